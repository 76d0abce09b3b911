/**
 * Configuration file loading
 */

import * as fs from "node:fs";
import { readFile } from "node:fs/promises";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { ShelfkeeperConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

// Re-export inline config utilities
export {
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  mergeInlineConfig,
} from "./inline";
export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = [
  "shelfkeeper.config.yaml",
  "shelfkeeper.config.yml",
  "shelfkeeper.config.json",
];

/**
 * Load and parse a config file
 */
export async function loadConfig(configPath: string): Promise<ShelfkeeperConfig> {
  const file = path.resolve(configPath);
  if (!fs.existsSync(file)) {
    throw new ConfigError(`Config file not found: ${file}`);
  }

  const fileConfig = parseConfigContent(
    await readFile(file, "utf8"),
    path.extname(file).toLowerCase(),
  );
  if (!isPlainObject(fileConfig)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = deepMerge({ ...DEFAULT_CONFIG }, fileConfig);

  // A schedules section in the file replaces the default schedules instead of extending them
  if (fileConfig.schedules !== undefined) {
    merged.schedules = fileConfig.schedules ?? {};
  }

  validateConfig(merged);

  return resolvePaths(merged, file);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

type ConfigParser = (content: string) => unknown;

const PARSERS: Record<string, { label: string; parse: ConfigParser }> = {
  ".yaml": { label: "YAML", parse: (content) => yaml.load(content) },
  ".yml": { label: "YAML", parse: (content) => yaml.load(content) },
  ".json": { label: "JSON", parse: (content) => JSON.parse(content) },
};

function parseConfigContent(content: string, ext: string): unknown {
  const parser = PARSERS[ext];
  if (!parser) {
    throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
  }

  try {
    return parser.parse(content);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(`Failed to parse ${parser.label}: ${reason}`);
  }
}

/**
 * First non-empty config file in `dir`, by CONFIG_FILE_NAMES order
 */
export function findConfigFile(dir: string = process.cwd()): string | null {
  const found = CONFIG_FILE_NAMES.map((name) => path.join(dir, name)).find((candidate) => {
    try {
      return fs.statSync(candidate).size > 0;
    } catch {
      return false;
    }
  });

  return found ?? null;
}

/**
 * Load the config named on the command line, then SHELFKEEPER_CONFIG, then
 * one found in the working directory
 */
export async function findAndLoadConfig(configPath?: string): Promise<ShelfkeeperConfig> {
  const explicit = configPath ?? process.env.SHELFKEEPER_CONFIG;
  if (explicit) {
    return loadConfig(explicit);
  }

  const found = findConfigFile();
  if (!found) {
    throw new ConfigError(
      "No config file found. Create shelfkeeper.config.yaml or specify --config path",
    );
  }

  return loadConfig(found);
}
