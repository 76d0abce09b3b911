/**
 * Inline configuration parsing and merging utilities
 */

import type { ShelfkeeperConfig } from "../types";
import { DEFAULT_CONFIG, deepMerge } from "./defaults";
import { resolvePaths } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

/**
 * Inline configuration options that can be passed via CLI flags
 */
export interface InlineConfigOptions {
  /** Library database file path */
  database?: string;
  /** Root directory for snapshots */
  backupDir?: string;
  /** HTTP listen host */
  host?: string;
  /** HTTP listen port */
  port?: number;
  /** Disable on-demand cover fetching */
  noCovers?: boolean;
}

/**
 * CLI option definitions for inline config (for parseArgs)
 */
export const INLINE_CONFIG_OPTIONS = {
  database: { type: "string" as const },
  "backup-dir": { type: "string" as const },
  host: { type: "string" as const },
  port: { type: "string" as const },
  "no-covers": { type: "boolean" as const, default: false },
} as const;

function stringValue(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Extract inline config options from parsed CLI values
 */
export function extractInlineOptions(values: Record<string, unknown>): InlineConfigOptions {
  const port = stringValue(values.port);
  const parsedPort = port !== undefined ? Number.parseInt(port, 10) : undefined;
  if (parsedPort !== undefined && Number.isNaN(parsedPort)) {
    throw new ConfigError(`--port must be a number, got "${port}"`);
  }

  return {
    database: stringValue(values.database),
    backupDir: stringValue(values["backup-dir"]),
    host: stringValue(values.host),
    port: parsedPort,
    noCovers: values["no-covers"] === true,
  };
}

/**
 * Check if any inline config options were provided
 */
export function hasInlineOptions(options: InlineConfigOptions): boolean {
  return Boolean(
    options.database ||
      options.backupDir ||
      options.host ||
      options.port !== undefined ||
      options.noCovers,
  );
}

/**
 * Build a partial config from inline options
 */
export function buildInlineConfig(options: InlineConfigOptions): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  if (options.database) {
    config.database = { path: options.database };
  }

  if (options.backupDir) {
    config.backups = { path: options.backupDir };
  }

  if (options.host || options.port !== undefined) {
    config.server = {
      ...(options.host && { host: options.host }),
      ...(options.port !== undefined && { port: options.port }),
    };
  }

  if (options.noCovers) {
    config.covers = { enabled: false };
  }

  return config;
}

/**
 * Merge inline config options into an existing config
 */
export function mergeInlineConfig(
  baseConfig: ShelfkeeperConfig,
  inlineOptions: InlineConfigOptions,
): ShelfkeeperConfig {
  const merged = deepMerge({ ...baseConfig }, buildInlineConfig(inlineOptions));
  validateConfig(merged);
  return resolvePaths(merged);
}

/**
 * Check if inline options can support config-free mode.
 * The database path is the only thing with no sensible default.
 */
export function canRunWithoutConfigFile(options: InlineConfigOptions): boolean {
  return Boolean(options.database);
}

/**
 * Create a complete config from inline options only (no config file).
 * Relative paths resolve against the working directory.
 */
export function createConfigFromInlineOptions(options: InlineConfigOptions): ShelfkeeperConfig {
  if (!canRunWithoutConfigFile(options)) {
    throw new ConfigError("--database is required when running without a config file");
  }

  const merged = deepMerge(
    { ...DEFAULT_CONFIG, version: "1.0" },
    buildInlineConfig(options),
  );
  validateConfig(merged);
  return resolvePaths(merged);
}
