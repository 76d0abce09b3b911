/**
 * Config resolution shared by the commands
 */

import {
  ConfigError,
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  findAndLoadConfig,
  hasInlineOptions,
  mergeInlineConfig,
} from "../config/loader";
import type { ShelfkeeperConfig } from "../types";
import { setLogLevel } from "../utils/logger";
import { ui } from "./ui";

export interface CommandConfigValues {
  config?: string;
  verbose?: boolean;
  [key: string]: unknown;
}

/**
 * Load the config file (or build one from inline flags), apply inline
 * overrides and the log level. Prints the problem and returns null when no
 * usable config can be assembled.
 */
export async function loadCommandConfig(
  values: CommandConfigValues,
): Promise<ShelfkeeperConfig | null> {
  const inlineOptions = extractInlineOptions(values);
  let config: ShelfkeeperConfig;

  try {
    config = await findAndLoadConfig(values.config);
    if (hasInlineOptions(inlineOptions)) {
      config = mergeInlineConfig(config, inlineOptions);
    }
  } catch (error) {
    // Without an explicit --config, --database alone is enough
    if (!(error instanceof ConfigError) || values.config) {
      throw error;
    }
    if (!canRunWithoutConfigFile(inlineOptions)) {
      ui.error(error.message);
      ui.info("Either create shelfkeeper.config.yaml or pass --database <path>.");
      return null;
    }
    config = createConfigFromInlineOptions(inlineOptions);
  }

  setLogLevel(values.verbose ? "debug" : config.logging.level);
  return config;
}

export const INLINE_OPTIONS_HELP = `      --database <path>     Library database file
      --backup-dir <path>   Snapshot root directory (default: ./backups)
      --host <host>         HTTP listen host (default: 0.0.0.0)
      --port <port>         HTTP listen port (default: 5000)
      --no-covers           Do not fetch missing covers from the cover service`;
