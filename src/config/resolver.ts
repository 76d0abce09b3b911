/**
 * Configuration path resolution
 */

import * as path from "node:path";
import type { ShelfkeeperConfig, SnapshotCategory } from "../types";

/**
 * Resolve relative paths in config to absolute paths, relative to the
 * directory holding the config file (or the working directory).
 */
export function resolvePaths(config: ShelfkeeperConfig, configPath?: string): ShelfkeeperConfig {
  const baseDir = configPath ? path.dirname(path.resolve(configPath)) : process.cwd();

  return {
    ...config,
    database: { ...config.database, path: path.resolve(baseDir, config.database.path) },
    backups: { ...config.backups, path: path.resolve(baseDir, config.backups.path) },
  };
}

/**
 * Number of snapshots kept for a category
 */
export function getRetentionLimit(config: ShelfkeeperConfig, category: SnapshotCategory): number {
  return config.backups.retention[category];
}
