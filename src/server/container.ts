/**
 * Wiring of the services the HTTP layer and the CLI share
 */

import { BackupManager } from "../core/backup";
import { CoverFetcher, FetchGuard, type FetchImpl, OpenLibraryCoverClient } from "../core/cover";
import { closeDatabase, createCoverStore, initDatabase } from "../db";
import type { ShelfkeeperConfig } from "../types";

export interface ContainerOptions {
  /** Replaces global fetch for the cover service */
  fetchImpl?: FetchImpl;
  now?: () => Date;
}

export function createContainer(config: ShelfkeeperConfig, options: ContainerOptions = {}) {
  const backups = BackupManager.fromConfig(config, options.now);

  const covers = new CoverFetcher({
    store: createCoverStore(config.covers.noCoverMarker),
    source: OpenLibraryCoverClient.fromConfig(config.covers, options.fetchImpl),
    guard: new FetchGuard(config.covers.minIntervalMs),
    minImageBytes: config.covers.minImageBytes,
    enabled: config.covers.enabled,
  });

  return {
    config,
    backups,
    covers,
    openDatabase: async (): Promise<void> => {
      await initDatabase(config.database.path);
    },
    closeDatabase,
  };
}

export type Container = ReturnType<typeof createContainer>;
