/**
 * Default configuration values
 */

import type { ShelfkeeperConfig } from "../types";
import { DEFAULT_SNAPSHOT_PREFIX } from "../utils/naming";

export const DEFAULT_RETENTION = {
  daily: 7,
  frequent: 24,
  events: 10,
  manual: 5,
} as const;

export const DEFAULT_CONFIG: Omit<ShelfkeeperConfig, "version" | "database"> = {
  // version and database are intentionally NOT defaulted - they must be specified by the user
  backups: {
    enabled: true,
    path: "./backups",
    prefix: DEFAULT_SNAPSHOT_PREFIX,
    compression: 6,
    retention: { ...DEFAULT_RETENTION },
  },
  schedules: {
    daily: { cron: "0 2 * * *" },
    frequent: { cron: "0 * * * *" },
  },
  covers: {
    enabled: true,
    baseUrl: "https://covers.openlibrary.org/b/isbn",
    size: "L",
    minIntervalMs: 500,
    timeoutMs: 5000,
    minImageBytes: 500,
    userAgent: "ShelfKeeper/1.0 (Library Management System; on-demand cover fetch)",
    noCoverMarker: "NO_COVER",
  },
  server: {
    host: "0.0.0.0",
    port: 5000,
  },
  logging: {
    level: "info",
  },
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects, with source overriding target.
 * Arrays and scalars from source replace the target value.
 */
export function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}
