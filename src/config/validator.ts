/**
 * Configuration validation
 */

import { isSnapshotCategory, SNAPSHOT_CATEGORIES, type ShelfkeeperConfig } from "../types";
import { isLogLevel } from "../utils/logger";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type ConfigObject = Record<string, unknown>;

type Validator = (config: ConfigObject) => void;

function isObject(value: unknown): value is ConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(c: ConfigObject, name: string): ConfigObject {
  const value = c[name];
  if (!isObject(value)) {
    throw new ConfigError(`Config must have a '${name}' section`);
  }
  return value;
}

function requirePositiveInteger(value: unknown, field: string): void {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${field} must be a positive integer`);
  }
}

function requireString(value: unknown, field: string): void {
  if (!value || typeof value !== "string") {
    throw new ConfigError(`${field} must be a string`);
  }
}

const validators: Record<string, Validator> = {
  version: (c) => {
    if (!c.version || typeof c.version !== "string") {
      throw new ConfigError("Config must have a 'version' field");
    }
  },

  database: (c) => {
    const db = section(c, "database");
    requireString(db.path, "database.path");
  },

  backups: (c) => {
    const backups = section(c, "backups");
    if (typeof backups.enabled !== "boolean") {
      throw new ConfigError("backups.enabled must be a boolean");
    }
    requireString(backups.path, "backups.path");
    requireString(backups.prefix, "backups.prefix");
    if (typeof backups.prefix === "string" && !/^[A-Za-z0-9_-]+$/.test(backups.prefix)) {
      throw new ConfigError("backups.prefix may only contain letters, digits, '_' and '-'");
    }

    const compression = backups.compression;
    if (
      typeof compression !== "number" ||
      !Number.isInteger(compression) ||
      compression < 0 ||
      compression > 9
    ) {
      throw new ConfigError("backups.compression must be an integer between 0 and 9");
    }

    if (!isObject(backups.retention)) {
      throw new ConfigError("backups.retention must be an object");
    }
    for (const [category, limit] of Object.entries(backups.retention)) {
      if (!isSnapshotCategory(category)) {
        throw new ConfigError(
          `backups.retention.${category} is not a snapshot category (${SNAPSHOT_CATEGORIES.join(", ")})`,
        );
      }
      requirePositiveInteger(limit, `backups.retention.${category}`);
    }
  },

  schedules: (c) => {
    const schedules = section(c, "schedules");
    for (const [name, schedule] of Object.entries(schedules)) {
      if (!isSnapshotCategory(name)) {
        throw new ConfigError(
          `schedules.${name} is not a snapshot category (${SNAPSHOT_CATEGORIES.join(", ")})`,
        );
      }
      if (!isObject(schedule)) {
        throw new ConfigError(`schedules.${name} must be an object`);
      }
      requireString(schedule.cron, `schedules.${name}.cron`);
      if (schedule.timezone !== undefined && typeof schedule.timezone !== "string") {
        throw new ConfigError(`schedules.${name}.timezone must be a string`);
      }
    }
  },

  covers: (c) => {
    const covers = section(c, "covers");
    if (typeof covers.enabled !== "boolean") {
      throw new ConfigError("covers.enabled must be a boolean");
    }
    requireString(covers.baseUrl, "covers.baseUrl");
    if (typeof covers.baseUrl === "string" && !/^https?:\/\//.test(covers.baseUrl)) {
      throw new ConfigError("covers.baseUrl must be an http(s) URL");
    }
    requireString(covers.size, "covers.size");
    requireString(covers.userAgent, "covers.userAgent");
    requireString(covers.noCoverMarker, "covers.noCoverMarker");
    requirePositiveInteger(covers.timeoutMs, "covers.timeoutMs");
    requirePositiveInteger(covers.minImageBytes, "covers.minImageBytes");
    if (typeof covers.minIntervalMs !== "number" || covers.minIntervalMs < 0) {
      throw new ConfigError("covers.minIntervalMs must be a non-negative number");
    }
  },

  server: (c) => {
    const server = section(c, "server");
    requireString(server.host, "server.host");
    const port = server.port;
    if (typeof port !== "number" || !Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError("server.port must be an integer between 0 and 65535");
    }
  },

  logging: (c) => {
    const logging = section(c, "logging");
    if (!isLogLevel(logging.level)) {
      throw new ConfigError("logging.level must be one of: debug, info, warn, error");
    }
  },
};

/**
 * Validate a configuration object
 */
export function validateConfig(config: unknown): asserts config is ShelfkeeperConfig {
  if (!isObject(config)) {
    throw new ConfigError("Config must be an object");
  }

  for (const validate of Object.values(validators)) {
    validate(config);
  }
}
