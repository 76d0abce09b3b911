/**
 * Configuration type definitions for ShelfKeeper
 */

import type { LogLevel } from "../utils/logger";
import type { SnapshotCategory } from "./backup";

export interface DatabaseConfig {
  path: string;
}

export type RetentionConfig = Record<SnapshotCategory, number>;

export interface BackupsConfig {
  enabled: boolean;
  path: string;
  prefix: string;
  compression: number;
  retention: RetentionConfig;
}

export interface ScheduleConfig {
  cron: string;
  timezone?: string;
}

export interface CoversConfig {
  enabled: boolean;
  /** Base URL the cleaned ISBN and size code are appended to */
  baseUrl: string;
  /** Size code understood by the cover service (S, M or L) */
  size: string;
  /** Minimum spacing between two remote fetches, process-wide */
  minIntervalMs: number;
  timeoutMs: number;
  /** Bodies smaller than this are treated as placeholder images */
  minImageBytes: number;
  userAgent: string;
  /** Value stored in place of image bytes once the service confirms there is no cover */
  noCoverMarker: string;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

export interface ShelfkeeperConfig {
  version: string;
  database: DatabaseConfig;
  backups: BackupsConfig;
  schedules: Partial<Record<SnapshotCategory, ScheduleConfig>>;
  covers: CoversConfig;
  server: ServerConfig;
  logging: LoggingConfig;
}
