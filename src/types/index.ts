/**
 * Centralized type exports for ShelfKeeper
 */

// Snapshot types
export type {
  BackupStatus,
  RestoreInfo,
  SnapshotCategory,
  SnapshotMetadata,
  SnapshotRecord,
  VerifyReport,
} from "./backup";
export { isSnapshotCategory, SNAPSHOT_CATEGORIES, SNAPSHOT_FORMAT_VERSION } from "./backup";
// Config types
export type {
  BackupsConfig,
  CoversConfig,
  DatabaseConfig,
  LoggingConfig,
  RetentionConfig,
  ScheduleConfig,
  ServerConfig,
  ShelfkeeperConfig,
} from "./config";
// Cover types
export type {
  CoverImage,
  CoverSource,
  CoverSourceKind,
  CoverStore,
  RemoteCoverResponse,
} from "./cover";
// Database types
export type { BookCoverRecord, BookInsert, CoverEntry, Migration } from "./database";
