/**
 * Snapshot type definitions
 */

export const SNAPSHOT_CATEGORIES = ["daily", "frequent", "events", "manual"] as const;

export type SnapshotCategory = (typeof SNAPSHOT_CATEGORIES)[number];

export function isSnapshotCategory(value: unknown): value is SnapshotCategory {
  return SNAPSHOT_CATEGORIES.some((category) => category === value);
}

export const SNAPSHOT_FORMAT_VERSION = "1.0";

/**
 * Sidecar metadata written next to every snapshot as `<snapshot>.json`
 */
export interface SnapshotMetadata {
  timestamp: string;
  backup_type: SnapshotCategory;
  event_description: string | null;
  original_size: number;
  compressed_size: number;
  compression_ratio: number;
  /** SHA256 of the uncompressed store content */
  checksum?: string;
  version: string;
}

/**
 * A snapshot as reported by list(). Sidecar fields win over the
 * filesystem-derived ones when the sidecar can be read.
 */
export interface SnapshotRecord extends Partial<SnapshotMetadata> {
  file_path: string;
  file_name: string;
  backup_type: SnapshotCategory;
  timestamp: string;
  size: number;
}

export interface RestoreInfo {
  restoredFrom: string;
  /** Path of the pre-restore safety snapshot, null if it could not be taken */
  safetySnapshot: string | null;
  message: string;
}

export interface VerifyReport {
  filePath: string;
  decompressedSize: number;
  checksum: string;
  sizeMatches: boolean | null;
  checksumMatches: boolean | null;
  issues: string[];
}

export interface BackupStatus {
  enabled: boolean;
  backup_directory: string;
  total_backups: number;
  backup_counts: Record<SnapshotCategory, number>;
  recent_backups: SnapshotRecord[];
  last_backup: SnapshotRecord | null;
}
