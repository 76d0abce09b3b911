/**
 * Backup manager: compressed, categorized snapshots of the library store
 */

import { existsSync } from "node:fs";
import { mkdir, readdir, rename, rm, stat } from "node:fs/promises";
import * as path from "node:path";
import { DEFAULT_RETENTION } from "../../config/defaults";
import {
  type BackupStatus,
  type RestoreInfo,
  type RetentionConfig,
  isSnapshotCategory,
  SNAPSHOT_CATEGORIES,
  SNAPSHOT_FORMAT_VERSION,
  type ShelfkeeperConfig,
  type SnapshotCategory,
  type SnapshotMetadata,
  type SnapshotRecord,
  type VerifyReport,
} from "../../types";
import { formatBytes, formatDuration } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import {
  DEFAULT_SNAPSHOT_PREFIX,
  generateSnapshotName,
  isValidSnapshotName,
} from "../../utils/naming";
import { isPathWithinDir, uniqueTempPath } from "../../utils/path";
import { errorMessage, fail, type Outcome, ok } from "../errors";
import { compressionRatio, metadataPathFor, readSidecar, writeSidecar } from "./metadata";
import { getPruneCandidates, type SnapshotFile } from "./retention";
import {
  compressFile,
  decompressFile,
  type InspectResult,
  inspectSnapshot,
} from "./snapshot-writer";

const logger = createLogger("backup");

export const SAFETY_SNAPSHOT_DESCRIPTION = "pre-restore backup";

const RECENT_BACKUPS_LIMIT = 10;

export interface BackupManagerOptions {
  /** Library database file that gets snapshotted */
  storePath: string;
  /** Root directory, one subdirectory per category */
  backupDir: string;
  enabled?: boolean;
  prefix?: string;
  /** gzip level 0-9 */
  compression?: number;
  retention?: RetentionConfig;
  now?: () => Date;
}

export class BackupManager {
  readonly storePath: string;
  readonly backupDir: string;
  readonly enabled: boolean;
  private readonly prefix: string;
  private readonly compression: number;
  private readonly retention: RetentionConfig;
  private readonly now: () => Date;
  private readonly pending = new Set<Promise<void>>();
  /** Snapshots being restored from, with the number of restores reading each; never pruned */
  private readonly inUse = new Map<string, number>();

  constructor(options: BackupManagerOptions) {
    this.storePath = path.resolve(options.storePath);
    this.backupDir = path.resolve(options.backupDir);
    this.enabled = options.enabled ?? true;
    this.prefix = options.prefix ?? DEFAULT_SNAPSHOT_PREFIX;
    this.compression = options.compression ?? 6;
    this.retention = options.retention ?? { ...DEFAULT_RETENTION };
    this.now = options.now ?? (() => new Date());
  }

  static fromConfig(config: ShelfkeeperConfig, now?: () => Date): BackupManager {
    return new BackupManager({
      storePath: config.database.path,
      backupDir: config.backups.path,
      enabled: config.backups.enabled,
      prefix: config.backups.prefix,
      compression: config.backups.compression,
      retention: config.backups.retention,
      now,
    });
  }

  categoryDir(category: SnapshotCategory): string {
    return path.join(this.backupDir, category);
  }

  /**
   * Snapshot the store into the category directory, then prune the category.
   */
  async create(
    category: SnapshotCategory,
    description?: string | null,
  ): Promise<Outcome<SnapshotRecord>> {
    if (!this.enabled) {
      logger.debug(`Backups disabled, skipping ${category} snapshot`);
      return fail("Disabled", "Backups are disabled");
    }

    if (!existsSync(this.storePath)) {
      logger.error(`Database file not found: ${this.storePath}`);
      return fail("SourceMissing", `Database file not found: ${this.storePath}`);
    }

    const startTime = Date.now();
    const createdAt = this.now();
    const dir = this.categoryDir(category);
    const fileName = generateSnapshotName(createdAt, description, this.prefix);
    const filePath = path.join(dir, fileName);
    const partialPath = uniqueTempPath(filePath, "partial");

    let metadata: SnapshotMetadata;
    try {
      await mkdir(dir, { recursive: true });
      const result = await compressFile(this.storePath, partialPath, this.compression);
      await rename(partialPath, filePath);

      metadata = {
        timestamp: createdAt.toISOString(),
        backup_type: category,
        event_description: description ?? null,
        original_size: result.originalSize,
        compressed_size: result.compressedSize,
        compression_ratio: compressionRatio(result.originalSize, result.compressedSize),
        checksum: result.checksum,
        version: SNAPSHOT_FORMAT_VERSION,
      };
    } catch (err) {
      await discard(partialPath);
      logger.error(`Backup failed (${category}): ${errorMessage(err)}`);
      return fail("StorageError", `Backup failed: ${errorMessage(err)}`);
    }

    try {
      await writeSidecar(filePath, metadata);
    } catch (err) {
      // The snapshot stays usable, list() falls back to filesystem fields
      logger.warn(`Could not write metadata for ${fileName}: ${errorMessage(err)}`);
    }

    await this.prune(category);

    logger.info(
      `Backup created: ${filePath} (${category}, ${formatBytes(metadata.compressed_size)}, ${formatDuration(Date.now() - startTime)})`,
    );

    return ok({
      ...metadata,
      file_path: filePath,
      file_name: fileName,
      size: metadata.compressed_size,
    });
  }

  /**
   * Delete the oldest snapshots of a category beyond its retention limit.
   * Returns the removed snapshot paths; individual failures are logged and skipped.
   */
  async prune(category: SnapshotCategory): Promise<string[]> {
    const files = await this.scanCategory(category);
    const candidates = getPruneCandidates(files, this.retention[category]).filter(
      (candidate) => !this.inUse.has(candidate.path),
    );
    const removed: string[] = [];

    for (const candidate of candidates) {
      try {
        await rm(candidate.path);
        await rm(metadataPathFor(candidate.path), { force: true });
        removed.push(candidate.path);
        logger.info(`Removed old backup: ${candidate.path}`);
      } catch (err) {
        logger.warn(`Failed to remove ${candidate.path}: ${errorMessage(err)}`);
      }
    }

    return removed;
  }

  /**
   * Replace the store with a snapshot's content. A safety snapshot of the
   * current store is attempted first; its failure does not stop the restore.
   * Callers must reopen and migrate the database afterwards.
   */
  async restore(snapshotPath: string): Promise<Outcome<RestoreInfo>> {
    const source = await this.resolveSnapshot(snapshotPath);
    if (!source) {
      logger.warn(`Restore requested for unknown backup: ${snapshotPath}`);
      return fail("NotFound", "Backup file not found");
    }

    this.inUse.set(source, (this.inUse.get(source) ?? 0) + 1);
    let safety: Outcome<SnapshotRecord>;
    try {
      safety = await this.create("events", SAFETY_SNAPSHOT_DESCRIPTION);
      if (safety.success) {
        logger.info(`Safety snapshot taken: ${safety.value.file_path}`);
      } else {
        logger.warn(`Safety snapshot failed (${safety.error.kind}): ${safety.error.message}`);
      }

      const tempPath = uniqueTempPath(this.storePath, "restore-tmp");
      try {
        await mkdir(path.dirname(this.storePath), { recursive: true });
        await decompressFile(source, tempPath);
        await rename(tempPath, this.storePath);
      } catch (err) {
        await discard(tempPath);
        logger.error(`Restore failed: ${errorMessage(err)}`);
        return fail("StorageError", `Restore failed: ${errorMessage(err)}`);
      }
    } finally {
      this.release(source);
      // The safety snapshot's prune skipped the source; catch up now it is released
      const sourceCategory = path.basename(path.dirname(source));
      await this.prune("events");
      if (isSnapshotCategory(sourceCategory) && sourceCategory !== "events") {
        await this.prune(sourceCategory);
      }
    }

    logger.info(`Database restored from: ${source}`);

    return ok({
      restoredFrom: source,
      safetySnapshot: safety.success ? safety.value.file_path : null,
      message: "Database restored successfully",
    });
  }

  /**
   * All snapshots across categories, newest first
   */
  async list(): Promise<SnapshotRecord[]> {
    const records: SnapshotRecord[] = [];

    for (const category of SNAPSHOT_CATEGORIES) {
      for (const file of await this.scanCategory(category)) {
        records.push(await this.toRecord(category, file));
      }
    }

    return records.sort((a, b) => {
      const diff = timestampValue(b.timestamp) - timestampValue(a.timestamp);
      if (diff !== 0) return diff;
      return b.file_name < a.file_name ? -1 : b.file_name > a.file_name ? 1 : 0;
    });
  }

  /**
   * Start a snapshot without waiting for it. The outcome is only logged.
   */
  triggerAsync(category: SnapshotCategory, description: string): void {
    const task: Promise<void> = this.create(category, description)
      .then((outcome) => {
        if (!outcome.success && outcome.error.kind !== "Disabled") {
          logger.warn(`Event backup "${description}" failed: ${outcome.error.message}`);
        }
      })
      .catch((err: unknown) => {
        logger.error(`Event backup "${description}" failed:`, err);
      })
      .finally(() => {
        this.pending.delete(task);
      });

    this.pending.add(task);
  }

  /**
   * Wait for every snapshot started by triggerAsync
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  async status(): Promise<BackupStatus> {
    const backups = await this.list();

    const counts: Record<SnapshotCategory, number> = { daily: 0, frequent: 0, events: 0, manual: 0 };
    for (const backup of backups) {
      counts[backup.backup_type] += 1;
    }

    return {
      enabled: this.enabled,
      backup_directory: this.backupDir,
      total_backups: backups.length,
      backup_counts: counts,
      recent_backups: backups.slice(0, RECENT_BACKUPS_LIMIT),
      last_backup: backups[0] ?? null,
    };
  }

  /**
   * Decompress a snapshot fully and compare it with its sidecar
   */
  async verify(snapshotPath: string): Promise<Outcome<VerifyReport>> {
    const source = await this.resolveSnapshot(snapshotPath);
    if (!source) {
      return fail("NotFound", "Backup file not found");
    }

    let inspected: InspectResult;
    try {
      inspected = await inspectSnapshot(source);
    } catch (err) {
      logger.error(`Verification failed for ${source}: ${errorMessage(err)}`);
      return fail("StorageError", `Snapshot is unreadable: ${errorMessage(err)}`);
    }

    const sidecar = await readSidecar(source);
    const issues: string[] = [];

    let sizeMatches: boolean | null = null;
    let checksumMatches: boolean | null = null;

    if (!sidecar) {
      issues.push("Metadata file missing or unreadable");
    } else {
      if (sidecar.original_size !== undefined) {
        sizeMatches = sidecar.original_size === inspected.decompressedSize;
        if (!sizeMatches) {
          issues.push(
            `Size mismatch: metadata says ${sidecar.original_size} bytes, snapshot holds ${inspected.decompressedSize}`,
          );
        }
      }
      if (sidecar.checksum !== undefined) {
        checksumMatches = sidecar.checksum === inspected.checksum;
        if (!checksumMatches) {
          issues.push("Checksum mismatch");
        }
      }
    }

    return ok({
      filePath: source,
      decompressedSize: inspected.decompressedSize,
      checksum: inspected.checksum,
      sizeMatches,
      checksumMatches,
      issues,
    });
  }

  private release(source: string): void {
    const readers = (this.inUse.get(source) ?? 1) - 1;
    if (readers > 0) {
      this.inUse.set(source, readers);
    } else {
      this.inUse.delete(source);
    }
  }

  /**
   * Resolve a snapshot reference (absolute, or relative to the backup
   * directory) to an existing snapshot file inside the backup directory.
   */
  private async resolveSnapshot(snapshotPath: string): Promise<string | null> {
    const resolved = path.resolve(this.backupDir, snapshotPath);

    if (!isPathWithinDir(resolved, this.backupDir)) return null;
    if (!isValidSnapshotName(path.basename(resolved), this.prefix)) return null;

    try {
      const stats = await stat(resolved);
      return stats.isFile() ? resolved : null;
    } catch {
      return null;
    }
  }

  private async scanCategory(category: SnapshotCategory): Promise<SnapshotFile[]> {
    const dir = this.categoryDir(category);

    let names: string[];
    try {
      names = await readdir(dir);
    } catch (err) {
      if (isNotFound(err)) return [];
      logger.warn(`Could not read ${dir}: ${errorMessage(err)}`);
      return [];
    }

    const files: SnapshotFile[] = [];
    for (const name of names) {
      if (!isValidSnapshotName(name, this.prefix)) continue;

      const filePath = path.join(dir, name);
      try {
        const stats = await stat(filePath);
        if (stats.isFile()) {
          files.push({ path: filePath, name, mtimeMs: stats.mtimeMs, size: stats.size });
        }
      } catch (err) {
        // Removed between readdir and stat
        logger.debug(`Skipping ${filePath}: ${errorMessage(err)}`);
      }
    }

    return files;
  }

  private async toRecord(category: SnapshotCategory, file: SnapshotFile): Promise<SnapshotRecord> {
    const base: SnapshotRecord = {
      file_path: file.path,
      file_name: file.name,
      backup_type: category,
      timestamp: new Date(file.mtimeMs).toISOString(),
      size: file.size,
    };

    const sidecar = await readSidecar(file.path);
    return sidecar ? { ...base, ...sidecar } : base;
  }
}

async function discard(filePath: string): Promise<void> {
  try {
    await rm(filePath, { force: true });
  } catch (err) {
    logger.warn(`Could not remove ${filePath}: ${errorMessage(err)}`);
  }
}

function timestampValue(timestamp: string): number {
  const value = Date.parse(timestamp);
  return Number.isNaN(value) ? 0 : value;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
