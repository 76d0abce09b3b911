/**
 * Database connection management
 */

import { existsSync } from "node:fs";
import { copyFile, mkdir, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import BetterSqlite3, { type Database } from "better-sqlite3";
import { errorMessage } from "../core/errors";
import { createLogger } from "../utils/logger";
import {
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
} from "./migrations";

const logger = createLogger("db");

let db: Database | null = null;
let openPath: string | null = null;

async function removeMigrationBackup(backupPath: string): Promise<void> {
  try {
    await unlink(backupPath);
  } catch (err) {
    logger.warn(`Could not remove migration backup ${backupPath}: ${errorMessage(err)}`);
  }
}

export async function initDatabase(dbPath: string): Promise<Database> {
  if (db) {
    return db;
  }

  // Ensure parent directory exists
  await mkdir(dirname(dbPath), { recursive: true });

  if (existsSync(dbPath)) {
    // Open temporarily to check migration status
    const tempDb = new BetterSqlite3(dbPath);
    const currentVersion = getCurrentVersion(tempDb);
    const pending = getPendingMigrations(currentVersion);
    tempDb.close();

    if (pending.length > 0) {
      // Backup before migrations
      const backupPath = `${dbPath}.migration-backup`;
      logger.info(`Pending migrations detected (${pending.length}), creating backup...`);
      await copyFile(dbPath, backupPath);

      try {
        db = new BetterSqlite3(dbPath);
        initializeDatabase(db);
        openPath = dbPath;
        logger.info(`Migrations completed successfully (v${currentVersion} -> v${getLatestVersion()})`);

        await removeMigrationBackup(backupPath);
      } catch (err) {
        logger.error(`Migration failed: ${errorMessage(err)}`);
        logger.info("Rolling back database from backup...");

        if (db) {
          db.close();
          db = null;
          openPath = null;
        }

        await copyFile(backupPath, dbPath);
        await removeMigrationBackup(backupPath);

        throw new Error(`Database migration failed and was rolled back: ${errorMessage(err)}`);
      }

      return db;
    }
  }

  // No pending migrations or new database
  db = new BetterSqlite3(dbPath);
  initializeDatabase(db);
  openPath = dbPath;

  return db;
}

export function getDatabase(): Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

/**
 * Path of the open database file, null when closed
 */
export function getDatabasePath(): string | null {
  return openPath;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    openPath = null;
  }
}
