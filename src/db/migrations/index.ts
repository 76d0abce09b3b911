import type { Database } from "better-sqlite3";
import type { Migration } from "../../types/database";

import { migration as m0001 } from "./0001_initial";
import { migration as m0002 } from "./0002_books_isbn_index";

const migrations: Migration[] = [m0001, m0002];

export function getAllMigrations(): Migration[] {
  return [...migrations].sort((a, b) => a.version - b.version);
}

export function getLatestVersion(): number {
  const all = getAllMigrations();
  const lastMigration = all[all.length - 1];
  return lastMigration ? lastMigration.version : 0;
}

export function getCurrentVersion(database: Database): number {
  try {
    const row = database
      .prepare<[], { version: number | null }>("SELECT MAX(version) as version FROM schema_version")
      .get();
    return row?.version ?? 0;
  } catch {
    // No schema_version table yet
    return 0;
  }
}

export function getPendingMigrations(currentVersion: number): Migration[] {
  return getAllMigrations().filter((m) => m.version > currentVersion);
}

function applyMigration(database: Database, migration: Migration): void {
  // Trigger bodies contain semicolons, so the script runs as a whole
  database.transaction(() => {
    database.exec(migration.up);
    database.prepare("INSERT INTO schema_version (version) VALUES (?)").run(migration.version);
  })();
}

export function runMigrations(database: Database): void {
  const currentVersion = getCurrentVersion(database);
  const pending = getPendingMigrations(currentVersion);

  for (const migration of pending) {
    applyMigration(database, migration);
  }
}

/**
 * Databases created before the cover cache existed lack books.cover_image
 */
function ensureCoverColumn(database: Database): void {
  const columns = database.prepare<[], { name: string }>("PRAGMA table_info(books)").all();
  if (!columns.some((c) => c.name === "cover_image")) {
    database.exec("ALTER TABLE books ADD COLUMN cover_image BLOB");
  }
}

export function initializeDatabase(database: Database): void {
  // The store is copied as a single file by the backup manager, so no WAL
  database.pragma("foreign_keys = ON");

  runMigrations(database);
  ensureCoverColumn(database);
}
