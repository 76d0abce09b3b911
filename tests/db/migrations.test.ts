import BetterSqlite3, { type Database } from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
  initializeDatabase,
} from "../../src/db/migrations";

describe("migrations", () => {
  let db: Database;

  beforeEach(() => {
    db = new BetterSqlite3(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  function objectNames(type: "table" | "index" | "trigger"): string[] {
    return db
      .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = ?")
      .all(type)
      .map((r) => r.name);
  }

  test("migrations are ordered by version", () => {
    expect(getAllMigrations().map((m) => m.version)).toEqual([1, 2]);
    expect(getLatestVersion()).toBe(2);
  });

  test("getCurrentVersion is 0 without a schema_version table", () => {
    expect(getCurrentVersion(db)).toBe(0);
  });

  test("getPendingMigrations returns the newer migrations", () => {
    expect(getPendingMigrations(0).map((m) => m.version)).toEqual([1, 2]);
    expect(getPendingMigrations(1).map((m) => m.version)).toEqual([2]);
    expect(getPendingMigrations(2)).toEqual([]);
  });

  test("initializeDatabase creates the library schema", () => {
    initializeDatabase(db);

    const tables = objectNames("table");
    for (const table of [
      "classes",
      "students",
      "books",
      "checkouts",
      "uauth",
      "uauth_cookies",
      "books_fts",
      "schema_version",
    ]) {
      expect(tables).toContain(table);
    }
    expect(objectNames("index")).toContain("idx_books_isbn");
    expect(objectNames("trigger").sort()).toEqual(["books_ad", "books_ai", "books_au"]);
    expect(getCurrentVersion(db)).toBe(2);
  });

  test("initializeDatabase turns on foreign keys", () => {
    initializeDatabase(db);
    expect(db.pragma("foreign_keys", { simple: true })).toBe(1);
  });

  test("initializeDatabase is idempotent", () => {
    initializeDatabase(db);
    initializeDatabase(db);

    const row = db
      .prepare<[], { count: number }>("SELECT COUNT(*) as count FROM schema_version")
      .get();
    expect(row?.count).toBe(2);
  });

  describe("search index triggers", () => {
    beforeEach(() => {
      initializeDatabase(db);
      db.prepare(
        "INSERT INTO books (localnumber, title, author) VALUES ('1042', 'Wind Atlas', 'R. Vale')",
      ).run();
    });

    function indexedTitle(): string | undefined {
      return db
        .prepare<[], { title: string }>("SELECT title FROM books_fts WHERE localnumber = '1042'")
        .get()?.title;
    }

    test("insert adds the book to the index", () => {
      expect(indexedTitle()).toBe("Wind Atlas");
    });

    test("title update is mirrored", () => {
      db.prepare("UPDATE books SET title = 'Tide Atlas' WHERE localnumber = '1042'").run();
      expect(indexedTitle()).toBe("Tide Atlas");
    });

    test("delete removes the book from the index", () => {
      db.prepare("DELETE FROM books WHERE localnumber = '1042'").run();
      expect(indexedTitle()).toBeUndefined();
    });
  });
});
