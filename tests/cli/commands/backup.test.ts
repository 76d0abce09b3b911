import { existsSync } from "node:fs";
import { mkdir, readdir, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { backupCommand } from "../../../src/cli/commands/backup";
import { restoreCommand } from "../../../src/cli/commands/restore";
import { verifyCommand } from "../../../src/cli/commands/verify";
import { closeDatabase, initDatabase, insertBook } from "../../../src/db";

describe("snapshot commands", () => {
  let tempDir: string;
  let storePath: string;
  let backupDir: string;

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `shelfkeeper-commands-test-${Date.now()}`);
    storePath = path.join(tempDir, "library.db");
    backupDir = path.join(tempDir, "backups");
    await mkdir(tempDir, { recursive: true });
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process.stdout, "write").mockImplementation(() => true);
  });

  afterEach(async () => {
    closeDatabase();
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  const inline = () => ["--database", storePath, "--backup-dir", backupDir];

  async function snapshotsIn(category: string): Promise<string[]> {
    const dir = path.join(backupDir, category);
    if (!existsSync(dir)) return [];
    return (await readdir(dir)).filter((name) => name.endsWith(".db.gz"));
  }

  describe("backup", () => {
    test("creates a snapshot of the given type", async () => {
      await writeFile(storePath, Buffer.alloc(1000, "a"));

      const code = await backupCommand([...inline(), "-t", "manual", "-d", "test"]);

      expect(code).toBe(0);
      const names = await snapshotsIn("manual");
      expect(names).toHaveLength(1);
      expect(names[0]).toMatch(/^library_backup_\d{8}_\d{6}_test\.db\.gz$/);
    });

    test("fails for an unknown type", async () => {
      await writeFile(storePath, Buffer.alloc(1000, "a"));

      expect(await backupCommand([...inline(), "-t", "weekly"])).toBe(1);
      expect(existsSync(backupDir)).toBe(false);
    });

    test("fails when the database file is missing", async () => {
      expect(await backupCommand([...inline(), "-t", "manual"])).toBe(1);
      expect(existsSync(backupDir)).toBe(false);
    });

    test("fails without a config file or database", async () => {
      expect(await backupCommand(["-t", "manual", "-c", path.join(tempDir, "missing.yaml")])).toBe(1);
    });
  });

  describe("verify", () => {
    test("passes for healthy snapshots", async () => {
      await writeFile(storePath, Buffer.alloc(1000, "a"));
      await backupCommand([...inline(), "-t", "daily"]);

      expect(await verifyCommand([...inline(), "--all"])).toBe(0);
    });

    test("fails when a snapshot is corrupt", async () => {
      const corrupt = path.join(backupDir, "daily", "library_backup_20260101_000000.db.gz");
      await mkdir(path.dirname(corrupt), { recursive: true });
      await writeFile(corrupt, "not gzip");

      expect(await verifyCommand([...inline(), corrupt])).toBe(1);
    });

    test("needs files or --all", async () => {
      expect(await verifyCommand(inline())).toBe(1);
    });
  });

  describe("restore", () => {
    test("restores a snapshot and migrates the restored database", async () => {
      await initDatabase(storePath);
      insertBook({ localnumber: "1042", title: "Wind Atlas", author: "R. Vale" });
      closeDatabase();
      await backupCommand([...inline(), "-t", "manual"]);
      const [snapshot] = await snapshotsIn("manual");

      await writeFile(storePath, "");
      const code = await restoreCommand([...inline(), "--yes", `manual/${snapshot ?? ""}`]);

      expect(code).toBe(0);
      const db = await initDatabase(storePath);
      const row = db
        .prepare<[], { title: string }>("SELECT title FROM books WHERE localnumber = '1042'")
        .get();
      expect(row?.title).toBe("Wind Atlas");
      expect(await snapshotsIn("events")).toHaveLength(1);
    });

    test("fails for an unknown snapshot", async () => {
      await writeFile(storePath, Buffer.alloc(10, "a"));

      const code = await restoreCommand([
        ...inline(),
        "--yes",
        "manual/library_backup_20200101_000000.db.gz",
      ]);

      expect(code).toBe(1);
    });
  });
});
