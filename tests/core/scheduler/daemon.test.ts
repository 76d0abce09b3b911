import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createConfigFromInlineOptions } from "../../../src/config";
import { BackupManager } from "../../../src/core/backup";
import { fail, ok } from "../../../src/core/errors";
import { Scheduler } from "../../../src/core/scheduler";
import type { ShelfkeeperConfig, SnapshotCategory, SnapshotRecord } from "../../../src/types";

function createTestConfig(schedules: ShelfkeeperConfig["schedules"]): ShelfkeeperConfig {
  const base = createConfigFromInlineOptions({
    database: "/tmp/shelfkeeper-scheduler-test/library.db",
    backupDir: "/tmp/shelfkeeper-scheduler-test/backups",
  });
  return { ...base, schedules };
}

function record(category: SnapshotCategory): SnapshotRecord {
  return {
    file_path: `/tmp/shelfkeeper-scheduler-test/backups/${category}/library_backup_20261018_020000.db.gz`,
    file_name: "library_backup_20261018_020000.db.gz",
    backup_type: category,
    timestamp: new Date(2026, 9, 18, 2, 0, 0).toISOString(),
    size: 120,
  };
}

describe("Scheduler", () => {
  let manager: BackupManager;

  beforeEach(() => {
    manager = BackupManager.fromConfig(createTestConfig({}));
    vi.spyOn(manager, "create").mockImplementation(async (category) => ok(record(category)));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function at(date: Date): () => Date {
    return () => new Date(date.getTime());
  }

  describe("constructor", () => {
    test("parses the default daily and frequent schedules", () => {
      const scheduler = new Scheduler(
        createTestConfig({ daily: { cron: "0 2 * * *" }, frequent: { cron: "0 * * * *" } }),
        manager,
      );

      expect(scheduler.size).toBe(2);
      expect(scheduler.getStatus().map((s) => s.category)).toEqual(["daily", "frequent"]);
    });

    test("skips invalid expressions", () => {
      const scheduler = new Scheduler(
        createTestConfig({ daily: { cron: "every night" }, frequent: { cron: "0 * * * *" } }),
        manager,
      );

      expect(scheduler.getStatus().map((s) => s.category)).toEqual(["frequent"]);
      expect(console.error).toHaveBeenCalled();
    });

    test("has nothing to do without schedules", () => {
      expect(new Scheduler(createTestConfig({}), manager).size).toBe(0);
    });
  });

  describe("getStatus", () => {
    test("reports the next run of each schedule", () => {
      const scheduler = new Scheduler(
        createTestConfig({ daily: { cron: "0 2 * * *" }, frequent: { cron: "0 * * * *" } }),
        manager,
        at(new Date(2026, 9, 18, 14, 30, 0)),
      );

      expect(scheduler.getStatus()).toEqual([
        {
          category: "daily",
          cron: "0 2 * * *",
          lastRun: null,
          nextRun: new Date(2026, 9, 19, 2, 0, 0),
        },
        {
          category: "frequent",
          cron: "0 * * * *",
          lastRun: null,
          nextRun: new Date(2026, 9, 18, 15, 0, 0),
        },
      ]);
    });
  });

  describe("checkSchedules", () => {
    test("creates a snapshot for every schedule due this minute", async () => {
      const scheduler = new Scheduler(
        createTestConfig({ daily: { cron: "0 2 * * *" }, frequent: { cron: "0 * * * *" } }),
        manager,
        at(new Date(2026, 9, 18, 2, 0, 30)),
      );

      await scheduler.checkSchedules();

      expect(manager.create).toHaveBeenCalledTimes(2);
      expect(manager.create).toHaveBeenNthCalledWith(1, "daily");
      expect(manager.create).toHaveBeenNthCalledWith(2, "frequent");
      expect(scheduler.getStatus()[0]?.lastRun).toEqual(new Date(2026, 9, 18, 2, 0, 0));
    });

    test("runs a schedule at most once per minute", async () => {
      const scheduler = new Scheduler(
        createTestConfig({ frequent: { cron: "0 * * * *" } }),
        manager,
        at(new Date(2026, 9, 18, 14, 0, 5)),
      );

      await scheduler.checkSchedules();
      await scheduler.checkSchedules();

      expect(manager.create).toHaveBeenCalledTimes(1);
    });

    test("does nothing outside the schedule", async () => {
      const scheduler = new Scheduler(
        createTestConfig({ daily: { cron: "0 2 * * *" }, frequent: { cron: "0 * * * *" } }),
        manager,
        at(new Date(2026, 9, 18, 14, 30, 0)),
      );

      await scheduler.checkSchedules();

      expect(manager.create).not.toHaveBeenCalled();
    });

    test("logs a failed snapshot and carries on", async () => {
      vi.mocked(manager.create).mockImplementation(async () =>
        fail("SourceMissing", "Database file not found: /tmp/library.db"),
      );
      const scheduler = new Scheduler(
        createTestConfig({ daily: { cron: "0 2 * * *" }, frequent: { cron: "0 * * * *" } }),
        manager,
        at(new Date(2026, 9, 18, 2, 0, 0)),
      );

      await expect(scheduler.checkSchedules()).resolves.toBeUndefined();

      expect(manager.create).toHaveBeenCalledTimes(2);
      expect(console.error).toHaveBeenCalledTimes(2);
    });
  });

  describe("start / stop", () => {
    test("runs the first check on start and stops cleanly", async () => {
      const scheduler = new Scheduler(
        createTestConfig({ frequent: { cron: "0 * * * *" } }),
        manager,
        at(new Date(2026, 9, 18, 14, 0, 0)),
      );

      scheduler.start();
      await scheduler.stop();

      expect(manager.create).toHaveBeenCalledWith("frequent");
    });

    test("stop without start is a no-op", async () => {
      const scheduler = new Scheduler(createTestConfig({}), manager);

      await expect(scheduler.stop()).resolves.toBeUndefined();
    });
  });
});
