import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  compressionRatio,
  metadataPathFor,
  readSidecar,
  writeSidecar,
} from "../../../src/core/backup";
import type { SnapshotMetadata } from "../../../src/types";

describe("snapshot metadata", () => {
  let tempDir: string;
  let snapshotPath: string;

  const metadata: SnapshotMetadata = {
    timestamp: "2026-10-18T12:03:09.000Z",
    backup_type: "events",
    event_description: "bulk import",
    original_size: 1000,
    compressed_size: 120,
    compression_ratio: 0.12,
    version: "1.0",
  };

  beforeEach(async () => {
    tempDir = path.join(os.tmpdir(), `shelfkeeper-metadata-test-${Date.now()}`);
    snapshotPath = path.join(tempDir, "library_backup_20261018_140309_bulk_import.db.gz");
    await mkdir(tempDir, { recursive: true });
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  test("metadataPathFor appends .json", () => {
    expect(metadataPathFor("/srv/a.db.gz")).toBe("/srv/a.db.gz.json");
  });

  describe("compressionRatio", () => {
    test("rounds to two decimals", () => {
      expect(compressionRatio(1000, 120)).toBe(0.12);
      expect(compressionRatio(3, 1)).toBe(0.33);
    });

    test("is zero for an empty store", () => {
      expect(compressionRatio(0, 20)).toBe(0);
    });
  });

  test("writeSidecar writes pretty JSON and leaves no partial file", async () => {
    await writeSidecar(snapshotPath, metadata);

    const content = await readFile(`${snapshotPath}.json`, "utf8");
    expect(content).toBe(`${JSON.stringify(metadata, null, 2)}\n`);
    expect(await readdir(tempDir)).toEqual([`${path.basename(snapshotPath)}.json`]);
  });

  test("readSidecar reads back what was written", async () => {
    await writeSidecar(snapshotPath, metadata);

    expect(await readSidecar(snapshotPath)).toEqual(metadata);
  });

  test("readSidecar returns null for a missing file", async () => {
    expect(await readSidecar(snapshotPath)).toBeNull();
  });

  test("readSidecar returns null for invalid JSON", async () => {
    await writeFile(`${snapshotPath}.json`, "{ not json");

    expect(await readSidecar(snapshotPath)).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  test("readSidecar returns null for an unknown category", async () => {
    await writeFile(`${snapshotPath}.json`, JSON.stringify({ backup_type: "weekly" }));

    expect(await readSidecar(snapshotPath)).toBeNull();
  });

  test("readSidecar accepts partial metadata", async () => {
    await writeFile(`${snapshotPath}.json`, JSON.stringify({ backup_type: "daily" }));

    expect(await readSidecar(snapshotPath)).toEqual({ backup_type: "daily" });
  });
});
