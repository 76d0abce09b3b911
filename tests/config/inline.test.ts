import * as path from "node:path";
import { describe, expect, test } from "vitest";
import {
  buildInlineConfig,
  canRunWithoutConfigFile,
  createConfigFromInlineOptions,
  extractInlineOptions,
  hasInlineOptions,
  mergeInlineConfig,
} from "../../src/config/inline";
import { ConfigError } from "../../src/config/validator";

describe("inline config", () => {
  describe("extractInlineOptions", () => {
    test("maps parsed flags to options", () => {
      const options = extractInlineOptions({
        database: "library.db",
        "backup-dir": "snapshots",
        host: "127.0.0.1",
        port: "8080",
        "no-covers": true,
        verbose: true,
      });

      expect(options).toEqual({
        database: "library.db",
        backupDir: "snapshots",
        host: "127.0.0.1",
        port: 8080,
        noCovers: true,
      });
    });

    test("treats empty strings as absent", () => {
      const options = extractInlineOptions({ database: "", "no-covers": false });

      expect(options.database).toBeUndefined();
      expect(options.noCovers).toBe(false);
    });

    test("rejects a non-numeric port", () => {
      expect(() => extractInlineOptions({ port: "http" })).toThrow(ConfigError);
      expect(() => extractInlineOptions({ port: "http" })).toThrow(
        '--port must be a number, got "http"',
      );
    });
  });

  describe("hasInlineOptions", () => {
    test("is false without options", () => {
      expect(hasInlineOptions({})).toBe(false);
      expect(hasInlineOptions({ noCovers: false })).toBe(false);
    });

    test("is true for any option", () => {
      expect(hasInlineOptions({ port: 0 })).toBe(true);
      expect(hasInlineOptions({ noCovers: true })).toBe(true);
      expect(hasInlineOptions({ backupDir: "snapshots" })).toBe(true);
    });
  });

  describe("buildInlineConfig", () => {
    test("builds only the sections that were given", () => {
      expect(buildInlineConfig({ port: 8080, noCovers: true })).toEqual({
        server: { port: 8080 },
        covers: { enabled: false },
      });
    });

    test("returns an empty object without options", () => {
      expect(buildInlineConfig({})).toEqual({});
    });
  });

  describe("canRunWithoutConfigFile", () => {
    test("needs a database path", () => {
      expect(canRunWithoutConfigFile({ database: "library.db" })).toBe(true);
      expect(canRunWithoutConfigFile({ backupDir: "snapshots" })).toBe(false);
    });
  });

  describe("createConfigFromInlineOptions", () => {
    test("builds a full config from defaults", () => {
      const config = createConfigFromInlineOptions({ database: "library.db" });

      expect(config.version).toBe("1.0");
      expect(config.database.path).toBe(path.resolve("library.db"));
      expect(config.backups.path).toBe(path.resolve("backups"));
      expect(config.covers.enabled).toBe(true);
      expect(Object.keys(config.schedules)).toEqual(["daily", "frequent"]);
    });

    test("applies the other flags", () => {
      const config = createConfigFromInlineOptions({
        database: "/srv/library.db",
        backupDir: "/srv/snapshots",
        noCovers: true,
      });

      expect(config.database.path).toBe("/srv/library.db");
      expect(config.backups.path).toBe("/srv/snapshots");
      expect(config.covers.enabled).toBe(false);
    });

    test("throws without a database path", () => {
      expect(() => createConfigFromInlineOptions({ port: 8080 })).toThrow(
        "--database is required when running without a config file",
      );
    });
  });

  describe("mergeInlineConfig", () => {
    test("overrides only the given values", () => {
      const base = createConfigFromInlineOptions({ database: "/srv/library.db" });

      const merged = mergeInlineConfig(base, { port: 8080, noCovers: true });

      expect(merged.server).toEqual({ host: "0.0.0.0", port: 8080 });
      expect(merged.covers.enabled).toBe(false);
      expect(merged.covers.baseUrl).toBe(base.covers.baseUrl);
      expect(merged.database.path).toBe("/srv/library.db");
    });

    test("validates the merged config", () => {
      const base = createConfigFromInlineOptions({ database: "/srv/library.db" });

      expect(() => mergeInlineConfig(base, { port: 70000 })).toThrow(
        "server.port must be an integer between 0 and 65535",
      );
    });
  });
});
