import { describe, expect, test } from "vitest";
import {
  formatSummary,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  snapshotOption,
} from "../../src/cli/ui";

function stripAnsi(text: string): string {
  return text.replace(/\x1b\[[0-9;]*m/g, "");
}

describe("CLI formatters", () => {
  describe("formatSummary", () => {
    test("aligns labels and skips empty values", () => {
      const summary = formatSummary([
        { label: "Verified", value: 3 },
        { label: "With issues", value: 0 },
        { label: "Description", value: null },
      ]);

      expect(stripAnsi(summary)).toBe("Verified     3\nWith issues  0");
    });

    test("returns an empty string without items", () => {
      expect(formatSummary([])).toBe("");
    });
  });

  describe("formatTableRow", () => {
    test("pads each column to its width", () => {
      expect(stripAnsi(formatTableRow(["a", "bb"], [3, 2]))).toBe("a   │ bb");
    });
  });

  describe("formatTableSeparator", () => {
    test("draws one rule per column", () => {
      expect(stripAnsi(formatTableSeparator([2, 3]))).toBe("───┼────");
    });
  });

  describe("formatTimestamp", () => {
    test("formats ISO timestamps in local time", () => {
      const iso = new Date(2026, 9, 18, 14, 3, 9).toISOString();
      expect(formatTimestamp(iso)).toBe("2026-10-18 14:03:09");
    });

    test("returns unparsable values unchanged", () => {
      expect(formatTimestamp("yesterday")).toBe("yesterday");
    });
  });

  describe("snapshotOption", () => {
    test("labels a snapshot for pickers", () => {
      const option = snapshotOption({
        file_path: "/srv/backups/manual/library_backup_20261018_140309.db.gz",
        file_name: "library_backup_20261018_140309.db.gz",
        backup_type: "manual",
        timestamp: new Date(2026, 9, 18, 14, 3, 9).toISOString(),
        size: 2048,
      });

      expect(option).toEqual({
        value: "/srv/backups/manual/library_backup_20261018_140309.db.gz",
        label: "library_backup_20261018_140309.db.gz",
        hint: "manual, 2026-10-18 14:03:09, 2.00 KB",
      });
    });
  });
});
