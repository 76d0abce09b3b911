import { describe, expect, test } from "vitest";
import { getNextRun, matchesCron, parseCron } from "../../../src/core/scheduler";

describe("cron parser", () => {
  describe("parseCron", () => {
    test("accepts five-field expressions", () => {
      expect(parseCron("0 2 * * *")).toEqual({ expression: "0 2 * * *", timezone: undefined });
      expect(parseCron("*/15 * * * *", "UTC")).toEqual({
        expression: "*/15 * * * *",
        timezone: "UTC",
      });
    });

    test("rejects the wrong number of fields", () => {
      expect(() => parseCron("0 2 * *")).toThrow(
        'Invalid cron expression: "0 2 * *". Expected 5 fields, got 4.',
      );
      expect(() => parseCron("0 0 2 * * *")).toThrow("Expected 5 fields, got 6.");
    });

    test("rejects out of range values", () => {
      expect(() => parseCron("61 * * * *")).toThrow();
    });
  });

  describe("matchesCron", () => {
    test("matches anywhere inside the firing minute", () => {
      const cron = parseCron("*/15 * * * *");

      expect(matchesCron(cron, new Date(2026, 9, 18, 10, 15, 0))).toBe(true);
      expect(matchesCron(cron, new Date(2026, 9, 18, 10, 15, 42))).toBe(true);
      expect(matchesCron(cron, new Date(2026, 9, 18, 10, 16, 0))).toBe(false);
    });

    test("daily schedule matches only at its hour", () => {
      const cron = parseCron("0 2 * * *");

      expect(matchesCron(cron, new Date(2026, 9, 18, 2, 0, 30))).toBe(true);
      expect(matchesCron(cron, new Date(2026, 9, 18, 14, 0, 0))).toBe(false);
    });

    test("honours the timezone", () => {
      const cron = parseCron("0 2 * * *", "UTC");

      expect(matchesCron(cron, new Date(Date.UTC(2026, 9, 18, 2, 0, 30)))).toBe(true);
      expect(matchesCron(cron, new Date(Date.UTC(2026, 9, 18, 3, 0, 0)))).toBe(false);
    });
  });

  describe("getNextRun", () => {
    test("returns the next firing time after the given date", () => {
      const next = getNextRun(parseCron("0 2 * * *"), new Date(2026, 9, 18, 14, 30, 0));

      expect(next.getTime()).toBe(new Date(2026, 9, 19, 2, 0, 0).getTime());
    });

    test("hourly schedule fires at the next full hour", () => {
      const next = getNextRun(parseCron("0 * * * *"), new Date(2026, 9, 18, 14, 30, 0));

      expect(next.getTime()).toBe(new Date(2026, 9, 18, 15, 0, 0).getTime());
    });

    test("uses the timezone", () => {
      const next = getNextRun(
        parseCron("0 2 * * *", "UTC"),
        new Date(Date.UTC(2026, 9, 18, 14, 30, 0)),
      );

      expect(next.getTime()).toBe(Date.UTC(2026, 9, 19, 2, 0, 0));
    });
  });
});
