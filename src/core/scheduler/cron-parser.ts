/**
 * Cron expressions for scheduled snapshots (cron-parser)
 *
 *   "0 2 * * *"  daily snapshot at 02:00
 *   "0 * * * *"  frequent snapshot every hour
 */

import { CronExpressionParser } from "cron-parser";

export interface ParsedCron {
  expression: string;
  timezone?: string;
}

const MINUTE_MS = 60 * 1000;

function parserOptions(cron: ParsedCron, currentDate?: Date): { currentDate?: Date; tz?: string } {
  const options: { currentDate?: Date; tz?: string } = {};
  if (currentDate) options.currentDate = currentDate;
  if (cron.timezone) options.tz = cron.timezone;
  return options;
}

function truncateToMinute(date: Date): Date {
  return new Date(Math.floor(date.getTime() / MINUTE_MS) * MINUTE_MS);
}

/**
 * Validate a five-field cron expression. Throws on anything else.
 */
export function parseCron(expression: string, timezone?: string): ParsedCron {
  const fields = expression.trim().split(/\s+/);
  if (fields.length !== 5) {
    throw new Error(
      `Invalid cron expression: "${expression}". Expected 5 fields, got ${fields.length}.`,
    );
  }

  const cron: ParsedCron = { expression, timezone };
  CronExpressionParser.parse(expression, parserOptions(cron));
  return cron;
}

/**
 * True when the expression fires in the minute containing `date`
 */
export function matchesCron(cron: ParsedCron, date: Date): boolean {
  const minute = truncateToMinute(date);
  const interval = CronExpressionParser.parse(
    cron.expression,
    parserOptions(cron, new Date(minute.getTime() - MINUTE_MS)),
  );
  return truncateToMinute(interval.next().toDate()).getTime() === minute.getTime();
}

export function getNextRun(cron: ParsedCron, fromDate: Date = new Date()): Date {
  const interval = CronExpressionParser.parse(cron.expression, parserOptions(cron, fromDate));
  return interval.next().toDate();
}
