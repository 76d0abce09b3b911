/**
 * Leveled console logger. Facilities log through a scoped logger so every
 * line names where it came from:
 *
 *   [2026-10-18T14:03:09.000Z] INFO  [backup] Backup created: ...
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

let currentLevel: LogLevel = "info";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

const SINKS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.log(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return currentLevel === "debug" && data.stack ? data.stack : data.message;
  }
  if (typeof data === "object" && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

function write(level: LogLevel, scope: string | null, message: string, data?: unknown): void {
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[currentLevel]) return;

  const timestamp = new Date().toISOString();
  const prefix = scope ? `[${scope}] ` : "";
  let line = `${LEVEL_COLORS[level]}[${timestamp}] ${level.toUpperCase().padEnd(5)}${RESET} ${prefix}${message}`;

  if (data !== undefined) {
    line += ` ${formatData(data)}`;
  }

  SINKS[level](line);
}

/**
 * Logger whose lines carry `[scope]` after the level
 */
export function createLogger(scope: string | null = null): Logger {
  return {
    debug: (message, data) => write("debug", scope, message, data),
    info: (message, data) => write("info", scope, message, data),
    warn: (message, data) => write("warn", scope, message, data),
    error: (message, data) => write("error", scope, message, data),
  };
}

export const logger = createLogger();
