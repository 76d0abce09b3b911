/**
 * Path validation utilities
 */

import { randomUUID } from "node:crypto";
import * as path from "node:path";

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal when a restore target comes from a request.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) || normalizedPath === normalizedDir
  );
}

/**
 * Working file beside `filePath` for a write-then-rename. Unique per call so
 * concurrent writers of the same final name never share one.
 */
export function uniqueTempPath(filePath: string, suffix: string): string {
  return `${filePath}.${process.pid}.${randomUUID()}.${suffix}`;
}
