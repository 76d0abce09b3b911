/**
 * Snapshot file naming utilities
 */

export const DEFAULT_SNAPSHOT_PREFIX = "library_backup";

export const SNAPSHOT_EXTENSION = ".db.gz";

export const METADATA_EXTENSION = ".json";

const MAX_DESCRIPTION_LENGTH = 30;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

// Pattern: prefix_YYYYMMDD_HHMMSS[_description].db.gz
export function snapshotNamePattern(prefix: string = DEFAULT_SNAPSHOT_PREFIX): RegExp {
  return new RegExp(
    `^${escapeRegExp(prefix)}_(\\d{8})_(\\d{6})(?:_([\\p{L}\\p{M}\\p{N}_-]+))?\\.db\\.gz$`,
    "u",
  );
}

/**
 * Keep only letters and digits of any script, spaces, underscores and
 * hyphens, trim the end and cut to 30 characters.
 */
export function sanitizeDescription(description: string): string {
  const kept = Array.from(description.normalize("NFC"))
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join("")
    .trimEnd();
  return Array.from(kept).slice(0, MAX_DESCRIPTION_LENGTH).join("");
}

export function formatSnapshotTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function generateSnapshotName(
  date: Date,
  description?: string | null,
  prefix: string = DEFAULT_SNAPSHOT_PREFIX,
): string {
  const timestamp = formatSnapshotTimestamp(date);
  const safe = description ? sanitizeDescription(description).replace(/ /g, "_") : "";

  return safe
    ? `${prefix}_${timestamp}_${safe}${SNAPSHOT_EXTENSION}`
    : `${prefix}_${timestamp}${SNAPSHOT_EXTENSION}`;
}

export function metadataNameFor(snapshotName: string): string {
  return `${snapshotName}${METADATA_EXTENSION}`;
}

export function isValidSnapshotName(
  fileName: string,
  prefix: string = DEFAULT_SNAPSHOT_PREFIX,
): boolean {
  return snapshotNamePattern(prefix).test(fileName);
}
