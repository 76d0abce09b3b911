/**
 * Retention policy logic
 */

export interface SnapshotFile {
  path: string;
  name: string;
  mtimeMs: number;
  size: number;
}

/**
 * Get snapshots beyond the retention limit, newest kept first.
 * Ordered by modification time, ties broken by name (later names are newer).
 */
export function getPruneCandidates(files: SnapshotFile[], keep: number): SnapshotFile[] {
  const sorted = [...files].sort((a, b) => {
    if (b.mtimeMs !== a.mtimeMs) return b.mtimeMs - a.mtimeMs;
    return b.name < a.name ? -1 : b.name > a.name ? 1 : 0;
  });

  return sorted.slice(Math.max(keep, 0));
}
