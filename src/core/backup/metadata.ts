/**
 * Sidecar metadata files written next to each snapshot
 */

import { readFile, rename, rm, writeFile } from "node:fs/promises";
import { z } from "zod";
import { SNAPSHOT_CATEGORIES, type SnapshotMetadata } from "../../types";
import { createLogger } from "../../utils/logger";
import { metadataNameFor } from "../../utils/naming";
import { uniqueTempPath } from "../../utils/path";

const logger = createLogger("backup");

// Every field is optional: a sidecar from an older release may lack some of them
const sidecarSchema = z
  .object({
    timestamp: z.string(),
    backup_type: z.enum(SNAPSHOT_CATEGORIES),
    event_description: z.string().nullable(),
    original_size: z.number(),
    compressed_size: z.number(),
    compression_ratio: z.number(),
    checksum: z.string(),
    version: z.string(),
  })
  .partial();

export type Sidecar = z.infer<typeof sidecarSchema>;

export function metadataPathFor(snapshotPath: string): string {
  return metadataNameFor(snapshotPath);
}

export function compressionRatio(originalSize: number, compressedSize: number): number {
  if (originalSize === 0) return 0;
  return Math.round((compressedSize / originalSize) * 100) / 100;
}

export async function writeSidecar(snapshotPath: string, metadata: SnapshotMetadata): Promise<void> {
  const target = metadataPathFor(snapshotPath);
  const partial = uniqueTempPath(target, "partial");
  try {
    await writeFile(partial, `${JSON.stringify(metadata, null, 2)}\n`, "utf8");
    await rename(partial, target);
  } catch (err) {
    await rm(partial, { force: true });
    throw err;
  }
}

/**
 * Read a sidecar. Missing, unparsable or malformed sidecars yield null.
 */
export async function readSidecar(snapshotPath: string): Promise<Sidecar | null> {
  const target = metadataPathFor(snapshotPath);

  let content: string;
  try {
    content = await readFile(target, "utf8");
  } catch {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    logger.warn(`Ignoring unreadable metadata file: ${target}`);
    return null;
  }

  const result = sidecarSchema.safeParse(parsed);
  if (!result.success) {
    logger.warn(`Ignoring malformed metadata file: ${target}`);
    return null;
  }
  return result.data;
}
