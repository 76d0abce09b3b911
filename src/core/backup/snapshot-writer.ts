/**
 * Gzip streaming between the live store and snapshot files
 */

import { createReadStream, createWriteStream } from "node:fs";
import { pipeline } from "node:stream/promises";
import { createGunzip, createGzip } from "node:zlib";
import { ChecksumCounter } from "../../utils/crypto";
import { createLogger } from "../../utils/logger";

const logger = createLogger("backup");

export interface CompressResult {
  originalSize: number;
  compressedSize: number;
  /** SHA256 of the uncompressed content */
  checksum: string;
}

export interface InspectResult {
  decompressedSize: number;
  checksum: string;
}

/**
 * Compress `sourcePath` into `targetPath`, hashing the uncompressed bytes on the way
 */
export async function compressFile(
  sourcePath: string,
  targetPath: string,
  level: number,
): Promise<CompressResult> {
  logger.debug(`Compressing ${sourcePath} with level ${level}`);

  const uncompressed = new ChecksumCounter();
  const compressed = new ChecksumCounter();

  await pipeline(
    createReadStream(sourcePath),
    uncompressed.tap(),
    createGzip({ level }),
    compressed.tap(),
    createWriteStream(targetPath),
  );

  return {
    originalSize: uncompressed.bytes,
    compressedSize: compressed.bytes,
    checksum: uncompressed.digest(),
  };
}

export async function decompressFile(sourcePath: string, targetPath: string): Promise<void> {
  await pipeline(createReadStream(sourcePath), createGunzip(), createWriteStream(targetPath));
}

/**
 * Decompress fully without writing anything, reporting size and checksum
 */
export async function inspectSnapshot(snapshotPath: string): Promise<InspectResult> {
  const counter = new ChecksumCounter();

  await pipeline(
    createReadStream(snapshotPath),
    createGunzip(),
    counter.tap(),
    async (source: AsyncIterable<Buffer>) => {
      for await (const _chunk of source) {
        // consumed
      }
    },
  );

  return { decompressedSize: counter.bytes, checksum: counter.digest() };
}
