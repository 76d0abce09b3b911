import { createHash, type Hash } from "node:crypto";

/**
 * Running SHA256 and byte count over a stream of chunks
 */
export class ChecksumCounter {
  private readonly hash: Hash = createHash("sha256");
  bytes = 0;

  update(chunk: Buffer): void {
    this.hash.update(chunk);
    this.bytes += chunk.length;
  }

  /** Hex digest; the counter can't be updated afterwards */
  digest(): string {
    return this.hash.digest("hex");
  }

  /** Pipeline stage that counts every chunk and passes it through unchanged */
  tap(): (source: AsyncIterable<Buffer>) => AsyncGenerator<Buffer> {
    const update = (chunk: Buffer): void => this.update(chunk);
    return async function* (source) {
      for await (const chunk of source) {
        update(chunk);
        yield chunk;
      }
    };
  }
}
