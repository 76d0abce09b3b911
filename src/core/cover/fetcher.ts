/**
 * Cover fetcher: cached cover images with a guarded remote fallback
 */

import type { BookCoverRecord, CoverImage, CoverSource, CoverStore } from "../../types";
import { formatBytes } from "../../utils/format";
import { createLogger } from "../../utils/logger";
import { errorMessage, fail, type Outcome, ok } from "../errors";
import type { FetchGuard } from "./guard";
import { cleanIsbn } from "./remote";

const logger = createLogger("covers");

export interface CoverFetcherOptions {
  store: CoverStore;
  source: CoverSource;
  guard: FetchGuard;
  /** Smaller 200 bodies are the service's placeholder images */
  minImageBytes: number;
  /** When false, cache misses are answered without contacting the service */
  enabled?: boolean;
}

export class CoverFetcher {
  private readonly store: CoverStore;
  private readonly source: CoverSource;
  private readonly guard: FetchGuard;
  private readonly minImageBytes: number;
  private readonly enabled: boolean;

  constructor(options: CoverFetcherOptions) {
    this.store = options.store;
    this.source = options.source;
    this.guard = options.guard;
    this.minImageBytes = options.minImageBytes;
    this.enabled = options.enabled ?? true;
  }

  async get(localnumber: string): Promise<Outcome<CoverImage>> {
    let book: BookCoverRecord | null;
    try {
      book = this.store.find(localnumber);
    } catch (err) {
      logger.error(`Cover lookup failed for ${localnumber}: ${errorMessage(err)}`);
      return fail("StorageError", `Cover lookup failed: ${errorMessage(err)}`);
    }

    if (!book) {
      return fail("NotFound", "Book not found");
    }

    switch (book.cover.state) {
      case "cached":
        return ok({ localnumber, data: book.cover.data, source: "cache" });
      case "tombstone":
        return fail("NoCoverAvailable", "No cover available");
      case "absent":
        break;
    }

    const isbn = book.isbn ? cleanIsbn(book.isbn) : "";
    if (!isbn) {
      return fail("NoCoverAvailable", "No cover available");
    }

    if (!this.enabled) {
      return fail("Disabled", "Cover fetching is disabled");
    }

    if (!this.guard.tryAcquire()) {
      logger.debug(`Cover fetch for ${localnumber} skipped, another download is in progress`);
      return fail("DownloadInProgress", "Download in progress");
    }

    try {
      if (this.guard.isRateLimited()) {
        logger.debug(`Cover fetch for ${localnumber} rate limited`);
        return fail("RateLimited", "Rate limited - try again later");
      }
      return await this.fetchRemote(localnumber, isbn);
    } finally {
      this.guard.release();
    }
  }

  private async fetchRemote(localnumber: string, isbn: string): Promise<Outcome<CoverImage>> {
    let status: number;
    let body: Buffer;
    try {
      ({ status, body } = await this.source.fetchCover(isbn));
    } catch (err) {
      // Timeouts and network errors may clear up, so nothing is recorded
      logger.warn(`Cover service request failed for ISBN ${isbn}: ${errorMessage(err)}`);
      return fail("ServiceUnavailable", "Cover service temporarily unavailable");
    }

    if (status === 200 && body.length >= this.minImageBytes) {
      this.persist(localnumber, () => this.store.save(localnumber, body));
      this.guard.recordFetch();
      logger.info(`Cover downloaded for ${localnumber} (${formatBytes(body.length)})`);
      return ok({ localnumber, data: body, source: "remote" });
    }

    if (status === 404) {
      this.persist(localnumber, () => this.store.markNoCover(localnumber));
      this.guard.recordFetch();
      logger.info(`No cover exists for ${localnumber} (ISBN ${isbn})`);
      return fail("NoCoverAvailable", "No cover available");
    }

    logger.warn(
      status === 200
        ? `Cover service returned a ${body.length} byte placeholder for ISBN ${isbn}`
        : `Cover service returned HTTP ${status} for ISBN ${isbn}`,
    );
    return fail("ServiceUnavailable", "Cover service temporarily unavailable");
  }

  /**
   * A failed cache write is logged; the caller still gets the service's answer
   */
  private persist(localnumber: string, write: () => boolean): void {
    try {
      if (!write()) {
        logger.warn(`Book ${localnumber} disappeared before its cover could be stored`);
      }
    } catch (err) {
      logger.error(`Could not store cover for ${localnumber}: ${errorMessage(err)}`);
    }
  }
}
