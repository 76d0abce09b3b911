/**
 * Cover cache type definitions
 */

import type { BookCoverRecord } from "./database";

export type CoverSourceKind = "cache" | "remote";

export interface CoverImage {
  localnumber: string;
  data: Buffer;
  source: CoverSourceKind;
}

/**
 * Raw answer from the remote cover service
 */
export interface RemoteCoverResponse {
  status: number;
  body: Buffer;
}

export interface CoverSource {
  buildUrl(isbn: string): string;
  fetchCover(isbn: string): Promise<RemoteCoverResponse>;
}

/**
 * Persistence the cover fetcher reads and writes through
 */
export interface CoverStore {
  find(localnumber: string): BookCoverRecord | null;
  /** Returns false when the book no longer exists */
  save(localnumber: string, data: Buffer): boolean;
  markNoCover(localnumber: string): boolean;
}
