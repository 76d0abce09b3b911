/**
 * Database record type definitions
 */

export interface Migration {
  version: number;
  name: string;
  description: string;
  up: string;
}

/**
 * The slice of a `books` row the cover cache works with
 */
export interface BookCoverRecord {
  localnumber: string;
  isbn: string | null;
  cover: CoverEntry;
}

export type CoverEntry =
  | { state: "absent" }
  | { state: "tombstone" }
  | { state: "cached"; data: Buffer };

export interface BookInsert {
  localnumber: string;
  title: string;
  author: string;
  subtitle?: string | null;
  isbn?: string | null;
  publisher?: string | null;
  published?: string | null;
  call1?: string | null;
  call2?: string | null;
  booklocation?: string | null;
}
