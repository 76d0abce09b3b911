/**
 * Database row mapping utilities
 */

import type { BookCoverRecord, CoverEntry } from "../types";

export interface RawBookCoverRow {
  localnumber: string;
  isbn: string | null;
  /** BLOB as written by the cover fetcher, TEXT if an older tool stored the marker as a string */
  cover_image: Buffer | string | null;
}

export function parseCoverEntry(value: Buffer | string | null, noCoverMarker: string): CoverEntry {
  if (value === null) {
    return { state: "absent" };
  }

  if (typeof value === "string") {
    if (value === noCoverMarker) return { state: "tombstone" };
    return value.length === 0 ? { state: "absent" } : { state: "cached", data: Buffer.from(value) };
  }

  if (value.length === 0) {
    return { state: "absent" };
  }
  if (value.equals(serializeTombstone(noCoverMarker))) {
    return { state: "tombstone" };
  }
  return { state: "cached", data: value };
}

export function parseBookCoverRow(row: RawBookCoverRow, noCoverMarker: string): BookCoverRecord {
  return {
    localnumber: row.localnumber,
    isbn: row.isbn,
    cover: parseCoverEntry(row.cover_image, noCoverMarker),
  };
}

export function serializeTombstone(noCoverMarker: string): Buffer {
  return Buffer.from(noCoverMarker, "utf8");
}
