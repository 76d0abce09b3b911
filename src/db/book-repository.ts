/**
 * Book repository: the cover cache slice of the books table
 */

import type { BookCoverRecord, BookInsert, CoverStore } from "../types";
import { getDatabase } from "./connection";
import { parseBookCoverRow, type RawBookCoverRow, serializeTombstone } from "./mappers";

export function findBookCover(localnumber: string, noCoverMarker: string): BookCoverRecord | null {
  const database = getDatabase();
  const row = database
    .prepare<{ localnumber: string }, RawBookCoverRow>(
      "SELECT localnumber, isbn, cover_image FROM books WHERE localnumber = $localnumber",
    )
    .get({ localnumber });

  if (!row) return null;
  return parseBookCoverRow(row, noCoverMarker);
}

/**
 * Store image bytes, returns false when the book no longer exists
 */
export function saveCover(localnumber: string, data: Buffer): boolean {
  const database = getDatabase();
  const result = database
    .prepare<{ localnumber: string; data: Buffer }>(
      "UPDATE books SET cover_image = $data WHERE localnumber = $localnumber",
    )
    .run({ localnumber, data });
  return result.changes > 0;
}

export function markNoCover(localnumber: string, noCoverMarker: string): boolean {
  return saveCover(localnumber, serializeTombstone(noCoverMarker));
}

export function insertBook(book: BookInsert): number {
  const database = getDatabase();
  const result = database
    .prepare<Required<BookInsert>>(`
      INSERT INTO books (
        localnumber, title, subtitle, author, call1, call2,
        publisher, published, isbn, booklocation
      ) VALUES ($localnumber, $title, $subtitle, $author, $call1, $call2,
        $publisher, $published, $isbn, $booklocation)
    `)
    .run({
      localnumber: book.localnumber,
      title: book.title,
      subtitle: book.subtitle ?? null,
      author: book.author,
      call1: book.call1 ?? null,
      call2: book.call2 ?? null,
      publisher: book.publisher ?? null,
      published: book.published ?? null,
      isbn: book.isbn ?? null,
      booklocation: book.booklocation ?? null,
    });
  return Number(result.lastInsertRowid);
}

export function countBooks(): number {
  const database = getDatabase();
  const row = database.prepare<[], { count: number }>("SELECT COUNT(*) as count FROM books").get();
  return row?.count ?? 0;
}

/**
 * Cover store backed by the open library database
 */
export function createCoverStore(noCoverMarker: string): CoverStore {
  return {
    find: (localnumber) => findBookCover(localnumber, noCoverMarker),
    save: (localnumber, data) => saveCover(localnumber, data),
    markNoCover: (localnumber) => markNoCover(localnumber, noCoverMarker),
  };
}
