import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 2,
  name: "books_isbn_index",
  description: "Index books by ISBN for cover lookups and imports",
  up: `
CREATE INDEX IF NOT EXISTS idx_books_isbn ON books(isbn) WHERE isbn IS NOT NULL;
`,
};
