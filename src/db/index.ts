/**
 * Database module exports
 */

// Book repository
export {
  countBooks,
  createCoverStore,
  findBookCover,
  insertBook,
  markNoCover,
  saveCover,
} from "./book-repository";

// Connection
export { closeDatabase, getDatabase, getDatabasePath, initDatabase } from "./connection";
export type { RawBookCoverRow } from "./mappers";
// Mappers
export { parseBookCoverRow, parseCoverEntry, serializeTombstone } from "./mappers";
// Migrations
export {
  getAllMigrations,
  getCurrentVersion,
  getLatestVersion,
  getPendingMigrations,
} from "./migrations";
