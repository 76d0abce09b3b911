/**
 * Cover module exports
 */

export { CoverFetcher, type CoverFetcherOptions } from "./fetcher";
export { FetchGuard } from "./guard";
export {
  cleanIsbn,
  type FetchImpl,
  OpenLibraryCoverClient,
  type OpenLibraryCoverClientOptions,
} from "./remote";
