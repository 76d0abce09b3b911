/**
 * Result and error types shared by the backup manager and the cover fetcher.
 *
 * Operations never throw for expected failures; they return an Outcome whose
 * error carries a kind the HTTP layer and the CLI can map to a response.
 */

export type ServiceErrorKind =
  | "SourceMissing"
  | "NotFound"
  | "NoCoverAvailable"
  | "RateLimited"
  | "DownloadInProgress"
  | "ServiceUnavailable"
  | "StorageError"
  | "Disabled";

const TRANSIENT_KINDS: readonly ServiceErrorKind[] = [
  "RateLimited",
  "DownloadInProgress",
  "ServiceUnavailable",
];

export interface ServiceError {
  kind: ServiceErrorKind;
  message: string;
  /** True when the same call may succeed if retried shortly */
  transient: boolean;
}

export type Outcome<T> = { success: true; value: T } | { success: false; error: ServiceError };

export function isTransient(kind: ServiceErrorKind): boolean {
  return TRANSIENT_KINDS.includes(kind);
}

export function ok<T>(value: T): Outcome<T> {
  return { success: true, value };
}

export function fail<T>(kind: ServiceErrorKind, message: string): Outcome<T> {
  return { success: false, error: { kind, message, transient: isTransient(kind) } };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
