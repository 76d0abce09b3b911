/**
 * Mapping of service errors to HTTP responses
 */

import type { FastifyReply } from "fastify";
import type { ServiceError, ServiceErrorKind } from "../core/errors";

/** Seconds a client should wait before retrying a transient failure */
export const RETRY_AFTER_SECONDS = 1;

const STATUS_BY_KIND: Record<ServiceErrorKind, number> = {
  NotFound: 404,
  NoCoverAvailable: 404,
  RateLimited: 503,
  DownloadInProgress: 503,
  ServiceUnavailable: 503,
  SourceMissing: 409,
  Disabled: 409,
  StorageError: 500,
};

export function statusForError(kind: ServiceErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function sendServiceError(reply: FastifyReply, error: ServiceError): FastifyReply {
  if (error.transient) {
    reply.header("Retry-After", String(RETRY_AFTER_SECONDS));
  }

  return reply.status(statusForError(error.kind)).send({
    success: false,
    error: error.message,
    kind: error.kind,
    retryable: error.transient,
  });
}
