/**
 * Error envelope for API responses.
 *
 * Every error response has the shape
 * { error: { code, message, details? } }
 * where `code` is either an HTTP-layer code or the code of the domain
 * error that caused it.
 */

import type { EventStoreErrorCode } from "@lockbox/event-store";
import type { CustodyErrorCode } from "@lockbox/ledger";

/** Codes raised by the HTTP layer itself. */
export type ApiErrorCode =
  | "VALIDATION_ERROR"
  | "UNAUTHORIZED"
  | "FORBIDDEN"
  | "INTERNAL_ERROR";

export type ErrorCode = ApiErrorCode | CustodyErrorCode | EventStoreErrorCode;

export interface ErrorDetail {
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  return details === undefined
    ? { error: { code, message } }
    : { error: { code, message, details } };
}
