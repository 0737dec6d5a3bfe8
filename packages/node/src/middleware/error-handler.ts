/**
 * Global error handler, registered as Hono's onError.
 *
 * Domain errors (CustodyError, EventStoreError) keep their code and
 * message and get the status below. Anything else is a 500 with a
 * generic message.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { createErrorEnvelope } from "../types/error.js";
import type { ErrorCode } from "../types/error.js";

const STATUS_MAP = {
  // Custody errors
  INVALID_AMOUNT: 400,
  INVALID_ASSET: 400,
  INVALID_LOCK_PERIOD: 400,
  INVALID_SNAPSHOT: 400,
  UNAUTHORIZED: 403,
  NO_ACCOUNT: 404,
  STILL_LOCKED: 409,
  NO_BALANCE: 409,
  REENTRANT_CALL: 409,
  TRANSFER_FAILED: 502,
  SYSTEM_PAUSED: 503,

  // Event store errors
  INVALID_STREAM_ID: 400,
  INVALID_VERSION: 400,
} satisfies Partial<Record<ErrorCode, ContentfulStatusCode>>;

type MappedCode = keyof typeof STATUS_MAP;

function isMappedCode(code: string): code is MappedCode {
  return Object.hasOwn(STATUS_MAP, code);
}

function mappedCode(err: Error): MappedCode | undefined {
  if (!("code" in err) || typeof err.code !== "string") {
    return undefined;
  }
  return isMappedCode(err.code) ? err.code : undefined;
}

export function handleError(err: Error, c: Context): Response {
  const code = mappedCode(err);
  if (code === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }
  return c.json(createErrorEnvelope(code, err.message), STATUS_MAP[code]);
}
