/**
 * Zod validation middleware for request bodies and query strings.
 *
 * The parsed value is stored in the context (`validatedBody`,
 * `validatedQuery`) typed by the schema's output. Failures are a 400
 * VALIDATION_ERROR listing each issue by path.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { z, ZodError, ZodTypeAny } from "zod";
import type { AppEnv, ValidatedEnv, ValidatedQueryEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function validateBody<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<AppEnv & ValidatedEnv<z.output<S>>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return rejectWith(c, "Request body validation failed", result.error);
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

export function validateQuery<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<AppEnv & ValidatedQueryEnv<z.output<S>>> {
  return async (c, next) => {
    const result = schema.safeParse(c.req.query());
    if (!result.success) {
      return rejectWith(c, "Invalid query parameters", result.error);
    }

    c.set("validatedQuery", result.data);
    return next();
  };
}

function rejectWith(c: Context, message: string, error: ZodError): Response {
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", message, {
      issues: error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      })),
    }),
    400,
  );
}
