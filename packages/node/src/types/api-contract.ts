/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { CustodyService } from "../services/custody-service.js";
import type { AuthContext } from "./auth.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The custody service (set by the service middleware) */
    service: CustodyService;

    /** Authenticated caller (set by auth middleware) */
    auth: AuthContext;
  };
}

/**
 * Context variables added by validateBody().
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/**
 * Context variables added by validateQuery().
 */
export interface ValidatedQueryEnv<T> {
  Variables: {
    validatedQuery: T;
  };
}
