/**
 * Authentication middleware.
 *
 * API key via X-Api-Key header → looked up in the configured key registry.
 *
 * On success, sets `c.set("auth", authContext)`.
 * On failure, returns 401 or 403.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Create authentication middleware.
 *
 * Returns 401 if the key is missing or unknown.
 */
export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header("X-Api-Key");
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    const auth: AuthContext = {
      type: "api-key",
      subject: record.subject,
      role: record.role,
    };
    c.set("auth", auth);
    return next();
  };
}

/**
 * Unsecured mode (tests, dev): act as the X-Actor-Id header, or as the
 * admin when absent, with every permission.
 */
export function unsecuredAuthMiddleware(adminId: string): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("auth", {
      type: "unsecured",
      subject: c.req.header("X-Actor-Id") ?? adminId,
      role: "admin",
    });
    return next();
  };
}

// =============================================================================
// Permission Guards
// =============================================================================

/**
 * Create a permission guard middleware.
 *
 * Must run AFTER authMiddleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}

/**
 * Restrict holders to the `:account` in the path. Admins pass.
 */
export function requireAccountAccess(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    const account = c.req.param("account");
    if (auth.role !== "admin" && auth.subject !== account) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `'${auth.subject}' may not act on account '${account ?? ""}'`,
        ),
        403,
      );
    }
    return next();
  };
}
