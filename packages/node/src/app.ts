/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts so tests create the app without starting
 * the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { CustodyService } from "./services/custody-service.js";
import type { CustodyServiceConfig } from "./services/custody-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware, unsecuredAuthMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEventRoutes } from "./routes/events.js";
import { createAdminRoutes } from "./routes/admin.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: CustodyServiceConfig;
  /** Request logger. When provided, every request is logged. */
  readonly logger?: Logger | undefined;
  /** Auth configuration. When provided, API-key auth is enabled. */
  readonly auth?: AuthConfig | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: CustodyService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new CustodyService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logger !== undefined) {
    app.use("*", loggerMiddleware(options.logger));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(handleError);

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  if (options.auth !== undefined) {
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    app.use("/api/*", unsecuredAuthMiddleware(options.serviceConfig.adminId));
  }

  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/accounts", createAccountRoutes());
  app.route("/api/v1/events", createEventRoutes());
  app.route("/api/v1/admin", createAdminRoutes());

  return { app, service };
}
