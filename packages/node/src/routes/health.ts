/**
 * Health check routes.
 *
 * GET /health Liveness check (always 200 if server is running)
 * GET /ready  Readiness check (service started, event log chain intact)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { CustodyService } from "../services/custody-service.js";

export function createHealthRoutes(service: CustodyService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const integrity = service.checkIntegrity();
    const ready = service.isReady() && integrity.valid;

    return c.json(
      {
        status: ready ? "ready" : "not_ready",
        paused: service.toggle.isPaused(),
        eventStore: {
          events: service.eventStore.globalPosition(),
          chainValid: integrity.valid,
          errors: integrity.errors.length,
        },
        timestamp: new Date().toISOString(),
      },
      ready ? 200 : 503,
    );
  });

  return routes;
}
