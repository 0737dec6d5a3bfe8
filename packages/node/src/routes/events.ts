/**
 * Event query routes.
 *
 * GET /api/v1/events  The global custody log, optionally filtered by type
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";
import { validateQuery } from "../middleware/validate.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), validateQuery(ListEventsQuerySchema), (c) => {
    const query = c.get("validatedQuery");
    const events = c.get("service").readAllEvents({
      fromPosition: (query.afterPosition ?? 0) + 1,
      maxCount: query.limit + 1,
      types: query.type !== undefined ? [query.type] : undefined,
    });

    return c.json(paginate(events, query.limit, (e) => e.globalPosition));
  });

  return routes;
}
