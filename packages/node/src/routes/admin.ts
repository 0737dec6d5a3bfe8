/**
 * Administrative routes.
 *
 * POST /api/v1/admin/pause    Stop deposits, withdrawals and removals
 * POST /api/v1/admin/unpause  Resume them
 * GET  /api/v1/admin/status   Pause state and counters
 * POST /api/v1/admin/mint     Fund a holder in the development bank
 *
 * Pausing is reserved to the configured admin subject; any other
 * caller gets 403 even with the admin role.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { MintSchema } from "../types/dto.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.post("/pause", (c) => {
    return c.json({ data: c.get("service").pause(c.get("auth").subject) });
  });

  routes.post("/unpause", (c) => {
    return c.json({ data: c.get("service").unpause(c.get("auth").subject) });
  });

  routes.get("/status", (c) => {
    return c.json({ data: c.get("service").status() });
  });

  routes.post("/mint", validateBody(MintSchema), (c) => {
    const { asset, holder, amount } = c.get("validatedBody");
    return c.json({ data: c.get("service").mint(asset, holder, amount) }, 201);
  });

  return routes;
}
