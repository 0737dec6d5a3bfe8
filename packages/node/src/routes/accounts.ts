/**
 * Account routes.
 *
 * POST   /api/v1/accounts/:account/deposits         Deposit under the account's lock
 * POST   /api/v1/accounts/:account/withdrawals      Withdraw every balance once unlocked
 * DELETE /api/v1/accounts/:account/assets/:asset    Drop an asset, forfeiting its balance
 * GET    /api/v1/accounts/:account                  Lock state and balances
 * GET    /api/v1/accounts/:account/balances/:asset  One balance
 * GET    /api/v1/accounts/:account/events           The account's event stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { requireAccountAccess, requirePermission } from "../middleware/auth.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { DepositSchema, ListAccountEventsQuerySchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Mutations ─────────────────────────────────────────────────────

  routes.post(
    "/:account/deposits",
    requirePermission("write"),
    requireAccountAccess(),
    validateBody(DepositSchema),
    async (c) => {
      const result = await c
        .get("service")
        .deposit(c.req.param("account"), c.get("validatedBody"));
      return c.json({ data: result }, 201);
    },
  );

  routes.post(
    "/:account/withdrawals",
    requirePermission("write"),
    requireAccountAccess(),
    async (c) => {
      const outcomes = await c.get("service").withdrawAll(c.req.param("account"));
      return c.json({ data: outcomes });
    },
  );

  routes.delete(
    "/:account/assets/:asset",
    requirePermission("write"),
    requireAccountAccess(),
    async (c) => {
      const result = await c
        .get("service")
        .removeAsset(c.req.param("account"), c.req.param("asset"));
      return c.json({ data: result });
    },
  );

  // ─── Queries ───────────────────────────────────────────────────────

  routes.get("/:account", requirePermission("read"), (c) => {
    return c.json({ data: c.get("service").getAccount(c.req.param("account")) });
  });

  routes.get("/:account/balances/:asset", requirePermission("read"), (c) => {
    const view = c.get("service").getBalance(c.req.param("account"), c.req.param("asset"));
    return c.json({ data: view });
  });

  routes.get(
    "/:account/events",
    requirePermission("read"),
    validateQuery(ListAccountEventsQuerySchema),
    (c) => {
      const query = c.get("validatedQuery");
      const events = c.get("service").readAccountEvents(c.req.param("account"), {
        fromVersion: (query.afterVersion ?? 0) + 1,
        maxCount: query.limit + 1,
      });
      return c.json(paginate(events, query.limit, (e) => e.version));
    },
  );

  return routes;
}
