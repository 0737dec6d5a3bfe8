/**
 * Route barrel.
 */

export { createHealthRoutes } from "./health.js";
export { createAccountRoutes } from "./accounts.js";
export { createEventRoutes } from "./events.js";
export { createAdminRoutes } from "./admin.js";
