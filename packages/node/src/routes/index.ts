/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createSystemRoutes } from "./system.js";
export { createTroveRoutes } from "./troves.js";
export { createRedemptionRoutes } from "./redemptions.js";
export { createAccountRoutes } from "./accounts.js";
export type { AccountRouteOptions } from "./accounts.js";
export { createEventRoutes } from "./events.js";
