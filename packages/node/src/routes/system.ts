/**
 * System read model.
 *
 * GET /api/v1/system — Aggregates, mode, current rates and collateral types
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createSystemRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").system() });
  });

  return routes;
}
