/**
 * Account routes.
 *
 * GET  /api/v1/accounts/:account          — Stable balance, wallet and surplus
 * POST /api/v1/accounts/:account/deposit  — Credit collateral to a wallet (non-production only)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { DepositSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export interface AccountRouteOptions {
  readonly allowDeposits: boolean;
}

export function createAccountRoutes(options: AccountRouteOptions): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/:account", (c) => {
    return c.json({ data: c.get("service").account(c.req.param("account")) });
  });

  if (options.allowDeposits) {
    routes.post("/:account/deposit", validateBody(DepositSchema), (c) => {
      const { collateral } = c.get("validatedBody");
      const account = c.get("service").deposit(c.req.param("account"), collateral);
      return c.json({ data: account });
    });
  }

  return routes;
}
