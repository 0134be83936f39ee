/**
 * Redemption routes.
 *
 * POST /api/v1/redemptions        — Redeem stable credit for collateral
 * GET  /api/v1/redemptions/hints  — First trove and partial ratio for an amount
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RedeemSchema, RedemptionHintsQuerySchema } from "../types/dto.js";
import { validateBody, formatZodErrors } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";

export function createRedemptionRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(RedeemSchema), (c) => {
    const body = c.get("validatedBody");

    const result = c.get("service").redeem({
      redeemer: body.redeemer,
      amount: body.amount,
      maxFee: body.maxFee,
      firstHint: body.firstHint,
      upperHint: body.upperHint,
      lowerHint: body.lowerHint,
      partialHintICR: body.partialHintICR,
      maxIterations: body.maxIterations,
    });

    return c.json({ data: result });
  });

  routes.get("/hints", (c) => {
    const queryResult = RedemptionHintsQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const { amount, maxIterations } = queryResult.data;
    return c.json({ data: c.get("service").redemptionHints(amount, maxIterations) });
  });

  return routes;
}
