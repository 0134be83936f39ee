/**
 * Trove routes.
 *
 * GET    /api/v1/troves                       — List active troves (cursor pagination)
 * GET    /api/v1/troves/:owner                — Get one trove, any status
 * POST   /api/v1/troves                       — Open a trove
 * POST   /api/v1/troves/:owner/adjust         — Adjust collateral and debt
 * POST   /api/v1/troves/:owner/close          — Close, repaying the debt
 * POST   /api/v1/troves/:owner/claim-surplus  — Claim surplus left by a redemption
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AdjustTroveSchema,
  ListTrovesQuerySchema,
  OpenTroveSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { paginate } from "../types/pagination.js";

export function createTroveRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/troves — List
  routes.get("/", (c) => {
    const queryResult = ListTrovesQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters"),
        400,
      );
    }

    const query = queryResult.data;
    const result = paginate(
      c.get("service").listTroves(),
      { cursor: query.cursor, limit: query.limit },
      (trove) => trove.owner,
      "owner",
    );

    return c.json(result);
  });

  // GET /api/v1/troves/:owner — Get one
  routes.get("/:owner", (c) => {
    const owner = c.req.param("owner");
    const trove = c.get("service").getTrove(owner);

    if (trove === undefined) {
      return c.json(
        createErrorEnvelope("NOT_FOUND", `Trove '${owner}' not found`),
        404,
      );
    }

    return c.json({ data: trove });
  });

  // POST /api/v1/troves — Open
  routes.post("/", validateBody(OpenTroveSchema), (c) => {
    const body = c.get("validatedBody");

    const change = c.get("service").openTrove({
      owner: body.owner,
      collateral: body.collateral,
      debtAmount: body.debt,
      maxFeePercentage: body.maxFeePercentage,
      upperHint: body.upperHint,
      lowerHint: body.lowerHint,
    });

    return c.json({ data: change }, 201);
  });

  // POST /api/v1/troves/:owner/adjust
  routes.post("/:owner/adjust", validateBody(AdjustTroveSchema), (c) => {
    const body = c.get("validatedBody");

    const change = c.get("service").adjustTrove({
      owner: c.req.param("owner"),
      collateralIn: body.collateralIn,
      collateralOut: body.collateralOut,
      debtChange: body.debtChange,
      isDebtIncrease: body.isDebtIncrease,
      maxFeePercentage: body.maxFeePercentage,
      upperHint: body.upperHint,
      lowerHint: body.lowerHint,
    });

    return c.json({ data: change });
  });

  // POST /api/v1/troves/:owner/close
  routes.post("/:owner/close", (c) => {
    const trove = c.get("service").closeTrove(c.req.param("owner"));
    return c.json({ data: trove });
  });

  // POST /api/v1/troves/:owner/claim-surplus
  routes.post("/:owner/claim-surplus", (c) => {
    const claim = c.get("service").claimSurplus(c.req.param("owner"));
    return c.json({ data: claim });
  });

  return routes;
}
