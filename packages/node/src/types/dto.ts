/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as base-10 integer strings: 18-decimal units for the
 * stable credit and ratios, token units for collateral. Schemas turn
 * them into bigints.
 */

import { z } from "zod";
import type { CollateralId } from "@ballast/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const UintString = z
  .string()
  .regex(/^\d+$/, "Expected a base-10 integer string")
  .transform((value) => BigInt(value));

export const AccountSchema = z.string().min(1).max(128);

export const CollateralListSchema = z
  .array(
    z.object({
      collateralId: z.string().min(1),
      amount: UintString,
    }),
  )
  .transform((items) =>
    items.map((item): readonly [CollateralId, bigint] => [item.collateralId, item.amount]),
  );

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

// =============================================================================
// Trove DTOs
// =============================================================================

export const OpenTroveSchema = z.object({
  owner: AccountSchema,
  collateral: CollateralListSchema,
  debt: UintString,
  maxFeePercentage: UintString,
  upperHint: AccountSchema.optional(),
  lowerHint: AccountSchema.optional(),
});

export type OpenTroveDto = z.output<typeof OpenTroveSchema>;

export const AdjustTroveSchema = z.object({
  collateralIn: CollateralListSchema.optional(),
  collateralOut: CollateralListSchema.optional(),
  debtChange: UintString.optional(),
  isDebtIncrease: z.boolean().optional(),
  maxFeePercentage: UintString,
  upperHint: AccountSchema.optional(),
  lowerHint: AccountSchema.optional(),
});

export type AdjustTroveDto = z.output<typeof AdjustTroveSchema>;

export const ListTrovesQuerySchema = PaginationQuerySchema;

export type ListTrovesQuery = z.output<typeof ListTrovesQuerySchema>;

// =============================================================================
// Redemption DTOs
// =============================================================================

export const RedeemSchema = z.object({
  redeemer: AccountSchema,
  amount: UintString,
  /** Absolute cap on the fee, in stable-credit units */
  maxFee: UintString,
  firstHint: AccountSchema.optional(),
  upperHint: AccountSchema.optional(),
  lowerHint: AccountSchema.optional(),
  /** Expected ratio of the partially redeemed trove; "0" when none is expected */
  partialHintICR: UintString,
  maxIterations: z.number().int().min(0).optional(),
});

export type RedeemDto = z.output<typeof RedeemSchema>;

export const RedemptionHintsQuerySchema = z.object({
  amount: UintString,
  maxIterations: z.coerce.number().int().min(0).default(0),
});

export type RedemptionHintsQuery = z.output<typeof RedemptionHintsQuerySchema>;

// =============================================================================
// Account DTOs
// =============================================================================

export const DepositSchema = z.object({
  collateral: CollateralListSchema,
});

export type DepositDto = z.output<typeof DepositSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
});

export type ListEventsQuery = z.output<typeof ListEventsQuerySchema>;

export const ListStreamEventsQuerySchema = PaginationQuerySchema.extend({
  afterVersion: z.coerce.number().int().min(0).optional(),
});

export type ListStreamEventsQuery = z.output<typeof ListStreamEventsQuerySchema>;
