/**
 * @ballast/valuation — Types for collateral valuation and fee pricing.
 *
 * Rules:
 * - Prices, ratios and fees are bigint in 18-decimal fixed point
 * - Amounts are bigint in the collateral's own decimals
 * - Times are unix seconds
 */

import type { CollateralId } from "@ballast/types";

// =============================================================================
// Price feed
// =============================================================================

/**
 * Source of collateral prices: USD per whole token, 18 decimals.
 */
export interface PriceFeed {
  getPrice(id: CollateralId): bigint;
}

// =============================================================================
// Fee curve
// =============================================================================

/**
 * Configuration of a three-piece linear fee curve.
 *
 * fee(x) = m·x/1e18 + b on each segment, where x is the share of
 * total system value backed by this collateral type.
 * Only b1 is given; b2 and b3 are derived so the curve is continuous.
 */
export interface FeeCurveParams {
  readonly m1: bigint;
  readonly b1: bigint;
  readonly cutoff1: bigint;
  readonly m2: bigint;
  readonly cutoff2: bigint;
  readonly m3: bigint;
  /** Cap on total normalized value held of this type; 0 = uncapped */
  readonly dollarCap: bigint;
  /** Seconds over which the last applied fee decays */
  readonly decayWindow: number;
}

/**
 * Fully-derived curve with all three intercepts.
 */
export interface FeeCurveSegments extends FeeCurveParams {
  readonly b2: bigint;
  readonly b3: bigint;
}

/**
 * Mutable part of a fee curve, persisted by a committed fee.
 */
export interface FeeCurveState {
  readonly lastFee: bigint;
  readonly lastFeeTime: number;
}

// =============================================================================
// Registry
// =============================================================================

/**
 * Unforgeable permission to call a gated registry method.
 * Compared by identity of its token.
 */
export interface Capability {
  readonly name: string;
  readonly token: symbol;
}

/**
 * Input for registering a collateral type.
 */
export interface CollateralConfig {
  readonly id: CollateralId;
  readonly decimals: number;
  /** Risk discount in (0, 1e18] */
  readonly safetyRatio: bigint;
  readonly active?: boolean | undefined;
  /** Yield-bearing wrapper, unwrapped when sent out of the protocol */
  readonly wrapped?: boolean | undefined;
  /** Collateral id delivered when a wrapped type is unwrapped */
  readonly underlying?: CollateralId | undefined;
  readonly feeCurve: FeeCurveParams;
}

/**
 * A registered collateral type.
 */
export interface CollateralEntry {
  readonly id: CollateralId;
  /** Registration order */
  readonly index: number;
  readonly decimals: number;
  readonly safetyRatio: bigint;
  readonly active: boolean;
  readonly wrapped: boolean;
  readonly underlying?: CollateralId | undefined;
}

/**
 * Rollback state of the registry: activation flags and fee-curve state.
 */
export interface RegistrySnapshot {
  readonly active: ReadonlyMap<CollateralId, boolean>;
  readonly feeStates: ReadonlyMap<CollateralId, FeeCurveState>;
}

// =============================================================================
// Errors
// =============================================================================

export type ValuationErrorCode =
  | "UNKNOWN_COLLATERAL"
  | "DUPLICATE_COLLATERAL"
  | "COLLATERAL_NOT_ACTIVE"
  | "INVALID_COLLATERAL_CONFIG"
  | "INVALID_CURVE"
  | "PRICE_UNAVAILABLE"
  | "PERCENT_BACKED_OUT_OF_BOUNDS"
  | "COLLATERAL_CAP_EXCEEDED"
  | "UNAUTHORIZED_CALLER";

export class ValuationError extends Error {
  public readonly code: ValuationErrorCode;

  constructor(code: ValuationErrorCode, message: string) {
    super(message);
    this.name = "ValuationError";
    this.code = code;
  }
}
