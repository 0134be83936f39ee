/**
 * @ballast/valuation — Three-piece linear fee curve.
 *
 * Prices the variable fee charged for depositing one collateral type,
 * as a function of the share of system value that type backs.
 *
 * Rules:
 * - Segments meet exactly at both cutoffs (b2, b3 derived)
 * - Output is clamped to [0, 1e18]
 * - A committed fee decays linearly to zero over the decay window,
 *   then stays at its last value
 */

import { DECIMAL_PRECISION, maxBig } from "@ballast/ledger";
import type { FeeCurveParams, FeeCurveSegments, FeeCurveState } from "./types.js";
import { ValuationError } from "./types.js";

export const INITIAL_FEE_STATE: FeeCurveState = Object.freeze({
  lastFee: 0n,
  lastFeeTime: 0,
});

/**
 * Validate curve parameters and derive the intercepts of segments 2 and 3.
 */
export function configureFeeCurve(params: FeeCurveParams): FeeCurveSegments {
  const { m1, b1, cutoff1, m2, cutoff2, m3, dollarCap, decayWindow } = params;

  if (cutoff1 < 0n || cutoff1 > cutoff2 || cutoff2 > DECIMAL_PRECISION) {
    throw new ValuationError(
      "INVALID_CURVE",
      `Cutoffs must satisfy 0 <= cutoff1 <= cutoff2 <= 1e18, got ${cutoff1} and ${cutoff2}`,
    );
  }
  if (dollarCap < 0n) {
    throw new ValuationError("INVALID_CURVE", "Dollar cap cannot be negative");
  }
  if (!Number.isSafeInteger(decayWindow) || decayWindow <= 0) {
    throw new ValuationError("INVALID_CURVE", `Decay window must be a positive integer, got ${decayWindow}`);
  }

  const b2 = (m1 * cutoff1) / DECIMAL_PRECISION + b1 - (m2 * cutoff1) / DECIMAL_PRECISION;
  const b3 = (m2 * cutoff2) / DECIMAL_PRECISION + b2 - (m3 * cutoff2) / DECIMAL_PRECISION;

  return Object.freeze({ ...params, b2, b3 });
}

/**
 * Value of the segment covering `percentBacked`, before clamping.
 */
export function segmentValue(curve: FeeCurveSegments, percentBacked: bigint): bigint {
  if (percentBacked <= curve.cutoff1) {
    return (curve.m1 * percentBacked) / DECIMAL_PRECISION + curve.b1;
  }
  if (percentBacked <= curve.cutoff2) {
    return (curve.m2 * percentBacked) / DECIMAL_PRECISION + curve.b2;
  }
  return (curve.m3 * percentBacked) / DECIMAL_PRECISION + curve.b3;
}

/**
 * Fee fraction at a point of the curve.
 */
export function feePoint(
  curve: FeeCurveSegments,
  collateralValue: bigint,
  totalValue: bigint,
): bigint {
  if (totalValue === 0n) {
    return 0n;
  }
  const percentBacked = (collateralValue * DECIMAL_PRECISION) / totalValue;
  if (percentBacked < 0n || percentBacked > DECIMAL_PRECISION) {
    throw new ValuationError(
      "PERCENT_BACKED_OUT_OF_BOUNDS",
      `Collateral value ${collateralValue} is outside [0, ${totalValue}]`,
    );
  }

  const fee = segmentValue(curve, percentBacked);
  if (fee < 0n) return 0n;
  if (fee > DECIMAL_PRECISION) return DECIMAL_PRECISION;
  return fee;
}

/**
 * Last committed fee, decayed linearly over the window.
 *
 * Rounds once: `floor(lastFee × (window − elapsed) / window)`. This can be
 * one unit below `lastFee − floor(lastFee × elapsed / window)`.
 */
export function decayedFee(
  curve: FeeCurveSegments,
  state: FeeCurveState,
  now: number,
): bigint {
  const elapsed = Math.max(0, now - state.lastFeeTime);
  if (elapsed < curve.decayWindow) {
    const window = BigInt(curve.decayWindow);
    return (state.lastFee * (window - BigInt(elapsed))) / window;
  }
  return state.lastFee;
}

/**
 * Fee fraction charged for adding `inputValue` to a pool.
 *
 * Averages the curve before and after the deposit, floored by the
 * decayed last fee. Throws COLLATERAL_CAP_EXCEEDED before any pricing.
 */
export function priceFeeFraction(
  curve: FeeCurveSegments,
  state: FeeCurveState,
  inputValue: bigint,
  poolValueBefore: bigint,
  systemValueBefore: bigint,
  systemValueAfter: bigint,
  now: number,
): bigint {
  const poolValueAfter = poolValueBefore + inputValue;
  if (curve.dollarCap !== 0n && poolValueAfter > curve.dollarCap) {
    throw new ValuationError(
      "COLLATERAL_CAP_EXCEEDED",
      `Pool value ${poolValueAfter} would exceed cap ${curve.dollarCap}`,
    );
  }

  const before = feePoint(curve, poolValueBefore, systemValueBefore);
  const after = feePoint(curve, poolValueAfter, systemValueAfter);
  return maxBig((before + after) / 2n, decayedFee(curve, state, now));
}
