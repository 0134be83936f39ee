/**
 * @ballast/valuation — Collateral valuation and variable fees.
 *
 * - Normalized value: price × amount × safety ratio
 * - Per-type three-piece fee curves with linear decay
 * - Collateral registry with capability-gated mutation
 *
 * Zero runtime dependencies beyond the workspace.
 */

export {
  CollateralRegistry,
} from "./collateral-registry.js";
export type {
  CollateralRegistryOptions,
  FeeQuoteInput,
} from "./collateral-registry.js";

export {
  INITIAL_FEE_STATE,
  configureFeeCurve,
  segmentValue,
  feePoint,
  decayedFee,
  priceFeeFraction,
} from "./fee-curve.js";

export { StaticPriceFeed } from "./price-feed.js";
export { createCapability, assertCapability } from "./capability.js";
export { normalizedValue, usdValue } from "./valuation.js";

export type {
  PriceFeed,
  FeeCurveParams,
  FeeCurveSegments,
  FeeCurveState,
  Capability,
  CollateralConfig,
  CollateralEntry,
  RegistrySnapshot,
  ValuationErrorCode,
} from "./types.js";

export { ValuationError } from "./types.js";
