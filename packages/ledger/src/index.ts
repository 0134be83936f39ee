/**
 * @ballast/ledger — Trove ledger and fixed-point arithmetic.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * - Every trove is keyed by its owner
 * - Holdings are sparse collateral-id → amount maps
 * - All monetary arithmetic uses bigint in 18-decimal fixed point
 * - Snapshots support all-or-nothing rollback of an operation
 *
 * Design rules:
 * - All exposed types are readonly
 * - No business validation here: callers validate, then commit
 * - Zero runtime dependencies
 */

// Core ledger
export { TroveLedger } from "./trove-ledger.js";

// Owners array
export { OwnerRegistry } from "./owners.js";

// Holdings arithmetic
export {
  EMPTY_HOLDINGS,
  toHoldings,
  addHoldings,
  subtractHoldings,
  isEmptyHoldings,
  holdingsEqual,
  sortedIds,
  toRecords,
  fromRecords,
} from "./holdings.js";

// Fixed-point arithmetic
export {
  DECIMAL_PRECISION,
  MAX_RATIO,
  MAX_DECAY_MINUTES,
  parseDecimal,
  formatDecimal,
  parseUint,
  mulDiv,
  decMul,
  decPow,
  minBig,
  maxBig,
  computeICR,
  computeRatio,
} from "./decimal-math.js";

// Types
export type {
  LedgerErrorCode,
  TroveLedgerSnapshot,
  OwnerRemoval,
} from "./types.js";

export { LedgerError } from "./types.js";
