/**
 * @ballast/protocol — Error taxonomy.
 *
 * Every rejected operation throws a ProtocolError whose category tells
 * the caller what kind of problem it was. Lower packages keep their own
 * error classes; `categorize` maps them into the same taxonomy.
 */

import { LedgerError } from "@ballast/ledger";
import { ValuationError } from "@ballast/valuation";
import type { ValuationErrorCode } from "@ballast/valuation";

export type ErrorCategory =
  | "validation"
  | "state-conflict"
  | "invariant-violation"
  | "insufficient-funds"
  | "temporal-restriction"
  | "authorization";

export type ProtocolErrorCode =
  // validation
  | "INVALID_PARAMETERS"
  | "INVALID_AMOUNT"
  | "ZERO_AMOUNT"
  | "EMPTY_COLLATERAL"
  | "DUPLICATE_COLLATERAL"
  | "UNKNOWN_COLLATERAL"
  | "COLLATERAL_NOT_ACTIVE"
  | "OVERLAPPING_COLLATERAL"
  | "EMPTY_ADJUSTMENT"
  | "ZERO_DEBT_CHANGE"
  | "INVALID_MAX_FEE"
  // state-conflict
  | "TROVE_ALREADY_ACTIVE"
  | "TROVE_NOT_ACTIVE"
  | "LAST_TROVE"
  | "RECOVERY_MODE_CLOSE"
  | "NO_SURPLUS"
  | "INDEX_CONFLICT"
  | "REENTRANT_CALL"
  // invariant-violation
  | "ICR_BELOW_MCR"
  | "ICR_BELOW_CCR"
  | "ICR_NOT_IMPROVED"
  | "TCR_BELOW_CCR"
  | "BELOW_MIN_NET_DEBT"
  | "REPAYMENT_EXCEEDS_DEBT"
  | "COLLATERAL_WITHDRAWAL_IN_RECOVERY"
  | "FEE_EXCEEDS_MAXIMUM"
  | "FEE_EXCEEDS_REDEMPTION"
  | "NOTHING_REDEEMED"
  // insufficient-funds
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_COLLATERAL"
  | "INSUFFICIENT_COLLATERAL_BALANCE"
  // temporal-restriction
  | "BOOTSTRAP_PERIOD_ACTIVE"
  | "REDEMPTIONS_HALTED";

const CATEGORY_OF: Readonly<Record<ProtocolErrorCode, ErrorCategory>> = {
  INVALID_PARAMETERS: "validation",
  INVALID_AMOUNT: "validation",
  ZERO_AMOUNT: "validation",
  EMPTY_COLLATERAL: "validation",
  DUPLICATE_COLLATERAL: "validation",
  UNKNOWN_COLLATERAL: "validation",
  COLLATERAL_NOT_ACTIVE: "validation",
  OVERLAPPING_COLLATERAL: "validation",
  EMPTY_ADJUSTMENT: "validation",
  ZERO_DEBT_CHANGE: "validation",
  INVALID_MAX_FEE: "validation",
  TROVE_ALREADY_ACTIVE: "state-conflict",
  TROVE_NOT_ACTIVE: "state-conflict",
  LAST_TROVE: "state-conflict",
  RECOVERY_MODE_CLOSE: "state-conflict",
  NO_SURPLUS: "state-conflict",
  INDEX_CONFLICT: "state-conflict",
  REENTRANT_CALL: "state-conflict",
  ICR_BELOW_MCR: "invariant-violation",
  ICR_BELOW_CCR: "invariant-violation",
  ICR_NOT_IMPROVED: "invariant-violation",
  TCR_BELOW_CCR: "invariant-violation",
  BELOW_MIN_NET_DEBT: "invariant-violation",
  REPAYMENT_EXCEEDS_DEBT: "invariant-violation",
  COLLATERAL_WITHDRAWAL_IN_RECOVERY: "invariant-violation",
  FEE_EXCEEDS_MAXIMUM: "invariant-violation",
  FEE_EXCEEDS_REDEMPTION: "invariant-violation",
  NOTHING_REDEEMED: "invariant-violation",
  INSUFFICIENT_BALANCE: "insufficient-funds",
  INSUFFICIENT_COLLATERAL: "insufficient-funds",
  INSUFFICIENT_COLLATERAL_BALANCE: "insufficient-funds",
  BOOTSTRAP_PERIOD_ACTIVE: "temporal-restriction",
  REDEMPTIONS_HALTED: "temporal-restriction",
};

export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;
  public readonly category: ErrorCategory;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
    this.category = CATEGORY_OF[code];
  }
}

const VALUATION_CATEGORY: Readonly<Record<ValuationErrorCode, ErrorCategory>> = {
  UNKNOWN_COLLATERAL: "validation",
  DUPLICATE_COLLATERAL: "validation",
  COLLATERAL_NOT_ACTIVE: "validation",
  INVALID_COLLATERAL_CONFIG: "validation",
  INVALID_CURVE: "validation",
  PERCENT_BACKED_OUT_OF_BOUNDS: "validation",
  PRICE_UNAVAILABLE: "state-conflict",
  COLLATERAL_CAP_EXCEEDED: "invariant-violation",
  UNAUTHORIZED_CALLER: "authorization",
};

export interface ClassifiedError {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly message: string;
}

/**
 * Place any error thrown by the core into the taxonomy.
 * Returns undefined for errors the core does not own.
 */
export function categorize(error: unknown): ClassifiedError | undefined {
  if (error instanceof ProtocolError) {
    return { code: error.code, category: error.category, message: error.message };
  }
  if (error instanceof ValuationError) {
    return { code: error.code, category: VALUATION_CATEGORY[error.code], message: error.message };
  }
  if (error instanceof LedgerError) {
    const category: ErrorCategory =
      error.code === "INVALID_AMOUNT" || error.code === "DUPLICATE_COLLATERAL"
        ? "validation"
        : "invariant-violation";
    return { code: error.code, category, message: error.message };
  }
  return undefined;
}
