/**
 * @ballast/ledger — Internal types for the trove ledger.
 *
 * These extend the shared @ballast/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - All exposed types are readonly
 * - The ledger performs no business validation
 * - Fail-closed: arithmetic that would break a structural invariant throws
 */

import type { Trove } from "@ballast/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "DIVISION_BY_ZERO"
  | "UNDEFINED_RATIO"
  | "NEGATIVE_BALANCE"
  | "DUPLICATE_COLLATERAL"
  | "DEBT_UNDERFLOW"
  | "UNKNOWN_OWNER"
  | "DUPLICATE_OWNER"
  | "INVALID_STATUS";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable-in-memory snapshot of the whole trove ledger.
 * Used for rollback of a failed operation.
 */
export interface TroveLedgerSnapshot {
  readonly version: 1;
  readonly troves: readonly Trove[];
  readonly owners: readonly string[];
}

/**
 * Result of removing an owner from the owners array.
 * When the removed owner was not last, the last owner moves into its slot.
 */
export interface OwnerRemoval {
  readonly removedIndex: number;
  readonly moved?: { readonly owner: string; readonly index: number } | undefined;
}
