/**
 * Trove Types
 *
 * A trove is one account's collateralized debt position.
 */

import type { CollateralAmounts } from "./collateral.js";

/**
 * Lifecycle status of a trove.
 *
 * nonExistent → active → closedByOwner | closedByLiquidation | closedByRedemption
 * A closed trove may be reopened by its owner (→ active).
 */
export type TroveStatus =
  | "nonExistent"
  | "active"
  | "closedByOwner"
  | "closedByLiquidation"
  | "closedByRedemption";

/**
 * Statuses a trove can be closed into.
 */
export type TerminalTroveStatus = Exclude<TroveStatus, "nonExistent" | "active">;

/**
 * The operation that last changed a trove (carried in audit records).
 */
export type TroveOperation =
  | "open"
  | "close"
  | "adjust"
  | "addCollateral"
  | "withdrawCollateral"
  | "increaseDebt"
  | "repayDebt"
  | "redeem";

/**
 * A trove as stored by the ledger.
 */
export interface Trove {
  /** Owner identity (unique key) */
  readonly owner: string;

  readonly status: TroveStatus;

  /** Collateral held, keyed by collateral id */
  readonly collateral: CollateralAmounts;

  /** Total debt, 18 decimals, liquidation reserve included */
  readonly debt: bigint;

  /** Stake weight, owned by the redistribution collaborator */
  readonly stake: bigint;

  /** Position in the owners array while active */
  readonly arrayIndex?: number | undefined;
}
