/**
 * Collateral Types
 *
 * Primitives for describing what a trove holds.
 *
 * Rules:
 * - Amounts are bigint in the token's own decimals
 * - Holdings are sparse maps keyed by collateral id (never position-aligned arrays)
 * - Zero entries are never stored
 * - Wire/audit representations use base-10 integer strings
 */

/**
 * Collateral type identifier (e.g., "wETH", "wBTC", "sAVAX").
 */
export type CollateralId = string;

/**
 * Collateral amounts keyed by collateral id.
 * Read-only view; writers build a fresh map.
 */
export type CollateralAmounts = ReadonlyMap<CollateralId, bigint>;

/**
 * A single collateral amount as carried over JSON and in audit records.
 */
export interface CollateralAmountRecord {
  /** Which collateral type */
  readonly collateralId: CollateralId;

  /** Base-10 integer string in the token's own decimals */
  readonly amount: string;
}
