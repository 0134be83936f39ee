/**
 * @ballast/protocol — Collaborator contracts.
 *
 * The core consumes everything outside valuation, the ledger and the
 * fee state through these interfaces. In-memory implementations live
 * beside this file.
 */

import type { CollateralAmounts, CollateralId } from "@ballast/types";

// =============================================================================
// Ordered index
// =============================================================================

/**
 * Neighbours an insert would sit between. `prev` holds the higher ratio.
 */
export interface InsertPosition {
  readonly prev: string | undefined;
  readonly next: string | undefined;
}

/**
 * Troves ordered by collateral ratio, highest first.
 */
export interface OrderedIndex {
  insert(owner: string, icr: bigint, prevHint?: string, nextHint?: string): void;
  reInsert(owner: string, icr: bigint, prevHint?: string, nextHint?: string): void;
  remove(owner: string): void;
  contains(owner: string): boolean;
  /** Highest ratio */
  getFirst(): string | undefined;
  /** Lowest ratio */
  getLast(): string | undefined;
  /** Neighbour toward lower ratio */
  getNext(owner: string): string | undefined;
  /** Neighbour toward higher ratio */
  getPrev(owner: string): string | undefined;
  /** Ratio the trove was last inserted with */
  getKey(owner: string): bigint | undefined;
  readonly size: number;
  findInsertPosition(icr: bigint, prevHint?: string, nextHint?: string): InsertPosition;
}

// =============================================================================
// Custody
// =============================================================================

export interface SendOptions {
  /** Deliver wrapped collateral as its underlying asset */
  readonly unwrap?: boolean | undefined;
}

/**
 * Anything that can take collateral from a pool.
 */
export interface CollateralReceiver {
  receiveCollateral(amounts: CollateralAmounts): void;
}

/**
 * A pool holding collateral and tracking the debt issued against it.
 */
export interface CustodyPool extends CollateralReceiver {
  readonly name: string;
  /** Pay collateral out to an external account */
  sendCollateral(to: string, amounts: CollateralAmounts, options?: SendOptions): void;
  /** Move collateral to another pool */
  transferTo(receiver: CollateralReceiver, amounts: CollateralAmounts): void;
  increaseDebt(amount: bigint): void;
  decreaseDebt(amount: bigint): void;
  getDebt(): bigint;
  getCollateral(id: CollateralId): bigint;
  getHoldings(): CollateralAmounts;
}

/**
 * Collateral left over from troves closed by redemption, claimable by
 * their owners.
 */
export interface SurplusPool extends CollateralReceiver {
  accountSurplus(owner: string, amounts: CollateralAmounts): void;
  getSurplus(owner: string): CollateralAmounts;
  /** Pay out and clear an owner's surplus. Returns what was paid. */
  claim(owner: string, to: string, options?: SendOptions): CollateralAmounts;
  getHoldings(): CollateralAmounts;
}

// =============================================================================
// Tokens and wallets
// =============================================================================

export interface StableToken {
  mint(account: string, amount: bigint): void;
  burn(account: string, amount: bigint): void;
  transfer(from: string, to: string, amount: bigint): void;
  balanceOf(account: string): bigint;
  totalSupply(): bigint;
}

/**
 * Collateral held by accounts outside the protocol.
 */
export interface CollateralWallets {
  deposit(account: string, amounts: CollateralAmounts): void;
  withdraw(account: string, amounts: CollateralAmounts): void;
  balanceOf(account: string, id: CollateralId): bigint;
  holdingsOf(account: string): CollateralAmounts;
}

// =============================================================================
// Redistribution
// =============================================================================

export interface PendingRewards {
  readonly collateral: CollateralAmounts;
  readonly debt: bigint;
}

/**
 * Socialized debt and collateral waiting to be folded into troves.
 */
export interface Redistribution {
  pendingRewards(owner: string): PendingRewards;
  /** Fold pending rewards into the trove and reset its snapshots */
  applyPendingRewards(owner: string): PendingRewards;
  /** Start a fresh trove with no claim on earlier rewards */
  updateRewardSnapshots(owner: string): void;
  /** Recompute the trove's stake from its holdings. Returns the new stake. */
  updateStake(owner: string): bigint;
  removeStake(owner: string): void;
  totalStakes(): bigint;
}
