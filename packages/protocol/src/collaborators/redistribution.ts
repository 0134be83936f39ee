/**
 * @ballast/protocol — In-memory redistribution.
 *
 * Socialized debt and collateral are spread over all stakes through
 * running per-unit-stake totals. A trove's claim is its stake times the
 * growth of those totals since its last snapshot.
 *
 * Rules:
 * - Pending rewards are applied before a trove is touched
 * - A trove's stake is its normalized collateral value when last updated
 * - Per-unit totals truncate; the default pool always covers every claim
 */

import type { CollateralAmounts, CollateralId } from "@ballast/types";
import type { TroveLedger } from "@ballast/ledger";
import {
  DECIMAL_PRECISION,
  EMPTY_HOLDINGS,
  addHoldings,
  isEmptyHoldings,
  toHoldings,
} from "@ballast/ledger";
import type { CollateralRegistry } from "@ballast/valuation";
import type { CustodyPool, PendingRewards, Redistribution } from "./types.js";
import { ProtocolError } from "../errors.js";

interface RewardSnapshot {
  readonly collateral: ReadonlyMap<CollateralId, bigint>;
  readonly debt: bigint;
}

export interface RedistributionSnapshot {
  readonly perStakeCollateral: ReadonlyMap<CollateralId, bigint>;
  readonly perStakeDebt: bigint;
  readonly rewardSnapshots: ReadonlyMap<string, RewardSnapshot>;
  readonly totalStakes: bigint;
}

export interface InMemoryRedistributionOptions {
  readonly ledger: TroveLedger;
  readonly registry: CollateralRegistry;
  readonly activePool: CustodyPool;
  readonly defaultPool: CustodyPool;
}

const NO_REWARDS: PendingRewards = Object.freeze({ collateral: EMPTY_HOLDINGS, debt: 0n });

export class InMemoryRedistribution implements Redistribution {
  private _perStakeCollateral = new Map<CollateralId, bigint>();
  private _perStakeDebt = 0n;
  private _rewardSnapshots = new Map<string, RewardSnapshot>();
  private _totalStakes = 0n;
  private readonly _ledger: TroveLedger;
  private readonly _registry: CollateralRegistry;
  private readonly _activePool: CustodyPool;
  private readonly _defaultPool: CustodyPool;

  constructor(options: InMemoryRedistributionOptions) {
    this._ledger = options.ledger;
    this._registry = options.registry;
    this._activePool = options.activePool;
    this._defaultPool = options.defaultPool;
  }

  /**
   * Spread debt and collateral from outside the active troves (such as
   * a liquidated position) over every stake. The amounts are parked in
   * the default pool until each trove applies its share.
   */
  redistribute(debt: bigint, collateral: CollateralAmounts): void {
    if (this._totalStakes === 0n) {
      throw new ProtocolError("INVALID_AMOUNT", "Nothing to redistribute over: total stakes are zero");
    }
    this._defaultPool.receiveCollateral(collateral);
    this._defaultPool.increaseDebt(debt);

    for (const [id, amount] of collateral) {
      const increment = (amount * DECIMAL_PRECISION) / this._totalStakes;
      this._perStakeCollateral.set(id, (this._perStakeCollateral.get(id) ?? 0n) + increment);
    }
    this._perStakeDebt += (debt * DECIMAL_PRECISION) / this._totalStakes;
  }

  pendingRewards(owner: string): PendingRewards {
    if (!this._ledger.isActive(owner)) {
      return NO_REWARDS;
    }
    const snapshot = this._rewardSnapshots.get(owner);
    if (snapshot === undefined) {
      return NO_REWARDS;
    }
    const stake = this._ledger.getStake(owner);

    const entries: [CollateralId, bigint][] = [];
    for (const [id, perStake] of this._perStakeCollateral) {
      const delta = perStake - (snapshot.collateral.get(id) ?? 0n);
      entries.push([id, (stake * delta) / DECIMAL_PRECISION]);
    }
    return {
      collateral: toHoldings(entries),
      debt: (stake * (this._perStakeDebt - snapshot.debt)) / DECIMAL_PRECISION,
    };
  }

  applyPendingRewards(owner: string): PendingRewards {
    const rewards = this.pendingRewards(owner);
    if (!isEmptyHoldings(rewards.collateral) || rewards.debt > 0n) {
      this._ledger.setCollateral(owner, addHoldings(this._ledger.getCollateral(owner), rewards.collateral));
      this._ledger.increaseDebt(owner, rewards.debt);
      this._defaultPool.transferTo(this._activePool, rewards.collateral);
      this._defaultPool.decreaseDebt(rewards.debt);
      this._activePool.increaseDebt(rewards.debt);
    }
    this.updateRewardSnapshots(owner);
    return rewards;
  }

  updateRewardSnapshots(owner: string): void {
    this._rewardSnapshots.set(owner, {
      collateral: new Map(this._perStakeCollateral),
      debt: this._perStakeDebt,
    });
  }

  updateStake(owner: string): bigint {
    const stake = this._registry.normalizedValueOf(this._ledger.getCollateral(owner));
    this._totalStakes += stake - this._ledger.getStake(owner);
    this._ledger.setStake(owner, stake);
    return stake;
  }

  removeStake(owner: string): void {
    this._totalStakes -= this._ledger.getStake(owner);
    this._ledger.setStake(owner, 0n);
    this._rewardSnapshots.delete(owner);
  }

  totalStakes(): bigint {
    return this._totalStakes;
  }

  snapshot(): RedistributionSnapshot {
    return {
      perStakeCollateral: new Map(this._perStakeCollateral),
      perStakeDebt: this._perStakeDebt,
      rewardSnapshots: new Map(this._rewardSnapshots),
      totalStakes: this._totalStakes,
    };
  }

  restore(snapshot: RedistributionSnapshot): void {
    this._perStakeCollateral = new Map(snapshot.perStakeCollateral);
    this._perStakeDebt = snapshot.perStakeDebt;
    this._rewardSnapshots = new Map(snapshot.rewardSnapshots);
    this._totalStakes = snapshot.totalStakes;
  }
}
