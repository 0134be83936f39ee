/**
 * @ballast/protocol — System read model.
 *
 * Derived aggregates and per-trove views shared by borrower operations,
 * redemption and hint helpers. Nothing here mutates state.
 *
 * Rules:
 * - System value and debt span the active and the default pool
 * - System value is summed per collateral type over both pools, so a
 *   single pool's value never exceeds it
 * - Trove views include pending redistribution rewards
 */

import type { CollateralAmounts, Trove } from "@ballast/types";
import {
  DECIMAL_PRECISION,
  addHoldings,
  computeICR,
  computeRatio,
  mulDiv,
} from "@ballast/ledger";
import type { TroveLedger } from "@ballast/ledger";
import type { CollateralRegistry } from "@ballast/valuation";
import type { BaseRate } from "./base-rate.js";
import type { Clock } from "./clock.js";
import type { CustodyPool, Redistribution } from "./collaborators/types.js";
import type { ProtocolParameters } from "./parameters.js";

/**
 * A trove with its pending rewards folded in.
 */
export interface EntireTrove {
  readonly collateral: CollateralAmounts;
  readonly debt: bigint;
  readonly pendingCollateral: CollateralAmounts;
  readonly pendingDebt: bigint;
}

export interface SystemStateOptions {
  readonly params: ProtocolParameters;
  readonly registry: CollateralRegistry;
  readonly ledger: TroveLedger;
  readonly activePool: CustodyPool;
  readonly defaultPool: CustodyPool;
  readonly redistribution: Redistribution;
  readonly baseRate: BaseRate;
  readonly clock: Clock;
  /** Unix seconds at deployment; the bootstrap period starts here */
  readonly deploymentTime: number;
}

export class SystemState {
  readonly params: ProtocolParameters;
  readonly deploymentTime: number;
  private readonly _registry: CollateralRegistry;
  private readonly _ledger: TroveLedger;
  private readonly _activePool: CustodyPool;
  private readonly _defaultPool: CustodyPool;
  private readonly _redistribution: Redistribution;
  private readonly _baseRate: BaseRate;
  private readonly _clock: Clock;

  constructor(options: SystemStateOptions) {
    this.params = options.params;
    this.deploymentTime = options.deploymentTime;
    this._registry = options.registry;
    this._ledger = options.ledger;
    this._activePool = options.activePool;
    this._defaultPool = options.defaultPool;
    this._redistribution = options.redistribution;
    this._baseRate = options.baseRate;
    this._clock = options.clock;
  }

  // ─── Aggregates ───────────────────────────────────────────────────────

  getEntireSystemCollateral(): CollateralAmounts {
    return addHoldings(this._activePool.getHoldings(), this._defaultPool.getHoldings());
  }

  getEntireSystemValue(): bigint {
    return this._registry.normalizedValueOf(this.getEntireSystemCollateral());
  }

  getEntireSystemDebt(): bigint {
    return this._activePool.getDebt() + this._defaultPool.getDebt();
  }

  getTCR(): bigint {
    return computeRatio(this.getEntireSystemValue(), this.getEntireSystemDebt());
  }

  checkRecoveryMode(): boolean {
    return this.getTCR() < this.params.ccr;
  }

  /**
   * System ratio after a trove change, given as signed value and debt deltas.
   */
  getNewTCR(valueDelta: bigint, debtDelta: bigint): bigint {
    return computeRatio(
      this.getEntireSystemValue() + valueDelta,
      this.getEntireSystemDebt() + debtDelta,
    );
  }

  /**
   * Normalized value of one collateral type across both pools.
   */
  getPoolValue(id: string): bigint {
    const amount = this._activePool.getCollateral(id) + this._defaultPool.getCollateral(id);
    return this._registry.normalizedValue(id, amount);
  }

  isBootstrapPeriod(now: number = this._clock.now()): boolean {
    return now < this.deploymentTime + this.params.bootstrapPeriod;
  }

  // ─── Troves ───────────────────────────────────────────────────────────

  valueOf(holdings: CollateralAmounts): bigint {
    return this._registry.normalizedValueOf(holdings);
  }

  getTrove(owner: string): Trove {
    return this._ledger.getTrove(owner);
  }

  getEntireTrove(owner: string): EntireTrove {
    const pending = this._redistribution.pendingRewards(owner);
    return {
      collateral: addHoldings(this._ledger.getCollateral(owner), pending.collateral),
      debt: this._ledger.getDebt(owner) + pending.debt,
      pendingCollateral: pending.collateral,
      pendingDebt: pending.debt,
    };
  }

  /**
   * Ratio of an active trove including pending rewards.
   */
  getCurrentICR(owner: string): bigint {
    const trove = this.getEntireTrove(owner);
    return computeICR(this.valueOf(trove.collateral), trove.debt);
  }

  // ─── Fees ─────────────────────────────────────────────────────────────

  getBorrowingRate(): bigint {
    return this._baseRate.borrowingRate();
  }

  getBorrowingRateWithDecay(): bigint {
    return this._baseRate.borrowingRate(this._baseRate.decayedBaseRate(this._clock.now()));
  }

  getRedemptionRate(): bigint {
    return this._baseRate.redemptionRate();
  }

  getRedemptionRateWithDecay(): bigint {
    return this._baseRate.redemptionRate(this._baseRate.decayedBaseRate(this._clock.now()));
  }

  getRedemptionFeeWithDecay(amount: bigint): bigint {
    return mulDiv(this.getRedemptionRateWithDecay(), amount, DECIMAL_PRECISION);
  }
}
