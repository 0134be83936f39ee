/**
 * @ballast/protocol — Dynamic fee state (base rate).
 *
 * One global scalar drives both the flat borrowing fee and the
 * redemption fee. Redemptions push it up; otherwise it decays per
 * whole minute elapsed since the last fee operation.
 *
 * Rules:
 * - lastFeeOperationTime advances only when at least a minute has
 *   passed, so a stream of sub-minute calls cannot stall the decay
 * - Borrowing persists the decayed rate; it never raises it
 * - The rate never exceeds 100%
 */

import {
  DECIMAL_PRECISION,
  decMul,
  decPow,
  minBig,
  mulDiv,
} from "@ballast/ledger";
import type { ProtocolParameters } from "./parameters.js";

const SECONDS_IN_ONE_MINUTE = 60;

export interface BaseRateSnapshot {
  readonly baseRate: bigint;
  readonly lastFeeOperationTime: number;
}

export class BaseRate {
  private _baseRate = 0n;
  private _lastFeeOperationTime: number;
  private readonly _params: ProtocolParameters;

  constructor(params: ProtocolParameters, deploymentTime: number) {
    this._params = params;
    this._lastFeeOperationTime = deploymentTime;
  }

  get baseRate(): bigint {
    return this._baseRate;
  }

  get lastFeeOperationTime(): number {
    return this._lastFeeOperationTime;
  }

  // ─── Reads ────────────────────────────────────────────────────────────

  minutesPassed(now: number): bigint {
    const elapsed = Math.max(0, now - this._lastFeeOperationTime);
    return BigInt(Math.floor(elapsed / SECONDS_IN_ONE_MINUTE));
  }

  decayedBaseRate(now: number): bigint {
    const factor = decPow(this._params.minuteDecayFactor, this.minutesPassed(now));
    return decMul(this._baseRate, factor);
  }

  borrowingRate(baseRate: bigint = this._baseRate): bigint {
    return minBig(this._params.borrowingFeeFloor + baseRate, this._params.maxBorrowingFee);
  }

  redemptionRate(baseRate: bigint = this._baseRate): bigint {
    return minBig(this._params.redemptionFeeFloor + baseRate, DECIMAL_PRECISION);
  }

  // ─── Updates ──────────────────────────────────────────────────────────

  /**
   * Persist the decayed rate ahead of charging a borrowing fee.
   */
  decayForBorrowing(now: number): bigint {
    this._baseRate = this.decayedBaseRate(now);
    this._updateLastFeeOperationTime(now);
    return this._baseRate;
  }

  /**
   * Raise the rate by the redeemed share of supply, dampened by BETA.
   */
  increaseFromRedemption(redeemed: bigint, totalSupply: bigint, now: number): bigint {
    const redeemedFraction = mulDiv(redeemed, DECIMAL_PRECISION, totalSupply);
    const next = this.decayedBaseRate(now) + redeemedFraction / this._params.beta;
    this._baseRate = minBig(next, DECIMAL_PRECISION);
    this._updateLastFeeOperationTime(now);
    return this._baseRate;
  }

  // ─── Rollback ─────────────────────────────────────────────────────────

  snapshot(): BaseRateSnapshot {
    return { baseRate: this._baseRate, lastFeeOperationTime: this._lastFeeOperationTime };
  }

  restore(snapshot: BaseRateSnapshot): void {
    this._baseRate = snapshot.baseRate;
    this._lastFeeOperationTime = snapshot.lastFeeOperationTime;
  }

  private _updateLastFeeOperationTime(now: number): void {
    if (now - this._lastFeeOperationTime >= SECONDS_IN_ONE_MINUTE) {
      this._lastFeeOperationTime = now;
    }
  }
}
