/**
 * @ballast/protocol — Redemption engine.
 *
 * Swaps stable credit for collateral at face value, drawing from the
 * riskiest troves first (lowest ratio, walking up the ordered index).
 *
 * Rules:
 * - Troves below MCR are skipped; they are for liquidation
 * - Each trove gives up collateral in proportion to the raw USD value
 *   of its holdings, so the redeemer receives dollar-exact value
 * - A trove drawn down to its reserve is closed and its leftover
 *   collateral is credited to its owner in the surplus pool
 * - A partial redemption whose new ratio is more than the hint tolerance
 *   (2%) away from the caller's ratio hint, relative to the hint, or that
 *   would leave less than the minimum net debt, ends the walk without error
 * - Token burns and collateral transfers happen after every check
 */

import type { CollateralAmounts, CollateralId } from "@ballast/types";
import {
  DECIMAL_PRECISION,
  EMPTY_HOLDINGS,
  addHoldings,
  computeICR,
  isEmptyHoldings,
  minBig,
  mulDiv,
  subtractHoldings,
  toHoldings,
} from "@ballast/ledger";
import type { TroveLedger } from "@ballast/ledger";
import type { CollateralRegistry } from "@ballast/valuation";
import { FEE_RECIPIENT, GAS_POOL } from "./accounts.js";
import { holdingsPayload, troveUpdatedPayload } from "./audit.js";
import type { BaseRate } from "./base-rate.js";
import type {
  CustodyPool,
  OrderedIndex,
  Redistribution,
  StableToken,
  SurplusPool,
} from "./collaborators/types.js";
import { ProtocolError } from "./errors.js";
import type { SystemState } from "./system-state.js";
import { SYSTEM_STREAM, troveStream } from "./transaction-manager.js";
import type { TransactionContext, TransactionManager } from "./transaction-manager.js";

export interface RedeemInput {
  readonly redeemer: string;
  readonly amount: bigint;
  /** Largest acceptable fee, in stable credit */
  readonly maxFee: bigint;
  /** Expected first trove to redeem from */
  readonly firstHint?: string | undefined;
  /** Insert hints for the partially redeemed trove */
  readonly upperHint?: string | undefined;
  readonly lowerHint?: string | undefined;
  /**
   * Expected ratio of the partially redeemed trove, as the hint helpers
   * compute it; 0 when no partial redemption is expected
   */
  readonly partialHintICR: bigint;
  /** Troves to visit at most; 0 or absent means no limit */
  readonly maxIterations?: number | undefined;
}

export interface RedemptionResult {
  readonly attempted: bigint;
  readonly redeemed: bigint;
  readonly fee: bigint;
  /** Collateral paid to the redeemer, keyed by the ids the troves held */
  readonly collateral: CollateralAmounts;
  readonly trovesTouched: readonly string[];
  readonly baseRate: bigint;
}

export interface RedemptionEngineOptions {
  readonly transactions: TransactionManager;
  readonly state: SystemState;
  readonly registry: CollateralRegistry;
  readonly ledger: TroveLedger;
  readonly index: OrderedIndex;
  readonly activePool: CustodyPool;
  readonly surplusPool: SurplusPool;
  readonly redistribution: Redistribution;
  readonly token: StableToken;
  readonly baseRate: BaseRate;
}

interface ClosedTrove {
  readonly owner: string;
  readonly surplus: CollateralAmounts;
}

interface TroveRedemption {
  readonly lot: bigint;
  readonly drawn: CollateralAmounts;
  readonly closed?: ClosedTrove | undefined;
}

/**
 * Collateral drawn from a trove for `lot` of its debt, split by raw USD
 * value. Truncates, so the trove keeps any rounding dust.
 */
export function drawCollateral(
  registry: CollateralRegistry,
  holdings: CollateralAmounts,
  lot: bigint,
): CollateralAmounts {
  const totalUsd = registry.usdValueOf(holdings);
  const entries: [CollateralId, bigint][] = [];
  for (const [id, amount] of holdings) {
    entries.push([id, mulDiv(amount, lot, totalUsd)]);
  }
  return toHoldings(entries);
}

export class RedemptionEngine {
  private readonly _tx: TransactionManager;
  private readonly _state: SystemState;
  private readonly _registry: CollateralRegistry;
  private readonly _ledger: TroveLedger;
  private readonly _index: OrderedIndex;
  private readonly _activePool: CustodyPool;
  private readonly _surplusPool: SurplusPool;
  private readonly _redistribution: Redistribution;
  private readonly _token: StableToken;
  private readonly _baseRate: BaseRate;

  constructor(options: RedemptionEngineOptions) {
    this._tx = options.transactions;
    this._state = options.state;
    this._registry = options.registry;
    this._ledger = options.ledger;
    this._index = options.index;
    this._activePool = options.activePool;
    this._surplusPool = options.surplusPool;
    this._redistribution = options.redistribution;
    this._token = options.token;
    this._baseRate = options.baseRate;
  }

  redeem(input: RedeemInput): RedemptionResult {
    const { redeemer, amount } = input;
    return this._tx.run("redeem", { actor: redeemer, source: "redemption" }, (tx) => {
      const params = this._state.params;

      // Checks
      if (amount <= 0n) {
        throw new ProtocolError("ZERO_AMOUNT", "Redemption amount must be positive");
      }
      const maxFeePercentage = mulDiv(input.maxFee, DECIMAL_PRECISION, amount);
      if (maxFeePercentage < params.redemptionFeeFloor || maxFeePercentage > DECIMAL_PRECISION) {
        throw new ProtocolError(
          "INVALID_MAX_FEE",
          `Max fee must be between the fee floor and 100% of the amount, got ${input.maxFee}`,
        );
      }
      if (this._state.isBootstrapPeriod(tx.now)) {
        throw new ProtocolError("BOOTSTRAP_PERIOD_ACTIVE", "Redemptions open after the bootstrap period");
      }
      const tcr = this._state.getTCR();
      if (tcr < params.mcr) {
        throw new ProtocolError("REDEMPTIONS_HALTED", `TCR ${tcr} is below MCR`);
      }
      this._assertBalance(redeemer, amount);

      const supplyAtStart = this._state.getEntireSystemDebt();
      const maxIterations = input.maxIterations ?? 0;

      let current = this._firstCandidate(input.firstHint);
      let remaining = amount;
      let iterations = 0;
      let drawn: CollateralAmounts = EMPTY_HOLDINGS;
      const closed: ClosedTrove[] = [];
      const touched: string[] = [];

      while (current !== undefined && remaining > 0n && (maxIterations === 0 || iterations < maxIterations)) {
        iterations++;
        // Read before the trove moves or leaves the index
        const next = this._index.getPrev(current);
        const result = this._redeemFromTrove(tx, current, remaining, input);
        if (result === undefined) break;

        remaining -= result.lot;
        drawn = addHoldings(drawn, result.drawn);
        touched.push(current);
        if (result.closed !== undefined) closed.push(result.closed);
        current = next;
      }

      const redeemed = amount - remaining;
      if (isEmptyHoldings(drawn)) {
        throw new ProtocolError("NOTHING_REDEEMED", "No trove could be redeemed against");
      }

      const baseRate = this._baseRate.increaseFromRedemption(redeemed, supplyAtStart, tx.now);
      const fee = mulDiv(this._baseRate.redemptionRate(baseRate), redeemed, DECIMAL_PRECISION);
      if (fee >= redeemed) {
        throw new ProtocolError("FEE_EXCEEDS_REDEMPTION", `Fee ${fee} would consume the redeemed ${redeemed}`);
      }
      if (fee > input.maxFee) {
        throw new ProtocolError("FEE_EXCEEDS_MAXIMUM", `Fee ${fee} exceeds the accepted maximum ${input.maxFee}`);
      }
      this._assertBalance(redeemer, redeemed + fee);

      // Interactions
      if (fee > 0n) {
        this._token.transfer(redeemer, FEE_RECIPIENT, fee);
      }
      this._token.burn(redeemer, redeemed);
      this._activePool.decreaseDebt(redeemed);
      for (const trove of closed) {
        this._token.burn(GAS_POOL, params.liquidationReserve);
        this._activePool.decreaseDebt(params.liquidationReserve);
        if (!isEmptyHoldings(trove.surplus)) {
          this._activePool.transferTo(this._surplusPool, trove.surplus);
          this._surplusPool.accountSurplus(trove.owner, trove.surplus);
        }
      }
      this._activePool.sendCollateral(redeemer, drawn, { unwrap: true });

      tx.record(SYSTEM_STREAM, "base-rate.updated", {
        baseRate: baseRate.toString(),
        lastFeeOperationTime: this._baseRate.lastFeeOperationTime,
      });
      tx.record(SYSTEM_STREAM, "redemption.performed", {
        attempted: amount.toString(),
        actual: redeemed.toString(),
        fee: fee.toString(),
        ...holdingsPayload(drawn),
      });

      return { attempted: amount, redeemed, fee, collateral: drawn, trovesTouched: touched, baseRate };
    });
  }

  /**
   * The caller's hint when it is the lowest trove at or above MCR,
   * otherwise a walk up from the bottom of the index.
   */
  private _firstCandidate(hint: string | undefined): string | undefined {
    const mcr = this._state.params.mcr;
    if (hint !== undefined && this._index.contains(hint) && this._ledger.isActive(hint)) {
      const next = this._index.getNext(hint);
      if (
        this._state.getCurrentICR(hint) >= mcr &&
        (next === undefined || this._state.getCurrentICR(next) < mcr)
      ) {
        return hint;
      }
    }
    let current = this._index.getLast();
    while (current !== undefined && this._state.getCurrentICR(current) < mcr) {
      current = this._index.getPrev(current);
    }
    return current;
  }

  /**
   * Redeem up to `remaining` from one trove. Returns undefined when a
   * partial redemption is cancelled.
   */
  private _redeemFromTrove(
    tx: TransactionContext,
    owner: string,
    remaining: bigint,
    input: RedeemInput,
  ): TroveRedemption | undefined {
    const params = this._state.params;
    this._redistribution.applyPendingRewards(owner);

    const collateral = this._ledger.getCollateral(owner);
    const debt = this._ledger.getDebt(owner);
    const lot = minBig(remaining, debt - params.liquidationReserve);
    const drawn = drawCollateral(this._registry, collateral, lot);
    const newCollateral = subtractHoldings(collateral, drawn);
    const newDebt = debt - lot;

    if (newDebt === params.liquidationReserve) {
      this._redistribution.removeStake(owner);
      this._ledger.closeTrove(owner, "closedByRedemption");
      this._index.remove(owner);
      tx.record(troveStream(owner), "trove.updated", troveUpdatedPayload(this._ledger.getTrove(owner), "redeem"));
      return { lot, drawn, closed: { owner, surplus: newCollateral } };
    }

    const newICR = computeICR(this._state.valueOf(newCollateral), newDebt);
    const { partialHintICR } = input;
    const distance = newICR > partialHintICR ? newICR - partialHintICR : partialHintICR - newICR;
    if (distance * DECIMAL_PRECISION > partialHintICR * params.redemptionHintTolerance) {
      return undefined;
    }
    if (newDebt - params.liquidationReserve < params.minNetDebt) {
      return undefined;
    }

    this._ledger.setCollateral(owner, newCollateral);
    this._ledger.decreaseDebt(owner, lot);
    this._redistribution.updateStake(owner);
    this._index.reInsert(owner, newICR, input.upperHint, input.lowerHint);
    tx.record(troveStream(owner), "trove.updated", troveUpdatedPayload(this._ledger.getTrove(owner), "redeem"));
    return { lot, drawn };
  }

  private _assertBalance(redeemer: string, needed: bigint): void {
    const balance = this._token.balanceOf(redeemer);
    if (balance < needed) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `"${redeemer}" holds ${balance} stable credit, needs ${needed}`,
      );
    }
  }
}
