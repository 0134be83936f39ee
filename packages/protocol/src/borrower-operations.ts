/**
 * @ballast/protocol — Borrower operations.
 *
 * Opens, adjusts and closes troves. Every call runs inside the
 * transaction manager and follows the same shape:
 *
 *   1. Checks: validate input, mode rules and fees against the state
 *   2. Effects: write the ledger, stakes, index and fee state
 *   3. Interactions: move collateral and stable credit through the
 *      custody pools, wallets and token
 *
 * Any throw at any step rolls the whole call back.
 */

import type {
  CollateralAmounts,
  CollateralId,
  Trove,
  TroveOperation,
} from "@ballast/types";
import {
  DECIMAL_PRECISION,
  EMPTY_HOLDINGS,
  addHoldings,
  computeICR,
  isEmptyHoldings,
  maxBig,
  minBig,
  mulDiv,
  sortedIds,
  subtractHoldings,
  toRecords,
} from "@ballast/ledger";
import type { TroveLedger } from "@ballast/ledger";
import type { Capability, CollateralRegistry } from "@ballast/valuation";
import { FEE_RECIPIENT, GAS_POOL } from "./accounts.js";
import { troveUpdatedPayload } from "./audit.js";
import type { BaseRate } from "./base-rate.js";
import type {
  CollateralWallets,
  CustodyPool,
  OrderedIndex,
  Redistribution,
  StableToken,
  SurplusPool,
} from "./collaborators/types.js";
import { ProtocolError } from "./errors.js";
import type { SystemState } from "./system-state.js";
import { troveStream } from "./transaction-manager.js";
import type { TransactionContext, TransactionManager } from "./transaction-manager.js";

/**
 * Collateral deltas as submitted by a caller. Duplicates are rejected,
 * so this stays a list until validated.
 */
export type CollateralList = readonly (readonly [CollateralId, bigint])[];

export interface InsertHints {
  /** Trove expected just above the new position */
  readonly upperHint?: string | undefined;
  /** Trove expected just below the new position */
  readonly lowerHint?: string | undefined;
}

export interface OpenTroveInput extends InsertHints {
  readonly owner: string;
  readonly collateral: CollateralList;
  readonly debtAmount: bigint;
  /** Largest acceptable fee as a fraction of the fee basis (18 decimals) */
  readonly maxFeePercentage: bigint;
}

export interface AdjustTroveInput extends InsertHints {
  readonly owner: string;
  readonly collateralIn?: CollateralList | undefined;
  readonly collateralOut?: CollateralList | undefined;
  readonly debtChange?: bigint | undefined;
  readonly isDebtIncrease?: boolean | undefined;
  readonly maxFeePercentage: bigint;
}

export interface CollateralChangeInput extends InsertHints {
  readonly owner: string;
  readonly collateral: CollateralList;
  readonly maxFeePercentage?: bigint | undefined;
}

export interface DebtChangeInput extends InsertHints {
  readonly owner: string;
  readonly amount: bigint;
  readonly maxFeePercentage?: bigint | undefined;
}

/**
 * A trove after a successful operation, with the fees it paid.
 */
export interface TroveChange {
  readonly trove: Trove;
  readonly icr: bigint;
  readonly borrowingFee: bigint;
  readonly variableFee: bigint;
}

export interface BorrowerOperationsOptions {
  readonly transactions: TransactionManager;
  readonly state: SystemState;
  readonly registry: CollateralRegistry;
  /** Presented to the registry when persisting variable fees */
  readonly feeCapability: Capability;
  readonly ledger: TroveLedger;
  readonly index: OrderedIndex;
  readonly activePool: CustodyPool;
  readonly surplusPool: SurplusPool;
  readonly redistribution: Redistribution;
  readonly token: StableToken;
  readonly wallets: CollateralWallets;
  readonly baseRate: BaseRate;
}

interface Fees {
  readonly borrowingFee: bigint;
  readonly variableFee: bigint;
  readonly total: bigint;
}

export class BorrowerOperations {
  private readonly _tx: TransactionManager;
  private readonly _state: SystemState;
  private readonly _registry: CollateralRegistry;
  private readonly _feeCapability: Capability;
  private readonly _ledger: TroveLedger;
  private readonly _index: OrderedIndex;
  private readonly _activePool: CustodyPool;
  private readonly _surplusPool: SurplusPool;
  private readonly _redistribution: Redistribution;
  private readonly _token: StableToken;
  private readonly _wallets: CollateralWallets;
  private readonly _baseRate: BaseRate;

  constructor(options: BorrowerOperationsOptions) {
    this._tx = options.transactions;
    this._state = options.state;
    this._registry = options.registry;
    this._feeCapability = options.feeCapability;
    this._ledger = options.ledger;
    this._index = options.index;
    this._activePool = options.activePool;
    this._surplusPool = options.surplusPool;
    this._redistribution = options.redistribution;
    this._token = options.token;
    this._wallets = options.wallets;
    this._baseRate = options.baseRate;
  }

  // ─── Open ─────────────────────────────────────────────────────────────

  open(input: OpenTroveInput): TroveChange {
    const { owner } = input;
    return this._tx.run("open", { actor: owner, source: "borrower-operations" }, (tx) => {
      const params = this._state.params;

      // Checks
      if (this._ledger.isActive(owner)) {
        throw new ProtocolError("TROVE_ALREADY_ACTIVE", `Trove of "${owner}" is already active`);
      }
      const collateral = this._collateralMap(input.collateral);
      if (isEmptyHoldings(collateral)) {
        throw new ProtocolError("EMPTY_COLLATERAL", "A trove needs at least one collateral type");
      }
      if (input.debtAmount <= 0n) {
        throw new ProtocolError("ZERO_DEBT_CHANGE", "Debt amount must be positive");
      }
      const recovery = this._state.checkRecoveryMode();
      this._validateMaxFee(input.maxFeePercentage, !recovery);
      this._assertWalletCovers(owner, collateral);

      const value = this._state.valueOf(collateral);
      const fees = this._chargeFees(tx.now, collateral, input.debtAmount, !recovery);
      this._assertFeeWithinMaximum(fees.total, input.maxFeePercentage, maxBig(value, input.debtAmount));

      const netDebt = input.debtAmount + fees.total;
      this._assertMinNetDebt(netDebt);
      const compositeDebt = netDebt + params.liquidationReserve;
      const icr = computeICR(value, compositeDebt);

      if (recovery) {
        this._assertICR(icr, params.ccr, "ICR_BELOW_CCR");
      } else {
        this._assertICR(icr, params.mcr, "ICR_BELOW_MCR");
        this._assertTCR(this._state.getNewTCR(value, compositeDebt));
      }

      // Effects
      this._ledger.setStatus(owner, "active");
      this._ledger.setCollateral(owner, collateral);
      this._ledger.increaseDebt(owner, compositeDebt);
      this._redistribution.updateRewardSnapshots(owner);
      this._redistribution.updateStake(owner);
      const arrayIndex = this._ledger.addOwner(owner);
      this._index.insert(owner, icr, input.upperHint, input.lowerHint);

      // Interactions
      this._wallets.withdraw(owner, collateral);
      this._activePool.receiveCollateral(collateral);
      this._activePool.increaseDebt(compositeDebt);
      this._token.mint(owner, input.debtAmount);
      this._token.mint(GAS_POOL, params.liquidationReserve);
      if (fees.total > 0n) {
        this._token.mint(FEE_RECIPIENT, fees.total);
      }

      const trove = this._ledger.getTrove(owner);
      tx.record(troveStream(owner), "trove.created", { owner, arrayIndex });
      this._recordUpdate(tx, trove, "open", fees.total);
      return { trove, icr, borrowingFee: fees.borrowingFee, variableFee: fees.variableFee };
    });
  }

  // ─── Adjust ───────────────────────────────────────────────────────────

  adjust(input: AdjustTroveInput): TroveChange {
    return this._adjust(input, "adjust");
  }

  addCollateral(input: CollateralChangeInput): TroveChange {
    return this._adjust(
      { ...input, collateralIn: input.collateral, maxFeePercentage: input.maxFeePercentage ?? DECIMAL_PRECISION },
      "addCollateral",
    );
  }

  withdrawCollateral(input: CollateralChangeInput): TroveChange {
    return this._adjust(
      { ...input, collateralOut: input.collateral, maxFeePercentage: input.maxFeePercentage ?? DECIMAL_PRECISION },
      "withdrawCollateral",
    );
  }

  increaseDebt(input: DebtChangeInput): TroveChange {
    return this._adjust(
      {
        ...input,
        debtChange: input.amount,
        isDebtIncrease: true,
        maxFeePercentage: input.maxFeePercentage ?? DECIMAL_PRECISION,
      },
      "increaseDebt",
    );
  }

  repayDebt(input: DebtChangeInput): TroveChange {
    return this._adjust(
      {
        ...input,
        debtChange: input.amount,
        isDebtIncrease: false,
        maxFeePercentage: input.maxFeePercentage ?? DECIMAL_PRECISION,
      },
      "repayDebt",
    );
  }

  private _adjust(input: AdjustTroveInput, operation: TroveOperation): TroveChange {
    const { owner } = input;
    return this._tx.run(operation, { actor: owner, source: "borrower-operations" }, (tx) => {
      const params = this._state.params;

      // Checks
      this._assertActive(owner);
      const collateralIn = this._collateralMap(input.collateralIn ?? []);
      const collateralOut = this._collateralMap(input.collateralOut ?? []);
      for (const id of collateralIn.keys()) {
        if (collateralOut.has(id)) {
          throw new ProtocolError("OVERLAPPING_COLLATERAL", `"${id}" is both deposited and withdrawn`);
        }
      }

      const debtChange = input.debtChange ?? 0n;
      const isDebtIncrease = input.isDebtIncrease ?? false;
      if (debtChange < 0n) {
        throw new ProtocolError("INVALID_AMOUNT", "Debt change cannot be negative");
      }
      if (isEmptyHoldings(collateralIn) && isEmptyHoldings(collateralOut) && debtChange === 0n) {
        throw new ProtocolError("EMPTY_ADJUSTMENT", "Adjustment changes neither collateral nor debt");
      }
      if (isDebtIncrease && debtChange === 0n) {
        throw new ProtocolError("ZERO_DEBT_CHANGE", "Debt increase must be positive");
      }

      const recovery = this._state.checkRecoveryMode();
      const chargesBorrowingFee = isDebtIncrease && !recovery;
      this._validateMaxFee(input.maxFeePercentage, chargesBorrowingFee);
      this._assertWalletCovers(owner, collateralIn);

      this._redistribution.applyPendingRewards(owner);
      const oldCollateral = this._ledger.getCollateral(owner);
      const oldDebt = this._ledger.getDebt(owner);
      const oldValue = this._state.valueOf(oldCollateral);
      const oldICR = computeICR(oldValue, oldDebt);

      const valueIn = this._state.valueOf(collateralIn);
      const fees = this._chargeFees(tx.now, collateralIn, debtChange, chargesBorrowingFee);
      const basis = isDebtIncrease ? maxBig(valueIn, debtChange) : valueIn;
      this._assertFeeWithinMaximum(fees.total, input.maxFeePercentage, basis);

      for (const [id, amount] of collateralOut) {
        const held = oldCollateral.get(id) ?? 0n;
        if (amount > held) {
          throw new ProtocolError(
            "INSUFFICIENT_COLLATERAL",
            `Trove holds ${held} of "${id}", cannot withdraw ${amount}`,
          );
        }
      }
      const newCollateral = subtractHoldings(addHoldings(oldCollateral, collateralIn), collateralOut);

      if (!isDebtIncrease && debtChange > 0n) {
        this._assertRepayable(owner, oldDebt, debtChange);
      }
      const newDebt = isDebtIncrease
        ? oldDebt + debtChange + fees.total
        : oldDebt - debtChange + fees.total;

      const newValue = this._state.valueOf(newCollateral);
      const newICR = computeICR(newValue, newDebt);
      if (recovery) {
        if (!isEmptyHoldings(collateralOut)) {
          throw new ProtocolError(
            "COLLATERAL_WITHDRAWAL_IN_RECOVERY",
            "Collateral cannot be withdrawn in Recovery Mode",
          );
        }
        if (isDebtIncrease) {
          this._assertICR(newICR, params.ccr, "ICR_BELOW_CCR");
          if (newICR < oldICR) {
            throw new ProtocolError("ICR_NOT_IMPROVED", "Debt increase in Recovery Mode must not lower the ICR");
          }
        }
      } else {
        this._assertICR(newICR, params.mcr, "ICR_BELOW_MCR");
        this._assertTCR(this._state.getNewTCR(newValue - oldValue, newDebt - oldDebt));
      }

      // Effects
      this._ledger.setCollateral(owner, newCollateral);
      if (newDebt >= oldDebt) {
        this._ledger.increaseDebt(owner, newDebt - oldDebt);
      } else {
        this._ledger.decreaseDebt(owner, oldDebt - newDebt);
      }
      this._redistribution.updateStake(owner);
      this._index.reInsert(owner, newICR, input.upperHint, input.lowerHint);

      // Interactions
      if (!isEmptyHoldings(collateralIn)) {
        this._wallets.withdraw(owner, collateralIn);
        this._activePool.receiveCollateral(collateralIn);
      }
      if (!isEmptyHoldings(collateralOut)) {
        this._activePool.sendCollateral(owner, collateralOut, { unwrap: true });
      }
      if (newDebt >= oldDebt) {
        this._activePool.increaseDebt(newDebt - oldDebt);
      } else {
        this._activePool.decreaseDebt(oldDebt - newDebt);
      }
      if (isDebtIncrease) {
        this._token.mint(owner, debtChange);
      } else if (debtChange > 0n) {
        this._token.burn(owner, debtChange);
      }
      if (fees.total > 0n) {
        this._token.mint(FEE_RECIPIENT, fees.total);
      }

      const trove = this._ledger.getTrove(owner);
      this._recordUpdate(tx, trove, operation, fees.total);
      return { trove, icr: newICR, borrowingFee: fees.borrowingFee, variableFee: fees.variableFee };
    });
  }

  // ─── Close ────────────────────────────────────────────────────────────

  close(owner: string): Trove {
    return this._tx.run("close", { actor: owner, source: "borrower-operations" }, (tx) => {
      const params = this._state.params;

      // Checks
      this._assertActive(owner);
      if (this._state.checkRecoveryMode()) {
        throw new ProtocolError("RECOVERY_MODE_CLOSE", "Troves cannot be closed in Recovery Mode");
      }
      if (this._ledger.ownerCount < 2) {
        throw new ProtocolError("LAST_TROVE", "The last trove in the system cannot be closed");
      }

      this._redistribution.applyPendingRewards(owner);
      const collateral = this._ledger.getCollateral(owner);
      const debt = this._ledger.getDebt(owner);
      const netDebt = debt - params.liquidationReserve;
      const balance = this._token.balanceOf(owner);
      if (balance < netDebt) {
        throw new ProtocolError(
          "INSUFFICIENT_BALANCE",
          `Closing needs ${netDebt} stable credit, "${owner}" holds ${balance}`,
        );
      }
      this._assertTCR(this._state.getNewTCR(-this._state.valueOf(collateral), -debt));

      // Effects
      this._redistribution.removeStake(owner);
      this._ledger.closeTrove(owner, "closedByOwner");
      this._index.remove(owner);

      // Interactions
      this._token.burn(owner, netDebt);
      this._token.burn(GAS_POOL, params.liquidationReserve);
      this._activePool.decreaseDebt(debt);
      this._activePool.sendCollateral(owner, collateral, { unwrap: true });

      const trove = this._ledger.getTrove(owner);
      this._recordUpdate(tx, trove, "close", 0n);
      return trove;
    });
  }

  // ─── Surplus ──────────────────────────────────────────────────────────

  /**
   * Pay out collateral left over from a trove closed by redemption.
   */
  claimSurplus(owner: string): CollateralAmounts {
    return this._tx.run("claimSurplus", { actor: owner, source: "borrower-operations" }, (tx) => {
      const paid = this._surplusPool.claim(owner, owner, { unwrap: true });
      tx.record(troveStream(owner), "surplus.claimed", { owner, collateral: toRecords(paid) });
      return paid;
    });
  }

  // ─── Checks ───────────────────────────────────────────────────────────

  private _assertActive(owner: string): void {
    if (!this._ledger.isActive(owner)) {
      throw new ProtocolError("TROVE_NOT_ACTIVE", `"${owner}" has no active trove`);
    }
  }

  /**
   * Validate one side of an adjustment into a holdings map.
   */
  private _collateralMap(list: CollateralList): CollateralAmounts {
    if (list.length === 0) return EMPTY_HOLDINGS;
    const result = new Map<CollateralId, bigint>();
    for (const [id, amount] of list) {
      if (result.has(id)) {
        throw new ProtocolError("DUPLICATE_COLLATERAL", `"${id}" is listed more than once`);
      }
      if (amount <= 0n) {
        throw new ProtocolError("INVALID_AMOUNT", `Amount of "${id}" must be positive, got ${amount}`);
      }
      const entry = this._registry.get(id);
      if (entry === undefined) {
        throw new ProtocolError("UNKNOWN_COLLATERAL", `Unknown collateral: "${id}"`);
      }
      if (!entry.active) {
        throw new ProtocolError("COLLATERAL_NOT_ACTIVE", `Collateral "${id}" is not active`);
      }
      result.set(id, amount);
    }
    return result;
  }

  private _validateMaxFee(maxFee: bigint, chargesBorrowingFee: boolean): void {
    const floor = chargesBorrowingFee ? this._state.params.borrowingFeeFloor : 0n;
    if (maxFee < floor || maxFee > DECIMAL_PRECISION) {
      throw new ProtocolError(
        "INVALID_MAX_FEE",
        `Max fee percentage must be within [${floor}, ${DECIMAL_PRECISION}], got ${maxFee}`,
      );
    }
  }

  private _assertWalletCovers(owner: string, amounts: CollateralAmounts): void {
    for (const [id, amount] of amounts) {
      const balance = this._wallets.balanceOf(owner, id);
      if (balance < amount) {
        throw new ProtocolError(
          "INSUFFICIENT_COLLATERAL_BALANCE",
          `"${owner}" holds ${balance} of "${id}", needs ${amount}`,
        );
      }
    }
  }

  private _assertFeeWithinMaximum(fee: bigint, maxFeePercentage: bigint, basis: bigint): void {
    const maximum = mulDiv(maxFeePercentage, basis, DECIMAL_PRECISION);
    if (fee > maximum) {
      throw new ProtocolError("FEE_EXCEEDS_MAXIMUM", `Fee ${fee} exceeds the accepted maximum ${maximum}`);
    }
  }

  private _assertMinNetDebt(netDebt: bigint): void {
    if (netDebt < this._state.params.minNetDebt) {
      throw new ProtocolError(
        "BELOW_MIN_NET_DEBT",
        `Net debt ${netDebt} is below the minimum ${this._state.params.minNetDebt}`,
      );
    }
  }

  private _assertRepayable(owner: string, debt: bigint, repayment: bigint): void {
    const repayable = debt - this._state.params.liquidationReserve;
    if (repayment > repayable) {
      throw new ProtocolError(
        "REPAYMENT_EXCEEDS_DEBT",
        `Repayment ${repayment} exceeds the repayable debt ${repayable}`,
      );
    }
    this._assertMinNetDebt(repayable - repayment);
    const balance = this._token.balanceOf(owner);
    if (balance < repayment) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `Repayment needs ${repayment} stable credit, "${owner}" holds ${balance}`,
      );
    }
  }

  private _assertICR(icr: bigint, floor: bigint, code: "ICR_BELOW_MCR" | "ICR_BELOW_CCR"): void {
    if (icr < floor) {
      throw new ProtocolError(code, `ICR ${icr} is below ${floor}`);
    }
  }

  private _assertTCR(tcr: bigint): void {
    if (tcr < this._state.params.ccr) {
      throw new ProtocolError("TCR_BELOW_CCR", `Operation would drop TCR to ${tcr}, below CCR`);
    }
  }

  // ─── Fees ─────────────────────────────────────────────────────────────

  /**
   * Price and persist the flat borrowing fee and the variable
   * per-collateral fee for one operation.
   */
  private _chargeFees(
    now: number,
    collateralIn: CollateralAmounts,
    debtIncrease: bigint,
    chargesBorrowingFee: boolean,
  ): Fees {
    let borrowingFee = 0n;
    if (chargesBorrowingFee) {
      const rate = this._baseRate.borrowingRate(this._baseRate.decayForBorrowing(now));
      borrowingFee = mulDiv(rate, debtIncrease, DECIMAL_PRECISION);
    }
    const variableFee = this._chargeVariableFee(now, collateralIn);
    return { borrowingFee, variableFee, total: borrowingFee + variableFee };
  }

  private _chargeVariableFee(now: number, collateralIn: CollateralAmounts): bigint {
    if (isEmptyHoldings(collateralIn)) return 0n;

    const ids = sortedIds(collateralIn);
    const values = new Map<CollateralId, bigint>();
    let totalIn = 0n;
    for (const id of ids) {
      const value = this._registry.normalizedValue(id, collateralIn.get(id) ?? 0n);
      values.set(id, value);
      totalIn += value;
    }

    const systemValueBefore = this._state.getEntireSystemValue();
    const systemValueAfter = systemValueBefore + totalIn;
    const bootstrap = this._state.isBootstrapPeriod(now);

    let fee = 0n;
    for (const id of ids) {
      const inputValue = values.get(id) ?? 0n;
      let fraction = this._registry.commitFee(this._feeCapability, id, {
        inputValue,
        poolValueBefore: this._state.getPoolValue(id),
        systemValueBefore,
        systemValueAfter,
        now,
      });
      if (bootstrap) {
        fraction = minBig(fraction, this._state.params.bootstrapVariableFeeCap);
      }
      fee += mulDiv(inputValue, fraction, DECIMAL_PRECISION);
    }
    return fee;
  }

  private _recordUpdate(tx: TransactionContext, trove: Trove, operation: TroveOperation, fee: bigint): void {
    tx.record(troveStream(trove.owner), "trove.updated", troveUpdatedPayload(trove, operation));
    if (fee > 0n) {
      tx.record(troveStream(trove.owner), "fee.paid", { owner: trove.owner, amount: fee.toString() });
    }
  }
}
