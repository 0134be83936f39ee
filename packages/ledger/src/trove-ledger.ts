/**
 * @ballast/ledger — Trove Ledger.
 *
 * Per-owner record of collateral holdings, debt, stake and status.
 * Pure data operations: the ledger never validates business rules.
 * It is mutated only by callers that have already checked every
 * invariant of the operation they run.
 *
 * API surface:
 * - getTrove() / getStatus() / isActive()
 * - setStatus() / setCollateral() / setStake()
 * - increaseDebt() / decreaseDebt() — return the new debt
 * - addOwner() / closeTrove()
 * - snapshot() / restore()
 */

import type {
  CollateralAmounts,
  TerminalTroveStatus,
  Trove,
  TroveStatus,
} from "@ballast/types";
import { toHoldings } from "./holdings.js";
import { OwnerRegistry } from "./owners.js";
import type { TroveLedgerSnapshot } from "./types.js";
import { LedgerError } from "./types.js";

const TERMINAL_STATUSES: ReadonlySet<TroveStatus> = new Set([
  "closedByOwner",
  "closedByLiquidation",
  "closedByRedemption",
]);

/**
 * Mutable internal record. Never handed out; readers get a frozen Trove.
 */
interface TroveRecord {
  status: TroveStatus;
  collateral: CollateralAmounts;
  debt: bigint;
  stake: bigint;
}

function emptyRecord(): TroveRecord {
  return { status: "nonExistent", collateral: new Map(), debt: 0n, stake: 0n };
}

export class TroveLedger {
  private readonly _troves: Map<string, TroveRecord> = new Map();
  private readonly _owners: OwnerRegistry = new OwnerRegistry();

  // ─── Queries ──────────────────────────────────────────────────────────

  /**
   * Get a trove. Unknown owners read as a nonExistent, empty trove.
   */
  getTrove(owner: string): Trove {
    const record = this._troves.get(owner) ?? emptyRecord();
    return {
      owner,
      status: record.status,
      collateral: new Map(record.collateral),
      debt: record.debt,
      stake: record.stake,
      arrayIndex: this._owners.indexOf(owner),
    };
  }

  getStatus(owner: string): TroveStatus {
    return this._troves.get(owner)?.status ?? "nonExistent";
  }

  isActive(owner: string): boolean {
    return this.getStatus(owner) === "active";
  }

  getCollateral(owner: string): CollateralAmounts {
    return new Map(this._troves.get(owner)?.collateral ?? []);
  }

  getDebt(owner: string): bigint {
    return this._troves.get(owner)?.debt ?? 0n;
  }

  getStake(owner: string): bigint {
    return this._troves.get(owner)?.stake ?? 0n;
  }

  /**
   * Owners of active troves, in owners-array order.
   */
  getOwners(): readonly string[] {
    return this._owners.getAll();
  }

  get ownerCount(): number {
    return this._owners.count;
  }

  // ─── Mutations ────────────────────────────────────────────────────────

  setStatus(owner: string, status: TroveStatus): void {
    this._record(owner).status = status;
  }

  /**
   * Replace the holding set. Zero entries are dropped.
   */
  setCollateral(owner: string, holdings: CollateralAmounts): void {
    this._record(owner).collateral = toHoldings(holdings);
  }

  increaseDebt(owner: string, amount: bigint): bigint {
    this._assertNonNegative(amount);
    const record = this._record(owner);
    record.debt += amount;
    return record.debt;
  }

  decreaseDebt(owner: string, amount: bigint): bigint {
    this._assertNonNegative(amount);
    const record = this._record(owner);
    if (amount > record.debt) {
      throw new LedgerError(
        "DEBT_UNDERFLOW",
        `Cannot decrease debt of "${owner}" by ${amount.toString()}: only ${record.debt.toString()} owed`,
      );
    }
    record.debt -= amount;
    return record.debt;
  }

  setStake(owner: string, stake: bigint): void {
    this._assertNonNegative(stake);
    this._record(owner).stake = stake;
  }

  /**
   * Append the owner to the owners array. Returns the array index.
   */
  addOwner(owner: string): number {
    return this._owners.add(owner);
  }

  /**
   * Close a trove: terminal status, holdings/debt/stake cleared,
   * owner removed from the owners array.
   */
  closeTrove(owner: string, status: TerminalTroveStatus): void {
    if (!TERMINAL_STATUSES.has(status)) {
      throw new LedgerError("INVALID_STATUS", `"${String(status)}" is not a closing status`);
    }
    const record = this._record(owner);
    record.status = status;
    record.collateral = new Map();
    record.debt = 0n;
    record.stake = 0n;
    if (this._owners.has(owner)) {
      this._owners.remove(owner);
    }
  }

  // ─── Snapshot (Rollback) ──────────────────────────────────────────────

  snapshot(): TroveLedgerSnapshot {
    return {
      version: 1,
      troves: [...this._troves.keys()].map((owner) => this.getTrove(owner)),
      owners: this._owners.getAll(),
    };
  }

  restore(snapshot: TroveLedgerSnapshot): void {
    this._troves.clear();
    for (const trove of snapshot.troves) {
      this._troves.set(trove.owner, {
        status: trove.status,
        collateral: new Map(trove.collateral),
        debt: trove.debt,
        stake: trove.stake,
      });
    }
    this._owners.reset(snapshot.owners);
  }

  static fromSnapshot(snapshot: TroveLedgerSnapshot): TroveLedger {
    const ledger = new TroveLedger();
    ledger.restore(snapshot);
    return ledger;
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  private _record(owner: string): TroveRecord {
    let record = this._troves.get(owner);
    if (record === undefined) {
      record = emptyRecord();
      this._troves.set(owner, record);
    }
    return record;
  }

  private _assertNonNegative(amount: bigint): void {
    if (amount < 0n) {
      throw new LedgerError("INVALID_AMOUNT", `Amount must not be negative, got ${amount.toString()}`);
    }
  }
}
