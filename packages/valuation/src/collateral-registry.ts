/**
 * @ballast/valuation — Collateral registry.
 *
 * The whitelist of collateral types the protocol accepts, with their
 * valuation parameters and per-type fee curves.
 *
 * Rules:
 * - No duplicate collateral ids; entries are never removed
 * - Registration, activation and curve changes need the owner capability
 * - Committing a fee needs the fee capability
 * - Everything else is read-only
 */

import type { CollateralAmounts, CollateralId } from "@ballast/types";
import { DECIMAL_PRECISION } from "@ballast/ledger";
import { assertCapability } from "./capability.js";
import {
  INITIAL_FEE_STATE,
  configureFeeCurve,
  priceFeeFraction,
} from "./fee-curve.js";
import type {
  Capability,
  CollateralConfig,
  CollateralEntry,
  FeeCurveParams,
  FeeCurveSegments,
  FeeCurveState,
  PriceFeed,
  RegistrySnapshot,
} from "./types.js";
import { ValuationError } from "./types.js";
import { normalizedValue, usdValue } from "./valuation.js";

const MAX_DECIMALS = 36;

interface RegistryRecord {
  entry: CollateralEntry;
  curve: FeeCurveSegments;
  feeState: FeeCurveState;
}

export interface CollateralRegistryOptions {
  readonly priceFeed: PriceFeed;
  /** Permission to register, toggle and reconfigure collateral */
  readonly owner: Capability;
  /** Permission to persist a fee (held by borrower operations) */
  readonly feeCommitter: Capability;
}

/**
 * Arguments shared by quoteFee and commitFee.
 */
export interface FeeQuoteInput {
  readonly inputValue: bigint;
  readonly poolValueBefore: bigint;
  readonly systemValueBefore: bigint;
  readonly systemValueAfter: bigint;
  readonly now: number;
}

export class CollateralRegistry {
  private readonly _records: Map<CollateralId, RegistryRecord> = new Map();
  private readonly _priceFeed: PriceFeed;
  private readonly _owner: Capability;
  private readonly _feeCommitter: Capability;

  constructor(options: CollateralRegistryOptions) {
    this._priceFeed = options.priceFeed;
    this._owner = options.owner;
    this._feeCommitter = options.feeCommitter;
  }

  // ─── Configuration ────────────────────────────────────────────────────

  /**
   * Register a new collateral type.
   * Throws if the id already exists or the configuration is invalid.
   */
  register(capability: Capability, config: CollateralConfig): CollateralEntry {
    assertCapability(capability, this._owner, "register collateral");

    if (config.id.length === 0) {
      throw new ValuationError("INVALID_COLLATERAL_CONFIG", "Collateral id cannot be empty");
    }
    if (this._records.has(config.id)) {
      throw new ValuationError(
        "DUPLICATE_COLLATERAL",
        `Collateral already registered: "${config.id}"`,
      );
    }
    if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > MAX_DECIMALS) {
      throw new ValuationError(
        "INVALID_COLLATERAL_CONFIG",
        `Decimals for "${config.id}" must be an integer in [0, ${MAX_DECIMALS}]`,
      );
    }
    if (config.safetyRatio <= 0n || config.safetyRatio > DECIMAL_PRECISION) {
      throw new ValuationError(
        "INVALID_COLLATERAL_CONFIG",
        `Safety ratio for "${config.id}" must be in (0, 1e18]`,
      );
    }
    const wrapped = config.wrapped ?? false;
    if (wrapped && config.underlying === undefined) {
      throw new ValuationError(
        "INVALID_COLLATERAL_CONFIG",
        `Wrapped collateral "${config.id}" needs an underlying id`,
      );
    }

    const entry: CollateralEntry = Object.freeze({
      id: config.id,
      index: this._records.size,
      decimals: config.decimals,
      safetyRatio: config.safetyRatio,
      active: config.active ?? true,
      wrapped,
      underlying: config.underlying,
    });

    this._records.set(config.id, {
      entry,
      curve: configureFeeCurve(config.feeCurve),
      feeState: INITIAL_FEE_STATE,
    });
    return entry;
  }

  setActive(capability: Capability, id: CollateralId, active: boolean): CollateralEntry {
    assertCapability(capability, this._owner, "change collateral activation");
    const record = this._assertRecord(id);
    record.entry = Object.freeze({ ...record.entry, active });
    return record.entry;
  }

  /**
   * Replace the curve of a collateral type. Its committed fee state is kept.
   */
  setFeeCurve(capability: Capability, id: CollateralId, params: FeeCurveParams): FeeCurveSegments {
    assertCapability(capability, this._owner, "change a fee curve");
    const record = this._assertRecord(id);
    record.curve = configureFeeCurve(params);
    return record.curve;
  }

  // ─── Lookups ──────────────────────────────────────────────────────────

  get(id: CollateralId): CollateralEntry | undefined {
    return this._records.get(id)?.entry;
  }

  has(id: CollateralId): boolean {
    return this._records.has(id);
  }

  /**
   * Assert a collateral type is registered. Throws if not found.
   */
  assertKnown(id: CollateralId): CollateralEntry {
    return this._assertRecord(id).entry;
  }

  /**
   * Assert a collateral type is registered and accepting deposits.
   */
  assertActive(id: CollateralId): CollateralEntry {
    const entry = this._assertRecord(id).entry;
    if (!entry.active) {
      throw new ValuationError("COLLATERAL_NOT_ACTIVE", `Collateral is not active: "${id}"`);
    }
    return entry;
  }

  /**
   * All entries in registration order.
   */
  list(): readonly CollateralEntry[] {
    return [...this._records.values()].map((r) => r.entry);
  }

  get count(): number {
    return this._records.size;
  }

  getFeeCurve(id: CollateralId): FeeCurveSegments {
    return this._assertRecord(id).curve;
  }

  getFeeState(id: CollateralId): FeeCurveState {
    return this._assertRecord(id).feeState;
  }

  /**
   * Id delivered when this collateral leaves the protocol unwrapped.
   */
  unwrappedId(id: CollateralId): CollateralId {
    const entry = this.assertKnown(id);
    return entry.wrapped && entry.underlying !== undefined ? entry.underlying : id;
  }

  // ─── Valuation ────────────────────────────────────────────────────────

  getPrice(id: CollateralId): bigint {
    this.assertKnown(id);
    const price = this._priceFeed.getPrice(id);
    if (price <= 0n) {
      throw new ValuationError("PRICE_UNAVAILABLE", `Price for "${id}" is not positive`);
    }
    return price;
  }

  normalizedValue(id: CollateralId, amount: bigint): bigint {
    const entry = this.assertKnown(id);
    return normalizedValue(this.getPrice(id), amount, entry.safetyRatio, entry.decimals);
  }

  usdValue(id: CollateralId, amount: bigint): bigint {
    const entry = this.assertKnown(id);
    return usdValue(this.getPrice(id), amount, entry.decimals);
  }

  /**
   * Sum of normalized values. Each term truncates separately.
   */
  normalizedValueOf(holdings: CollateralAmounts): bigint {
    let total = 0n;
    for (const [id, amount] of holdings) {
      total += this.normalizedValue(id, amount);
    }
    return total;
  }

  usdValueOf(holdings: CollateralAmounts): bigint {
    let total = 0n;
    for (const [id, amount] of holdings) {
      total += this.usdValue(id, amount);
    }
    return total;
  }

  // ─── Fees ─────────────────────────────────────────────────────────────

  /**
   * Price the variable fee fraction without persisting it.
   */
  quoteFee(id: CollateralId, input: FeeQuoteInput): bigint {
    const record = this._assertRecord(id);
    return priceFeeFraction(
      record.curve,
      record.feeState,
      input.inputValue,
      input.poolValueBefore,
      input.systemValueBefore,
      input.systemValueAfter,
      input.now,
    );
  }

  /**
   * Price the variable fee fraction and persist it as the new last fee.
   */
  commitFee(capability: Capability, id: CollateralId, input: FeeQuoteInput): bigint {
    assertCapability(capability, this._feeCommitter, "commit a fee");
    const fee = this.quoteFee(id, input);
    this._assertRecord(id).feeState = Object.freeze({ lastFee: fee, lastFeeTime: input.now });
    return fee;
  }

  // ─── Rollback ─────────────────────────────────────────────────────────

  snapshot(): RegistrySnapshot {
    const active = new Map<CollateralId, boolean>();
    const feeStates = new Map<CollateralId, FeeCurveState>();
    for (const [id, record] of this._records) {
      active.set(id, record.entry.active);
      feeStates.set(id, record.feeState);
    }
    return { active, feeStates };
  }

  /**
   * Restore activation flags and fee state. Types registered after the
   * snapshot keep their current state.
   */
  restore(snapshot: RegistrySnapshot): void {
    for (const [id, record] of this._records) {
      const active = snapshot.active.get(id);
      if (active !== undefined && active !== record.entry.active) {
        record.entry = Object.freeze({ ...record.entry, active });
      }
      record.feeState = snapshot.feeStates.get(id) ?? record.feeState;
    }
  }

  private _assertRecord(id: CollateralId): RegistryRecord {
    const record = this._records.get(id);
    if (record === undefined) {
      throw new ValuationError("UNKNOWN_COLLATERAL", `Unknown collateral: "${id}"`);
    }
    return record;
  }
}
