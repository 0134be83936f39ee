/**
 * Protocol — top-level coordinator.
 *
 * Composes:
 * - CollateralRegistry (valuation and fee curves)
 * - TroveLedger and SortedTroves (positions and their order)
 * - Custody pools, stable token and wallets (in-memory collaborators)
 * - BaseRate and redistribution
 * - BorrowerOperations, RedemptionEngine and HintHelpers
 *
 * Every stateful part is registered with the transaction manager so a
 * failed operation leaves all of them as they were.
 */

import type { CollateralId } from "@ballast/types";
import { TroveLedger } from "@ballast/ledger";
import {
  CollateralRegistry,
  StaticPriceFeed,
  createCapability,
} from "@ballast/valuation";
import type {
  Capability,
  CollateralConfig,
  CollateralEntry,
  FeeCurveParams,
  FeeCurveSegments,
  PriceFeed,
} from "@ballast/valuation";
import { InMemoryEventStore } from "@ballast/event-store";
import type { EventStore } from "@ballast/event-store";
import { BaseRate } from "./base-rate.js";
import { BorrowerOperations } from "./borrower-operations.js";
import { SystemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { InMemoryCustodyPool } from "./collaborators/custody-pool.js";
import { InMemoryRedistribution } from "./collaborators/redistribution.js";
import { SortedTroves } from "./collaborators/sorted-troves.js";
import { InMemoryStableToken } from "./collaborators/stable-token.js";
import { InMemorySurplusPool } from "./collaborators/surplus-pool.js";
import { InMemoryWallets } from "./collaborators/wallets.js";
import { HintHelpers } from "./hint-helpers.js";
import { resolveParameters } from "./parameters.js";
import type { ProtocolParameters } from "./parameters.js";
import { RedemptionEngine } from "./redemption-engine.js";
import { SystemState } from "./system-state.js";
import { TransactionManager } from "./transaction-manager.js";

export interface ProtocolOptions {
  readonly params?: Partial<ProtocolParameters> | undefined;
  /** Default: an empty StaticPriceFeed */
  readonly priceFeed?: PriceFeed | undefined;
  /** Default: SystemClock */
  readonly clock?: Clock | undefined;
  /** Default: an InMemoryEventStore stamped from the clock */
  readonly eventStore?: EventStore | undefined;
  /** Unix seconds. Default: the clock's current reading */
  readonly deploymentTime?: number | undefined;
  readonly generateId?: (() => string) | undefined;
}

// =============================================================================
// Protocol
// =============================================================================

export class Protocol {
  readonly params: ProtocolParameters;
  readonly clock: Clock;
  readonly priceFeed: PriceFeed;
  readonly eventStore: EventStore;
  readonly registry: CollateralRegistry;
  readonly ledger: TroveLedger;
  readonly index: SortedTroves;
  readonly activePool: InMemoryCustodyPool;
  readonly defaultPool: InMemoryCustodyPool;
  readonly surplusPool: InMemorySurplusPool;
  readonly token: InMemoryStableToken;
  readonly wallets: InMemoryWallets;
  readonly baseRate: BaseRate;
  readonly redistribution: InMemoryRedistribution;
  readonly transactions: TransactionManager;
  readonly state: SystemState;
  readonly borrowerOperations: BorrowerOperations;
  readonly redemption: RedemptionEngine;
  readonly hints: HintHelpers;
  private readonly _owner: Capability;

  constructor(options: ProtocolOptions = {}) {
    this.params = resolveParameters(options.params);
    this.clock = options.clock ?? new SystemClock();
    const clock = this.clock;
    this.priceFeed = options.priceFeed ?? new StaticPriceFeed();
    this.eventStore =
      options.eventStore ?? new InMemoryEventStore({ now: () => new Date(clock.now() * 1000) });
    const deploymentTime = options.deploymentTime ?? clock.now();

    this._owner = createCapability("protocol-owner");
    const feeCapability = createCapability("borrower-operations");
    this.registry = new CollateralRegistry({
      priceFeed: this.priceFeed,
      owner: this._owner,
      feeCommitter: feeCapability,
    });
    const unwrap = (id: CollateralId): CollateralId => this.registry.unwrappedId(id);

    this.ledger = new TroveLedger();
    this.index = new SortedTroves();
    this.wallets = new InMemoryWallets();
    this.activePool = new InMemoryCustodyPool("active", this.wallets, unwrap);
    this.defaultPool = new InMemoryCustodyPool("default", this.wallets, unwrap);
    this.surplusPool = new InMemorySurplusPool(this.wallets, unwrap);
    this.token = new InMemoryStableToken();
    this.baseRate = new BaseRate(this.params, deploymentTime);
    this.redistribution = new InMemoryRedistribution({
      ledger: this.ledger,
      registry: this.registry,
      activePool: this.activePool,
      defaultPool: this.defaultPool,
    });

    this.transactions = new TransactionManager({
      eventStore: this.eventStore,
      clock,
      generateId: options.generateId,
    });
    this.transactions.register("ledger", this.ledger);
    this.transactions.register("index", this.index);
    this.transactions.register("active-pool", this.activePool);
    this.transactions.register("default-pool", this.defaultPool);
    this.transactions.register("surplus-pool", this.surplusPool);
    this.transactions.register("token", this.token);
    this.transactions.register("wallets", this.wallets);
    this.transactions.register("base-rate", this.baseRate);
    this.transactions.register("registry", this.registry);
    this.transactions.register("redistribution", this.redistribution);

    this.state = new SystemState({
      params: this.params,
      registry: this.registry,
      ledger: this.ledger,
      activePool: this.activePool,
      defaultPool: this.defaultPool,
      redistribution: this.redistribution,
      baseRate: this.baseRate,
      clock,
      deploymentTime,
    });

    this.borrowerOperations = new BorrowerOperations({
      transactions: this.transactions,
      state: this.state,
      registry: this.registry,
      feeCapability,
      ledger: this.ledger,
      index: this.index,
      activePool: this.activePool,
      surplusPool: this.surplusPool,
      redistribution: this.redistribution,
      token: this.token,
      wallets: this.wallets,
      baseRate: this.baseRate,
    });

    this.redemption = new RedemptionEngine({
      transactions: this.transactions,
      state: this.state,
      registry: this.registry,
      ledger: this.ledger,
      index: this.index,
      activePool: this.activePool,
      surplusPool: this.surplusPool,
      redistribution: this.redistribution,
      token: this.token,
      baseRate: this.baseRate,
    });

    this.hints = new HintHelpers(this.state, this.registry, this.index);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  registerCollateral(config: CollateralConfig): CollateralEntry {
    return this.registry.register(this._owner, config);
  }

  setCollateralActive(id: CollateralId, active: boolean): CollateralEntry {
    return this.registry.setActive(this._owner, id, active);
  }

  setFeeCurve(id: CollateralId, params: FeeCurveParams): FeeCurveSegments {
    return this.registry.setFeeCurve(this._owner, id, params);
  }
}

export function createProtocol(options: ProtocolOptions = {}): Protocol {
  return new Protocol(options);
}
