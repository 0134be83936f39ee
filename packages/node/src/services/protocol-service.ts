/**
 * ProtocolService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. It owns one Protocol, seeds its collateral types
 * and renders results as JSON-safe views.
 */

import type { CollateralId, Trove } from "@ballast/types";
import { computeICR, toHoldings, toRecords, EMPTY_HOLDINGS } from "@ballast/ledger";
import { StaticPriceFeed } from "@ballast/valuation";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@ballast/event-store";
import { createProtocol } from "@ballast/protocol";
import type {
  AdjustTroveInput,
  Clock,
  OpenTroveInput,
  Protocol,
  ProtocolParameters,
  RedeemInput,
  TroveChange,
} from "@ballast/protocol";
import type { CollateralSeed } from "../config.js";
import type {
  AccountView,
  CollateralView,
  RedemptionHintsView,
  RedemptionView,
  SurplusClaimView,
  SystemView,
  TroveChangeView,
  TroveView,
} from "../types/views.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ProtocolServiceConfig {
  readonly params?: Partial<ProtocolParameters> | undefined;
  readonly collaterals?: readonly CollateralSeed[] | undefined;
  readonly clock?: Clock | undefined;
  readonly generateId?: (() => string) | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class ProtocolService {
  readonly protocol: Protocol;
  readonly prices: StaticPriceFeed;

  private _ready = true;

  constructor(config: ProtocolServiceConfig = {}) {
    const collaterals = config.collaterals ?? [];
    this.prices = new StaticPriceFeed(collaterals.map((c) => [c.id, c.price] as const));
    this.protocol = createProtocol({
      params: config.params,
      priceFeed: this.prices,
      clock: config.clock,
      generateId: config.generateId,
    });

    for (const seed of collaterals) {
      this.protocol.registerCollateral({
        id: seed.id,
        decimals: seed.decimals,
        safetyRatio: seed.safetyRatio,
        active: seed.active,
        wrapped: seed.wrapped,
        underlying: seed.underlying,
        feeCurve: seed.feeCurve,
      });
    }
  }

  get eventStore(): EventStore {
    return this.protocol.eventStore;
  }

  // ─── Read models ──────────────────────────────────────────────────

  system(): SystemView {
    const { state, baseRate, registry, ledger } = this.protocol;
    return {
      tcr: state.getTCR().toString(),
      recoveryMode: state.checkRecoveryMode(),
      bootstrapPeriod: state.isBootstrapPeriod(),
      totalValue: state.getEntireSystemValue().toString(),
      totalDebt: state.getEntireSystemDebt().toString(),
      totalCollateral: toRecords(state.getEntireSystemCollateral()),
      troveCount: ledger.ownerCount,
      baseRate: baseRate.baseRate.toString(),
      borrowingRate: state.getBorrowingRateWithDecay().toString(),
      redemptionRate: state.getRedemptionRateWithDecay().toString(),
      collaterals: registry.list().map((entry): CollateralView => ({
        id: entry.id,
        decimals: entry.decimals,
        safetyRatio: entry.safetyRatio.toString(),
        active: entry.active,
        wrapped: entry.wrapped,
        underlying: entry.underlying ?? null,
        price: this.prices.getPrice(entry.id).toString(),
      })),
    };
  }

  /**
   * Active troves, sorted by owner.
   */
  listTroves(): readonly TroveView[] {
    return [...this.protocol.ledger.getOwners()]
      .sort()
      .map((owner) => this._troveView(this.protocol.ledger.getTrove(owner)));
  }

  getTrove(owner: string): TroveView | undefined {
    const trove = this.protocol.ledger.getTrove(owner);
    return trove.status === "nonExistent" ? undefined : this._troveView(trove);
  }

  account(account: string): AccountView {
    const { token, wallets, surplusPool } = this.protocol;
    return {
      account,
      stableBalance: token.balanceOf(account).toString(),
      collateral: toRecords(wallets.holdingsOf(account)),
      surplus: toRecords(surplusPool.getSurplus(account)),
    };
  }

  redemptionHints(amount: bigint, maxIterations: number): RedemptionHintsView {
    const hints = this.protocol.hints.getRedemptionHints(amount, maxIterations);
    return {
      firstHint: hints.firstHint ?? null,
      partialHintICR: hints.partialHintICR.toString(),
      truncatedAmount: hints.truncatedAmount.toString(),
      minimumFee: this.protocol.state.getRedemptionFeeWithDecay(hints.truncatedAmount).toString(),
    };
  }

  // ─── Operations ───────────────────────────────────────────────────

  openTrove(input: OpenTroveInput): TroveChangeView {
    return this._changeView(this.protocol.borrowerOperations.open(input));
  }

  adjustTrove(input: AdjustTroveInput): TroveChangeView {
    return this._changeView(this.protocol.borrowerOperations.adjust(input));
  }

  closeTrove(owner: string): TroveView {
    return this._troveView(this.protocol.borrowerOperations.close(owner));
  }

  claimSurplus(owner: string): SurplusClaimView {
    const paid = this.protocol.borrowerOperations.claimSurplus(owner);
    return { owner, collateral: toRecords(paid) };
  }

  redeem(input: RedeemInput): RedemptionView {
    const result = this.protocol.redemption.redeem(input);
    return {
      attempted: result.attempted.toString(),
      redeemed: result.redeemed.toString(),
      fee: result.fee.toString(),
      collateral: toRecords(result.collateral),
      trovesTouched: result.trovesTouched,
      baseRate: result.baseRate.toString(),
    };
  }

  /**
   * Credit externally held collateral to an account's wallet.
   */
  deposit(account: string, collateral: readonly (readonly [CollateralId, bigint])[]): AccountView {
    for (const [id] of collateral) {
      this.protocol.registry.assertKnown(id);
    }
    this.protocol.wallets.deposit(account, toHoldings(collateral));
    return this.account(account);
  }

  // ─── Events ───────────────────────────────────────────────────────

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  readStreamEvents(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(streamId, options);
  }

  // ─── Health & Integrity ───────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  isReady(): boolean {
    return this._ready;
  }

  stop(): void {
    this._ready = false;
  }

  // ─── Views ────────────────────────────────────────────────────────

  private _troveView(trove: Trove): TroveView {
    if (trove.status !== "active") {
      return {
        owner: trove.owner,
        status: trove.status,
        collateral: toRecords(trove.collateral),
        debt: trove.debt.toString(),
        stake: trove.stake.toString(),
        icr: null,
        pendingCollateral: toRecords(EMPTY_HOLDINGS),
        pendingDebt: "0",
      };
    }

    const { state } = this.protocol;
    const entire = state.getEntireTrove(trove.owner);
    return {
      owner: trove.owner,
      status: trove.status,
      collateral: toRecords(trove.collateral),
      debt: trove.debt.toString(),
      stake: trove.stake.toString(),
      icr: computeICR(state.valueOf(entire.collateral), entire.debt).toString(),
      pendingCollateral: toRecords(entire.pendingCollateral),
      pendingDebt: entire.pendingDebt.toString(),
    };
  }

  private _changeView(change: TroveChange): TroveChangeView {
    return {
      trove: this._troveView(change.trove),
      borrowingFee: change.borrowingFee.toString(),
      variableFee: change.variableFee.toString(),
    };
  }
}
