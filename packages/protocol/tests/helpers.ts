/**
 * Shared fixtures for protocol tests.
 */

import type { CollateralAmounts } from "@ballast/types";
import { toHoldings } from "@ballast/ledger";
import { StaticPriceFeed } from "@ballast/valuation";
import type { FeeCurveParams } from "@ballast/valuation";
import { ManualClock } from "../src/clock.js";
import type { ProtocolParameters } from "../src/parameters.js";
import { Protocol, createProtocol } from "../src/protocol.js";
import { ProtocolError } from "../src/errors.js";

export const E18 = 10n ** 18n;

/** 2,000 per wETH */
export const ETH_PRICE = 2000n * E18;

/** A flat 0.5% curve */
export const FLAT_CURVE: FeeCurveParams = {
  m1: 0n,
  b1: 5n * 10n ** 15n,
  cutoff1: 5n * 10n ** 17n,
  m2: 0n,
  cutoff2: 8n * 10n ** 17n,
  m3: 0n,
  dollarCap: 0n,
  decayWindow: 3600,
};

export const ZERO_CURVE: FeeCurveParams = { ...FLAT_CURVE, b1: 0n };

export interface Fixture {
  readonly protocol: Protocol;
  readonly clock: ManualClock;
  readonly prices: StaticPriceFeed;
}

export interface FixtureOptions {
  readonly params?: Partial<ProtocolParameters>;
  readonly curve?: FeeCurveParams;
  /** Accounts funded with 100 wETH each */
  readonly accounts?: readonly string[];
}

export function setup(options: FixtureOptions = {}): Fixture {
  const clock = new ManualClock(0);
  const prices = new StaticPriceFeed([["wETH", ETH_PRICE]]);
  let counter = 0;
  const protocol = createProtocol({
    params: options.params,
    priceFeed: prices,
    clock,
    deploymentTime: 0,
    generateId: () => `id-${++counter}`,
  });
  protocol.registerCollateral({
    id: "wETH",
    decimals: 18,
    safetyRatio: E18,
    feeCurve: options.curve ?? FLAT_CURVE,
  });
  for (const account of options.accounts ?? ["alice", "bob", "carol"]) {
    protocol.wallets.deposit(account, eth(100n));
  }
  return { protocol, clock, prices };
}

/** Whole wETH as holdings */
export function eth(units: bigint): CollateralAmounts {
  return toHoldings([["wETH", units * E18]]);
}

export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ProtocolError) return error.code;
    throw error;
  }
  return undefined;
}

/**
 * Everything an operation may touch, for before/after comparisons.
 */
export function captureState(protocol: Protocol): unknown {
  return {
    ledger: protocol.ledger.snapshot(),
    index: protocol.index.snapshot(),
    activePool: protocol.activePool.snapshot(),
    defaultPool: protocol.defaultPool.snapshot(),
    surplusPool: protocol.surplusPool.snapshot(),
    token: protocol.token.snapshot(),
    wallets: protocol.wallets.snapshot(),
    baseRate: protocol.baseRate.snapshot(),
    registry: protocol.registry.snapshot(),
    redistribution: protocol.redistribution.snapshot(),
    events: protocol.eventStore.globalPosition(),
  };
}
