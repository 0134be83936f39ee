/**
 * Property tests for the protocol.
 *
 * Random sequences of borrower operations and redemptions at a fixed
 * price must keep the system solvent and its books balanced, and every
 * rejected operation must leave the state exactly as it was.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { categorize } from "../src/errors.js";
import type { Protocol } from "../src/protocol.js";
import type { RedemptionResult } from "../src/redemption-engine.js";
import { E18, FLAT_CURVE, ZERO_CURVE, captureState, setup } from "./helpers.js";

const OWNERS = ["alice", "bob", "carol", "dave"] as const;

const owner = fc.constantFrom(...OWNERS);
const units = (min: number, max: number) => fc.integer({ min, max }).map((n) => BigInt(n) * E18);

const operation = fc.oneof(
  fc.record({ kind: fc.constant("open" as const), owner, coll: units(1, 20), debt: units(1800, 20000) }),
  fc.record({ kind: fc.constant("add" as const), owner, coll: units(1, 5) }),
  fc.record({ kind: fc.constant("withdraw" as const), owner, coll: units(1, 5) }),
  fc.record({ kind: fc.constant("borrow" as const), owner, amount: units(1, 3000) }),
  fc.record({ kind: fc.constant("repay" as const), owner, amount: units(1, 3000) }),
  fc.record({ kind: fc.constant("close" as const), owner }),
  fc.record({ kind: fc.constant("redeem" as const), owner, amount: units(1, 5000) }),
  fc.record({ kind: fc.constant("wait" as const), seconds: fc.integer({ min: 1, max: 7200 }) }),
);

type Operation = typeof operation extends fc.Arbitrary<infer T> ? T : never;

function apply(protocol: Protocol, op: Operation, advance: (seconds: number) => void): void {
  const ops = protocol.borrowerOperations;
  switch (op.kind) {
    case "open":
      ops.open({ owner: op.owner, collateral: [["wETH", op.coll]], debtAmount: op.debt, maxFeePercentage: E18 });
      return;
    case "add":
      ops.addCollateral({ owner: op.owner, collateral: [["wETH", op.coll]] });
      return;
    case "withdraw":
      ops.withdrawCollateral({ owner: op.owner, collateral: [["wETH", op.coll]] });
      return;
    case "borrow":
      ops.increaseDebt({ owner: op.owner, amount: op.amount });
      return;
    case "repay":
      ops.repayDebt({ owner: op.owner, amount: op.amount });
      return;
    case "close":
      ops.close(op.owner);
      return;
    case "redeem":
      protocol.redemption.redeem({
        redeemer: op.owner,
        amount: op.amount,
        maxFee: op.amount,
        partialHintICR: protocol.hints.getRedemptionHints(op.amount).partialHintICR,
      });
      return;
    case "wait":
      advance(op.seconds);
      return;
  }
}

function assertSolvent(protocol: Protocol): void {
  const { params, state, ledger, token, activePool } = protocol;
  let debt = 0n;
  let coll = 0n;
  for (const owner of ledger.getOwners()) {
    expect(state.getCurrentICR(owner)).toBeGreaterThanOrEqual(params.mcr);
    debt += ledger.getDebt(owner);
    coll += ledger.getCollateral(owner).get("wETH") ?? 0n;
  }
  expect(state.getTCR()).toBeGreaterThanOrEqual(params.ccr);
  expect(activePool.getDebt()).toBe(debt);
  expect(activePool.getCollateral("wETH")).toBe(coll);
  expect(token.totalSupply()).toBe(state.getEntireSystemDebt());
  expect(protocol.index.size).toBe(ledger.ownerCount);
}

describe("protocol properties", () => {
  it("stays solvent and rolls back every rejected operation", () => {
    fc.assert(
      fc.property(fc.array(operation, { minLength: 1, maxLength: 25 }), (ops) => {
        const { protocol, clock } = setup({
          params: { bootstrapPeriod: 0 },
          curve: FLAT_CURVE,
          accounts: OWNERS,
        });

        for (const op of ops) {
          const before = captureState(protocol);
          try {
            apply(protocol, op, (seconds) => clock.advance(seconds));
          } catch (error) {
            if (categorize(error) === undefined) throw error;
            expect(captureState(protocol)).toEqual(before);
          }
          assertSolvent(protocol);
        }
        expect(protocol.eventStore.verifyIntegrity().valid).toBe(true);
      }),
      { numRuns: 60 },
    );
  });

  it("redeems exactly what it takes from troves and pays it in collateral", () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(units(2, 20), units(500, 5000)), { minLength: 1, maxLength: 5 }),
        units(1, 8000),
        (troves, amount) => {
          const { protocol } = setup({
            params: { borrowingFeeFloor: 0n, minNetDebt: 500n * E18, bootstrapPeriod: 0 },
            curve: ZERO_CURVE,
            accounts: ["redeemer", ...troves.map((_, i) => `owner-${i}`)],
          });
          protocol.token.mint("redeemer", 20000n * E18);

          troves.forEach(([coll, debt], i) => {
            try {
              protocol.borrowerOperations.open({
                owner: `owner-${i}`,
                collateral: [["wETH", coll]],
                debtAmount: debt,
                maxFeePercentage: 0n,
              });
            } catch (error) {
              if (categorize(error) === undefined) throw error;
            }
          });
          const poolDebtBefore = protocol.activePool.getDebt();

          let result: RedemptionResult;
          try {
            const { partialHintICR } = protocol.hints.getRedemptionHints(amount);
            result = protocol.redemption.redeem({ redeemer: "redeemer", amount, maxFee: amount, partialHintICR });
          } catch (error) {
            if (categorize(error) === undefined) throw error;
            return;
          }

          const closed = result.trovesTouched.filter(
            (o) => protocol.ledger.getStatus(o) === "closedByRedemption",
          ).length;
          const reserve = protocol.params.liquidationReserve;
          expect(poolDebtBefore - protocol.activePool.getDebt()).toBe(result.redeemed + reserve * BigInt(closed));
          expect(result.redeemed).toBeLessThanOrEqual(amount);

          const paid = protocol.registry.usdValueOf(result.collateral);
          expect(paid).toBeLessThanOrEqual(result.redeemed);
          expect(result.redeemed - paid).toBeLessThan(10n ** 6n);
        },
      ),
      { numRuns: 60 },
    );
  });
});
