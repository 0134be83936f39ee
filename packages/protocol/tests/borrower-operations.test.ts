/**
 * Tests for BorrowerOperations.
 *
 * Covers:
 * - Opening: fees, debt composition, effects and audit records
 * - Rejections roll every part of the state back
 * - Mode rules in Normal and Recovery Mode
 * - Adjust and its wrappers
 * - Closing and surplus claims
 */

import { describe, it, expect, beforeEach } from "vitest";
import { ProtocolError } from "../src/errors.js";
import { FEE_RECIPIENT, GAS_POOL } from "../src/accounts.js";
import type { Protocol } from "../src/protocol.js";
import { E18, ETH_PRICE, FLAT_CURVE, ZERO_CURVE, captureState, codeOf, eth, setup } from "./helpers.js";
import type { Fixture } from "./helpers.js";

const MAX_FEE = 5n * 10n ** 16n;

function openAlice(protocol: Protocol): void {
  protocol.borrowerOperations.open({
    owner: "alice",
    collateral: [["wETH", 5n * E18]],
    debtAmount: 2000n * E18,
    maxFeePercentage: MAX_FEE,
  });
}

describe("BorrowerOperations", () => {
  let fx: Fixture;

  beforeEach(() => {
    fx = setup();
  });

  // ─── Open ─────────────────────────────────────────────────────────────

  describe("open", () => {
    it("opens a trove worth 10,000 against 2,000 of debt", () => {
      const change = fx.protocol.borrowerOperations.open({
        owner: "alice",
        collateral: [["wETH", 5n * E18]],
        debtAmount: 2000n * E18,
        maxFeePercentage: MAX_FEE,
      });

      // 0.5% flat on 2,000; the curve averages 0 (empty system) and 0.5%
      expect(change.borrowingFee).toBe(10n * E18);
      expect(change.variableFee).toBe(25n * E18);
      expect(change.trove.debt).toBe(2235n * E18);
      expect(change.icr).toBe(4474272930648769574n);
      expect(change.trove.status).toBe("active");
      expect(change.trove.stake).toBe(10000n * E18);
      expect(change.trove.arrayIndex).toBe(0);
    });

    it("moves collateral and mints debt, reserve and fees", () => {
      openAlice(fx.protocol);
      const { token, wallets, activePool, index } = fx.protocol;

      expect(token.balanceOf("alice")).toBe(2000n * E18);
      expect(token.balanceOf(GAS_POOL)).toBe(200n * E18);
      expect(token.balanceOf(FEE_RECIPIENT)).toBe(35n * E18);
      expect(token.totalSupply()).toBe(2235n * E18);
      expect(wallets.balanceOf("alice", "wETH")).toBe(95n * E18);
      expect(activePool.getCollateral("wETH")).toBe(5n * E18);
      expect(activePool.getDebt()).toBe(2235n * E18);
      expect(index.toArray()).toEqual(["alice"]);
    });

    it("records creation, update and fee in the trove stream", () => {
      openAlice(fx.protocol);
      const events = fx.protocol.eventStore.read("trove:alice");

      expect(events.map((e) => e.event.type)).toEqual(["trove.created", "trove.updated", "fee.paid"]);
      expect(events[0]?.event.payload).toEqual({ owner: "alice", arrayIndex: 0 });
      expect(events[1]?.event.payload).toEqual({
        owner: "alice",
        debt: "2235000000000000000000",
        collateralIds: ["wETH"],
        amounts: ["5000000000000000000"],
        stake: "10000000000000000000000",
        operation: "open",
      });
      expect(events[2]?.event.payload).toEqual({ owner: "alice", amount: "35000000000000000000" });
      expect(events[0]?.event.metadata.source).toBe("borrower-operations");
      expect(events[0]?.event.metadata.correlationId).toBe(events[2]?.event.metadata.correlationId);
      expect(fx.protocol.eventStore.verifyIntegrity().valid).toBe(true);
    });

    it("persists the committed variable fee", () => {
      openAlice(fx.protocol);
      expect(fx.protocol.registry.getFeeState("wETH")).toEqual({ lastFee: 25n * 10n ** 14n, lastFeeTime: 0 });
    });

    it("rejects a ratio below MCR and leaves every part of the state untouched", () => {
      openAlice(fx.protocol);
      const before = captureState(fx.protocol);

      const code = codeOf(() =>
        fx.protocol.borrowerOperations.open({
          owner: "bob",
          collateral: [["wETH", 5n * E18]],
          debtAmount: 9000n * E18,
          maxFeePercentage: MAX_FEE,
        }),
      );

      expect(code).toBe("ICR_BELOW_MCR");
      expect(captureState(fx.protocol)).toEqual(before);
      expect(fx.protocol.ledger.getStatus("bob")).toBe("nonExistent");
      expect(fx.protocol.registry.getFeeState("wETH").lastFee).toBe(25n * 10n ** 14n);
      expect(fx.protocol.transactions.inFlight).toBeUndefined();
    });

    it("rejects an opening that would drop TCR below CCR", () => {
      openAlice(fx.protocol);
      const before = captureState(fx.protocol);

      const code = codeOf(() =>
        fx.protocol.borrowerOperations.open({
          owner: "bob",
          collateral: [["wETH", 50n * E18]],
          debtAmount: 88000n * E18,
          maxFeePercentage: MAX_FEE,
        }),
      );

      expect(code).toBe("TCR_BELOW_CCR");
      expect(captureState(fx.protocol)).toEqual(before);
    });

    it("rejects a second open of an active trove", () => {
      openAlice(fx.protocol);
      expect(codeOf(() => openAlice(fx.protocol))).toBe("TROVE_ALREADY_ACTIVE");
    });

    it("validates the collateral list", () => {
      const open = (collateral: readonly (readonly [string, bigint])[]) => () =>
        fx.protocol.borrowerOperations.open({
          owner: "alice",
          collateral,
          debtAmount: 2000n * E18,
          maxFeePercentage: MAX_FEE,
        });

      expect(codeOf(open([]))).toBe("EMPTY_COLLATERAL");
      expect(codeOf(open([["wETH", E18], ["wETH", E18]]))).toBe("DUPLICATE_COLLATERAL");
      expect(codeOf(open([["wETH", 0n]]))).toBe("INVALID_AMOUNT");
      expect(codeOf(open([["DOGE", E18]]))).toBe("UNKNOWN_COLLATERAL");

      fx.protocol.setCollateralActive("wETH", false);
      expect(codeOf(open([["wETH", 5n * E18]]))).toBe("COLLATERAL_NOT_ACTIVE");
    });

    it("requires the max fee to reach the borrowing floor in Normal Mode", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.open({
          owner: "alice",
          collateral: [["wETH", 5n * E18]],
          debtAmount: 2000n * E18,
          maxFeePercentage: 10n ** 15n,
        }),
      );
      expect(code).toBe("INVALID_MAX_FEE");
    });

    it("rejects fees above the accepted maximum", () => {
      fx.protocol.setFeeCurve("wETH", { ...FLAT_CURVE, b1: 2n * 10n ** 16n });
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.open({
          owner: "alice",
          collateral: [["wETH", 5n * E18]],
          debtAmount: 2000n * E18,
          maxFeePercentage: 5n * 10n ** 15n,
        }),
      );
      expect(code).toBe("FEE_EXCEEDS_MAXIMUM");
    });

    it("rejects net debt below the minimum", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.open({
          owner: "alice",
          collateral: [["wETH", 5n * E18]],
          debtAmount: 1000n * E18,
          maxFeePercentage: MAX_FEE,
        }),
      );
      expect(code).toBe("BELOW_MIN_NET_DEBT");
    });

    it("rejects collateral the owner does not hold", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.open({
          owner: "alice",
          collateral: [["wETH", 500n * E18]],
          debtAmount: 2000n * E18,
          maxFeePercentage: MAX_FEE,
        }),
      );
      expect(code).toBe("INSUFFICIENT_COLLATERAL_BALANCE");
    });

    it("caps the variable fee during the bootstrap period but persists the full fee", () => {
      fx.protocol.setFeeCurve("wETH", { ...FLAT_CURVE, b1: 4n * 10n ** 16n });
      const change = fx.protocol.borrowerOperations.open({
        owner: "alice",
        collateral: [["wETH", 5n * E18]],
        debtAmount: 2000n * E18,
        maxFeePercentage: MAX_FEE,
      });

      expect(change.variableFee).toBe(100n * E18);
      expect(fx.protocol.registry.getFeeState("wETH").lastFee).toBe(2n * 10n ** 16n);
    });

    it("charges the full variable fee once the bootstrap period is over", () => {
      const late = setup({ params: { bootstrapPeriod: 0 } });
      late.protocol.setFeeCurve("wETH", { ...FLAT_CURVE, b1: 4n * 10n ** 16n });
      const change = late.protocol.borrowerOperations.open({
        owner: "alice",
        collateral: [["wETH", 5n * E18]],
        debtAmount: 2000n * E18,
        maxFeePercentage: MAX_FEE,
      });

      expect(change.variableFee).toBe(200n * E18);
    });
  });

  // ─── Recovery Mode ────────────────────────────────────────────────────

  describe("in Recovery Mode", () => {
    beforeEach(() => {
      openAlice(fx.protocol);
      // 3,000 of value against 2,235 of debt: TCR ≈ 1.34
      fx.prices.setPrice("wETH", 600n * E18);
    });

    it("reports Recovery Mode", () => {
      expect(fx.protocol.state.checkRecoveryMode()).toBe(true);
    });

    it("requires a new trove to reach CCR", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.open({
          owner: "bob",
          collateral: [["wETH", 5n * E18]],
          debtAmount: 2000n * E18,
          maxFeePercentage: MAX_FEE,
        }),
      );
      expect(code).toBe("ICR_BELOW_CCR");
    });

    it("opens without a borrowing fee", () => {
      const change = fx.protocol.borrowerOperations.open({
        owner: "bob",
        collateral: [["wETH", 10n * E18]],
        debtAmount: 1800n * E18,
        maxFeePercentage: MAX_FEE,
      });

      expect(change.borrowingFee).toBe(0n);
      expect(change.variableFee).toBe(30n * E18);
      expect(change.trove.debt).toBe(2030n * E18);
    });

    it("forbids collateral withdrawal", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.withdrawCollateral({ owner: "alice", collateral: [["wETH", E18]] }),
      );
      expect(code).toBe("COLLATERAL_WITHDRAWAL_IN_RECOVERY");
    });

    it("requires a debt increase to reach CCR", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.increaseDebt({ owner: "alice", amount: 100n * E18 }),
      );
      expect(code).toBe("ICR_BELOW_CCR");
    });

    it("forbids closing", () => {
      fx.prices.setPrice("wETH", ETH_PRICE);
      fx.protocol.borrowerOperations.open({
        owner: "bob",
        collateral: [["wETH", 5n * E18]],
        debtAmount: 2000n * E18,
        maxFeePercentage: MAX_FEE,
      });
      fx.prices.setPrice("wETH", 600n * E18);

      expect(codeOf(() => fx.protocol.borrowerOperations.close("alice"))).toBe("RECOVERY_MODE_CLOSE");
    });
  });

  // ─── Debt increases near CCR ──────────────────────────────────────────

  describe("debt increases near CCR", () => {
    beforeEach(() => {
      // Each trove carries 2,000 + 10 fee + 200 reserve = 2,210 of debt
      fx = setup({ curve: ZERO_CURVE });
      for (const [owner, units] of [["alice", 5n], ["bob", 20n]] as const) {
        fx.protocol.borrowerOperations.open({
          owner,
          collateral: [["wETH", units * E18]],
          debtAmount: 2000n * E18,
          maxFeePercentage: MAX_FEE,
        });
      }
    });

    it("rejects a Recovery Mode debt increase that lowers a ratio still above CCR", () => {
      // 6,250 against 4,420: TCR ≈ 1.41; bob 5,000 against 2,210
      fx.prices.setPrice("wETH", 250n * E18);
      expect(fx.protocol.state.checkRecoveryMode()).toBe(true);
      const before = captureState(fx.protocol);

      // 5,000 / 2,310 ≈ 2.16 clears CCR but falls from ≈ 2.26
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.increaseDebt({ owner: "bob", amount: 100n * E18 }),
      );

      expect(code).toBe("ICR_NOT_IMPROVED");
      expect(captureState(fx.protocol)).toEqual(before);
      expect(fx.protocol.ledger.getDebt("bob")).toBe(2210n * E18);
      expect(fx.protocol.transactions.inFlight).toBeUndefined();
    });

    it("rejects a Normal Mode debt increase that would drop TCR below CCR", () => {
      // 7,250 against 4,420: TCR ≈ 1.64
      fx.prices.setPrice("wETH", 290n * E18);
      expect(fx.protocol.state.checkRecoveryMode()).toBe(false);
      const before = captureState(fx.protocol);

      // Bob ends at 5,800 / 3,215 ≈ 1.80, the system at 7,250 / 5,425 ≈ 1.34
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.increaseDebt({ owner: "bob", amount: 1000n * E18 }),
      );

      expect(code).toBe("TCR_BELOW_CCR");
      expect(captureState(fx.protocol)).toEqual(before);
      expect(fx.protocol.ledger.getDebt("bob")).toBe(2210n * E18);
    });
  });

  // ─── Adjust ───────────────────────────────────────────────────────────

  describe("adjust", () => {
    beforeEach(() => {
      openAlice(fx.protocol);
    });

    it("rejects a no-op adjustment", () => {
      const noOp = (isDebtIncrease: boolean) => () =>
        fx.protocol.borrowerOperations.adjust({ owner: "alice", isDebtIncrease, maxFeePercentage: MAX_FEE });

      expect(codeOf(noOp(false))).toBe("EMPTY_ADJUSTMENT");
      expect(codeOf(noOp(true))).toBe("EMPTY_ADJUSTMENT");
    });

    it("rejects a debt increase of zero alongside a collateral change", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.adjust({
          owner: "alice",
          collateralIn: [["wETH", E18]],
          debtChange: 0n,
          isDebtIncrease: true,
          maxFeePercentage: MAX_FEE,
        }),
      );
      expect(code).toBe("ZERO_DEBT_CHANGE");
    });

    it("rejects the same collateral on both sides", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.adjust({
          owner: "alice",
          collateralIn: [["wETH", E18]],
          collateralOut: [["wETH", E18]],
          maxFeePercentage: MAX_FEE,
        }),
      );
      expect(code).toBe("OVERLAPPING_COLLATERAL");
    });

    it("rejects an inactive trove", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.addCollateral({ owner: "bob", collateral: [["wETH", E18]] }),
      );
      expect(code).toBe("TROVE_NOT_ACTIVE");
    });

    it("adds collateral and charges the variable fee on it", () => {
      // Past the decay window the last fee holds at 0.5%
      fx.clock.advance(3600);
      const change = fx.protocol.borrowerOperations.addCollateral({
        owner: "alice",
        collateral: [["wETH", E18]],
      });

      expect(change.variableFee).toBe(10n * E18);
      expect(change.borrowingFee).toBe(0n);
      expect(change.trove.debt).toBe(2245n * E18);
      expect(change.trove.collateral.get("wETH")).toBe(6n * E18);
      expect(change.trove.stake).toBe(12000n * E18);
      expect(fx.protocol.token.balanceOf(FEE_RECIPIENT)).toBe(45n * E18);
      expect(fx.protocol.activePool.getDebt()).toBe(2245n * E18);

      const last = fx.protocol.eventStore.read("trove:alice", { direction: "backward", maxCount: 2 });
      expect(last.map((e) => e.event.type)).toEqual(["fee.paid", "trove.updated"]);
      expect(last[1]?.event.payload["operation"]).toBe("addCollateral");
    });

    it("withdraws collateral back to the owner's wallet", () => {
      const change = fx.protocol.borrowerOperations.withdrawCollateral({
        owner: "alice",
        collateral: [["wETH", E18]],
      });

      expect(change.trove.collateral.get("wETH")).toBe(4n * E18);
      expect(change.trove.debt).toBe(2235n * E18);
      expect(fx.protocol.wallets.balanceOf("alice", "wETH")).toBe(96n * E18);
      expect(fx.protocol.activePool.getCollateral("wETH")).toBe(4n * E18);
    });

    it("rejects withdrawing more than the trove holds", () => {
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.withdrawCollateral({ owner: "alice", collateral: [["wETH", 6n * E18]] }),
      );
      expect(code).toBe("INSUFFICIENT_COLLATERAL");
    });

    it("rejects a withdrawal that drops the ratio below MCR", () => {
      const before = captureState(fx.protocol);
      const code = codeOf(() =>
        fx.protocol.borrowerOperations.withdrawCollateral({ owner: "alice", collateral: [["wETH", 4n * E18]] }),
      );

      expect(code).toBe("ICR_BELOW_MCR");
      expect(captureState(fx.protocol)).toEqual(before);
    });

    it("increases debt with the flat borrowing fee", () => {
      const change = fx.protocol.borrowerOperations.increaseDebt({ owner: "alice", amount: 500n * E18 });

      expect(change.borrowingFee).toBe(25n * 10n ** 17n);
      expect(change.variableFee).toBe(0n);
      expect(change.trove.debt).toBe(27375n * 10n ** 17n);
      expect(fx.protocol.token.balanceOf("alice")).toBe(2500n * E18);
    });

    it("repays debt by burning stable credit", () => {
      const change = fx.protocol.borrowerOperations.repayDebt({ owner: "alice", amount: 200n * E18 });

      expect(change.trove.debt).toBe(2035n * E18);
      expect(fx.protocol.token.balanceOf("alice")).toBe(1800n * E18);
      expect(fx.protocol.token.totalSupply()).toBe(2035n * E18);
      expect(fx.protocol.activePool.getDebt()).toBe(2035n * E18);
    });

    it("guards repayments", () => {
      const repay = (amount: bigint) => () =>
        fx.protocol.borrowerOperations.repayDebt({ owner: "alice", amount: amount * E18 });

      expect(codeOf(repay(3000n))).toBe("REPAYMENT_EXCEEDS_DEBT");
      expect(codeOf(repay(300n))).toBe("BELOW_MIN_NET_DEBT");

      fx.protocol.token.transfer("alice", "bob", 1900n * E18);
      expect(codeOf(repay(200n))).toBe("INSUFFICIENT_BALANCE");
    });

    it("keeps the index ordered after an adjustment", () => {
      fx.protocol.borrowerOperations.open({
        owner: "bob",
        collateral: [["wETH", 10n * E18]],
        debtAmount: 2000n * E18,
        maxFeePercentage: MAX_FEE,
      });
      expect(fx.protocol.index.toArray()).toEqual(["bob", "alice"]);

      fx.protocol.borrowerOperations.addCollateral({ owner: "alice", collateral: [["wETH", 20n * E18]] });
      expect(fx.protocol.index.toArray()).toEqual(["alice", "bob"]);
    });
  });

  // ─── Close ────────────────────────────────────────────────────────────

  describe("close", () => {
    beforeEach(() => {
      openAlice(fx.protocol);
    });

    it("refuses to close the last trove", () => {
      expect(codeOf(() => fx.protocol.borrowerOperations.close("alice"))).toBe("LAST_TROVE");
    });

    describe("with a second trove", () => {
      beforeEach(() => {
        fx.protocol.borrowerOperations.open({
          owner: "bob",
          collateral: [["wETH", 5n * E18]],
          debtAmount: 2000n * E18,
          maxFeePercentage: MAX_FEE,
        });
      });

      it("needs the owner to hold the net debt", () => {
        expect(codeOf(() => fx.protocol.borrowerOperations.close("alice"))).toBe("INSUFFICIENT_BALANCE");
      });

      it("burns the debt, returns the collateral and closes the trove", () => {
        fx.protocol.token.transfer("bob", "alice", 35n * E18);
        const trove = fx.protocol.borrowerOperations.close("alice");
        const { token, wallets, activePool, index, redistribution } = fx.protocol;

        expect(trove.status).toBe("closedByOwner");
        expect(trove.debt).toBe(0n);
        expect(token.balanceOf("alice")).toBe(0n);
        expect(token.balanceOf(GAS_POOL)).toBe(200n * E18);
        expect(wallets.balanceOf("alice", "wETH")).toBe(100n * E18);
        expect(activePool.getDebt()).toBe(2260n * E18);
        expect(activePool.getCollateral("wETH")).toBe(5n * E18);
        expect(index.toArray()).toEqual(["bob"]);
        expect(redistribution.totalStakes()).toBe(10000n * E18);

        const [last] = fx.protocol.eventStore.read("trove:alice", { direction: "backward", maxCount: 1 });
        expect(last?.event.payload).toEqual({
          owner: "alice",
          debt: "0",
          collateralIds: [],
          amounts: [],
          stake: "0",
          operation: "close",
        });
      });

      it("lets a closed trove be reopened", () => {
        fx.protocol.token.transfer("bob", "alice", 35n * E18);
        fx.protocol.borrowerOperations.close("alice");
        openAlice(fx.protocol);

        expect(fx.protocol.ledger.getStatus("alice")).toBe("active");
        expect(fx.protocol.index.contains("alice")).toBe(true);
      });
    });
  });

  // ─── Surplus ──────────────────────────────────────────────────────────

  describe("claimSurplus", () => {
    it("fails when nothing is owed", () => {
      expect(codeOf(() => fx.protocol.borrowerOperations.claimSurplus("alice"))).toBe("NO_SURPLUS");
    });

    it("pays out and records a credited surplus", () => {
      fx.protocol.surplusPool.receiveCollateral(eth(1n));
      fx.protocol.surplusPool.accountSurplus("alice", eth(1n));

      const paid = fx.protocol.borrowerOperations.claimSurplus("alice");

      expect(paid.get("wETH")).toBe(E18);
      expect(fx.protocol.wallets.balanceOf("alice", "wETH")).toBe(101n * E18);
      const [event] = fx.protocol.eventStore.read("trove:alice");
      expect(event?.event.type).toBe("surplus.claimed");
      expect(event?.event.payload).toEqual({
        owner: "alice",
        collateral: [{ collateralId: "wETH", amount: "1000000000000000000" }],
      });
    });
  });

  it("throws ProtocolError carrying a category", () => {
    try {
      fx.protocol.borrowerOperations.close("nobody");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ProtocolError);
      if (error instanceof ProtocolError) {
        expect(error.code).toBe("TROVE_NOT_ACTIVE");
        expect(error.category).toBe("state-conflict");
      }
    }
  });
});
