/**
 * Tests for redemption routes.
 *
 * No borrowing or variable fees, so debts are exact:
 *   bob   2 wETH / 3,200 debt
 *   alice 1 wETH / 1,200 debt
 *   carol 5 wETH / 4,200 debt
 */

import { describe, it, expect, beforeEach } from "vitest";
import { E18, createTestApp, deposit, jsonRequest, openTrove, units } from "../setup.js";
import type { ErrorBody, TestApp } from "../setup.js";
import type { AccountView, RedemptionHintsView, RedemptionView, TroveView } from "../../src/types/views.js";

/** Carol's ratio after the partial step of a 5,000 redemption */
const CAROL_PARTIAL_ICR = "2812500000000000000";

describe("redemptions", () => {
  let instance: TestApp;

  beforeEach(async () => {
    instance = createTestApp({
      params: { borrowingFeeFloor: 0n, minNetDebt: 500n * E18, bootstrapPeriod: 0 },
      baseFee: "0",
    });
    const { app, service } = instance;
    for (const owner of ["alice", "bob", "carol"]) {
      await deposit(app, owner, 100n);
    }
    // Best-first keeps TCR above CCR at every step
    await openTrove(app, "carol", 5n, 4000n, 10n ** 16n);
    await openTrove(app, "alice", 1n, 1000n, 10n ** 16n);
    await openTrove(app, "bob", 2n, 3000n, 10n ** 16n);
    service.protocol.token.transfer("carol", "dave", 4000n * E18);
    service.protocol.token.transfer("bob", "dave", 3000n * E18);
  });

  describe("POST /api/v1/redemptions", () => {
    it("redeems across troves riskiest first", async () => {
      const res = await instance.app.request(
        jsonRequest("/api/v1/redemptions", "POST", {
          redeemer: "dave",
          amount: units(5000n),
          maxFee: units(5000n),
          partialHintICR: CAROL_PARTIAL_ICR,
        }),
      );

      expect(res.status).toBe(200);
      const body = (await res.json()) as { data: RedemptionView };
      expect(body.data).toEqual({
        attempted: "5000000000000000000000",
        redeemed: "5000000000000000000000",
        fee: "1478488372093023255000",
        collateral: [{ collateralId: "wETH", amount: "2500000000000000000" }],
        trovesTouched: ["bob", "alice", "carol"],
        baseRate: "290697674418604651",
      });

      const bob = await instance.app.request("/api/v1/troves/bob");
      const bobBody = (await bob.json()) as { data: TroveView };
      expect(bobBody.data.status).toBe("closedByRedemption");

      const dave = await instance.app.request("/api/v1/accounts/dave");
      const daveBody = (await dave.json()) as { data: AccountView };
      expect(daveBody.data.stableBalance).toBe("521511627906976745000");
      expect(daveBody.data.collateral).toEqual([{ collateralId: "wETH", amount: "2500000000000000000" }]);
    });

    it("lets a closed owner claim the surplus", async () => {
      await instance.app.request(
        jsonRequest("/api/v1/redemptions", "POST", {
          redeemer: "dave",
          amount: units(5000n),
          maxFee: units(5000n),
          partialHintICR: CAROL_PARTIAL_ICR,
        }),
      );

      const before = await instance.app.request("/api/v1/accounts/alice");
      const beforeBody = (await before.json()) as { data: AccountView };
      expect(beforeBody.data.surplus).toEqual([{ collateralId: "wETH", amount: "500000000000000000" }]);

      const res = await instance.app.request(jsonRequest("/api/v1/troves/alice/claim-surplus", "POST"));
      expect(res.status).toBe(200);
      const body = (await res.json()) as { data: unknown };
      expect(body.data).toEqual({
        owner: "alice",
        collateral: [{ collateralId: "wETH", amount: "500000000000000000" }],
      });
    });

    it("returns 400 for a zero amount", async () => {
      const res = await instance.app.request(
        jsonRequest("/api/v1/redemptions", "POST", { redeemer: "dave", amount: "0", maxFee: "0", partialHintICR: "0" }),
      );

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("ZERO_AMOUNT");
    });

    it("returns 400 without a partial ratio hint", async () => {
      const res = await instance.app.request(
        jsonRequest("/api/v1/redemptions", "POST", {
          redeemer: "dave",
          amount: units(5000n),
          maxFee: units(5000n),
        }),
      );

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.details?.issues.map((i) => i.path)).toEqual(["partialHintICR"]);
    });

    it("returns 422 when the redeemer lacks the balance", async () => {
      const res = await instance.app.request(
        jsonRequest("/api/v1/redemptions", "POST", {
          redeemer: "erin",
          amount: units(100n),
          maxFee: units(100n),
          partialHintICR: "0",
        }),
      );

      expect(res.status).toBe(422);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.code).toBe("INSUFFICIENT_BALANCE");
    });
  });

  describe("GET /api/v1/redemptions/hints", () => {
    it("returns the first trove and the partial ratio", async () => {
      const res = await instance.app.request(`/api/v1/redemptions/hints?amount=${units(5000n)}`);

      expect(res.status).toBe(200);
      const body = (await res.json()) as { data: RedemptionHintsView };
      expect(body.data).toEqual({
        firstHint: "bob",
        partialHintICR: "2812500000000000000",
        truncatedAmount: "5000000000000000000000",
        minimumFee: "25000000000000000000",
      });
    });

    it("truncates at the iteration limit", async () => {
      const res = await instance.app.request(`/api/v1/redemptions/hints?amount=${units(5000n)}&maxIterations=2`);

      const body = (await res.json()) as { data: RedemptionHintsView };
      expect(body.data.partialHintICR).toBe("0");
      expect(body.data.truncatedAmount).toBe("4000000000000000000000");
      expect(body.data.minimumFee).toBe("20000000000000000000");
    });

    it("returns 400 without an amount", async () => {
      const res = await instance.app.request("/api/v1/redemptions/hints");

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.error.details?.issues.map((i) => i.path)).toEqual(["amount"]);
    });
  });
});

describe("redemptions during bootstrap", () => {
  it("returns 423 while the bootstrap period runs", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/redemptions", "POST", {
        redeemer: "dave",
        amount: units(100n),
        maxFee: units(100n),
        partialHintICR: "0",
      }),
    );

    expect(res.status).toBe(423);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("BOOTSTRAP_PERIOD_ACTIVE");
  });
});
