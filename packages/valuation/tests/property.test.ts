/**
 * Property tests for the fee curve.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { configureFeeCurve, decayedFee, feePoint } from "../src/fee-curve.js";

const E18 = 10n ** 18n;

const slope = fc.bigInt({ min: -3n * E18, max: 3n * E18 });
const share = fc.bigInt({ min: 0n, max: E18 });

const curveArb = fc
  .record({
    m1: slope,
    b1: fc.bigInt({ min: -E18, max: E18 }),
    m2: slope,
    m3: slope,
    a: share,
    b: share,
    decayWindow: fc.integer({ min: 1, max: 86_400 }),
  })
  .map(({ a, b, ...rest }) =>
    configureFeeCurve({
      ...rest,
      cutoff1: a < b ? a : b,
      cutoff2: a < b ? b : a,
      dollarCap: 0n,
    }),
  );

describe("fee curve properties", () => {
  it("segments agree at both cutoffs", () => {
    fc.assert(
      fc.property(curveArb, (c) => {
        const seg1 = (c.m1 * c.cutoff1) / E18 + c.b1;
        const seg2AtCutoff1 = (c.m2 * c.cutoff1) / E18 + c.b2;
        const seg2AtCutoff2 = (c.m2 * c.cutoff2) / E18 + c.b2;
        const seg3 = (c.m3 * c.cutoff2) / E18 + c.b3;
        expect(seg2AtCutoff1).toBe(seg1);
        expect(seg3).toBe(seg2AtCutoff2);
      }),
    );
  });

  it("fee points stay within [0, 1e18]", () => {
    fc.assert(
      fc.property(curveArb, share, (c, pct) => {
        const fee = feePoint(c, pct, E18);
        expect(fee >= 0n && fee <= E18).toBe(true);
      }),
    );
  });

  it("decay returns the last fee at both ends of the window", () => {
    fc.assert(
      fc.property(
        curveArb,
        fc.bigInt({ min: 0n, max: E18 }),
        fc.integer({ min: 0, max: 1_000_000_000 }),
        fc.integer({ min: 0, max: 1_000_000 }),
        (c, lastFee, lastFeeTime, extra) => {
          const state = { lastFee, lastFeeTime };
          expect(decayedFee(c, state, lastFeeTime)).toBe(lastFee);
          expect(decayedFee(c, state, lastFeeTime + c.decayWindow + extra)).toBe(lastFee);
        },
      ),
    );
  });

  it("decay never exceeds the last fee", () => {
    fc.assert(
      fc.property(
        curveArb,
        fc.bigInt({ min: 0n, max: E18 }),
        fc.integer({ min: 0, max: 200_000 }),
        (c, lastFee, elapsed) => {
          expect(decayedFee(c, { lastFee, lastFeeTime: 0 }, elapsed) <= lastFee).toBe(true);
        },
      ),
    );
  });
});
