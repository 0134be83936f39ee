/**
 * Tests for the fixed-point arithmetic engine.
 *
 * Covers:
 * - parseDecimal / formatDecimal
 * - mulDiv truncation and divide-by-zero
 * - decMul rounding and decPow exponentiation
 * - ICR / aggregate ratio edge cases
 */

import { describe, it, expect } from "vitest";
import {
  DECIMAL_PRECISION,
  MAX_RATIO,
  parseDecimal,
  formatDecimal,
  parseUint,
  mulDiv,
  decMul,
  decPow,
  minBig,
  maxBig,
  computeICR,
  computeRatio,
} from "../src/decimal-math.js";
import { LedgerError } from "../src/types.js";

const E18 = DECIMAL_PRECISION;

// ─── parseDecimal ────────────────────────────────────────────────────────

describe("parseDecimal", () => {
  it("parses a whole number at 18 decimals", () => {
    expect(parseDecimal("2000")).toBe(2000n * E18);
  });

  it("parses a fraction", () => {
    expect(parseDecimal("1.5")).toBe(1_500_000_000_000_000_000n);
  });

  it("parses a percentage-style value", () => {
    expect(parseDecimal("0.005")).toBe(5_000_000_000_000_000n);
  });

  it("parses a negative slope", () => {
    expect(parseDecimal("-0.25", 2)).toBe(-25n);
  });

  it("honours a custom decimal count", () => {
    expect(parseDecimal("1.5", 6)).toBe(1_500_000n);
  });

  it("rejects more fractional digits than allowed", () => {
    expect(() => parseDecimal("1.123", 2)).toThrow(LedgerError);
  });

  it("rejects malformed input", () => {
    expect(() => parseDecimal("1e18")).toThrow(/Invalid decimal amount/);
    expect(() => parseDecimal("")).toThrow(LedgerError);
  });
});

// ─── formatDecimal ───────────────────────────────────────────────────────

describe("formatDecimal", () => {
  it("formats 1.5", () => {
    expect(formatDecimal(1_500_000_000_000_000_000n)).toBe("1.500000000000000000");
  });

  it("pads small values", () => {
    expect(formatDecimal(5n)).toBe("0.000000000000000005");
  });

  it("formats negative values", () => {
    expect(formatDecimal(-25n, 2)).toBe("-0.25");
  });

  it("formats with zero decimals", () => {
    expect(formatDecimal(42n, 0)).toBe("42");
  });
});

describe("parseUint", () => {
  it("parses integer strings", () => {
    expect(parseUint("1000")).toBe(1000n);
  });

  it("rejects signs and fractions", () => {
    expect(() => parseUint("-1")).toThrow(LedgerError);
    expect(() => parseUint("1.0")).toThrow(LedgerError);
  });
});

// ─── Arithmetic ──────────────────────────────────────────────────────────

describe("mulDiv", () => {
  it("truncates toward zero", () => {
    expect(mulDiv(10n, 3n, 4n)).toBe(7n);
  });

  it("throws on a zero divisor", () => {
    expect(() => mulDiv(1n, 1n, 0n)).toThrow(LedgerError);
  });
});

describe("decMul", () => {
  it("multiplies fixed-point values", () => {
    expect(decMul(E18 / 2n, E18 / 2n)).toBe(E18 / 4n);
  });

  it("rounds half up", () => {
    // 1 wei × 0.5 = 0.5 wei → rounds to 1
    expect(decMul(1n, E18 / 2n)).toBe(1n);
  });
});

describe("decPow", () => {
  const MINUTE_DECAY_FACTOR = 999_037_758_833_783_000n;

  it("returns 1.0 for a zero exponent", () => {
    expect(decPow(MINUTE_DECAY_FACTOR, 0n)).toBe(E18);
  });

  it("returns the base for an exponent of one", () => {
    expect(decPow(MINUTE_DECAY_FACTOR, 1n)).toBe(MINUTE_DECAY_FACTOR);
  });

  it("squares and cubes 0.5", () => {
    expect(decPow(E18 / 2n, 2n)).toBe(E18 / 4n);
    expect(decPow(E18 / 2n, 3n)).toBe(E18 / 8n);
  });

  it("halves after 720 minutes with the 12-hour decay factor", () => {
    const factor = decPow(MINUTE_DECAY_FACTOR, 720n);
    expect(factor > 499_000_000_000_000_000n).toBe(true);
    expect(factor < 501_000_000_000_000_000n).toBe(true);
  });

  it("caps the exponent instead of looping for ever", () => {
    expect(decPow(MINUTE_DECAY_FACTOR, 10n ** 12n)).toBe(0n);
  });
});

describe("minBig / maxBig", () => {
  it("picks the smaller and larger value", () => {
    expect(minBig(3n, 5n)).toBe(3n);
    expect(maxBig(3n, 5n)).toBe(5n);
  });
});

// ─── Ratios ──────────────────────────────────────────────────────────────

describe("computeICR", () => {
  it("divides value by debt at 18 decimals", () => {
    expect(computeICR(2200n * E18, 2000n * E18)).toBe(1_100_000_000_000_000_000n);
  });

  it("truncates", () => {
    expect(computeICR(1n, 3n)).toBe(333_333_333_333_333_333n);
  });

  it("throws for zero debt", () => {
    expect(() => computeICR(1n, 0n)).toThrow(/undefined for zero debt/);
  });
});

describe("computeRatio", () => {
  it("reports MAX_RATIO for zero debt", () => {
    expect(computeRatio(0n, 0n)).toBe(MAX_RATIO);
  });

  it("matches computeICR for positive debt", () => {
    expect(computeRatio(3000n * E18, 2000n * E18)).toBe(1_500_000_000_000_000_000n);
  });
});
