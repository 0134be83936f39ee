/**
 * @ballast/ledger — Deterministic 18-decimal fixed-point arithmetic.
 *
 * All arithmetic uses bigint. Every division truncates toward zero,
 * which is floor for the non-negative values the protocol works with.
 *
 * Rules:
 * - No floating-point operations
 * - 1.0 is represented as DECIMAL_PRECISION (1e18)
 * - Ratios are value × 1e18 / debt
 * - Zero runtime dependencies
 */

import { LedgerError } from "./types.js";

/** 1.0 in 18-decimal fixed point. */
export const DECIMAL_PRECISION = 10n ** 18n;

/** Ratio reported for a zero-debt aggregate (2^256 − 1). */
export const MAX_RATIO = 2n ** 256n - 1n;

/** Upper bound on the exponent accepted by decPow: 1000 years of minutes. */
export const MAX_DECAY_MINUTES = 525_600_000n;

// ─── Parsing & formatting ────────────────────────────────────────────────

/**
 * Parse a decimal string into a bigint scaled by `decimals`.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * "-0.25" with decimals=2 → -25n
 */
export function parseDecimal(amount: string, decimals = 18): bigint {
  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid decimal amount: "${amount}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but only ${String(decimals)} are allowed`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 1500000000000000000n with decimals=18 → "1.500000000000000000"
 */
export function formatDecimal(scaled: bigint, decimals = 18): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;

  return negative ? `-${result}` : result;
}

/**
 * Parse a non-negative base-10 integer string (the wire format for amounts).
 */
export function parseUint(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid integer amount: "${value}"`);
  }
  return BigInt(value);
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * (a × b) / c with truncating division.
 */
export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) {
    throw new LedgerError("DIVISION_BY_ZERO", "mulDiv divisor is zero");
  }
  return (a * b) / c;
}

/**
 * Fixed-point multiply, rounding half up.
 */
export function decMul(x: bigint, y: bigint): bigint {
  return (x * y + DECIMAL_PRECISION / 2n) / DECIMAL_PRECISION;
}

/**
 * base^minutes in fixed point, by exponentiation by squaring.
 *
 * The exponent is capped at MAX_DECAY_MINUTES; beyond that any decay
 * factor below 1.0 has long since reached zero.
 */
export function decPow(base: bigint, minutes: bigint): bigint {
  let n = minutes > MAX_DECAY_MINUTES ? MAX_DECAY_MINUTES : minutes;
  if (n <= 0n) {
    return DECIMAL_PRECISION;
  }

  let y = DECIMAL_PRECISION;
  let x = base;

  while (n > 1n) {
    if (n % 2n === 0n) {
      x = decMul(x, x);
      n = n / 2n;
    } else {
      y = decMul(x, y);
      x = decMul(x, x);
      n = (n - 1n) / 2n;
    }
  }

  return decMul(x, y);
}

export function minBig(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBig(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

// ─── Ratios ──────────────────────────────────────────────────────────────

/**
 * Individual collateral ratio: value × 1e18 / debt.
 * A trove with zero debt has no defined ratio.
 */
export function computeICR(value: bigint, debt: bigint): bigint {
  if (debt <= 0n) {
    throw new LedgerError("UNDEFINED_RATIO", "Collateral ratio is undefined for zero debt");
  }
  return (value * DECIMAL_PRECISION) / debt;
}

/**
 * Aggregate collateral ratio. Zero debt reports MAX_RATIO.
 */
export function computeRatio(value: bigint, debt: bigint): bigint {
  if (debt <= 0n) {
    return MAX_RATIO;
  }
  return (value * DECIMAL_PRECISION) / debt;
}
