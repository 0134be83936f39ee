/**
 * @ballast/valuation — Normalized and raw USD valuation.
 *
 * normalized = price × amount × safetyRatio / 10^(18 + decimals)
 * raw USD    = price × amount / 10^decimals
 *
 * Solvency ratios use normalized value everywhere. Raw USD value is
 * used only when splitting a redemption across a trove's holdings.
 */

import { DECIMAL_PRECISION } from "@ballast/ledger";

export function normalizedValue(
  price: bigint,
  amount: bigint,
  safetyRatio: bigint,
  decimals: number,
): bigint {
  return (price * amount * safetyRatio) / (DECIMAL_PRECISION * 10n ** BigInt(decimals));
}

export function usdValue(price: bigint, amount: bigint, decimals: number): bigint {
  return (price * amount) / 10n ** BigInt(decimals);
}
