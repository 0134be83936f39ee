/**
 * @ballast/ledger — Collateral holdings arithmetic.
 *
 * Holdings are sparse maps from collateral id to amount.
 *
 * Rules:
 * - Zero amounts are pruned, so equal holdings have equal key sets
 * - Negative amounts never exist; a subtraction that would produce one throws
 * - Functions never mutate their inputs
 */

import type {
  CollateralAmountRecord,
  CollateralAmounts,
  CollateralId,
} from "@ballast/types";
import { parseUint } from "./decimal-math.js";
import { LedgerError } from "./types.js";

/** The empty holding set. */
export const EMPTY_HOLDINGS: CollateralAmounts = new Map<CollateralId, bigint>();

/**
 * Build holdings from (id, amount) pairs.
 * Duplicate ids and negative amounts are rejected; zero amounts are dropped.
 */
export function toHoldings(
  entries: Iterable<readonly [CollateralId, bigint]>,
): CollateralAmounts {
  const result = new Map<CollateralId, bigint>();
  const seen = new Set<CollateralId>();

  for (const [id, amount] of entries) {
    if (seen.has(id)) {
      throw new LedgerError("DUPLICATE_COLLATERAL", `Duplicate collateral: "${id}"`);
    }
    if (amount < 0n) {
      throw new LedgerError(
        "NEGATIVE_BALANCE",
        `Collateral "${id}" amount must not be negative, got ${amount.toString()}`,
      );
    }
    seen.add(id);
    if (amount > 0n) {
      result.set(id, amount);
    }
  }

  return result;
}

/**
 * a + b, per collateral id.
 */
export function addHoldings(a: CollateralAmounts, b: CollateralAmounts): CollateralAmounts {
  const result = new Map(a);
  for (const [id, amount] of b) {
    const sum = (result.get(id) ?? 0n) + amount;
    if (sum > 0n) {
      result.set(id, sum);
    }
  }
  return result;
}

/**
 * a − b, per collateral id. Throws if any amount would go negative.
 */
export function subtractHoldings(a: CollateralAmounts, b: CollateralAmounts): CollateralAmounts {
  const result = new Map(a);
  for (const [id, amount] of b) {
    const diff = (result.get(id) ?? 0n) - amount;
    if (diff < 0n) {
      throw new LedgerError(
        "NEGATIVE_BALANCE",
        `Cannot remove ${amount.toString()} of "${id}": only ${(result.get(id) ?? 0n).toString()} held`,
      );
    }
    if (diff === 0n) {
      result.delete(id);
    } else {
      result.set(id, diff);
    }
  }
  return result;
}

export function isEmptyHoldings(holdings: CollateralAmounts): boolean {
  for (const amount of holdings.values()) {
    if (amount > 0n) return false;
  }
  return true;
}

export function holdingsEqual(a: CollateralAmounts, b: CollateralAmounts): boolean {
  const ids = new Set([...a.keys(), ...b.keys()]);
  for (const id of ids) {
    if ((a.get(id) ?? 0n) !== (b.get(id) ?? 0n)) return false;
  }
  return true;
}

/**
 * Collateral ids in deterministic (lexicographic) order.
 */
export function sortedIds(holdings: CollateralAmounts): readonly CollateralId[] {
  return [...holdings.keys()].sort();
}

/**
 * Convert holdings to wire records, sorted by collateral id.
 */
export function toRecords(holdings: CollateralAmounts): readonly CollateralAmountRecord[] {
  return sortedIds(holdings).map((collateralId) => ({
    collateralId,
    amount: (holdings.get(collateralId) ?? 0n).toString(),
  }));
}

/**
 * Parse wire records into holdings. Duplicate ids are rejected.
 */
export function fromRecords(records: readonly CollateralAmountRecord[]): CollateralAmounts {
  return toHoldings(records.map((r) => [r.collateralId, parseUint(r.amount)] as const));
}
