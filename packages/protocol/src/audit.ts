/**
 * @ballast/protocol — Audit payload builders.
 *
 * Amounts leave the core as integer strings.
 */

import type { CollateralAmounts, Trove, TroveOperation, TroveUpdatedPayload } from "@ballast/types";
import { sortedIds } from "@ballast/ledger";

export function holdingsPayload(holdings: CollateralAmounts): {
  collateralIds: readonly string[];
  amounts: readonly string[];
} {
  const collateralIds = sortedIds(holdings);
  return {
    collateralIds,
    amounts: collateralIds.map((id) => (holdings.get(id) ?? 0n).toString()),
  };
}

export function troveUpdatedPayload(trove: Trove, operation: TroveOperation): TroveUpdatedPayload {
  return {
    owner: trove.owner,
    debt: trove.debt.toString(),
    ...holdingsPayload(trove.collateral),
    stake: trove.stake.toString(),
    operation,
  };
}
