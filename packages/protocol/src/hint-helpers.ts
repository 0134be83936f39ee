/**
 * @ballast/protocol — Hint helpers.
 *
 * Read-only simulations that let callers compute the hints redemption
 * and insertion accept. Nothing here writes state.
 */

import { computeICR, subtractHoldings } from "@ballast/ledger";
import type { CollateralRegistry } from "@ballast/valuation";
import type { InsertPosition, OrderedIndex } from "./collaborators/types.js";
import { drawCollateral } from "./redemption-engine.js";
import type { SystemState } from "./system-state.js";

export interface RedemptionHints {
  /** First trove a redemption would draw from */
  readonly firstHint: string | undefined;
  /** Ratio of the partially redeemed trove, 0 when none is expected */
  readonly partialHintICR: bigint;
  /** Largest amount up to the request that the walk can fill */
  readonly truncatedAmount: bigint;
}

export class HintHelpers {
  private readonly _state: SystemState;
  private readonly _registry: CollateralRegistry;
  private readonly _index: OrderedIndex;

  constructor(state: SystemState, registry: CollateralRegistry, index: OrderedIndex) {
    this._state = state;
    this._registry = registry;
    this._index = index;
  }

  getRedemptionHints(amount: bigint, maxIterations = 0): RedemptionHints {
    const { mcr, liquidationReserve, minNetDebt } = this._state.params;

    let current = this._index.getLast();
    while (current !== undefined && this._state.getCurrentICR(current) < mcr) {
      current = this._index.getPrev(current);
    }
    const firstHint = current;

    let remaining = amount;
    let partialHintICR = 0n;
    let iterations = 0;
    while (current !== undefined && remaining > 0n && (maxIterations === 0 || iterations < maxIterations)) {
      iterations++;
      const trove = this._state.getEntireTrove(current);
      const netDebt = trove.debt - liquidationReserve;

      if (netDebt > remaining) {
        if (netDebt - remaining >= minNetDebt) {
          const drawn = drawCollateral(this._registry, trove.collateral, remaining);
          const newDebt = trove.debt - remaining;
          partialHintICR = computeICR(this._state.valueOf(subtractHoldings(trove.collateral, drawn)), newDebt);
          remaining = 0n;
        }
        break;
      }
      remaining -= netDebt;
      current = this._index.getPrev(current);
    }

    return { firstHint, partialHintICR, truncatedAmount: amount - remaining };
  }

  /**
   * Neighbours a trove with this ratio would be inserted between.
   */
  findInsertPosition(icr: bigint, upperHint?: string, lowerHint?: string): InsertPosition {
    return this._index.findInsertPosition(icr, upperHint, lowerHint);
  }
}
