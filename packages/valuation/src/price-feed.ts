/**
 * @ballast/valuation — In-memory price feed.
 *
 * Holds one USD price (18 decimals) per collateral id.
 * Suitable for tests, simulations and a single-process node.
 */

import type { CollateralId } from "@ballast/types";
import type { PriceFeed } from "./types.js";
import { ValuationError } from "./types.js";

export class StaticPriceFeed implements PriceFeed {
  private readonly _prices: Map<CollateralId, bigint>;

  constructor(prices?: Iterable<readonly [CollateralId, bigint]>) {
    this._prices = new Map(prices ?? []);
  }

  setPrice(id: CollateralId, price: bigint): void {
    if (price <= 0n) {
      throw new ValuationError("PRICE_UNAVAILABLE", `Price for "${id}" must be positive`);
    }
    this._prices.set(id, price);
  }

  getPrice(id: CollateralId): bigint {
    const price = this._prices.get(id);
    if (price === undefined) {
      throw new ValuationError("PRICE_UNAVAILABLE", `No price for collateral "${id}"`);
    }
    return price;
  }
}
