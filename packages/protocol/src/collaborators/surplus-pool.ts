/**
 * @ballast/protocol — In-memory surplus pool.
 *
 * Holds collateral left in troves that redemption closed, credited to
 * each former owner until claimed.
 */

import type { CollateralAmounts } from "@ballast/types";
import { EMPTY_HOLDINGS, addHoldings, isEmptyHoldings, subtractHoldings } from "@ballast/ledger";
import type { CollateralWallets, SendOptions, SurplusPool } from "./types.js";
import type { Unwrapper } from "./custody-pool.js";
import { unwrapHoldings } from "./custody-pool.js";
import { ProtocolError } from "../errors.js";

export interface SurplusPoolSnapshot {
  readonly holdings: CollateralAmounts;
  readonly balances: ReadonlyMap<string, CollateralAmounts>;
}

export class InMemorySurplusPool implements SurplusPool {
  private _holdings: CollateralAmounts = EMPTY_HOLDINGS;
  private _balances = new Map<string, CollateralAmounts>();
  private readonly _wallets: CollateralWallets;
  private readonly _unwrap: Unwrapper;

  constructor(wallets: CollateralWallets, unwrap: Unwrapper) {
    this._wallets = wallets;
    this._unwrap = unwrap;
  }

  receiveCollateral(amounts: CollateralAmounts): void {
    this._holdings = addHoldings(this._holdings, amounts);
  }

  accountSurplus(owner: string, amounts: CollateralAmounts): void {
    this._balances.set(owner, addHoldings(this.getSurplus(owner), amounts));
  }

  getSurplus(owner: string): CollateralAmounts {
    return this._balances.get(owner) ?? EMPTY_HOLDINGS;
  }

  claim(owner: string, to: string, options?: SendOptions): CollateralAmounts {
    const surplus = this.getSurplus(owner);
    if (isEmptyHoldings(surplus)) {
      throw new ProtocolError("NO_SURPLUS", `No collateral to claim for "${owner}"`);
    }
    this._balances.delete(owner);
    this._holdings = subtractHoldings(this._holdings, surplus);
    this._wallets.deposit(to, options?.unwrap === true ? unwrapHoldings(surplus, this._unwrap) : surplus);
    return surplus;
  }

  getHoldings(): CollateralAmounts {
    return this._holdings;
  }

  snapshot(): SurplusPoolSnapshot {
    return { holdings: this._holdings, balances: new Map(this._balances) };
  }

  restore(snapshot: SurplusPoolSnapshot): void {
    this._holdings = snapshot.holdings;
    this._balances = new Map(snapshot.balances);
  }
}
