/**
 * @ballast/protocol — In-memory custody pools.
 *
 * The active pool holds the collateral of open troves; the default pool
 * holds redistributed collateral and debt not yet folded into troves.
 */

import type { CollateralAmounts, CollateralId } from "@ballast/types";
import { EMPTY_HOLDINGS, addHoldings, subtractHoldings } from "@ballast/ledger";
import type {
  CollateralReceiver,
  CollateralWallets,
  CustodyPool,
  SendOptions,
} from "./types.js";
import { ProtocolError } from "../errors.js";

export interface CustodyPoolSnapshot {
  readonly holdings: CollateralAmounts;
  readonly debt: bigint;
}

/**
 * Maps a collateral id to the id delivered outside the protocol.
 */
export type Unwrapper = (id: CollateralId) => CollateralId;

/**
 * Re-key holdings by their unwrapped ids, merging ids that share an
 * underlying asset.
 */
export function unwrapHoldings(amounts: CollateralAmounts, unwrap: Unwrapper): CollateralAmounts {
  const result = new Map<CollateralId, bigint>();
  for (const [id, amount] of amounts) {
    const target = unwrap(id);
    result.set(target, (result.get(target) ?? 0n) + amount);
  }
  return result;
}

export class InMemoryCustodyPool implements CustodyPool {
  readonly name: string;
  private _holdings: CollateralAmounts = EMPTY_HOLDINGS;
  private _debt = 0n;
  private readonly _wallets: CollateralWallets;
  private readonly _unwrap: Unwrapper;

  constructor(name: string, wallets: CollateralWallets, unwrap: Unwrapper) {
    this.name = name;
    this._wallets = wallets;
    this._unwrap = unwrap;
  }

  receiveCollateral(amounts: CollateralAmounts): void {
    this._holdings = addHoldings(this._holdings, amounts);
  }

  sendCollateral(to: string, amounts: CollateralAmounts, options?: SendOptions): void {
    this._take(amounts);
    this._wallets.deposit(to, options?.unwrap === true ? unwrapHoldings(amounts, this._unwrap) : amounts);
  }

  transferTo(receiver: CollateralReceiver, amounts: CollateralAmounts): void {
    this._take(amounts);
    receiver.receiveCollateral(amounts);
  }

  increaseDebt(amount: bigint): void {
    this._debt += amount;
  }

  decreaseDebt(amount: bigint): void {
    if (amount > this._debt) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `${this.name} pool tracks ${this._debt} debt, cannot release ${amount}`,
      );
    }
    this._debt -= amount;
  }

  getDebt(): bigint {
    return this._debt;
  }

  getCollateral(id: CollateralId): bigint {
    return this._holdings.get(id) ?? 0n;
  }

  getHoldings(): CollateralAmounts {
    return this._holdings;
  }

  snapshot(): CustodyPoolSnapshot {
    return { holdings: this._holdings, debt: this._debt };
  }

  restore(snapshot: CustodyPoolSnapshot): void {
    this._holdings = snapshot.holdings;
    this._debt = snapshot.debt;
  }

  private _take(amounts: CollateralAmounts): void {
    for (const [id, amount] of amounts) {
      if (amount > this.getCollateral(id)) {
        throw new ProtocolError(
          "INSUFFICIENT_COLLATERAL",
          `${this.name} pool holds ${this.getCollateral(id)} of "${id}", cannot release ${amount}`,
        );
      }
    }
    this._holdings = subtractHoldings(this._holdings, amounts);
  }
}
