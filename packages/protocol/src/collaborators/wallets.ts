/**
 * @ballast/protocol — In-memory collateral wallets.
 *
 * Collateral that accounts hold outside the protocol: the source of
 * deposits and the destination of withdrawals, redemptions and claims.
 */

import type { CollateralAmounts, CollateralId } from "@ballast/types";
import { EMPTY_HOLDINGS, addHoldings, subtractHoldings } from "@ballast/ledger";
import type { CollateralWallets } from "./types.js";
import { ProtocolError } from "../errors.js";

export type WalletsSnapshot = ReadonlyMap<string, CollateralAmounts>;

export class InMemoryWallets implements CollateralWallets {
  private _accounts = new Map<string, CollateralAmounts>();

  deposit(account: string, amounts: CollateralAmounts): void {
    this._accounts.set(account, addHoldings(this.holdingsOf(account), amounts));
  }

  withdraw(account: string, amounts: CollateralAmounts): void {
    for (const [id, amount] of amounts) {
      const balance = this.balanceOf(account, id);
      if (amount > balance) {
        throw new ProtocolError(
          "INSUFFICIENT_COLLATERAL_BALANCE",
          `"${account}" holds ${balance} of "${id}", needs ${amount}`,
        );
      }
    }
    this._accounts.set(account, subtractHoldings(this.holdingsOf(account), amounts));
  }

  balanceOf(account: string, id: CollateralId): bigint {
    return this.holdingsOf(account).get(id) ?? 0n;
  }

  holdingsOf(account: string): CollateralAmounts {
    return this._accounts.get(account) ?? EMPTY_HOLDINGS;
  }

  snapshot(): WalletsSnapshot {
    return new Map(this._accounts);
  }

  restore(snapshot: WalletsSnapshot): void {
    this._accounts = new Map(snapshot);
  }
}
