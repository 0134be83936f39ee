/**
 * @ballast/protocol — In-memory stable-credit token.
 */

import type { StableToken } from "./types.js";
import { ProtocolError } from "../errors.js";

export interface StableTokenSnapshot {
  readonly balances: ReadonlyMap<string, bigint>;
  readonly supply: bigint;
}

export class InMemoryStableToken implements StableToken {
  private _balances = new Map<string, bigint>();
  private _supply = 0n;

  mint(account: string, amount: bigint): void {
    assertAmount(amount);
    this._balances.set(account, this.balanceOf(account) + amount);
    this._supply += amount;
  }

  burn(account: string, amount: bigint): void {
    assertAmount(amount);
    this._debit(account, amount);
    this._supply -= amount;
  }

  transfer(from: string, to: string, amount: bigint): void {
    assertAmount(amount);
    this._debit(from, amount);
    this._balances.set(to, this.balanceOf(to) + amount);
  }

  balanceOf(account: string): bigint {
    return this._balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this._supply;
  }

  snapshot(): StableTokenSnapshot {
    return { balances: new Map(this._balances), supply: this._supply };
  }

  restore(snapshot: StableTokenSnapshot): void {
    this._balances = new Map(snapshot.balances);
    this._supply = snapshot.supply;
  }

  private _debit(account: string, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (amount > balance) {
      throw new ProtocolError(
        "INSUFFICIENT_BALANCE",
        `"${account}" holds ${balance}, needs ${amount}`,
      );
    }
    this._balances.set(account, balance - amount);
  }
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new ProtocolError("INVALID_AMOUNT", `Token amount cannot be negative, got ${amount}`);
  }
}
