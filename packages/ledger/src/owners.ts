/**
 * @ballast/ledger — Trove owners array.
 *
 * Tracks every owner with an active trove, in creation order,
 * so each trove has a stable array index for audit records.
 *
 * Rules:
 * - No duplicate owners
 * - Removal is swap-and-pop: the last owner takes the removed slot
 */

import type { OwnerRemoval } from "./types.js";
import { LedgerError } from "./types.js";

export class OwnerRegistry {
  private readonly _owners: string[] = [];
  private readonly _index: Map<string, number> = new Map();

  /**
   * Append an owner. Returns its array index.
   * Throws if the owner is already present.
   */
  add(owner: string): number {
    if (this._index.has(owner)) {
      throw new LedgerError("DUPLICATE_OWNER", `Owner already registered: "${owner}"`);
    }
    const index = this._owners.length;
    this._owners.push(owner);
    this._index.set(owner, index);
    return index;
  }

  /**
   * Remove an owner, moving the last owner into its slot.
   */
  remove(owner: string): OwnerRemoval {
    const removedIndex = this.assertIndex(owner);
    const lastIndex = this._owners.length - 1;
    const last = this._owners[lastIndex];

    this._index.delete(owner);

    if (last === undefined || lastIndex === removedIndex) {
      this._owners.pop();
      return { removedIndex };
    }

    this._owners[removedIndex] = last;
    this._owners.pop();
    this._index.set(last, removedIndex);
    return { removedIndex, moved: { owner: last, index: removedIndex } };
  }

  has(owner: string): boolean {
    return this._index.has(owner);
  }

  indexOf(owner: string): number | undefined {
    return this._index.get(owner);
  }

  /**
   * Index of an owner. Throws if not registered.
   */
  assertIndex(owner: string): number {
    const index = this._index.get(owner);
    if (index === undefined) {
      throw new LedgerError("UNKNOWN_OWNER", `Unknown owner: "${owner}"`);
    }
    return index;
  }

  at(index: number): string | undefined {
    return this._owners[index];
  }

  getAll(): readonly string[] {
    return [...this._owners];
  }

  get count(): number {
    return this._owners.length;
  }

  /**
   * Replace the whole array (used by snapshot restore).
   */
  reset(owners: readonly string[]): void {
    this._owners.length = 0;
    this._index.clear();
    for (const owner of owners) {
      this.add(owner);
    }
  }
}
