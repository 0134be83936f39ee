/**
 * @ballast/protocol — Ordered index as a doubly linked list.
 *
 * Troves are ordered by the ratio they were inserted with, highest at
 * the head. Callers pass neighbour hints; a valid hint makes insertion
 * O(1), an invalid or missing one falls back to a scan.
 *
 * Rules:
 * - Each owner appears at most once
 * - A scan places a newcomer after troves with an equal ratio
 */

import type { InsertPosition, OrderedIndex } from "./types.js";
import { ProtocolError } from "../errors.js";

interface Node {
  key: bigint;
  prev: string | undefined;
  next: string | undefined;
}

export interface SortedTrovesSnapshot {
  readonly nodes: ReadonlyMap<string, Readonly<Node>>;
  readonly head: string | undefined;
  readonly tail: string | undefined;
}

export class SortedTroves implements OrderedIndex {
  private _nodes = new Map<string, Node>();
  private _head: string | undefined;
  private _tail: string | undefined;

  get size(): number {
    return this._nodes.size;
  }

  contains(owner: string): boolean {
    return this._nodes.has(owner);
  }

  getFirst(): string | undefined {
    return this._head;
  }

  getLast(): string | undefined {
    return this._tail;
  }

  getNext(owner: string): string | undefined {
    return this._node(owner).next;
  }

  getPrev(owner: string): string | undefined {
    return this._node(owner).prev;
  }

  getKey(owner: string): bigint | undefined {
    return this._nodes.get(owner)?.key;
  }

  /**
   * Owners from highest to lowest ratio.
   */
  toArray(): readonly string[] {
    const result: string[] = [];
    let current = this._head;
    while (current !== undefined) {
      result.push(current);
      current = this._node(current).next;
    }
    return result;
  }

  insert(owner: string, icr: bigint, prevHint?: string, nextHint?: string): void {
    if (this._nodes.has(owner)) {
      throw new ProtocolError("INDEX_CONFLICT", `"${owner}" is already in the index`);
    }
    const { prev, next } = this.findInsertPosition(icr, prevHint, nextHint);
    this._nodes.set(owner, { key: icr, prev, next });

    if (prev === undefined) this._head = owner;
    else this._node(prev).next = owner;

    if (next === undefined) this._tail = owner;
    else this._node(next).prev = owner;
  }

  reInsert(owner: string, icr: bigint, prevHint?: string, nextHint?: string): void {
    this.remove(owner);
    this.insert(
      owner,
      icr,
      prevHint === owner ? undefined : prevHint,
      nextHint === owner ? undefined : nextHint,
    );
  }

  remove(owner: string): void {
    const node = this._node(owner);

    if (node.prev === undefined) this._head = node.next;
    else this._node(node.prev).next = node.next;

    if (node.next === undefined) this._tail = node.prev;
    else this._node(node.next).prev = node.prev;

    this._nodes.delete(owner);
  }

  findInsertPosition(icr: bigint, prevHint?: string, nextHint?: string): InsertPosition {
    const hinted = { prev: this._known(prevHint), next: this._known(nextHint) };
    if ((hinted.prev !== undefined || hinted.next !== undefined) && this._isValidPosition(icr, hinted)) {
      return hinted;
    }
    return this._scan(icr);
  }

  // ─── Rollback ─────────────────────────────────────────────────────────

  snapshot(): SortedTrovesSnapshot {
    const nodes = new Map<string, Node>();
    for (const [owner, node] of this._nodes) nodes.set(owner, { ...node });
    return { nodes, head: this._head, tail: this._tail };
  }

  restore(snapshot: SortedTrovesSnapshot): void {
    this._nodes = new Map();
    for (const [owner, node] of snapshot.nodes) this._nodes.set(owner, { ...node });
    this._head = snapshot.head;
    this._tail = snapshot.tail;
  }

  // ─── Internal ─────────────────────────────────────────────────────────

  private _node(owner: string): Node {
    const node = this._nodes.get(owner);
    if (node === undefined) {
      throw new ProtocolError("INDEX_CONFLICT", `"${owner}" is not in the index`);
    }
    return node;
  }

  private _known(hint: string | undefined): string | undefined {
    return hint !== undefined && this._nodes.has(hint) ? hint : undefined;
  }

  private _isValidPosition(icr: bigint, { prev, next }: InsertPosition): boolean {
    if (prev === undefined && next === undefined) {
      return this._nodes.size === 0;
    }
    if (prev === undefined) {
      return next !== undefined && next === this._head && icr >= this._node(next).key;
    }
    if (next === undefined) {
      return prev === this._tail && this._node(prev).key >= icr;
    }
    const prevNode = this._node(prev);
    return prevNode.next === next && prevNode.key >= icr && icr >= this._node(next).key;
  }

  /**
   * Walk from the head to the first node with a strictly lower ratio.
   */
  private _scan(icr: bigint): InsertPosition {
    let prev: string | undefined;
    let current = this._head;
    while (current !== undefined) {
      const node = this._node(current);
      if (node.key < icr) break;
      prev = current;
      current = node.next;
    }
    return { prev, next: current };
  }
}
