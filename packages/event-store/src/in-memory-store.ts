/**
 * @ballast/event-store — In-memory EventStore implementation.
 *
 * Stores records in plain arrays. Suitable for:
 * - Unit and integration tests
 * - A single-process node whose audit log is rebuilt on restart
 *
 * Properties:
 * - O(1) append (amortized)
 * - O(n) read (where n = number of events scanned)
 * - Synchronous subscription dispatch, after the whole batch is stored
 * - No durability guarantees
 */

import type { DomainEvent } from "@ballast/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ExpectedVersion,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  StreamAppend,
  Subscription,
  UnhashedEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock for `appendedAt`. Default: system time */
  readonly now?: (() => Date) | undefined;
}

/**
 * In-memory event store.
 *
 * Records live in two structures:
 * - Per-stream arrays for stream reads
 * - A global array for readAll, integrity checks and global subscriptions
 */
export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();
  private readonly _now: () => Date;

  /** Hash of the last appended record (for chain linking) */
  private _lastHash: string = GENESIS_HASH;

  constructor(options?: InMemoryEventStoreOptions) {
    this._now = options?.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    const [result] = this.appendBatch([
      { streamId, events, expectedVersion: options?.expectedVersion },
    ]);
    if (result === undefined) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    return result;
  }

  appendBatch(parts: readonly StreamAppend[]): readonly AppendResult[] {
    if (parts.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append an empty batch");
    }

    // Validate every part before writing anything. Versions are tracked
    // locally so two parts for one stream are checked in order.
    const pending = new Map<string, number>();
    for (const part of parts) {
      this._validateStreamId(part.streamId);
      if (part.events.length === 0) {
        throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", part.streamId);
      }
      const current = pending.get(part.streamId) ?? this.streamVersion(part.streamId);
      this._checkExpectedVersion(part.streamId, current, part.expectedVersion);
      pending.set(part.streamId, current + part.events.length);
    }

    const appendedAt = this._now().toISOString();
    const results: AppendResult[] = [];
    const written: StoredEvent[] = [];

    for (const part of parts) {
      let stream = this._streams.get(part.streamId);
      if (stream === undefined) {
        stream = [];
        this._streams.set(part.streamId, stream);
      }

      const fromVersion = stream.length + 1;
      for (const event of part.events) {
        const base: UnhashedEvent = {
          event,
          streamId: part.streamId,
          version: stream.length + 1,
          globalPosition: this._globalLog.length + 1,
          appendedAt,
        };
        const previousHash = this._lastHash;
        const stored: StoredEvent = {
          ...base,
          hash: computeEventHash(base, previousHash),
          previousHash,
        };
        this._lastHash = stored.hash;

        stream.push(stored);
        this._globalLog.push(stored);
        written.push(stored);
      }

      results.push({
        streamId: part.streamId,
        fromVersion,
        toVersion: stream.length,
        count: part.events.length,
      });
    }

    this._dispatch(written);
    return results;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const result =
      (options?.direction ?? "forward") === "forward"
        ? stream.filter((e) => e.version >= fromVersion)
        : stream.filter((e) => e.version <= fromVersion).reverse();

    return limit(result, options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;
    const types = options?.types;

    const matches = (e: StoredEvent): boolean =>
      types === undefined || types.includes(e.event.type);

    const result =
      (options?.direction ?? "forward") === "forward"
        ? this._globalLog.filter((e) => e.globalPosition >= fromPosition && matches(e))
        : this._globalLog.filter((e) => e.globalPosition <= fromPosition && matches(e)).reverse();

    return limit(result, options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    let subscribers = this._streamSubscribers.get(streamId);
    if (subscribers === undefined) {
      subscribers = new Set();
      this._streamSubscribers.set(streamId, subscribers);
    }
    subscribers.add(handler);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);
    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    current: number,
    expected: ExpectedVersion | undefined,
  ): void {
    if (expected === undefined || expected === "any") {
      return;
    }
    if (expected === "no_stream") {
      if (current !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${current}), expected no_stream`,
          streamId,
        );
      }
      return;
    }
    if (current !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${current}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _dispatch(events: readonly StoredEvent[]): void {
    for (const event of events) {
      const streamSubs = this._streamSubscribers.get(event.streamId);
      if (streamSubs !== undefined) {
        for (const handler of streamSubs) handler(event);
      }
      for (const handler of this._globalSubscribers) handler(event);
    }
  }
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
