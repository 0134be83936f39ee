/**
 * @ballast/event-store — Append-only, hash-chained audit log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with atomic multi-stream batches
 * - Hash-chain computation and verification
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnhashedEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  StreamAppend,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";
