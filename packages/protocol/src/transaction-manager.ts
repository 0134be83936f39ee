/**
 * @ballast/protocol — Transaction manager.
 *
 * Runs every state-changing entry point as one all-or-nothing unit:
 *
 *   1. Refuse to start if another operation is in flight (single writer)
 *   2. Snapshot every registered participant
 *   3. Run the operation, buffering its audit records
 *   4. On success, append the buffer to the event store in one batch
 *   5. On any error, restore every snapshot, drop the buffer, rethrow
 */

import { randomUUID } from "node:crypto";
import type {
  AuditEventType,
  AuditPayloads,
  DomainEvent,
  EventSource,
} from "@ballast/types";
import type { EventStore, StreamAppend } from "@ballast/event-store";
import type { Clock } from "./clock.js";
import { ProtocolError } from "./errors.js";

/**
 * State that can be captured before an operation and put back after a
 * failed one.
 */
export interface Transactional<S> {
  snapshot(): S;
  restore(snapshot: S): void;
}

/**
 * Handle passed to the body of an operation.
 */
export interface TransactionContext {
  readonly label: string;
  readonly correlationId: string;
  /** Clock reading taken once at the start of the operation */
  readonly now: number;

  /**
   * Buffer an audit record. It reaches the event store only if the
   * operation commits.
   */
  record<K extends AuditEventType>(
    streamId: string,
    type: K,
    payload: AuditPayloads[K],
  ): void;
}

export interface TransactionOptions {
  readonly actor: string;
  readonly source: EventSource;
}

export interface TransactionManagerOptions {
  readonly eventStore: EventStore;
  readonly clock: Clock;
  /** Id source for correlation and event ids. Default: random UUIDs */
  readonly generateId?: (() => string) | undefined;
}

interface Participant {
  readonly name: string;
  capture(): () => void;
}

/** Audit stream of one trove */
export function troveStream(owner: string): string {
  return `trove:${owner}`;
}

/** Audit stream of system-wide records */
export const SYSTEM_STREAM = "system";

export class TransactionManager {
  private readonly _participants: Participant[] = [];
  private readonly _eventStore: EventStore;
  private readonly _clock: Clock;
  private readonly _generateId: () => string;
  private _inFlight: string | undefined;

  constructor(options: TransactionManagerOptions) {
    this._eventStore = options.eventStore;
    this._clock = options.clock;
    this._generateId = options.generateId ?? randomUUID;
  }

  /**
   * Register state to be rolled back on failure.
   */
  register<S>(name: string, participant: Transactional<S>): void {
    this._participants.push({
      name,
      capture: () => {
        const snapshot = participant.snapshot();
        return () => participant.restore(snapshot);
      },
    });
  }

  get participantNames(): readonly string[] {
    return this._participants.map((p) => p.name);
  }

  get inFlight(): string | undefined {
    return this._inFlight;
  }

  run<T>(label: string, options: TransactionOptions, body: (tx: TransactionContext) => T): T {
    if (this._inFlight !== undefined) {
      throw new ProtocolError(
        "REENTRANT_CALL",
        `Cannot start "${label}" while "${this._inFlight}" is in flight`,
      );
    }
    this._inFlight = label;

    const restores = this._participants.map((p) => p.capture());
    const buffer: StreamAppend[] = [];
    const now = this._clock.now();
    const correlationId = this._generateId();
    const timestamp = new Date(now * 1000).toISOString();

    const tx: TransactionContext = {
      label,
      correlationId,
      now,
      record: (streamId, type, payload) => {
        const event: DomainEvent = {
          type,
          metadata: {
            eventId: this._generateId(),
            timestamp,
            actor: options.actor,
            correlationId,
            source: options.source,
          },
          payload,
        };
        buffer.push({ streamId, events: [event] });
      },
    };

    try {
      const result = body(tx);
      if (buffer.length > 0) {
        this._eventStore.appendBatch(buffer);
      }
      return result;
    } catch (error) {
      for (let i = restores.length - 1; i >= 0; i--) {
        restores[i]?.();
      }
      throw error;
    } finally {
      this._inFlight = undefined;
    }
  }
}
