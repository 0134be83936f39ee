/**
 * Audit record logging.
 *
 * Subscribes to the event store and hands every committed audit record
 * to a log function. Records of failed operations are never committed,
 * so they never reach the log.
 */

import type { EventStore, StoredEvent, Subscription } from "@ballast/event-store";

export interface AuditLogEntry {
  readonly type: string;
  readonly streamId: string;
  readonly version: number;
  readonly globalPosition: number;
  readonly actor: string;
  readonly correlationId: string;
  readonly source: string;
}

export function toAuditLogEntry(stored: StoredEvent): AuditLogEntry {
  const { event } = stored;
  return {
    type: event.type,
    streamId: stored.streamId,
    version: stored.version,
    globalPosition: stored.globalPosition,
    actor: event.metadata.actor,
    correlationId: event.metadata.correlationId,
    source: event.metadata.source,
  };
}

export function subscribeAuditLog(
  eventStore: EventStore,
  log: (entry: AuditLogEntry) => void,
): Subscription {
  return eventStore.subscribeAll((stored) => log(toAuditLogEntry(stored)));
}
