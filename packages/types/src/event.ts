/**
 * Event Types
 *
 * Every committed state change produces audit records.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Payloads are JSON-safe: amounts are integer strings, never bigint
 * - Records of a failed operation are never emitted
 */

import type { CollateralId, CollateralAmountRecord } from "./collateral.js";
import type { TroveOperation } from "./trove.js";

/**
 * Which part of the protocol emitted an event.
 */
export type EventSource = "borrower-operations" | "redemption" | "registry";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who caused this event */
  readonly actor: string;

  /** ID of the event that caused this event */
  readonly causationId?: string | undefined;

  /** Shared by every record of one operation */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "trove.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the store, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}

// ─── Audit payloads ─────────────────────────────────────────────────────

export const AUDIT_EVENTS = {
  TROVE_CREATED: "trove.created",
  TROVE_UPDATED: "trove.updated",
  FEE_PAID: "fee.paid",
  REDEMPTION_PERFORMED: "redemption.performed",
  BASE_RATE_UPDATED: "base-rate.updated",
  SURPLUS_CLAIMED: "surplus.claimed",
} as const;

export type AuditEventType = (typeof AUDIT_EVENTS)[keyof typeof AUDIT_EVENTS];

export type TroveCreatedPayload = {
  readonly owner: string;
  readonly arrayIndex: number;
};

export type TroveUpdatedPayload = {
  readonly owner: string;
  readonly debt: string;
  readonly collateralIds: readonly CollateralId[];
  readonly amounts: readonly string[];
  readonly stake: string;
  readonly operation: TroveOperation;
};

export type FeePaidPayload = {
  readonly owner: string;
  readonly amount: string;
};

export type RedemptionPerformedPayload = {
  readonly attempted: string;
  readonly actual: string;
  readonly fee: string;
  readonly collateralIds: readonly CollateralId[];
  readonly amounts: readonly string[];
};

export type BaseRateUpdatedPayload = {
  readonly baseRate: string;
  readonly lastFeeOperationTime: number;
};

export type SurplusClaimedPayload = {
  readonly owner: string;
  readonly collateral: readonly CollateralAmountRecord[];
};

/**
 * Payload shape for each audit event type.
 *
 * Payloads are type aliases so they satisfy `DomainEvent["payload"]`.
 */
export interface AuditPayloads {
  "trove.created": TroveCreatedPayload;
  "trove.updated": TroveUpdatedPayload;
  "fee.paid": FeePaidPayload;
  "redemption.performed": RedemptionPerformedPayload;
  "base-rate.updated": BaseRateUpdatedPayload;
  "surplus.claimed": SurplusClaimedPayload;
}
