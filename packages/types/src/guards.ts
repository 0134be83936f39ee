/**
 * Runtime Type Guards
 *
 * Narrowing functions for Ballast domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized audit records, configuration).
 */

import type { CollateralAmountRecord } from "./collateral.js";
import type { TroveOperation, TroveStatus } from "./trove.js";
import type { AuditEventType, DomainEvent, EventMetadata } from "./event.js";
import { AUDIT_EVENTS } from "./event.js";

// =============================================================================
// Amount guards
// =============================================================================

const UINT_PATTERN = /^(0|[1-9]\d*)$/;

/**
 * A non-negative base-10 integer string without leading zeros.
 */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && UINT_PATTERN.test(value);
}

export function isCollateralAmountRecord(
  value: unknown,
): value is CollateralAmountRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.collateralId === "string" &&
    v.collateralId.length > 0 &&
    isUintString(v.amount)
  );
}

// =============================================================================
// Trove guards
// =============================================================================

const TROVE_STATUSES = new Set<string>([
  "nonExistent", "active", "closedByOwner", "closedByLiquidation", "closedByRedemption",
]);

const TROVE_OPERATIONS = new Set<string>([
  "open", "close", "adjust", "addCollateral", "withdrawCollateral",
  "increaseDebt", "repayDebt", "redeem",
]);

export function isTroveStatus(value: unknown): value is TroveStatus {
  return typeof value === "string" && TROVE_STATUSES.has(value);
}

export function isTroveOperation(value: unknown): value is TroveOperation {
  return typeof value === "string" && TROVE_OPERATIONS.has(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["borrower-operations", "redemption", "registry"]);
const AUDIT_EVENT_TYPES = new Set<string>(Object.values(AUDIT_EVENTS));

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}

export function isAuditEventType(value: unknown): value is AuditEventType {
  return typeof value === "string" && AUDIT_EVENT_TYPES.has(value);
}
