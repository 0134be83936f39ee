/**
 * @ballast/types — Shared domain types for the Ballast stack.
 *
 * These types are used across all Ballast packages:
 * - Collateral identifiers and holdings
 * - Trove lifecycle
 * - Audit event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Collateral types
export type {
  CollateralId,
  CollateralAmounts,
  CollateralAmountRecord,
} from "./collateral.js";

// Trove types
export type {
  Trove,
  TroveStatus,
  TerminalTroveStatus,
  TroveOperation,
} from "./trove.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
  AuditEventType,
  AuditPayloads,
  TroveCreatedPayload,
  TroveUpdatedPayload,
  FeePaidPayload,
  RedemptionPerformedPayload,
  BaseRateUpdatedPayload,
  SurplusClaimedPayload,
} from "./event.js";
export { AUDIT_EVENTS } from "./event.js";

// Runtime type guards
export {
  isUintString,
  isCollateralAmountRecord,
  isTroveStatus,
  isTroveOperation,
  isEventMetadata,
  isDomainEvent,
  isAuditEventType,
} from "./guards.js";
