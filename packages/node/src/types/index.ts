/**
 * Type barrel — re-exports all public types from @ballast/node.
 */

// DTOs
export {
  UintString,
  AccountSchema,
  CollateralListSchema,
  PaginationQuerySchema,
  OpenTroveSchema,
  AdjustTroveSchema,
  ListTrovesQuerySchema,
  RedeemSchema,
  RedemptionHintsQuerySchema,
  DepositSchema,
  ListEventsQuerySchema,
  ListStreamEventsQuerySchema,
} from "./dto.js";
export type {
  OpenTroveDto,
  AdjustTroveDto,
  ListTrovesQuery,
  RedeemDto,
  RedemptionHintsQuery,
  DepositDto,
  ListEventsQuery,
  ListStreamEventsQuery,
} from "./dto.js";

// Views
export type {
  AccountView,
  CollateralView,
  RedemptionHintsView,
  RedemptionView,
  SurplusClaimView,
  SystemView,
  TroveChangeView,
  TroveView,
} from "./views.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Pagination
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type {
  CursorValue,
  PaginationQuery,
  PaginationMeta,
  PaginatedResponse,
} from "./pagination.js";

// App env
export type { AppEnv } from "./api-contract.js";
