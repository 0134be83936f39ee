/**
 * @ballast/protocol — Multi-collateral CDP core.
 *
 * - Borrower operations: open, adjust and close troves
 * - Redemption of stable credit against the riskiest troves
 * - Base-rate and variable fees
 * - All-or-nothing operations over in-memory collaborators
 */

export { Protocol, createProtocol } from "./protocol.js";
export type { ProtocolOptions } from "./protocol.js";

export { BorrowerOperations } from "./borrower-operations.js";
export type {
  AdjustTroveInput,
  BorrowerOperationsOptions,
  CollateralChangeInput,
  CollateralList,
  DebtChangeInput,
  InsertHints,
  OpenTroveInput,
  TroveChange,
} from "./borrower-operations.js";

export { RedemptionEngine, drawCollateral } from "./redemption-engine.js";
export type {
  RedeemInput,
  RedemptionEngineOptions,
  RedemptionResult,
} from "./redemption-engine.js";

export { HintHelpers } from "./hint-helpers.js";
export type { RedemptionHints } from "./hint-helpers.js";

export { SystemState } from "./system-state.js";
export type { EntireTrove, SystemStateOptions } from "./system-state.js";

export { BaseRate } from "./base-rate.js";
export type { BaseRateSnapshot } from "./base-rate.js";

export { SystemClock, ManualClock } from "./clock.js";
export type { Clock } from "./clock.js";

export { DEFAULT_PARAMETERS, resolveParameters, validateParameters } from "./parameters.js";
export type { ProtocolParameters } from "./parameters.js";

export { TransactionManager, SYSTEM_STREAM, troveStream } from "./transaction-manager.js";
export type {
  Transactional,
  TransactionContext,
  TransactionOptions,
  TransactionManagerOptions,
} from "./transaction-manager.js";

export { FEE_RECIPIENT, GAS_POOL } from "./accounts.js";

export { ProtocolError, categorize } from "./errors.js";
export type {
  ClassifiedError,
  ErrorCategory,
  ProtocolErrorCode,
} from "./errors.js";

export { SortedTroves } from "./collaborators/sorted-troves.js";
export { InMemoryCustodyPool, unwrapHoldings } from "./collaborators/custody-pool.js";
export type { Unwrapper } from "./collaborators/custody-pool.js";
export { InMemorySurplusPool } from "./collaborators/surplus-pool.js";
export { InMemoryStableToken } from "./collaborators/stable-token.js";
export { InMemoryWallets } from "./collaborators/wallets.js";
export { InMemoryRedistribution } from "./collaborators/redistribution.js";
export type {
  CollateralReceiver,
  CollateralWallets,
  CustodyPool,
  InsertPosition,
  OrderedIndex,
  PendingRewards,
  Redistribution,
  SendOptions,
  StableToken,
  SurplusPool,
} from "./collaborators/types.js";
