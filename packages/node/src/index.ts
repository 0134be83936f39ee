/**
 * @ballast/node — HTTP surface for the Ballast protocol.
 */

export { ProtocolService } from "./services/protocol-service.js";
export type { ProtocolServiceConfig } from "./services/protocol-service.js";
export { subscribeAuditLog, toAuditLogEntry } from "./services/audit-logger.js";
export type { AuditLogEntry } from "./services/audit-logger.js";
export {
  loadConfig,
  protocolParameters,
  ConfigSchema,
  CollateralSeedSchema,
  FeeCurveSchema,
} from "./config.js";
export type { AppConfig, CollateralSeed } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
