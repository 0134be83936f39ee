/**
 * @ballast/node — Entry point.
 *
 * Loads config, seeds the protocol, starts the HTTP server and handles
 * graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, protocolParameters } from "./config.js";
import { createApp } from "./app.js";
import { ProtocolService } from "./services/protocol-service.js";
import { subscribeAuditLog } from "./services/audit-logger.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const service = new ProtocolService({
    params: protocolParameters(config),
    collaterals: config.COLLATERALS,
  });
  logger.info(
    { collaterals: config.COLLATERALS.map((c) => c.id) },
    "Collateral types registered",
  );

  const audit = subscribeAuditLog(service.eventStore, (entry) => {
    logger.info(entry, `audit ${entry.type}`);
  });

  const allowDeposits = config.NODE_ENV !== "production";
  const { app } = createApp({
    service,
    allowDeposits,
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    logFailure: (entry) => {
      if (entry.status === 500) {
        logger.error(entry, "Unhandled error");
      } else {
        logger.warn(entry, `Operation rejected: ${entry.code}`);
      }
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, allowDeposits },
    "Ballast node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    audit.unsubscribe();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
