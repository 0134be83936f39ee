/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Kept apart from
 * main.ts so tests create the app without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { ProtocolService } from "./services/protocol-service.js";
import type { ProtocolServiceConfig } from "./services/protocol-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { FailureLogEntry } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createErrorEnvelope } from "./types/error.js";
import { createHealthRoutes } from "./routes/health.js";
import { createSystemRoutes } from "./routes/system.js";
import { createTroveRoutes } from "./routes/troves.js";
import { createRedemptionRoutes } from "./routes/redemptions.js";
import { createAccountRoutes } from "./routes/accounts.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** An existing service; otherwise one is built from serviceConfig */
  readonly service?: ProtocolService | undefined;
  readonly serviceConfig?: ProtocolServiceConfig | undefined;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  readonly logFailure?: ((entry: FailureLogEntry) => void) | undefined;
  /** Mount the wallet deposit route. Default: false */
  readonly allowDeposits?: boolean | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ProtocolService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions = {}): AppInstance {
  const service = options.service ?? new ProtocolService(options.serviceConfig);

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.logFailure));
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes ──────────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1/system", createSystemRoutes());
  app.route("/api/v1/troves", createTroveRoutes());
  app.route("/api/v1/redemptions", createRedemptionRoutes());
  app.route("/api/v1/accounts", createAccountRoutes({ allowDeposits: options.allowDeposits ?? false }));
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
