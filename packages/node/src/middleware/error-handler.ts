/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope. Protocol errors map to a status by their category;
 * anything the domain does not own is a 500 without details.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import { EventStoreError } from "@ballast/event-store";
import { categorize } from "@ballast/protocol";
import type { ErrorCategory } from "@ballast/protocol";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Category → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 403 | 409 | 422 | 423 | 500;

export const STATUS_OF_CATEGORY: Readonly<Record<ErrorCategory, ErrorStatus>> = {
  validation: 400,
  "state-conflict": 409,
  "invariant-violation": 422,
  "insufficient-funds": 422,
  "temporal-restriction": 423,
  authorization: 403,
};

export interface FailureLogEntry {
  readonly code: string;
  readonly category: ErrorCategory | "unknown";
  readonly status: ErrorStatus;
  readonly message: string;
  readonly requestId: string;
}

interface Classified {
  readonly code: string;
  readonly category: ErrorCategory | "unknown";
  readonly message: string;
}

function classify(err: Error): Classified {
  const known = categorize(err);
  if (known !== undefined) return known;
  if (err instanceof EventStoreError) {
    return { code: err.code, category: "state-conflict", message: err.message };
  }
  return { code: "INTERNAL_ERROR", category: "unknown", message: err.message };
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Build the handler registered as Hono's onError. Rejected operations
 * are reported to `logFailure` with their code and category.
 */
export function createErrorHandler(
  logFailure?: (entry: FailureLogEntry) => void,
): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    const { code, category, message } = classify(err);
    const status = category === "unknown" ? 500 : STATUS_OF_CATEGORY[category];

    logFailure?.({ code, category, status, message, requestId: c.get("requestId") });

    // Don't leak internal details
    const envelope =
      status === 500
        ? createErrorEnvelope("INTERNAL_ERROR", "Internal server error")
        : createErrorEnvelope(code, message);
    return c.json(envelope, status);
  };
}
