/**
 * @ballast/valuation — Capabilities for gated calls.
 *
 * A capability is handed out at composition time to exactly the
 * component allowed to make a call; the callee checks identity.
 */

import type { Capability } from "./types.js";
import { ValuationError } from "./types.js";

export function createCapability(name: string): Capability {
  return Object.freeze({ name, token: Symbol(name) });
}

/**
 * Throw UNAUTHORIZED_CALLER unless `presented` is `expected`.
 */
export function assertCapability(
  presented: Capability,
  expected: Capability,
  action: string,
): void {
  if (presented.token !== expected.token) {
    throw new ValuationError(
      "UNAUTHORIZED_CALLER",
      `Capability "${presented.name}" may not ${action}`,
    );
  }
}
