/**
 * @ballast/protocol — Protocol parameters.
 *
 * All ratios and fees are 18-decimal fixed point; periods are seconds.
 */

import { DECIMAL_PRECISION } from "@ballast/ledger";
import { ProtocolError } from "./errors.js";

export interface ProtocolParameters {
  /** Minimum individual collateral ratio */
  readonly mcr: bigint;
  /** Critical system ratio; below it the system is in Recovery Mode */
  readonly ccr: bigint;
  /** Debt reserved per trove for whoever liquidates it */
  readonly liquidationReserve: bigint;
  /** Smallest debt a trove may carry, reserve excluded */
  readonly minNetDebt: bigint;
  readonly borrowingFeeFloor: bigint;
  readonly maxBorrowingFee: bigint;
  readonly redemptionFeeFloor: bigint;
  /** Dampening of the base-rate increase per redemption */
  readonly beta: bigint;
  /** Per-minute base-rate decay (12-hour half-life) */
  readonly minuteDecayFactor: bigint;
  readonly bootstrapPeriod: number;
  /** Cap on each collateral's variable fee during bootstrap */
  readonly bootstrapVariableFeeCap: bigint;
  /** Allowed distance between a partial redemption's ratio and its hint, as a fraction of the hint */
  readonly redemptionHintTolerance: bigint;
}

export const DEFAULT_PARAMETERS: ProtocolParameters = Object.freeze({
  mcr: 1_100_000_000_000_000_000n,
  ccr: 1_500_000_000_000_000_000n,
  liquidationReserve: 200n * DECIMAL_PRECISION,
  minNetDebt: 1800n * DECIMAL_PRECISION,
  borrowingFeeFloor: 5_000_000_000_000_000n,
  maxBorrowingFee: 50_000_000_000_000_000n,
  redemptionFeeFloor: 5_000_000_000_000_000n,
  beta: 2n,
  minuteDecayFactor: 999_037_758_833_783_000n,
  bootstrapPeriod: 14 * 24 * 60 * 60,
  bootstrapVariableFeeCap: 10_000_000_000_000_000n,
  redemptionHintTolerance: 20_000_000_000_000_000n,
});

/**
 * Merge overrides onto the defaults and validate the result.
 */
export function resolveParameters(
  overrides: Partial<ProtocolParameters> = {},
): ProtocolParameters {
  const params: ProtocolParameters = { ...DEFAULT_PARAMETERS, ...overrides };
  validateParameters(params);
  return Object.freeze(params);
}

export function validateParameters(params: ProtocolParameters): void {
  const fail = (message: string): never => {
    throw new ProtocolError("INVALID_PARAMETERS", message);
  };

  if (params.mcr <= DECIMAL_PRECISION) fail("MCR must exceed 100%");
  if (params.mcr >= params.ccr) fail("MCR must be below CCR");
  if (params.liquidationReserve <= 0n) fail("Liquidation reserve must be positive");
  if (params.minNetDebt < 0n) fail("Minimum net debt cannot be negative");
  if (params.borrowingFeeFloor < 0n || params.borrowingFeeFloor > DECIMAL_PRECISION) {
    fail("Borrowing fee floor must be within [0, 1e18]");
  }
  if (params.maxBorrowingFee < params.borrowingFeeFloor || params.maxBorrowingFee > DECIMAL_PRECISION) {
    fail("Maximum borrowing fee must be within [floor, 1e18]");
  }
  if (params.redemptionFeeFloor < 0n || params.redemptionFeeFloor > DECIMAL_PRECISION) {
    fail("Redemption fee floor must be within [0, 1e18]");
  }
  if (params.beta <= 0n) fail("BETA must be positive");
  if (params.minuteDecayFactor <= 0n || params.minuteDecayFactor > DECIMAL_PRECISION) {
    fail("Minute decay factor must be within (0, 1e18]");
  }
  if (!Number.isSafeInteger(params.bootstrapPeriod) || params.bootstrapPeriod < 0) {
    fail("Bootstrap period must be a non-negative integer of seconds");
  }
  if (params.bootstrapVariableFeeCap < 0n || params.bootstrapVariableFeeCap > DECIMAL_PRECISION) {
    fail("Bootstrap variable fee cap must be within [0, 1e18]");
  }
  if (params.redemptionHintTolerance < 0n || params.redemptionHintTolerance > DECIMAL_PRECISION) {
    fail("Redemption hint tolerance must be within [0, 1e18]");
  }
}
