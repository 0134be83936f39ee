/**
 * Response shapes. Every bigint is rendered as a base-10 string.
 */

import type {
  CollateralAmountRecord,
  CollateralId,
  TroveStatus,
} from "@ballast/types";

export interface TroveView {
  readonly owner: string;
  readonly status: TroveStatus;
  readonly collateral: readonly CollateralAmountRecord[];
  readonly debt: string;
  readonly stake: string;
  /** Current ratio including pending rewards; null unless active */
  readonly icr: string | null;
  readonly pendingCollateral: readonly CollateralAmountRecord[];
  readonly pendingDebt: string;
}

export interface TroveChangeView {
  readonly trove: TroveView;
  readonly borrowingFee: string;
  readonly variableFee: string;
}

export interface CollateralView {
  readonly id: CollateralId;
  readonly decimals: number;
  readonly safetyRatio: string;
  readonly active: boolean;
  readonly wrapped: boolean;
  readonly underlying: CollateralId | null;
  readonly price: string;
}

export interface SystemView {
  readonly tcr: string;
  readonly recoveryMode: boolean;
  readonly bootstrapPeriod: boolean;
  readonly totalValue: string;
  readonly totalDebt: string;
  readonly totalCollateral: readonly CollateralAmountRecord[];
  readonly troveCount: number;
  readonly baseRate: string;
  readonly borrowingRate: string;
  readonly redemptionRate: string;
  readonly collaterals: readonly CollateralView[];
}

export interface RedemptionView {
  readonly attempted: string;
  readonly redeemed: string;
  readonly fee: string;
  readonly collateral: readonly CollateralAmountRecord[];
  readonly trovesTouched: readonly string[];
  readonly baseRate: string;
}

export interface RedemptionHintsView {
  readonly firstHint: string | null;
  readonly partialHintICR: string;
  readonly truncatedAmount: string;
  /** Fee on the truncated amount at the current decayed rate, before the redemption raises it */
  readonly minimumFee: string;
}

export interface AccountView {
  readonly account: string;
  readonly stableBalance: string;
  readonly collateral: readonly CollateralAmountRecord[];
  readonly surplus: readonly CollateralAmountRecord[];
}

export interface SurplusClaimView {
  readonly owner: string;
  readonly collateral: readonly CollateralAmountRecord[];
}
