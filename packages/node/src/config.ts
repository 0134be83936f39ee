/**
 * @ballast/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Protocol parameters are decimal strings ("1.1" for 110%); collateral
 * types are seeded from the COLLATERALS JSON array.
 */

import { z } from "zod";
import { parseDecimal } from "@ballast/ledger";
import type { ProtocolParameters } from "@ballast/protocol";

// =============================================================================
// Shared Schemas
// =============================================================================

const DecimalString = z
  .string()
  .trim()
  .regex(/^\d+(\.\d{1,18})?$/, "Expected a non-negative decimal with at most 18 places")
  .transform((value) => parseDecimal(value));

export const FeeCurveSchema = z.object({
  m1: DecimalString.default("0"),
  b1: DecimalString.default("0.005"),
  cutoff1: DecimalString.default("0.5"),
  m2: DecimalString.default("0"),
  cutoff2: DecimalString.default("0.8"),
  m3: DecimalString.default("0"),
  dollarCap: DecimalString.default("0"),
  decayWindow: z.number().int().min(1).default(3600),
});

export const CollateralSeedSchema = z.object({
  id: z.string().min(1),
  decimals: z.number().int().min(0).max(36),
  /** USD per whole unit */
  price: DecimalString,
  safetyRatio: DecimalString.default("1"),
  active: z.boolean().default(true),
  wrapped: z.boolean().default(false),
  underlying: z.string().min(1).optional(),
  feeCurve: FeeCurveSchema.default({}),
});

export type CollateralSeed = z.output<typeof CollateralSeedSchema>;

const CollateralsJson = z
  .string()
  .default("[]")
  .transform((raw, ctx): unknown => {
    try {
      return JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "COLLATERALS must be valid JSON" });
      return z.NEVER;
    }
  })
  .pipe(z.array(CollateralSeedSchema));

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Protocol parameters
  MCR: DecimalString.optional(),
  CCR: DecimalString.optional(),
  LIQUIDATION_RESERVE: DecimalString.optional(),
  MIN_NET_DEBT: DecimalString.optional(),
  BOOTSTRAP_PERIOD_SECONDS: z.coerce.number().int().min(0).default(14 * 24 * 60 * 60),

  COLLATERALS: CollateralsJson,
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Parameter overrides named by the config. Unset values keep the
 * protocol defaults.
 */
export function protocolParameters(config: AppConfig): Partial<ProtocolParameters> {
  return {
    ...(config.MCR !== undefined ? { mcr: config.MCR } : {}),
    ...(config.CCR !== undefined ? { ccr: config.CCR } : {}),
    ...(config.LIQUIDATION_RESERVE !== undefined
      ? { liquidationReserve: config.LIQUIDATION_RESERVE }
      : {}),
    ...(config.MIN_NET_DEBT !== undefined ? { minNetDebt: config.MIN_NET_DEBT } : {}),
    bootstrapPeriod: config.BOOTSTRAP_PERIOD_SECONDS,
  };
}
