/**
 * @tandem/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { AssetPair } from "@tandem/types";
import type { VaultConfig } from "@tandem/vault";
import { MAX_SWAP_DEADLINE_MS } from "@tandem/vault";

// =============================================================================
// Schema
// =============================================================================

const identity = (fallback: string) => z.string().trim().min(1).default(fallback);

const integerString = z.string().regex(/^\d+$/, "Expected a non-negative integer");

export const ConfigSchema = z
  .object({
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Asset pair
    PRIMARY_SYMBOL: z.string().trim().min(1).default("ETH"),
    PRIMARY_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
    SECONDARY_SYMBOL: z.string().trim().min(1).default("BTC"),
    SECONDARY_DECIMALS: z.coerce.number().int().min(0).max(36).default(8),
    /** Whole primary units per whole secondary unit */
    SECONDARY_PRICE: z
      .string()
      .regex(/^\d+(\.\d{1,18})?$/, "Expected a decimal price with at most 18 fractional digits")
      .default("15"),

    // Fees
    FEE_RATE: integerString.default("10").transform((v) => BigInt(v)),
    FEE_DENOMINATOR: integerString.default("1000").transform((v) => BigInt(v)),

    // Rebalancing
    SWAP_DEADLINE_MS: z.coerce.number().int().min(1).max(MAX_SWAP_DEADLINE_MS).default(900_000),
    ALLOW_UNBOUNDED_SLIPPAGE: z
      .enum(["true", "false"])
      .default("false")
      .transform((v) => v === "true"),

    // Roles
    OWNER_ID: identity("owner"),
    MANAGER_ID: identity("manager"),
    TREASURY_ID: identity("treasury"),
  })
  .superRefine((config, ctx) => {
    if (config.PRIMARY_SYMBOL === config.SECONDARY_SYMBOL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SECONDARY_SYMBOL"],
        message: "Primary and secondary symbols must differ",
      });
    }
    if (config.FEE_DENOMINATOR === 0n || config.FEE_RATE > config.FEE_DENOMINATOR) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FEE_RATE"],
        message: "FEE_RATE must not exceed a positive FEE_DENOMINATOR",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Mapping
// =============================================================================

export function assetPairOf(config: AppConfig): AssetPair {
  return {
    primary: { symbol: config.PRIMARY_SYMBOL, decimals: config.PRIMARY_DECIMALS },
    secondary: { symbol: config.SECONDARY_SYMBOL, decimals: config.SECONDARY_DECIMALS },
  };
}

export function vaultConfigOf(config: AppConfig): VaultConfig {
  return {
    roles: {
      owner: config.OWNER_ID,
      manager: config.MANAGER_ID,
      treasury: config.TREASURY_ID,
    },
    feeRate: config.FEE_RATE,
    feeDenominator: config.FEE_DENOMINATOR,
    swapDeadlineMs: config.SWAP_DEADLINE_MS,
    allowUnboundedSlippage: config.ALLOW_UNBOUNDED_SLIPPAGE,
  };
}
