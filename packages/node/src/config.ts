/**
 * @granary/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Asset and pool definitions live in a JSON file named by ASSETS_FILE.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import type { GranaryServiceConfig } from "./services/granary-service.js";

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

  // Domain
  ASSETS_FILE: z.string().optional(),
  MAX_SLIPPAGE_BPS: z.coerce.number().int().min(0).max(10000).default(100),

  // Idempotency
  IDEMPOTENCY_TTL_MS: z.coerce.number().int().min(1000).default(86400000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Assets File
// =============================================================================

const UnitsString = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer string")
  .transform((v) => BigInt(v));

export const AssetsFileSchema = z.object({
  assets: z
    .array(
      z.object({
        id: z.string().min(1),
        kind: z.enum(["base", "poolShare"]),
        rewardRate: UnitsString,
        maturityWindow: UnitsString,
      }),
    )
    .min(1),
  pools: z
    .array(
      z.object({
        asset: z.string().min(1),
        baseReserve: UnitsString,
        pairedReserve: UnitsString,
        shareSupply: UnitsString,
        pairedPrice: UnitsString,
      }),
    )
    .default([]),
});

export type AssetsFile = z.infer<typeof AssetsFileSchema>;

/**
 * Parse asset and pool definitions from JSON text.
 *
 * @throws {SyntaxError} on malformed JSON
 * @throws {z.ZodError} on a well-formed file with invalid contents
 */
export function parseAssetsFile(raw: string): AssetsFile {
  const json: unknown = JSON.parse(raw);
  return AssetsFileSchema.parse(json);
}

export function loadAssetsFile(path: string): AssetsFile {
  return parseAssetsFile(readFileSync(path, "utf8"));
}

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
 * Combine env config and asset definitions into the service config.
 */
export function toServiceConfig(config: AppConfig, assets: AssetsFile): GranaryServiceConfig {
  return {
    assets: assets.assets,
    pools: assets.pools,
    maxSlippageBps: config.MAX_SLIPPAGE_BPS,
  };
}
