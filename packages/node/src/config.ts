/**
 * @splitpact/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { getAddress, isAddress } from "viem";
import { z } from "zod";
import type { SigningDomainInput } from "@splitpact/signing";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // EIP-712 domain
  DOMAIN_NAME: z.string().min(1).default("splitpact"),
  DOMAIN_VERSION: z.string().min(1).default("1"),
  CHAIN_ID: z.coerce.number().int().positive().default(1),

  // Verifying contract, and the spender participants grant allowances to
  COORDINATOR_ADDRESS: z
    .string()
    .refine((v) => isAddress(v, { strict: false }), {
      message: "COORDINATOR_ADDRESS must be a 20-byte hex address",
    })
    .transform((v) => getAddress(v)),
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
 * The signing domain described by a configuration.
 */
export function domainFromConfig(config: AppConfig): SigningDomainInput {
  return {
    name: config.DOMAIN_NAME,
    version: config.DOMAIN_VERSION,
    chainId: config.CHAIN_ID,
    verifyingContract: config.COORDINATOR_ADDRESS,
  };
}
