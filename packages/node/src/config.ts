/**
 * @tessera/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { getAddress, isAddress } from "viem";
import { z } from "zod";
import type { Address } from "@tessera/types";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "Invalid address")
  .transform((value) => getAddress(value));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Chain
  CHAIN_ID: z.coerce.number().int().positive().default(11155111),
  DISPATCHER_ADDRESS: AddressSchema.default("0x5FF137D4b0FDCD49DcA30c7CF57E578a026d2789"),
  ENGINE_ADDRESS: AddressSchema.default("0x7000000000000000000000000000000000000007"),

  // Accounts opened at startup
  ACCOUNTS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Account Parsing
// =============================================================================

export interface ParsedAccount {
  readonly address: Address;
  readonly balance: bigint;
}

/**
 * Parse the ACCOUNTS env var into accounts to open at startup.
 *
 * Format: "address1:balance1,address2" (balance in wei, default 0)
 */
export function parseAccounts(raw: string): readonly ParsedAccount[] {
  if (raw.trim() === "") {
    return [];
  }

  const accounts: ParsedAccount[] = [];
  const seen = new Set<Address>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length > 2) {
      throw new Error(
        `Invalid ACCOUNTS entry: "${entry.trim()}". Expected format: address[:balance]`,
      );
    }

    const rawAddress = parts[0] ?? "";
    const rawBalance = parts.length === 2 ? parts[1] : undefined;
    if (!isAddress(rawAddress, { strict: false })) {
      throw new Error(`Invalid account address in ACCOUNTS: "${rawAddress}"`);
    }
    if (rawBalance !== undefined && !/^\d+$/.test(rawBalance)) {
      throw new Error(`Invalid balance "${rawBalance}" in ACCOUNTS. Must be a whole number of wei`);
    }

    const address = getAddress(rawAddress);
    if (seen.has(address)) {
      throw new Error(`Duplicate account in ACCOUNTS: ${address}`);
    }
    seen.add(address);
    accounts.push({ address, balance: BigInt(rawBalance ?? "0") });
  }

  return accounts;
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
