/**
 * Request/Response DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body, param and query validation.
 */

import { getAddress, isAddress, isHex } from "viem";
import { z } from "zod";
import type { Hex } from "@tessera/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), "Invalid address")
  .transform((value) => getAddress(value));

export const HexSchema = z
  .string()
  .refine(
    (value): value is Hex => isHex(value, { strict: true }) && value.length % 2 === 0,
    "Expected 0x-prefixed hex bytes",
  );

/** Unsigned integer carried as a decimal string */
export const UintSchema = z
  .string()
  .regex(/^\d+$/, "Expected a decimal integer string")
  .transform((value) => BigInt(value));

export const TransactionIdSchema = z
  .string()
  .regex(/^\d+$/, "Expected a transaction id")
  .transform((value) => Number(value))
  .refine((value) => Number.isSafeInteger(value), "Transaction id out of range");

// =============================================================================
// Account DTOs
// =============================================================================

export const OpenAccountSchema = z.object({
  address: AddressSchema,
  balance: UintSchema.optional(),
});

export type OpenAccountDto = z.infer<typeof OpenAccountSchema>;

export const ListTransactionsQuerySchema = z.object({
  status: z.enum(["pending", "executed", "all"]).default("all"),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

// =============================================================================
// Request DTOs
// =============================================================================

export const AuthorizationRequestSchema = z.object({
  sender: AddressSchema,
  nonce: UintSchema,
  initCode: HexSchema.default("0x"),
  callData: HexSchema,
  callGasLimit: UintSchema.default("0"),
  verificationGasLimit: UintSchema.default("0"),
  preVerificationGas: UintSchema.default("0"),
  maxFeePerGas: UintSchema.default("0"),
  maxPriorityFeePerGas: UintSchema.default("0"),
  paymasterAndData: HexSchema.default("0x"),
  signature: HexSchema,
});

export type AuthorizationRequestDto = z.infer<typeof AuthorizationRequestSchema>;

export const SubmitRequestsSchema = z.object({
  requests: z.array(AuthorizationRequestSchema).min(1).max(32),
});

export type SubmitRequestsDto = z.infer<typeof SubmitRequestsSchema>;
