/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tessera types, used at boundaries where a value
 * arrives untyped (deployed targets looked up by address, decoded payloads,
 * API input).
 */

import type { Address, Hex } from "./chain.js";
import type { AuthorizationRequest } from "./request.js";
import type { CallTarget, Checkpointable, ModuleExecutor } from "./call.js";
import type { ValidationModule } from "./module.js";
import { EngineError } from "./errors.js";

// =============================================================================
// Primitives
// =============================================================================

const HEX_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;
const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/** Even-length 0x-prefixed hex. */
export function isHex(value: unknown): value is Hex {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

/** Shape check only; checksum validation belongs to viem. */
export function isAddressLike(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// =============================================================================
// Request
// =============================================================================

const BIGINT_FIELDS = [
  "nonce",
  "callGasLimit",
  "verificationGasLimit",
  "preVerificationGas",
  "maxFeePerGas",
  "maxPriorityFeePerGas",
] as const;

const HEX_FIELDS = ["initCode", "callData", "paymasterAndData", "signature"] as const;

export function isAuthorizationRequest(value: unknown): value is AuthorizationRequest {
  if (!isRecord(value)) return false;
  if (!isAddressLike(value.sender)) return false;
  for (const field of BIGINT_FIELDS) {
    if (typeof value[field] !== "bigint") return false;
  }
  for (const field of HEX_FIELDS) {
    if (!isHex(value[field])) return false;
  }
  return true;
}

// =============================================================================
// Components
// =============================================================================

export function isCallTarget(value: unknown): value is CallTarget {
  return (
    isRecord(value) &&
    isAddressLike(value.address) &&
    typeof value.handleCall === "function"
  );
}

export function isCheckpointable(value: unknown): value is Checkpointable {
  return isRecord(value) && typeof value.checkpoint === "function";
}

export function isValidationModule(value: unknown): value is ValidationModule {
  return (
    isRecord(value) &&
    isAddressLike(value.address) &&
    typeof value.onInstall === "function" &&
    typeof value.onUninstall === "function" &&
    typeof value.decide === "function"
  );
}

export function isModuleExecutor(value: unknown): value is ModuleExecutor {
  return (
    isRecord(value) &&
    isAddressLike(value.address) &&
    typeof value.executeFromModule === "function"
  );
}

export function isEngineError(value: unknown): value is EngineError {
  return value instanceof EngineError;
}
