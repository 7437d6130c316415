/**
 * Approval Engine encodings.
 *
 * - install data:   abi.encode(address[] owners, uint256 threshold)
 * - approval blob:  abi.encode(uint256 transactionId, address[] signers)
 * - content hash:   keccak256(abi.encode(address target, uint256 value, bytes data))
 *
 * A request that executes a transaction carries
 * `MULTISIG_ROUTING_KEY ++ abi.encode(target, value, data)` as its call
 * data, so the content hash equals keccak256 of the payload behind the key.
 */

import {
  BaseError,
  decodeAbiParameters,
  encodeAbiParameters,
  keccak256,
  parseAbiParameters,
} from "viem";
import { InvariantViolation } from "@tessera/types";
import type { Address, Hex } from "@tessera/types";
import { encodeRoutedCall } from "@tessera/account";
import type { RoutingKey } from "@tessera/account";

export const MULTISIG_ROUTING_KEY: RoutingKey = "0x00000000";

const INSTALL_PARAMS = parseAbiParameters("address[] owners, uint256 threshold");
const APPROVAL_PARAMS = parseAbiParameters("uint256 transactionId, address[] signers");
const CONTENT_PARAMS = parseAbiParameters("address target, uint256 value, bytes data");

// =============================================================================
// Numbers
// =============================================================================

/**
 * Narrow a decoded uint256 to a safe integer.
 *
 * @throws InvariantViolation if the value does not fit
 */
export function toSafeInteger(value: bigint, label: string): number {
  if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new InvariantViolation(`${label} out of range: ${value}`);
  }
  return Number(value);
}

// =============================================================================
// Install data
// =============================================================================

export interface InstallData {
  readonly owners: readonly Address[];
  readonly threshold: number;
}

export function encodeInstallData(owners: readonly Address[], threshold: number | bigint): Hex {
  return encodeAbiParameters(INSTALL_PARAMS, [owners, BigInt(threshold)]);
}

/**
 * @throws InvariantViolation if `data` is not (address[], uint256)
 */
export function decodeInstallData(data: Hex): InstallData {
  const [owners, threshold] = decodeOrThrow("install data", () =>
    decodeAbiParameters(INSTALL_PARAMS, data),
  );
  return { owners, threshold: toSafeInteger(threshold, "Threshold") };
}

// =============================================================================
// Approval blob
// =============================================================================

export interface Approval {
  readonly transactionId: number;
  readonly signers: readonly Address[];
}

export function encodeApproval(transactionId: number | bigint, signers: readonly Address[]): Hex {
  return encodeAbiParameters(APPROVAL_PARAMS, [BigInt(transactionId), signers]);
}

/**
 * @throws InvariantViolation if `blob` is not (uint256, address[])
 */
export function decodeApproval(blob: Hex): Approval {
  const [transactionId, signers] = decodeOrThrow("approval", () =>
    decodeAbiParameters(APPROVAL_PARAMS, blob),
  );
  return { transactionId: toSafeInteger(transactionId, "Transaction id"), signers };
}

// =============================================================================
// Content binding
// =============================================================================

export function computeContentHash(target: Address, value: bigint, data: Hex): Hex {
  return keccak256(encodeAbiParameters(CONTENT_PARAMS, [target, value, data]));
}

/**
 * Call data for a request that executes `(target, value, data)` through
 * the engine installed under `key`.
 */
export function encodeTransactionCall(
  target: Address,
  value: bigint,
  data: Hex,
  key: RoutingKey = MULTISIG_ROUTING_KEY,
): Hex {
  return encodeRoutedCall(key, target, value, data);
}

// =============================================================================
// Private
// =============================================================================

function decodeOrThrow<T>(label: string, decode: () => T): T {
  try {
    return decode();
  } catch (err) {
    if (err instanceof BaseError) {
      throw new InvariantViolation(`Malformed ${label}: ${err.shortMessage}`);
    }
    throw err;
  }
}
