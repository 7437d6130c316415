/**
 * Authorization Request Types
 *
 * The envelope a Trusted Dispatcher hands to an account for validation.
 * The core reads `callData` (routing key + payload), `signature` (approval
 * blob) and `nonce`; every budget and fee field passes through untouched.
 */

import type { Address, Hex } from "./chain.js";

export interface AuthorizationRequest {
  /** Account the request targets */
  readonly sender: Address;

  /** Account sequence number the request was built against */
  readonly nonce: bigint;

  /** Account initialization payload (empty for deployed accounts) */
  readonly initCode: Hex;

  /** Routing key followed by the call payload */
  readonly callData: Hex;

  readonly callGasLimit: bigint;
  readonly verificationGasLimit: bigint;
  readonly preVerificationGas: bigint;
  readonly maxFeePerGas: bigint;
  readonly maxPriorityFeePerGas: bigint;

  /** Auxiliary sponsor payload */
  readonly paymasterAndData: Hex;

  /** Signature or module-specific approval blob */
  readonly signature: Hex;
}

// =============================================================================
// Validation codes
// =============================================================================

/**
 * Flat validation taxonomy: `0` accepts, any other value rejects.
 */
export type ValidationCode = number;

export const VALIDATION_SUCCESS = 0;
export const VALIDATION_FAILED = 1;

export function isAccepted(code: ValidationCode): boolean {
  return code === VALIDATION_SUCCESS;
}
