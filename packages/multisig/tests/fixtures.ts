/**
 * Shared fixtures for Approval Engine tests.
 */

import { privateKeyToAccount } from "viem/accounts";
import { CallReverted, EMPTY_BYTES } from "@tessera/types";
import type {
  Address,
  AuthorizationRequest,
  CallContext,
  CallResult,
  CallTarget,
  ChainId,
  Checkpointable,
  Hex,
  InvocationContext,
  ModuleExecutor,
  Restore,
} from "@tessera/types";
import { defaultAuthorizationDigest, getRequestHash } from "@tessera/account";

export const CHAIN_ID: ChainId = 31337;

export const OWNER_A: Address = "0x1111111111111111111111111111111111111111";
export const OWNER_B: Address = "0x2222222222222222222222222222222222222222";
export const OWNER_C: Address = "0x3333333333333333333333333333333333333333";
export const OWNER_D: Address = "0x4444444444444444444444444444444444444444";
export const DISPATCHER: Address = "0x5000000000000000000000000000000000000005";
export const ACCOUNT: Address = "0x6000000000000000000000000000000000000006";
export const ENGINE: Address = "0x7000000000000000000000000000000000000007";
export const TARGET: Address = "0x8000000000000000000000000000000000000008";
export const STRANGER: Address = "0x9000000000000000000000000000000000000009";
export const SECOND_ACCOUNT: Address = "0x6000000000000000000000000000000000000066";

export const FIXED_TIME = new Date("2026-05-01T09:30:00.000Z");

/**
 * Module executor that records every call and answers with `result`, or
 * throws `refusal` when one is set.
 */
export class RecordingExecutor implements ModuleExecutor {
  readonly calls: { caller: Address; target: Address; value: bigint; data: Hex }[] = [];
  result: CallResult = { success: true, returnData: EMPTY_BYTES };
  refusal: Error | undefined;

  constructor(readonly address: Address = ACCOUNT) {}

  executeFromModule(ctx: InvocationContext, target: Address, value: bigint, data: Hex): CallResult {
    if (this.refusal !== undefined) {
      throw this.refusal;
    }
    this.calls.push({ caller: ctx.caller, target, value, data });
    return this.result;
  }
}

/**
 * Counts successful calls; reverts with `0x0badc0de` while `failing`.
 */
export class Counter implements CallTarget, Checkpointable {
  count = 0;
  failing = false;

  constructor(readonly address: Address = TARGET) {}

  handleCall(_ctx: CallContext, _data: Hex): Hex {
    this.count++;
    if (this.failing) {
      throw new CallReverted("0x0badc0de");
    }
    return "0x2a";
  }

  checkpoint(): Restore {
    const saved = this.count;
    return () => {
      this.count = saved;
    };
  }
}

// =============================================================================
// Requests
// =============================================================================

const SIGNER_KEY: Hex = `0x${"22".repeat(32)}`;
const signer = privateKeyToAccount(SIGNER_KEY);

export function buildRequest(overrides: Partial<AuthorizationRequest> = {}): AuthorizationRequest {
  return {
    sender: ACCOUNT,
    nonce: 0n,
    initCode: EMPTY_BYTES,
    callData: EMPTY_BYTES,
    callGasLimit: 0n,
    verificationGasLimit: 0n,
    preVerificationGas: 0n,
    maxFeePerGas: 0n,
    maxPriorityFeePerGas: 0n,
    paymasterAndData: EMPTY_BYTES,
    signature: EMPTY_BYTES,
    ...overrides,
  };
}

/**
 * Sign `request` for the account's default arm.
 */
export async function signForDefault(request: AuthorizationRequest): Promise<AuthorizationRequest> {
  const requestHash = getRequestHash(request, DISPATCHER, CHAIN_ID);
  const signature = await signer.signMessage({
    message: { raw: defaultAuthorizationDigest(requestHash, request.sender, CHAIN_ID) },
  });
  return { ...request, signature };
}
