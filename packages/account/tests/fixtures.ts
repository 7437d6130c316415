/**
 * Shared fixtures for account tests.
 */

import { privateKeyToAccount } from "viem/accounts";
import {
  AlreadyInStateError,
  CallReverted,
  EMPTY_BYTES,
  InvariantViolation,
  VALIDATION_SUCCESS,
} from "@tessera/types";
import type {
  Address,
  AuthorizationRequest,
  CallContext,
  CallTarget,
  ChainId,
  Checkpointable,
  Hex,
  InvocationContext,
  Restore,
  ValidationCode,
  ValidationModule,
} from "@tessera/types";
import { defaultAuthorizationDigest, getRequestHash } from "../src/request-hash.js";

export const CHAIN_ID: ChainId = 31337;

export const ALICE: Address = "0x1000000000000000000000000000000000000001";
export const BOB: Address = "0x2000000000000000000000000000000000000002";
export const COUNTER: Address = "0x3000000000000000000000000000000000000003";
export const DISPATCHER: Address = "0x5000000000000000000000000000000000000005";
export const ACCOUNT: Address = "0x6000000000000000000000000000000000000006";
export const MODULE: Address = "0x7000000000000000000000000000000000000007";

const SIGNER_KEY: Hex = `0x${"11".repeat(32)}`;
export const signer = privateKeyToAccount(SIGNER_KEY);

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
 * Sign `request` for the default arm of `account` and return the signed
 * request together with its hash.
 */
export async function signForDefault(
  request: AuthorizationRequest,
  dispatcher: Address = DISPATCHER,
  account: Address = ACCOUNT,
): Promise<{ request: AuthorizationRequest; requestHash: Hex }> {
  const requestHash = getRequestHash(request, dispatcher, CHAIN_ID);
  const signature = await signer.signMessage({
    message: { raw: defaultAuthorizationDigest(requestHash, account, CHAIN_ID) },
  });
  return { request: { ...request, signature }, requestHash };
}

/**
 * Module with a scripted decision that records every hook call.
 */
export class StubModule implements ValidationModule {
  code: ValidationCode = VALIDATION_SUCCESS;
  failInstall = false;
  failUninstall = false;
  failExecuted = false;
  readonly installs: { caller: Address; data: Hex }[] = [];
  readonly uninstalls: { caller: Address; data: Hex }[] = [];
  readonly decisions: { caller: Address; requestHash: Hex }[] = [];
  readonly executions: { caller: Address; nonce: bigint }[] = [];

  constructor(readonly address: Address = MODULE) {}

  onInstall(ctx: InvocationContext, data: Hex): void {
    if (this.failInstall) {
      throw new InvariantViolation("install refused");
    }
    this.installs.push({ caller: ctx.caller, data });
  }

  onUninstall(ctx: InvocationContext, data: Hex): void {
    if (this.failUninstall) {
      throw new InvariantViolation("uninstall refused");
    }
    this.uninstalls.push({ caller: ctx.caller, data });
  }

  decide(ctx: InvocationContext, _request: AuthorizationRequest, requestHash: Hex): ValidationCode {
    this.decisions.push({ caller: ctx.caller, requestHash });
    return this.code;
  }

  onExecuted(ctx: InvocationContext, request: AuthorizationRequest): void {
    if (this.failExecuted) {
      throw new AlreadyInStateError("execution refused");
    }
    this.executions.push({ caller: ctx.caller, nonce: request.nonce });
  }
}

/**
 * Counts calls and returns `0x2a`. `0xff` reverts with `0x0badc0de`.
 */
export class Counter implements CallTarget, Checkpointable {
  count = 0;
  lastCaller: Address | undefined;

  constructor(readonly address: Address = COUNTER) {}

  handleCall(ctx: CallContext, data: Hex): Hex {
    this.count++;
    this.lastCaller = ctx.caller;
    if (data === "0xff") {
      throw new CallReverted("0x0badc0de");
    }
    return "0x2a";
  }

  checkpoint(): Restore {
    const saved = this.count;
    const caller = this.lastCaller;
    return () => {
      this.count = saved;
      this.lastCaller = caller;
    };
  }
}
