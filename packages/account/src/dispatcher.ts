/**
 * In-Process Dispatcher
 *
 * The trusted dispatcher accounts are bound to: it hashes requests, keeps
 * per-account deposits, asks each account to authorize its request (paying
 * any prefund shortfall) and then executes accepted requests.
 *
 * Requests are handled one at a time, in order, and batches run one after
 * another in submission order even when submitted concurrently. Each
 * request yields exactly one receipt; a failing request never affects the
 * ones after it.
 */

import { decodeFunctionData, encodeFunctionData, getAddress, isAddressEqual, size } from "viem";
import {
  AlreadyInStateError,
  EMPTY_BYTES,
  ForwardedCallFailure,
  InvariantViolation,
  isEngineError,
} from "@tessera/types";
import type {
  Address,
  AuthorizationRequest,
  CallContext,
  CallTarget,
  ChainId,
  Checkpointable,
  EngineErrorCode,
  ExecutionHost,
  Hex,
  Restore,
  ValidationCode,
} from "@tessera/types";
import { describeRevert, toRevertData } from "@tessera/host";
import { dispatcherAbi } from "./abi.js";
import { getRequestHash } from "./request-hash.js";
import type { AccountRouter } from "./router.js";
import type { AuthorizationOutcome } from "./types.js";

// =============================================================================
// Types
// =============================================================================

interface ReceiptBase {
  readonly requestHash: Hex;
  readonly sender: Address;
  readonly nonce: bigint;
}

export type RequestReceipt =
  | (ReceiptBase & { readonly status: "executed"; readonly returnData: readonly Hex[] })
  | (ReceiptBase & { readonly status: "rejected"; readonly code: ValidationCode })
  | (ReceiptBase & {
      readonly status: "reverted";
      readonly reason: string;
      readonly revertData: Hex;
    })
  | (ReceiptBase & {
      readonly status: "invalid";
      readonly errorCode: EngineErrorCode;
      readonly reason: string;
    });

export type RequestStatus = RequestReceipt["status"];

export interface InProcessDispatcherConfig {
  readonly address: Address;
  readonly chainId: ChainId;
  readonly host: ExecutionHost;

  /** Receives every receipt as it is produced */
  readonly onReceipt?: (receipt: RequestReceipt) => void;
}

// =============================================================================
// Dispatcher
// =============================================================================

export class InProcessDispatcher implements CallTarget, Checkpointable {
  readonly address: Address;
  readonly chainId: ChainId;

  private readonly host: ExecutionHost;
  private readonly onReceipt: ((receipt: RequestReceipt) => void) | undefined;
  private readonly routers = new Map<Address, AccountRouter>();
  private deposits = new Map<Address, bigint>();
  private queue: Promise<unknown> = Promise.resolve();

  constructor(config: InProcessDispatcherConfig) {
    this.address = getAddress(config.address);
    this.chainId = config.chainId;
    this.host = config.host;
    this.onReceipt = config.onReceipt;
  }

  /**
   * Make an account reachable by its requests.
   *
   * @throws InvariantViolation if the account trusts another dispatcher
   * @throws AlreadyInStateError if the account is already registered
   */
  register(router: AccountRouter): void {
    if (!isAddressEqual(router.dispatcher, this.address)) {
      throw new InvariantViolation(
        `Account ${router.address} trusts dispatcher ${router.dispatcher}, not ${this.address}`,
      );
    }
    if (this.routers.has(router.address)) {
      throw new AlreadyInStateError(`Account ${router.address} is already registered`);
    }
    this.routers.set(router.address, router);
  }

  getRequestHash(request: AuthorizationRequest): Hex {
    return getRequestHash(request, this.address, this.chainId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposits
  // ───────────────────────────────────────────────────────────────────────

  getDeposit(account: Address): bigint {
    return this.deposits.get(getAddress(account)) ?? 0n;
  }

  /**
   * Move `amount` from `from` into the deposit held for `account`.
   *
   * @throws ForwardedCallFailure if the transfer fails
   */
  depositTo(from: Address, account: Address, amount: bigint): void {
    const data = encodeFunctionData({
      abi: dispatcherAbi,
      functionName: "depositTo",
      args: [account],
    });
    const result = this.host.call(from, this.address, amount, data);
    if (!result.success) {
      throw new ForwardedCallFailure(
        `Deposit for ${account} failed: ${describeRevert(result.revertData)}`,
        result.revertData,
      );
    }
  }

  /**
   * Balance a request must have on deposit to cover its budgets.
   */
  requiredPrefund(request: AuthorizationRequest): bigint {
    const gas = request.callGasLimit + request.verificationGasLimit + request.preVerificationGas;
    return gas * request.maxFeePerGas;
  }

  /**
   * What the account still owes before its request can be handled.
   */
  getShortfall(request: AuthorizationRequest): bigint {
    const missing = this.requiredPrefund(request) - this.getDeposit(request.sender);
    return missing > 0n ? missing : 0n;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Request handling
  // ───────────────────────────────────────────────────────────────────────

  handleRequests(requests: readonly AuthorizationRequest[]): Promise<readonly RequestReceipt[]> {
    const batch = this.queue.then(() => this.runBatch(requests));
    // The queue only orders batches; failures reach the batch's own caller.
    this.queue = batch.then(
      () => undefined,
      () => undefined,
    );
    return batch;
  }

  private async runBatch(requests: readonly AuthorizationRequest[]): Promise<readonly RequestReceipt[]> {
    const receipts: RequestReceipt[] = [];
    for (const request of requests) {
      const receipt = await this.handleRequest(request);
      this.onReceipt?.(receipt);
      receipts.push(receipt);
    }
    return receipts;
  }

  private async handleRequest(request: AuthorizationRequest): Promise<RequestReceipt> {
    const requestHash = this.getRequestHash(request);
    const base: ReceiptBase = { requestHash, sender: request.sender, nonce: request.nonce };

    const router = this.routers.get(getAddress(request.sender));
    if (router === undefined) {
      return {
        ...base,
        status: "invalid",
        errorCode: "NOT_FOUND",
        reason: `No account registered at ${request.sender}`,
      };
    }

    const shortfall = this.getShortfall(request);
    let outcome: AuthorizationOutcome;
    try {
      outcome = await router.authorize({ caller: this.address }, request, requestHash, shortfall);
    } catch (err) {
      if (isEngineError(err)) {
        return { ...base, status: "invalid", errorCode: err.code, reason: err.message };
      }
      throw err;
    }

    this.credit(router.address, shortfall);
    if (!outcome.accepted) {
      return { ...base, status: "rejected", code: outcome.code };
    }

    try {
      const returnData = router.executeAuthorized(outcome.grant);
      return { ...base, status: "executed", returnData };
    } catch (err) {
      if (isEngineError(err)) {
        const revertData = toRevertData(err);
        return { ...base, status: "reverted", reason: describeRevert(revertData), revertData };
      }
      throw err;
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Call surface
  // ───────────────────────────────────────────────────────────────────────

  handleCall(ctx: CallContext, data: Hex): Hex {
    if (size(data) === 0) {
      return EMPTY_BYTES;
    }

    const decoded = decodeFunctionData({ abi: dispatcherAbi, data });
    switch (decoded.functionName) {
      case "depositTo": {
        const [account] = decoded.args;
        this.credit(account, ctx.value);
        return EMPTY_BYTES;
      }
      case "withdrawTo": {
        const [recipient, amount] = decoded.args;
        this.withdraw(ctx.caller, recipient, amount);
        return EMPTY_BYTES;
      }
    }
  }

  checkpoint(): Restore {
    const deposits = new Map(this.deposits);
    return () => {
      this.deposits = deposits;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private credit(account: Address, amount: bigint): void {
    if (amount === 0n) return;
    const key = getAddress(account);
    this.deposits.set(key, this.getDeposit(key) + amount);
  }

  private withdraw(account: Address, recipient: Address, amount: bigint): void {
    const available = this.getDeposit(account);
    if (available < amount) {
      throw new InvariantViolation(
        `Withdrawal of ${amount} exceeds deposit of ${available} for ${account}`,
      );
    }
    this.deposits.set(getAddress(account), available - amount);
    const result = this.host.transfer(this.address, recipient, amount);
    if (!result.success) {
      throw new ForwardedCallFailure(
        `Withdrawal to ${recipient} failed: ${describeRevert(result.revertData)}`,
        result.revertData,
      );
    }
  }
}
