/**
 * Approval Engine
 *
 * Multi-owner threshold approval, installable on any number of accounts.
 * One engine instance keeps a separate configuration and transaction
 * ledger per account, keyed by the account that installed it.
 *
 * Per transaction:
 *   Proposed → Executable (confirmations ≥ threshold) → Executed
 * with a failed execution falling back to Executable. A transaction is
 * executed either directly (`executeTransaction`) or by an accepted routed
 * request (`onExecuted`), never both.
 *
 * Every operation validates before it mutates, so a failing operation
 * leaves no partial state behind.
 */

import {
  decodeFunctionData,
  encodeFunctionResult,
  getAddress,
  isAddressEqual,
  keccak256,
  size,
} from "viem";
import {
  AlreadyInStateError,
  AuthorizationError,
  EMPTY_BYTES,
  EngineError,
  IntegrityMismatch,
  InvariantViolation,
  NotFoundError,
  VALIDATION_FAILED,
  VALIDATION_SUCCESS,
  ZERO_ADDRESS,
} from "@tessera/types";
import type {
  Address,
  AuthorizationRequest,
  CallContext,
  CallResult,
  CallTarget,
  Checkpointable,
  Hex,
  InvocationContext,
  ModuleExecutor,
  Restore,
  ValidationCode,
  ValidationModule,
} from "@tessera/types";
import { payloadAfterKey } from "@tessera/account";
import { approvalEngineAbi } from "./abi.js";
import {
  computeContentHash,
  decodeApproval,
  decodeInstallData,
  toSafeInteger,
} from "./encoding.js";
import { ApprovalLedger, ApprovalStore } from "./store.js";
import type {
  ApprovalConfig,
  ApprovalEngineOptions,
  ApprovalEvent,
  ApprovalLifecycle,
  ExecutionOutcome,
  TransactionRecord,
} from "./types.js";

// =============================================================================
// Approval Engine
// =============================================================================

export class ApprovalEngine implements ValidationModule, CallTarget, Checkpointable {
  readonly address: Address;

  private readonly store = new ApprovalStore();
  private readonly resolveExecutor: ((account: Address) => ModuleExecutor | undefined) | undefined;
  private readonly onEvent: ((event: ApprovalEvent) => void) | undefined;
  private readonly clock: () => Date;

  constructor(options: ApprovalEngineOptions) {
    this.address = getAddress(options.address);
    this.resolveExecutor = options.resolveExecutor;
    this.onEvent = options.onEvent;
    this.clock = options.clock ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Initialize the calling account from `abi.encode(address[] owners,
   * uint256 threshold)`.
   *
   * @throws AlreadyInStateError if the account is already initialized
   * @throws InvariantViolation for malformed data, a duplicate or zero
   *   owner, or a threshold outside 1..owners
   */
  onInstall(ctx: InvocationContext, data: Hex): void {
    const account = getAddress(ctx.caller);
    if (this.store.lifecycle(account) === "active") {
      throw new AlreadyInStateError(`Approval configuration for ${account} is already initialized`);
    }

    const { owners, threshold } = decodeInstallData(data);
    const normalized = owners.map((owner) => getAddress(owner));
    const seen = new Set<Address>();
    for (const owner of normalized) {
      if (isAddressEqual(owner, ZERO_ADDRESS)) {
        throw new InvariantViolation("Owner must not be the zero address");
      }
      if (seen.has(owner)) {
        throw new InvariantViolation(`Duplicate owner: ${owner}`);
      }
      seen.add(owner);
    }
    assertThreshold(threshold, normalized.length);

    this.store.activate(account, ApprovalLedger.create(normalized, threshold));
    this.emit({
      type: "installed",
      account,
      owners: normalized,
      threshold,
      timestamp: this.now(),
    });
  }

  /**
   * Tear down everything the calling account owns. A later install starts
   * again from transaction 0.
   *
   * @throws NotFoundError if the account is not initialized
   */
  onUninstall(ctx: InvocationContext, _data: Hex): void {
    const account = getAddress(ctx.caller);
    this.store.clear(account);
    this.emit({ type: "uninstalled", account, timestamp: this.now() });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Propose a call from `account` and confirm it for the submitter.
   *
   * @returns The new transaction id
   */
  submitTransaction(
    ctx: InvocationContext,
    account: Address,
    target: Address,
    value: bigint,
    data: Hex,
  ): number {
    const { ledger, caller } = this.ownerContext(ctx, account);
    if (isAddressEqual(target, ZERO_ADDRESS)) {
      throw new InvariantViolation("Transaction target must not be the zero address");
    }
    if (value < 0n) {
      throw new InvariantViolation(`Transaction value must not be negative: ${value}`);
    }

    const normalizedTarget = getAddress(target);
    const contentHash = computeContentHash(normalizedTarget, value, data);
    const id = ledger.addTransaction({
      target: normalizedTarget,
      value,
      data,
      contentHash,
      createdAt: this.now(),
    });
    ledger.confirm(id, caller);

    const accountKey = getAddress(account);
    this.emit({
      type: "transaction_submitted",
      account: accountKey,
      transactionId: id,
      submitter: caller,
      target: normalizedTarget,
      value,
      contentHash,
      timestamp: this.now(),
    });
    this.emit({
      type: "transaction_confirmed",
      account: accountKey,
      transactionId: id,
      owner: caller,
      timestamp: this.now(),
    });
    return id;
  }

  /**
   * @throws NotFoundError if the transaction does not exist
   * @throws AlreadyInStateError if it is executed or already confirmed by the caller
   */
  confirmTransaction(ctx: InvocationContext, account: Address, transactionId: number): void {
    const { ledger, caller } = this.ownerContext(ctx, account);
    this.assertUnexecuted(ledger, transactionId);
    if (ledger.hasConfirmed(transactionId, caller)) {
      throw new AlreadyInStateError(`Transaction ${transactionId} is already confirmed by ${caller}`);
    }

    ledger.confirm(transactionId, caller);
    this.emit({
      type: "transaction_confirmed",
      account: getAddress(account),
      transactionId,
      owner: caller,
      timestamp: this.now(),
    });
  }

  /**
   * @throws NotFoundError if the transaction does not exist or the caller has not confirmed it
   * @throws AlreadyInStateError if it is executed
   */
  revokeConfirmation(ctx: InvocationContext, account: Address, transactionId: number): void {
    const { ledger, caller } = this.ownerContext(ctx, account);
    this.assertUnexecuted(ledger, transactionId);
    if (!ledger.hasConfirmed(transactionId, caller)) {
      throw new NotFoundError(`Transaction ${transactionId} is not confirmed by ${caller}`);
    }

    ledger.revoke(transactionId, caller);
    this.emit({
      type: "confirmation_revoked",
      account: getAddress(account),
      transactionId,
      owner: caller,
      timestamp: this.now(),
    });
  }

  /**
   * Execute a transaction from its account once it has enough
   * confirmations.
   *
   * A failed call is returned, not thrown. It leaves the transaction
   * unexecuted with its confirmations intact, so it can be executed again.
   *
   * @throws InvariantViolation if confirmations are below the threshold
   * @throws NotFoundError if no executor is known for the account
   * @throws whatever the account raises when it refuses the call; the
   *   transaction then stays unexecuted
   */
  executeTransaction(
    ctx: InvocationContext,
    account: Address,
    transactionId: number,
  ): ExecutionOutcome {
    const { ledger, caller } = this.ownerContext(ctx, account);
    this.assertUnexecuted(ledger, transactionId);
    const confirmations = ledger.confirmationCount(transactionId);
    if (confirmations < ledger.threshold) {
      throw new InvariantViolation(
        `Transaction ${transactionId} has ${confirmations} of ${ledger.threshold} required confirmations`,
      );
    }
    const accountKey = getAddress(account);
    const executor = this.resolveExecutor?.(accountKey);
    if (executor === undefined) {
      throw new NotFoundError(`No executor for account ${accountKey}`);
    }

    const transaction = ledger.transaction(transactionId);
    const restore = this.store.checkpoint();
    ledger.setExecuted(transactionId, true);
    let result: CallResult;
    try {
      result = executor.executeFromModule(
        { caller: this.address },
        transaction.target,
        transaction.value,
        transaction.data,
      );
    } catch (err) {
      restore();
      throw err;
    }

    if (result.success) {
      this.emit({
        type: "transaction_executed",
        account: accountKey,
        transactionId,
        executor: caller,
        timestamp: this.now(),
      });
      return { status: "executed", transactionId, returnData: result.returnData };
    }

    // The failed call may have restored the store; look the ledger up again.
    this.store.require(accountKey).setExecuted(transactionId, false);
    this.emit({
      type: "execution_failed",
      account: accountKey,
      transactionId,
      executor: caller,
      revertData: result.revertData,
      timestamp: this.now(),
    });
    return { status: "failed", transactionId, revertData: result.revertData };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Decision
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Accept a request iff its approval blob names a pending transaction
   * whose content matches the request's payload and enough of the named
   * signers are confirming owners.
   */
  decide(
    ctx: InvocationContext,
    request: AuthorizationRequest,
    _requestHash: Hex,
  ): ValidationCode {
    try {
      this.assertApproved(ctx.caller, request);
      return VALIDATION_SUCCESS;
    } catch (err) {
      if (err instanceof EngineError) {
        return VALIDATION_FAILED;
      }
      throw err;
    }
  }

  /**
   * Consume the approval of a routed request the calling account has just
   * executed. Runs in the same step as the call, so a failure here undoes
   * the call.
   *
   * @throws AlreadyInStateError if the transaction was executed meanwhile
   */
  onExecuted(ctx: InvocationContext, request: AuthorizationRequest): void {
    const account = getAddress(ctx.caller);
    this.assertApproved(account, request);
    const { transactionId } = decodeApproval(request.signature);
    this.store.require(account).setExecuted(transactionId, true);
    this.emit({
      type: "transaction_executed",
      account,
      transactionId,
      executor: account,
      timestamp: this.now(),
    });
  }

  /**
   * Throwing variant of `decide`.
   *
   * @returns The distinct confirming owners among the named signers
   * @throws NotFoundError if the account or transaction does not exist
   * @throws AlreadyInStateError if the transaction is executed
   * @throws IntegrityMismatch if the payload differs from the approved one
   * @throws InvariantViolation for a malformed blob or too few approvals
   */
  assertApproved(account: Address, request: AuthorizationRequest): readonly Address[] {
    const ledger = this.store.require(account);
    const { transactionId, signers } = decodeApproval(request.signature);
    const transaction = ledger.transaction(transactionId);
    if (transaction.executed) {
      throw new AlreadyInStateError(`Transaction ${transactionId} is already executed`);
    }
    if (keccak256(payloadAfterKey(request.callData)) !== transaction.contentHash) {
      throw new IntegrityMismatch(
        `Request payload does not match transaction ${transactionId}`,
      );
    }

    const approvers = [...new Set(signers.map((signer) => getAddress(signer)))].filter(
      (signer) => ledger.isOwner(signer) && ledger.hasConfirmed(transactionId, signer),
    );
    if (approvers.length < ledger.threshold) {
      throw new InvariantViolation(
        `Transaction ${transactionId} has ${approvers.length} of ${ledger.threshold} required approvals`,
      );
    }
    return approvers;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Owner management
  // ───────────────────────────────────────────────────────────────────────

  addOwner(ctx: InvocationContext, account: Address, owner: Address): void {
    const { ledger } = this.ownerContext(ctx, account);
    if (isAddressEqual(owner, ZERO_ADDRESS)) {
      throw new InvariantViolation("Owner must not be the zero address");
    }
    const normalized = getAddress(owner);
    if (ledger.isOwner(normalized)) {
      throw new AlreadyInStateError(`${normalized} is already an owner`);
    }

    ledger.addOwner(normalized);
    this.emit({
      type: "owner_added",
      account: getAddress(account),
      owner: normalized,
      timestamp: this.now(),
    });
  }

  /**
   * Remove an owner and withdraw its confirmations from pending
   * transactions.
   *
   * @throws InvariantViolation if fewer owners than the threshold would remain
   */
  removeOwner(ctx: InvocationContext, account: Address, owner: Address): void {
    const { ledger } = this.ownerContext(ctx, account);
    const normalized = getAddress(owner);
    if (!ledger.isOwner(normalized)) {
      throw new NotFoundError(`${normalized} is not an owner`);
    }
    if (ledger.ownerCount - 1 < ledger.threshold) {
      throw new InvariantViolation(
        `Removing ${normalized} would leave ${ledger.ownerCount - 1} owners, below threshold ${ledger.threshold}`,
      );
    }

    const withdrawnConfirmations = ledger.removeOwner(normalized);
    this.emit({
      type: "owner_removed",
      account: getAddress(account),
      owner: normalized,
      withdrawnConfirmations,
      timestamp: this.now(),
    });
  }

  changeThreshold(ctx: InvocationContext, account: Address, threshold: number): void {
    const { ledger } = this.ownerContext(ctx, account);
    assertThreshold(threshold, ledger.ownerCount);

    const previousThreshold = ledger.threshold;
    ledger.threshold = threshold;
    this.emit({
      type: "threshold_changed",
      account: getAddress(account),
      previousThreshold,
      newThreshold: threshold,
      timestamp: this.now(),
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getLifecycle(account: Address): ApprovalLifecycle {
    return this.store.lifecycle(account);
  }

  getConfig(account: Address): ApprovalConfig {
    const ledger = this.store.find(account);
    if (ledger === undefined) {
      return { owners: [], threshold: 0, initialized: false };
    }
    return { owners: ledger.ownerList, threshold: ledger.threshold, initialized: true };
  }

  getTransaction(account: Address, transactionId: number): TransactionRecord | undefined {
    const ledger = this.store.find(account);
    if (ledger === undefined || !ledger.hasTransaction(transactionId)) {
      return undefined;
    }
    return ledger.transaction(transactionId);
  }

  getTransactions(account: Address): readonly TransactionRecord[] {
    const ledger = this.store.find(account);
    return ledger === undefined ? [] : ledger.ids().map((id) => ledger.transaction(id));
  }

  /** Owners that confirmed the transaction, in confirmation order. */
  getConfirmations(account: Address, transactionId: number): readonly Address[] {
    return this.store.find(account)?.confirmersOf(transactionId) ?? [];
  }

  isOwner(account: Address, owner: Address): boolean {
    return this.store.find(account)?.isOwner(getAddress(owner)) ?? false;
  }

  getPendingTransactionIds(account: Address): readonly number[] {
    const ledger = this.store.find(account);
    return ledger === undefined ? [] : ledger.ids().filter((id) => !ledger.isExecuted(id));
  }

  getTransactionCount(account: Address): number {
    return this.store.find(account)?.transactionCount ?? 0;
  }

  getConfirmedTransactionIds(account: Address, owner: Address): readonly number[] {
    return this.store.find(account)?.confirmedIds(getAddress(owner)) ?? [];
  }

  getEventHistory(account: Address): readonly ApprovalEvent[] {
    return this.store.history(account);
  }

  /** Accounts with an active configuration. */
  getAccounts(): readonly Address[] {
    return this.store.accounts();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Call surface
  // ───────────────────────────────────────────────────────────────────────

  handleCall(ctx: CallContext, data: Hex): Hex {
    if (size(data) === 0) {
      return EMPTY_BYTES;
    }

    const decoded = decodeFunctionData({ abi: approvalEngineAbi, data });
    switch (decoded.functionName) {
      case "submitTransaction": {
        const [account, target, value, payload] = decoded.args;
        const id = this.submitTransaction(ctx, account, target, value, payload);
        return encodeFunctionResult({
          abi: approvalEngineAbi,
          functionName: "submitTransaction",
          result: BigInt(id),
        });
      }
      case "confirmTransaction": {
        const [account, id] = decoded.args;
        this.confirmTransaction(ctx, account, toSafeInteger(id, "Transaction id"));
        return EMPTY_BYTES;
      }
      case "revokeConfirmation": {
        const [account, id] = decoded.args;
        this.revokeConfirmation(ctx, account, toSafeInteger(id, "Transaction id"));
        return EMPTY_BYTES;
      }
      case "executeTransaction": {
        const [account, id] = decoded.args;
        const outcome = this.executeTransaction(ctx, account, toSafeInteger(id, "Transaction id"));
        const result = outcome.status === "executed" ? outcome.returnData : outcome.revertData;
        return encodeFunctionResult({
          abi: approvalEngineAbi,
          functionName: "executeTransaction",
          result: [outcome.status === "executed", result],
        });
      }
      case "addOwner": {
        const [account, owner] = decoded.args;
        this.addOwner(ctx, account, owner);
        return EMPTY_BYTES;
      }
      case "removeOwner": {
        const [account, owner] = decoded.args;
        this.removeOwner(ctx, account, owner);
        return EMPTY_BYTES;
      }
      case "changeThreshold": {
        const [account, threshold] = decoded.args;
        this.changeThreshold(ctx, account, toSafeInteger(threshold, "Threshold"));
        return EMPTY_BYTES;
      }
    }
  }

  checkpoint(): Restore {
    return this.store.checkpoint();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private ownerContext(
    ctx: InvocationContext,
    account: Address,
  ): { ledger: ApprovalLedger; caller: Address } {
    const ledger = this.store.require(account);
    const caller = getAddress(ctx.caller);
    if (!ledger.isOwner(caller)) {
      throw new AuthorizationError(`${caller} is not an owner of ${getAddress(account)}`);
    }
    return { ledger, caller };
  }

  private assertUnexecuted(ledger: ApprovalLedger, transactionId: number): void {
    if (ledger.isExecuted(transactionId)) {
      throw new AlreadyInStateError(`Transaction ${transactionId} is already executed`);
    }
  }

  private emit(event: ApprovalEvent): void {
    this.store.record(event);
    this.onEvent?.(event);
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

function assertThreshold(threshold: number, ownerCount: number): void {
  if (!Number.isInteger(threshold) || threshold < 1 || threshold > ownerCount) {
    throw new InvariantViolation(
      `Threshold must be between 1 and ${ownerCount}, got ${threshold}`,
    );
  }
}
