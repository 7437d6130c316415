/**
 * Tests for ApprovalEngine.
 *
 * Verifies:
 * - Install/uninstall lifecycle and configuration invariants
 * - Submission, confirmation, revocation and execution rules
 * - Retry after a failed execution
 * - Owner management
 * - Request decisions, content binding and consumption of an approval
 */

import { describe, it, expect, beforeEach } from "vitest";
import { decodeFunctionResult, encodeFunctionData } from "viem";
import {
  AlreadyInStateError,
  AuthorizationError,
  IntegrityMismatch,
  InvariantViolation,
  NotFoundError,
  VALIDATION_FAILED,
  VALIDATION_SUCCESS,
  ZERO_ADDRESS,
} from "@tessera/types";
import { approvalEngineAbi } from "../src/abi.js";
import { ApprovalEngine } from "../src/approval-engine.js";
import { encodeApproval, encodeInstallData, encodeTransactionCall } from "../src/encoding.js";
import type { ApprovalEvent } from "../src/types.js";
import {
  ACCOUNT,
  ENGINE,
  FIXED_TIME,
  OWNER_A,
  OWNER_B,
  OWNER_C,
  OWNER_D,
  RecordingExecutor,
  SECOND_ACCOUNT,
  STRANGER,
  TARGET,
  buildRequest,
} from "./fixtures.js";

const asAccount = { caller: ACCOUNT };
const asA = { caller: OWNER_A };
const asB = { caller: OWNER_B };
const asC = { caller: OWNER_C };

describe("ApprovalEngine", () => {
  let executor: RecordingExecutor;
  let events: ApprovalEvent[];
  let engine: ApprovalEngine;

  beforeEach(() => {
    executor = new RecordingExecutor();
    events = [];
    engine = new ApprovalEngine({
      address: ENGINE,
      resolveExecutor: (account) => (account === ACCOUNT ? executor : undefined),
      onEvent: (event) => events.push(event),
      clock: () => FIXED_TIME,
    });
    engine.onInstall(asAccount, encodeInstallData([OWNER_A, OWNER_B, OWNER_C], 2));
  });

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  describe("onInstall", () => {
    it("stores owners in insertion order with the threshold", () => {
      expect(engine.getConfig(ACCOUNT)).toEqual({
        owners: [OWNER_A, OWNER_B, OWNER_C],
        threshold: 2,
        initialized: true,
      });
      expect(engine.getLifecycle(ACCOUNT)).toBe("active");
      expect(events).toEqual([
        {
          type: "installed",
          account: ACCOUNT,
          owners: [OWNER_A, OWNER_B, OWNER_C],
          threshold: 2,
          timestamp: FIXED_TIME.toISOString(),
        },
      ]);
    });

    it("rejects a second install on the same account", () => {
      expect(() => engine.onInstall(asAccount, encodeInstallData([OWNER_A], 1))).toThrow(
        AlreadyInStateError,
      );
    });

    it.each([
      { label: "a zero threshold", owners: [OWNER_A, OWNER_B], threshold: 0 },
      { label: "a threshold above the owner count", owners: [OWNER_A, OWNER_B], threshold: 3 },
      { label: "a duplicate owner", owners: [OWNER_A, OWNER_A], threshold: 1 },
      { label: "the zero address as owner", owners: [OWNER_A, ZERO_ADDRESS], threshold: 1 },
      { label: "no owners", owners: [], threshold: 1 },
    ])("rejects $label", ({ owners, threshold }) => {
      expect(() =>
        engine.onInstall({ caller: SECOND_ACCOUNT }, encodeInstallData(owners, threshold)),
      ).toThrow(InvariantViolation);
      expect(engine.getLifecycle(SECOND_ACCOUNT)).toBe("uninitialized");
    });

    it("rejects malformed install data", () => {
      expect(() => engine.onInstall({ caller: SECOND_ACCOUNT }, "0x1234")).toThrow(
        InvariantViolation,
      );
    });

    it("keeps accounts isolated", () => {
      engine.onInstall({ caller: SECOND_ACCOUNT }, encodeInstallData([OWNER_D], 1));

      expect(engine.isOwner(SECOND_ACCOUNT, OWNER_D)).toBe(true);
      expect(engine.isOwner(ACCOUNT, OWNER_D)).toBe(false);
      expect(engine.getAccounts()).toEqual([ACCOUNT, SECOND_ACCOUNT]);
    });
  });

  describe("onUninstall", () => {
    it("clears everything for the account", () => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");

      engine.onUninstall(asAccount, "0x");

      expect(engine.getConfig(ACCOUNT)).toEqual({ owners: [], threshold: 0, initialized: false });
      expect(engine.getTransactionCount(ACCOUNT)).toBe(0);
      expect(engine.getTransaction(ACCOUNT, 0)).toBeUndefined();
      expect(engine.isOwner(ACCOUNT, OWNER_A)).toBe(false);
      expect(engine.getConfirmedTransactionIds(ACCOUNT, OWNER_A)).toEqual([]);
      expect(engine.getLifecycle(ACCOUNT)).toBe("uninitialized");
    });

    it("fails for an account that is not initialized", () => {
      expect(() => engine.onUninstall({ caller: SECOND_ACCOUNT }, "0x")).toThrow(NotFoundError);
    });

    it("restarts transaction numbering after reinstall", () => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");

      engine.onUninstall(asAccount, "0x");
      engine.onInstall(asAccount, encodeInstallData([OWNER_A, OWNER_B], 1));

      expect(engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x")).toBe(0);
    });

    it("starts a fresh event history", () => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");

      engine.onUninstall(asAccount, "0x");
      engine.onInstall(asAccount, encodeInstallData([OWNER_A], 1));

      expect(engine.getEventHistory(ACCOUNT).map((e) => e.type)).toEqual(["uninstalled", "installed"]);
    });
  });

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  describe("submitTransaction", () => {
    it("allocates sequential ids and confirms for the submitter", () => {
      const first = engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
      const second = engine.submitTransaction(asB, ACCOUNT, TARGET, 0n, "0x");

      expect(first).toBe(0);
      expect(second).toBe(1);
      expect(engine.getTransaction(ACCOUNT, 0)?.confirmations).toBe(1);
      expect(engine.getConfirmations(ACCOUNT, 0)).toEqual([OWNER_A]);
      expect(engine.getConfirmations(ACCOUNT, 1)).toEqual([OWNER_B]);
    });

    it("stores the record with its content hash", () => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 5n, "0xabcd");

      expect(engine.getTransaction(ACCOUNT, 0)).toMatchObject({
        id: 0,
        target: TARGET,
        value: 5n,
        data: "0xabcd",
        executed: false,
        confirmations: 1,
        createdAt: FIXED_TIME.toISOString(),
      });
      expect(events.slice(1).map((e) => e.type)).toEqual([
        "transaction_submitted",
        "transaction_confirmed",
      ]);
    });

    it("rejects callers that are not owners", () => {
      expect(() => engine.submitTransaction({ caller: STRANGER }, ACCOUNT, TARGET, 0n, "0x")).toThrow(
        AuthorizationError,
      );
      expect(engine.getTransactionCount(ACCOUNT)).toBe(0);
    });

    it("rejects an account that is not initialized", () => {
      expect(() => engine.submitTransaction(asA, SECOND_ACCOUNT, TARGET, 0n, "0x")).toThrow(
        NotFoundError,
      );
    });

    it("rejects the zero target", () => {
      expect(() => engine.submitTransaction(asA, ACCOUNT, ZERO_ADDRESS, 0n, "0x")).toThrow(
        InvariantViolation,
      );
    });
  });

  describe("confirmTransaction", () => {
    beforeEach(() => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
    });

    it("adds a confirmation", () => {
      engine.confirmTransaction(asB, ACCOUNT, 0);

      expect(engine.getTransaction(ACCOUNT, 0)?.confirmations).toBe(2);
      expect(engine.getConfirmations(ACCOUNT, 0)).toEqual([OWNER_A, OWNER_B]);
      expect(engine.getConfirmedTransactionIds(ACCOUNT, OWNER_B)).toEqual([0]);
    });

    it("rejects a second confirmation by the same owner", () => {
      expect(() => engine.confirmTransaction(asA, ACCOUNT, 0)).toThrow(AlreadyInStateError);
      expect(engine.getTransaction(ACCOUNT, 0)?.confirmations).toBe(1);
    });

    it("rejects an unknown transaction", () => {
      expect(() => engine.confirmTransaction(asB, ACCOUNT, 7)).toThrow(NotFoundError);
    });

    it("rejects an executed transaction", () => {
      engine.confirmTransaction(asB, ACCOUNT, 0);
      engine.executeTransaction(asA, ACCOUNT, 0);

      expect(() => engine.confirmTransaction(asC, ACCOUNT, 0)).toThrow(AlreadyInStateError);
    });

    it("rejects callers that are not owners", () => {
      expect(() => engine.confirmTransaction({ caller: STRANGER }, ACCOUNT, 0)).toThrow(
        AuthorizationError,
      );
    });
  });

  describe("revokeConfirmation", () => {
    beforeEach(() => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
    });

    it("removes the confirmation and its index entry", () => {
      engine.revokeConfirmation(asA, ACCOUNT, 0);

      expect(engine.getTransaction(ACCOUNT, 0)?.confirmations).toBe(0);
      expect(engine.getConfirmedTransactionIds(ACCOUNT, OWNER_A)).toEqual([]);
      expect(events.at(-1)?.type).toBe("confirmation_revoked");
    });

    it("rejects an owner that has not confirmed", () => {
      expect(() => engine.revokeConfirmation(asB, ACCOUNT, 0)).toThrow(NotFoundError);
    });

    it("rejects an executed transaction", () => {
      engine.confirmTransaction(asB, ACCOUNT, 0);
      engine.executeTransaction(asA, ACCOUNT, 0);

      expect(() => engine.revokeConfirmation(asA, ACCOUNT, 0)).toThrow(AlreadyInStateError);
    });
  });

  describe("executeTransaction", () => {
    beforeEach(() => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 9n, "0xabcd");
    });

    it("rejects execution below the threshold", () => {
      expect(() => engine.executeTransaction(asA, ACCOUNT, 0)).toThrow(
        "has 1 of 2 required confirmations",
      );
      expect(executor.calls).toEqual([]);
    });

    it("executes once through the account", () => {
      engine.confirmTransaction(asB, ACCOUNT, 0);

      const outcome = engine.executeTransaction(asC, ACCOUNT, 0);

      expect(outcome).toEqual({ status: "executed", transactionId: 0, returnData: "0x" });
      expect(executor.calls).toEqual([{ caller: ENGINE, target: TARGET, value: 9n, data: "0xabcd" }]);
      expect(engine.getTransaction(ACCOUNT, 0)?.executed).toBe(true);
      expect(engine.getPendingTransactionIds(ACCOUNT)).toEqual([]);
    });

    it("rejects a second execution", () => {
      engine.confirmTransaction(asB, ACCOUNT, 0);
      engine.executeTransaction(asA, ACCOUNT, 0);

      expect(() => engine.executeTransaction(asA, ACCOUNT, 0)).toThrow(AlreadyInStateError);
      expect(executor.calls).toHaveLength(1);
    });

    it("leaves a failed transaction re-executable with its confirmations", () => {
      engine.confirmTransaction(asB, ACCOUNT, 0);
      executor.result = { success: false, revertData: "0xdead" };

      const failed = engine.executeTransaction(asA, ACCOUNT, 0);

      expect(failed).toEqual({ status: "failed", transactionId: 0, revertData: "0xdead" });
      expect(engine.getTransaction(ACCOUNT, 0)).toMatchObject({ executed: false, confirmations: 2 });
      expect(events.at(-1)).toEqual({
        type: "execution_failed",
        account: ACCOUNT,
        transactionId: 0,
        executor: OWNER_A,
        revertData: "0xdead",
        timestamp: FIXED_TIME.toISOString(),
      });

      executor.result = { success: true, returnData: "0x01" };
      const retried = engine.executeTransaction(asA, ACCOUNT, 0);

      expect(retried).toEqual({ status: "executed", transactionId: 0, returnData: "0x01" });
      expect(executor.calls).toHaveLength(2);
    });

    it("stays pending when the account refuses the call", () => {
      engine.confirmTransaction(asB, ACCOUNT, 0);
      executor.refusal = new AuthorizationError(`${ENGINE} is not a module installed on ${ACCOUNT}`);

      expect(() => engine.executeTransaction(asA, ACCOUNT, 0)).toThrow(AuthorizationError);
      expect(engine.getTransaction(ACCOUNT, 0)).toMatchObject({ executed: false, confirmations: 2 });
      expect(engine.getPendingTransactionIds(ACCOUNT)).toEqual([0]);

      executor.refusal = undefined;
      expect(engine.executeTransaction(asA, ACCOUNT, 0).status).toBe("executed");
    });

    it("fails when no executor is known for the account", () => {
      const detached = new ApprovalEngine({ address: ENGINE });
      detached.onInstall(asAccount, encodeInstallData([OWNER_A], 1));
      detached.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");

      expect(() => detached.executeTransaction(asA, ACCOUNT, 0)).toThrow(NotFoundError);
      expect(detached.getTransaction(ACCOUNT, 0)?.executed).toBe(false);
    });
  });

  // ───────────────────────────────────────────────────────────────────────
  // Owner management
  // ───────────────────────────────────────────────────────────────────────

  describe("owner management", () => {
    it("adds an owner", () => {
      engine.addOwner(asA, ACCOUNT, OWNER_D);

      expect(engine.getConfig(ACCOUNT).owners).toEqual([OWNER_A, OWNER_B, OWNER_C, OWNER_D]);
      expect(engine.isOwner(ACCOUNT, OWNER_D)).toBe(true);
    });

    it("rejects adding an existing, zero or unauthorized owner", () => {
      expect(() => engine.addOwner(asA, ACCOUNT, OWNER_B)).toThrow(AlreadyInStateError);
      expect(() => engine.addOwner(asA, ACCOUNT, ZERO_ADDRESS)).toThrow(InvariantViolation);
      expect(() => engine.addOwner({ caller: STRANGER }, ACCOUNT, OWNER_D)).toThrow(
        AuthorizationError,
      );
    });

    it("refuses to drop below the threshold", () => {
      engine.onInstall({ caller: SECOND_ACCOUNT }, encodeInstallData([OWNER_A, OWNER_B], 2));

      expect(() => engine.removeOwner(asA, SECOND_ACCOUNT, OWNER_B)).toThrow(InvariantViolation);
      expect(engine.getConfig(SECOND_ACCOUNT).owners).toEqual([OWNER_A, OWNER_B]);
    });

    it("withdraws the removed owner's pending confirmations", () => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
      engine.confirmTransaction(asB, ACCOUNT, 0);

      engine.removeOwner(asA, ACCOUNT, OWNER_B);

      expect(engine.getConfig(ACCOUNT).owners).toEqual([OWNER_A, OWNER_C]);
      expect(engine.getTransaction(ACCOUNT, 0)?.confirmations).toBe(1);
      expect(engine.getConfirmations(ACCOUNT, 0)).toEqual([OWNER_A]);
      expect(events.at(-1)).toMatchObject({ type: "owner_removed", withdrawnConfirmations: [0] });
    });

    it("keeps confirmations of executed transactions", () => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
      engine.confirmTransaction(asB, ACCOUNT, 0);
      engine.executeTransaction(asA, ACCOUNT, 0);

      engine.removeOwner(asA, ACCOUNT, OWNER_B);

      expect(engine.getTransaction(ACCOUNT, 0)?.confirmations).toBe(2);
    });

    it("rejects removing a non-owner", () => {
      expect(() => engine.removeOwner(asA, ACCOUNT, OWNER_D)).toThrow(NotFoundError);
    });

    it("changes the threshold within 1..owners", () => {
      engine.changeThreshold(asB, ACCOUNT, 3);

      expect(engine.getConfig(ACCOUNT).threshold).toBe(3);
      expect(events.at(-1)).toMatchObject({
        type: "threshold_changed",
        previousThreshold: 2,
        newThreshold: 3,
      });
      expect(() => engine.changeThreshold(asB, ACCOUNT, 0)).toThrow(InvariantViolation);
      expect(() => engine.changeThreshold(asB, ACCOUNT, 4)).toThrow(InvariantViolation);
    });
  });

  // ───────────────────────────────────────────────────────────────────────
  // Decision
  // ───────────────────────────────────────────────────────────────────────

  describe("decide", () => {
    const callData = encodeTransactionCall(TARGET, 5n, "0x1234");

    beforeEach(() => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 5n, "0x1234");
      engine.confirmTransaction(asB, ACCOUNT, 0);
    });

    it("accepts when enough confirming owners sign", () => {
      const request = buildRequest({ callData, signature: encodeApproval(0, [OWNER_A, OWNER_B]) });

      expect(engine.decide(asAccount, request, "0x")).toBe(VALIDATION_SUCCESS);
      expect(engine.assertApproved(ACCOUNT, request)).toEqual([OWNER_A, OWNER_B]);
    });

    it("counts each signer once", () => {
      const request = buildRequest({ callData, signature: encodeApproval(0, [OWNER_A, OWNER_A]) });

      expect(engine.decide(asAccount, request, "0x")).toBe(VALIDATION_FAILED);
    });

    it("ignores signers that have not confirmed", () => {
      const request = buildRequest({ callData, signature: encodeApproval(0, [OWNER_A, OWNER_C]) });

      expect(engine.decide(asAccount, request, "0x")).toBe(VALIDATION_FAILED);
      expect(() => engine.assertApproved(ACCOUNT, request)).toThrow("has 1 of 2 required approvals");
    });

    it("rejects a payload that differs from the approved one", () => {
      const request = buildRequest({
        callData: encodeTransactionCall(TARGET, 6n, "0x1234"),
        signature: encodeApproval(0, [OWNER_A, OWNER_B]),
      });

      expect(engine.decide(asAccount, request, "0x")).toBe(VALIDATION_FAILED);
      expect(() => engine.assertApproved(ACCOUNT, request)).toThrow(IntegrityMismatch);
    });

    it("rejects an unknown transaction", () => {
      const request = buildRequest({ callData, signature: encodeApproval(9, [OWNER_A, OWNER_B]) });

      expect(() => engine.assertApproved(ACCOUNT, request)).toThrow(NotFoundError);
    });

    it("rejects an executed transaction", () => {
      engine.executeTransaction(asA, ACCOUNT, 0);
      const request = buildRequest({ callData, signature: encodeApproval(0, [OWNER_A, OWNER_B]) });

      expect(engine.decide(asAccount, request, "0x")).toBe(VALIDATION_FAILED);
      expect(() => engine.assertApproved(ACCOUNT, request)).toThrow(AlreadyInStateError);
    });

    it("rejects a malformed approval blob", () => {
      const request = buildRequest({ callData, signature: "0x" });

      expect(engine.decide(asAccount, request, "0x")).toBe(VALIDATION_FAILED);
    });

    it("rejects requests from an account without configuration", () => {
      const request = buildRequest({ callData, signature: encodeApproval(0, [OWNER_A, OWNER_B]) });

      expect(engine.decide({ caller: SECOND_ACCOUNT }, request, "0x")).toBe(VALIDATION_FAILED);
    });

    it("does not change state", () => {
      const request = buildRequest({ callData, signature: encodeApproval(0, [OWNER_A, OWNER_B]) });
      const before = engine.getTransaction(ACCOUNT, 0);
      const eventCount = events.length;

      engine.decide(asAccount, request, "0x");

      expect(engine.getTransaction(ACCOUNT, 0)).toEqual(before);
      expect(events).toHaveLength(eventCount);
    });

    it("consumes the approval once the routed call has run", () => {
      const request = buildRequest({ callData, signature: encodeApproval(0, [OWNER_A, OWNER_B]) });

      engine.onExecuted(asAccount, request);

      expect(engine.getTransaction(ACCOUNT, 0)?.executed).toBe(true);
      expect(events.at(-1)).toEqual({
        type: "transaction_executed",
        account: ACCOUNT,
        transactionId: 0,
        executor: ACCOUNT,
        timestamp: FIXED_TIME.toISOString(),
      });
      expect(engine.decide(asAccount, request, "0x")).toBe(VALIDATION_FAILED);
      expect(() => engine.onExecuted(asAccount, request)).toThrow(AlreadyInStateError);
      expect(() => engine.executeTransaction(asA, ACCOUNT, 0)).toThrow(AlreadyInStateError);
    });

    it("refuses to consume an approval that no longer holds", () => {
      engine.revokeConfirmation(asB, ACCOUNT, 0);
      const request = buildRequest({ callData, signature: encodeApproval(0, [OWNER_A, OWNER_B]) });

      expect(() => engine.onExecuted(asAccount, request)).toThrow(InvariantViolation);
      expect(engine.getTransaction(ACCOUNT, 0)?.executed).toBe(false);
    });
  });

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  describe("queries", () => {
    it("lists pending ids in allocation order", () => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
      engine.submitTransaction(asB, ACCOUNT, TARGET, 0n, "0x");
      engine.submitTransaction(asC, ACCOUNT, TARGET, 0n, "0x");
      engine.confirmTransaction(asA, ACCOUNT, 1);
      engine.executeTransaction(asA, ACCOUNT, 1);

      expect(engine.getPendingTransactionIds(ACCOUNT)).toEqual([0, 2]);
      expect(engine.getTransactionCount(ACCOUNT)).toBe(3);
      expect(engine.getTransactions(ACCOUNT).map((t) => t.executed)).toEqual([false, true, false]);
    });

    it("answers empty for unknown accounts", () => {
      expect(engine.getConfig(SECOND_ACCOUNT)).toEqual({ owners: [], threshold: 0, initialized: false });
      expect(engine.getPendingTransactionIds(SECOND_ACCOUNT)).toEqual([]);
      expect(engine.getConfirmations(SECOND_ACCOUNT, 0)).toEqual([]);
      expect(engine.isOwner(SECOND_ACCOUNT, OWNER_A)).toBe(false);
    });
  });

  // ───────────────────────────────────────────────────────────────────────
  // Call surface
  // ───────────────────────────────────────────────────────────────────────

  describe("handleCall", () => {
    it("submits and returns the new id", () => {
      const data = encodeFunctionData({
        abi: approvalEngineAbi,
        functionName: "submitTransaction",
        args: [ACCOUNT, TARGET, 0n, "0x"],
      });

      const result = engine.handleCall({ caller: OWNER_B, value: 0n }, data);

      expect(
        decodeFunctionResult({ abi: approvalEngineAbi, functionName: "submitTransaction", data: result }),
      ).toBe(0n);
      expect(engine.getConfirmations(ACCOUNT, 0)).toEqual([OWNER_B]);
    });

    it("confirms and executes for the calling owner", () => {
      engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
      const confirm = encodeFunctionData({
        abi: approvalEngineAbi,
        functionName: "confirmTransaction",
        args: [ACCOUNT, 0n],
      });
      const execute = encodeFunctionData({
        abi: approvalEngineAbi,
        functionName: "executeTransaction",
        args: [ACCOUNT, 0n],
      });

      engine.handleCall({ caller: OWNER_C, value: 0n }, confirm);
      const result = engine.handleCall({ caller: OWNER_C, value: 0n }, execute);

      expect(
        decodeFunctionResult({ abi: approvalEngineAbi, functionName: "executeTransaction", data: result }),
      ).toEqual([true, "0x"]);
    });

    it("changes the threshold", () => {
      const data = encodeFunctionData({
        abi: approvalEngineAbi,
        functionName: "changeThreshold",
        args: [ACCOUNT, 1n],
      });

      engine.handleCall({ caller: OWNER_A, value: 0n }, data);

      expect(engine.getConfig(ACCOUNT).threshold).toBe(1);
    });
  });

  it("restores the store from a checkpoint", () => {
    const restore = engine.checkpoint();
    engine.submitTransaction(asA, ACCOUNT, TARGET, 0n, "0x");
    engine.addOwner(asA, ACCOUNT, OWNER_D);

    restore();

    expect(engine.getTransactionCount(ACCOUNT)).toBe(0);
    expect(engine.isOwner(ACCOUNT, OWNER_D)).toBe(false);
    expect(engine.getEventHistory(ACCOUNT).map((e) => e.type)).toEqual(["installed"]);
  });
});
