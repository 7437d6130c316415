/**
 * Approval Engine Types
 *
 * Projections of the per-account approval state, execution outcomes and
 * the event-sourced audit trail.
 */

import type { Address, Hex, ModuleExecutor } from "@tessera/types";

// =============================================================================
// State projections
// =============================================================================

export type ApprovalLifecycle = "uninitialized" | "active";

export interface ApprovalConfig {
  /** Owners in insertion order */
  readonly owners: readonly Address[];
  readonly threshold: number;
  readonly initialized: boolean;
}

export interface TransactionRecord {
  readonly id: number;
  readonly target: Address;
  readonly value: bigint;
  readonly data: Hex;

  /** keccak256(abi.encode(target, value, data)) */
  readonly contentHash: Hex;

  readonly executed: boolean;
  readonly confirmations: number;

  /** ISO 8601 */
  readonly createdAt: string;
}

export type TransactionStatus = "pending" | "executed";

// =============================================================================
// Execution
// =============================================================================

export type ExecutionOutcome =
  | { readonly status: "executed"; readonly transactionId: number; readonly returnData: Hex }
  | { readonly status: "failed"; readonly transactionId: number; readonly revertData: Hex };

// =============================================================================
// Events
// =============================================================================

export type ApprovalEvent =
  | {
      readonly type: "installed";
      readonly account: Address;
      readonly owners: readonly Address[];
      readonly threshold: number;
      readonly timestamp: string;
    }
  | {
      readonly type: "uninstalled";
      readonly account: Address;
      readonly timestamp: string;
    }
  | {
      readonly type: "transaction_submitted";
      readonly account: Address;
      readonly transactionId: number;
      readonly submitter: Address;
      readonly target: Address;
      readonly value: bigint;
      readonly contentHash: Hex;
      readonly timestamp: string;
    }
  | {
      readonly type: "transaction_confirmed";
      readonly account: Address;
      readonly transactionId: number;
      readonly owner: Address;
      readonly timestamp: string;
    }
  | {
      readonly type: "confirmation_revoked";
      readonly account: Address;
      readonly transactionId: number;
      readonly owner: Address;
      readonly timestamp: string;
    }
  | {
      readonly type: "transaction_executed";
      readonly account: Address;
      readonly transactionId: number;
      readonly executor: Address;
      readonly timestamp: string;
    }
  | {
      readonly type: "execution_failed";
      readonly account: Address;
      readonly transactionId: number;
      readonly executor: Address;
      readonly revertData: Hex;
      readonly timestamp: string;
    }
  | {
      readonly type: "owner_added";
      readonly account: Address;
      readonly owner: Address;
      readonly timestamp: string;
    }
  | {
      readonly type: "owner_removed";
      readonly account: Address;
      readonly owner: Address;
      readonly withdrawnConfirmations: readonly number[];
      readonly timestamp: string;
    }
  | {
      readonly type: "threshold_changed";
      readonly account: Address;
      readonly previousThreshold: number;
      readonly newThreshold: number;
      readonly timestamp: string;
    };

export type ApprovalEventType = ApprovalEvent["type"];

// =============================================================================
// Configuration
// =============================================================================

export interface ApprovalEngineOptions {
  /** Identity the engine is deployed at */
  readonly address: Address;

  /** Finds the account a transaction executes from */
  readonly resolveExecutor?: (account: Address) => ModuleExecutor | undefined;

  readonly onEvent?: (event: ApprovalEvent) => void;

  /** Default: () => new Date() */
  readonly clock?: () => Date;
}
