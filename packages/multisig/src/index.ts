/**
 * @tessera/multisig: Multi-owner threshold Approval Engine.
 *
 * A validation module that lets an account's owners propose, confirm and
 * execute transactions, and decides requests that execute an approved
 * transaction.
 */

export { ApprovalEngine } from "./approval-engine.js";
export { ApprovalLedger, ApprovalStore } from "./store.js";
export { approvalEngineAbi } from "./abi.js";

export {
  MULTISIG_ROUTING_KEY,
  encodeInstallData,
  decodeInstallData,
  encodeApproval,
  decodeApproval,
  computeContentHash,
  encodeTransactionCall,
  toSafeInteger,
} from "./encoding.js";
export type { InstallData, Approval } from "./encoding.js";

export type {
  ApprovalLifecycle,
  ApprovalConfig,
  TransactionRecord,
  TransactionStatus,
  ExecutionOutcome,
  ApprovalEvent,
  ApprovalEventType,
  ApprovalEngineOptions,
} from "./types.js";
