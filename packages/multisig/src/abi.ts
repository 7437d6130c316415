/**
 * Approval Engine ABI
 *
 * Owner-facing operations, reachable by contract owners through
 * forwarded calls. Every function names the account it acts on.
 */

import { parseAbi } from "viem";

export const approvalEngineAbi = parseAbi([
  "function submitTransaction(address account, address target, uint256 value, bytes data) returns (uint256 transactionId)",
  "function confirmTransaction(address account, uint256 transactionId)",
  "function revokeConfirmation(address account, uint256 transactionId)",
  "function executeTransaction(address account, uint256 transactionId) returns (bool success, bytes result)",
  "function addOwner(address account, address owner)",
  "function removeOwner(address account, address owner)",
  "function changeThreshold(address account, uint256 threshold)",
]);
