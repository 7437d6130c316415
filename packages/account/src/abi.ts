/**
 * Account ABI
 *
 * The calls an authorized request can ask an account to perform, plus the
 * dispatcher's deposit surface.
 */

import { parseAbi } from "viem";

export const accountAbi = parseAbi([
  "function execute(address target, uint256 value, bytes data)",
  "function executeBatch(address[] targets, uint256[] values, bytes[] datas)",
  "function installModule(bytes4 key, address module, bytes initData)",
  "function uninstallModule(bytes4 key, bytes data)",
]);

export const dispatcherAbi = parseAbi([
  "function depositTo(address account) payable",
  "function withdrawTo(address recipient, uint256 amount)",
]);
