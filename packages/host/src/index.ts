/**
 * @tessera/host: In-process execution substrate.
 *
 * Balances, deployed call targets, and journaled nested calls that unwind
 * completely when they fail.
 */

export { InMemoryHost, DEFAULT_MAX_DEPTH } from "./in-memory-host.js";
export type { InMemoryHostOptions, HostLogEntry } from "./in-memory-host.js";

export {
  encodeRevertReason,
  decodeRevertReason,
  describeRevert,
  toRevertData,
} from "./revert.js";
