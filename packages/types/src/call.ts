/**
 * Call Types
 *
 * The seam between the authorization core and the substrate that actually
 * moves value and invokes targets. Failures are results, not exceptions:
 * the revert payload travels as an opaque blob so callers can re-raise it
 * unmodified.
 */

import type { Address, Hex } from "./chain.js";

/**
 * Outcome of a nested call.
 */
export type CallResult =
  | { readonly success: true; readonly returnData: Hex }
  | { readonly success: false; readonly revertData: Hex };

/**
 * Identity of the immediate caller of an operation.
 */
export interface InvocationContext {
  readonly caller: Address;
}

/**
 * Context handed to a call target by the host.
 */
export interface CallContext extends InvocationContext {
  /** Value transferred with the call (already credited to the target) */
  readonly value: bigint;
}

/**
 * Something the host can deliver a call to.
 *
 * `handleCall` returns the ABI-encoded return data, or throws to revert.
 */
export interface CallTarget {
  readonly address: Address;
  handleCall(ctx: CallContext, data: Hex): Hex;
}

/**
 * Restores the state captured by a checkpoint.
 */
export type Restore = () => void;

/**
 * Stateful components the host can roll back when a nested call fails.
 */
export interface Checkpointable {
  checkpoint(): Restore;
}

/**
 * The execution substrate as seen by routers and modules.
 */
export interface ExecutionHost {
  /** Deliver `value` and `data` from `from` to `to`. Never throws for callee failure. */
  call(from: Address, to: Address, value: bigint, data: Hex): CallResult;

  /** Plain value transfer. */
  transfer(from: Address, to: Address, amount: bigint): CallResult;

  /** Run `fn`; if it throws, every journaled effect since entry is undone. */
  atomic<T>(fn: () => T): T;

  balanceOf(address: Address): bigint;
}

/**
 * An account that lets its installed modules execute calls on its behalf.
 */
export interface ModuleExecutor {
  readonly address: Address;
  executeFromModule(
    ctx: InvocationContext,
    target: Address,
    value: bigint,
    data: Hex,
  ): CallResult;
}
