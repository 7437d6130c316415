/**
 * In-Memory Execution Host
 *
 * The substrate every Tessera component runs on in-process: it holds
 * native balances, delivers calls to deployed targets, and gives each
 * call run-to-completion, all-or-nothing semantics.
 *
 * Rules:
 * - Before every call the host checkpoints its balances and every
 *   journaled target; if the call throws, all of it is restored
 * - A failed call is a result (`success: false`), never an exception
 * - Calls to addresses with no deployed target only move value
 * - Nesting is bounded by `maxDepth`
 */

import { getAddress } from "viem";
import {
  AlreadyInStateError,
  EMPTY_BYTES,
  InvariantViolation,
  isCheckpointable,
} from "@tessera/types";
import type {
  Address,
  CallResult,
  CallTarget,
  Checkpointable,
  ExecutionHost,
  Hex,
  Restore,
} from "@tessera/types";
import { toRevertData } from "./revert.js";

// =============================================================================
// Types
// =============================================================================

export interface HostLogEntry {
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly depth: number;
  readonly success: boolean;
  readonly revertData?: Hex;
}

export interface InMemoryHostOptions {
  /** Maximum call nesting depth. Default: 64 */
  readonly maxDepth?: number;

  /** Receives one entry per completed call */
  readonly logFn?: (entry: HostLogEntry) => void;
}

export const DEFAULT_MAX_DEPTH = 64;

// =============================================================================
// Host
// =============================================================================

export class InMemoryHost implements ExecutionHost, Checkpointable {
  private balances = new Map<Address, bigint>();
  private readonly targets = new Map<Address, CallTarget>();
  private readonly journal: Checkpointable[] = [];
  private readonly maxDepth: number;
  private readonly logFn: ((entry: HostLogEntry) => void) | undefined;
  private depth = 0;

  constructor(options: InMemoryHostOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    this.logFn = options.logFn;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deployment
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Make `target` reachable at its address. Targets that can checkpoint
   * themselves are journaled so failed calls roll them back.
   */
  deploy<T extends CallTarget>(target: T): T {
    const address = getAddress(target.address);
    if (this.targets.has(address)) {
      throw new AlreadyInStateError(`A target is already deployed at ${address}`);
    }
    this.targets.set(address, target);
    if (isCheckpointable(target)) {
      this.journal.push(target);
    }
    return target;
  }

  resolve(address: Address): CallTarget | undefined {
    return this.targets.get(getAddress(address));
  }

  /** Credit native balance out of thin air (genesis allocation). */
  fund(address: Address, amount: bigint): void {
    if (amount < 0n) {
      throw new InvariantViolation(`Cannot fund a negative amount: ${amount}`);
    }
    const key = getAddress(address);
    this.balances.set(key, this.balanceOf(key) + amount);
  }

  balanceOf(address: Address): bigint {
    return this.balances.get(getAddress(address)) ?? 0n;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  call(from: Address, to: Address, value: bigint, data: Hex): CallResult {
    const restore = this.checkpoint();
    const caller = getAddress(from);
    const callee = getAddress(to);
    this.depth++;

    try {
      if (this.depth > this.maxDepth) {
        throw new InvariantViolation(`Call depth exceeded (${this.maxDepth})`);
      }
      this.move(caller, callee, value);

      const target = this.targets.get(callee);
      const returnData = target !== undefined
        ? target.handleCall({ caller, value }, data)
        : EMPTY_BYTES;

      this.logFn?.({ from: caller, to: callee, value, depth: this.depth, success: true });
      return { success: true, returnData };
    } catch (err) {
      restore();
      const revertData = toRevertData(err);
      this.logFn?.({
        from: caller,
        to: callee,
        value,
        depth: this.depth,
        success: false,
        revertData,
      });
      return { success: false, revertData };
    } finally {
      this.depth--;
    }
  }

  transfer(from: Address, to: Address, amount: bigint): CallResult {
    return this.call(from, to, amount, EMPTY_BYTES);
  }

  atomic<T>(fn: () => T): T {
    const restore = this.checkpoint();
    try {
      return fn();
    } catch (err) {
      restore();
      throw err;
    }
  }

  checkpoint(): Restore {
    const balances = new Map(this.balances);
    const restores = this.journal.map((component) => component.checkpoint());
    return () => {
      this.balances = balances;
      for (const restore of restores) {
        restore();
      }
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private move(from: Address, to: Address, value: bigint): void {
    if (value < 0n) {
      throw new InvariantViolation(`Negative call value: ${value}`);
    }
    if (value === 0n) return;

    const available = this.balanceOf(from);
    if (available < value) {
      throw new InvariantViolation(
        `Insufficient balance: ${from} has ${available}, needs ${value}`,
      );
    }
    this.balances.set(from, available - value);
    this.balances.set(to, this.balanceOf(to) + value);
  }
}
