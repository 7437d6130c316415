/**
 * Error Taxonomy
 *
 * Every guarded operation fails with one of these. All but
 * `ForwardedCallFailure` are fatal to the enclosing operation.
 */

import type { Hex } from "./chain.js";

export type EngineErrorCode =
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "INVARIANT_VIOLATION"
  | "ALREADY_IN_STATE"
  | "INTEGRITY_MISMATCH"
  | "FORWARDED_CALL_FAILED";

export class EngineError extends Error {
  public readonly code: EngineErrorCode;
  constructor(code: EngineErrorCode, message: string) {
    super(message);
    this.name = "EngineError";
    this.code = code;
  }
}

/** Caller failed an owner, self or trusted-dispatcher gate. */
export class AuthorizationError extends EngineError {
  constructor(message: string) {
    super("UNAUTHORIZED", message);
    this.name = "AuthorizationError";
  }
}

/** Referenced module, transaction or mapping entry is absent. */
export class NotFoundError extends EngineError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

/** Threshold, owner-count, duplicate or null checks. */
export class InvariantViolation extends EngineError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
    this.name = "InvariantViolation";
  }
}

/** Double confirm, double execute, double install. */
export class AlreadyInStateError extends EngineError {
  constructor(message: string) {
    super("ALREADY_IN_STATE", message);
    this.name = "AlreadyInStateError";
  }
}

/** Stored content hash disagrees with the payload being decided. */
export class IntegrityMismatch extends EngineError {
  constructor(message: string) {
    super("INTEGRITY_MISMATCH", message);
    this.name = "IntegrityMismatch";
  }
}

/**
 * A nested call failed. `revertData` is the callee's raw failure payload,
 * passed through unmodified.
 */
export class ForwardedCallFailure extends EngineError {
  public readonly revertData: Hex;
  constructor(message: string, revertData: Hex) {
    super("FORWARDED_CALL_FAILED", message);
    this.name = "ForwardedCallFailure";
    this.revertData = revertData;
  }
}

/**
 * Thrown by a call target to revert with an exact payload.
 */
export class CallReverted extends Error {
  public readonly revertData: Hex;
  constructor(revertData: Hex, message = "Call reverted") {
    super(message);
    this.name = "CallReverted";
    this.revertData = revertData;
  }
}
