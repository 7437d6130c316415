/**
 * @tessera/types: Shared types for the Tessera account stack.
 *
 * Used across all Tessera packages:
 * - Chain primitives (addresses, hex payloads)
 * - The authorization request envelope and validation codes
 * - Call results and the execution-host seam
 * - The validation module interface
 * - The error taxonomy
 *
 * Design rules:
 * - All data types are readonly
 * - No runtime dependencies
 */

// Chain primitives
export type { Address, Hex, Bytes32, ChainId } from "./chain.js";
export { ZERO_ADDRESS, EMPTY_BYTES } from "./chain.js";

// Requests
export type { AuthorizationRequest, ValidationCode } from "./request.js";
export { VALIDATION_SUCCESS, VALIDATION_FAILED, isAccepted } from "./request.js";

// Calls
export type {
  CallResult,
  InvocationContext,
  CallContext,
  CallTarget,
  Restore,
  Checkpointable,
  ExecutionHost,
  ModuleExecutor,
} from "./call.js";

// Modules
export type { ValidationModule } from "./module.js";

// Errors
export type { EngineErrorCode } from "./errors.js";
export {
  EngineError,
  AuthorizationError,
  NotFoundError,
  InvariantViolation,
  AlreadyInStateError,
  IntegrityMismatch,
  ForwardedCallFailure,
  CallReverted,
} from "./errors.js";

// Runtime type guards
export {
  isHex,
  isAddressLike,
  isAuthorizationRequest,
  isCallTarget,
  isCheckpointable,
  isValidationModule,
  isModuleExecutor,
  isEngineError,
} from "./guards.js";
