/**
 * Validation Module Interface
 *
 * A module is installed on an account under a routing key. The account
 * calls its lifecycle hooks with itself as the caller, and asks it to
 * decide requests whose routing key matches.
 *
 * Modules are multi-tenant: one instance serves many accounts and must
 * key all state by `ctx.caller`.
 */

import type { Address, Hex } from "./chain.js";
import type { InvocationContext } from "./call.js";
import type { AuthorizationRequest, ValidationCode } from "./request.js";

export interface ValidationModule {
  readonly address: Address;

  /** Called by the account right after the module is registered. Throw to abort the install. */
  onInstall(ctx: InvocationContext, data: Hex): void;

  /** Called by the account right after the module is unregistered. */
  onUninstall(ctx: InvocationContext, data: Hex): void;

  /** Pure decision for a request routed to this module. */
  decide(
    ctx: InvocationContext,
    request: AuthorizationRequest,
    requestHash: Hex,
  ): ValidationCode;

  /**
   * Called by the account once it has executed a routed request this
   * module accepted, in the same step as the call. Throw to undo the call.
   */
  onExecuted?(ctx: InvocationContext, request: AuthorizationRequest): void;
}
