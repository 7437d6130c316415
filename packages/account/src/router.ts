/**
 * Account Router
 *
 * The account itself: it owns the Validator Registry and the sequence
 * counter, routes authorization requests to the module installed under
 * their routing key (or to the default signature arm), and forwards calls
 * on behalf of its trusted dispatcher or of itself.
 *
 * Rules:
 * - Only the trusted dispatcher may call `authorize`
 * - Self-only operations (install, uninstall, forwarding as the account)
 *   need the `SelfGrant` issued by the most recent accepted request
 * - A grant is retired once its request has been executed
 * - A routed call and the deciding module's `onExecuted` hook form one step
 * - Forwarded failures carry the callee's raw revert payload unmodified
 */

import {
  encodeAbiParameters,
  getAddress,
  isAddressEqual,
  parseAbiParameters,
  recoverMessageAddress,
  size,
} from "viem";
import {
  AuthorizationError,
  EMPTY_BYTES,
  ForwardedCallFailure,
  InvariantViolation,
  NotFoundError,
  VALIDATION_FAILED,
  VALIDATION_SUCCESS,
  ZERO_ADDRESS,
  isAccepted,
} from "@tessera/types";
import type {
  Address,
  AuthorizationRequest,
  CallContext,
  CallResult,
  CallTarget,
  ChainId,
  Checkpointable,
  ExecutionHost,
  Hex,
  InvocationContext,
  ModuleExecutor,
  Restore,
  ValidationCode,
  ValidationModule,
} from "@tessera/types";
import { describeRevert } from "@tessera/host";
import { ValidatorRegistry } from "./registry.js";
import type { ModuleBinding } from "./registry.js";
import {
  decodeAccountCall,
  extractRoutingKey,
  normalizeRoutingKey,
} from "./routing.js";
import type { AccountCall, Route } from "./routing.js";
import { defaultAuthorizationDigest } from "./request-hash.js";
import { SelfGrant } from "./types.js";
import type {
  AccountRouterConfig,
  AuthorizationOutcome,
  Invoker,
  RouterEvent,
} from "./types.js";

const SIGNATURE_SIZE = 65;

const BATCH_RESULT_PARAMS = parseAbiParameters("bytes[]");

type RoutedCall = Extract<AccountCall, { kind: "routed" }>;

// =============================================================================
// Router
// =============================================================================

export class AccountRouter implements CallTarget, ModuleExecutor, Checkpointable {
  readonly address: Address;
  readonly dispatcher: Address;
  readonly chainId: ChainId;

  private readonly host: ExecutionHost;
  private readonly registry = new ValidatorRegistry();
  private readonly resolveModule: ((address: Address) => ValidationModule | undefined) | undefined;
  private readonly onEvent: ((event: RouterEvent) => void) | undefined;
  private readonly clock: () => Date;
  private readonly events: RouterEvent[] = [];
  private sequence = 0n;
  private activeGrant: SelfGrant | undefined;

  constructor(config: AccountRouterConfig) {
    this.address = getAddress(config.address);
    this.dispatcher = getAddress(config.dispatcher);
    this.chainId = config.chainId;
    this.host = config.host;
    this.resolveModule = config.resolveModule;
    this.onEvent = config.onEvent;
    this.clock = config.clock ?? (() => new Date());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Authorization
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Decide a request on behalf of the trusted dispatcher.
   *
   * Pays `shortfall` to the caller first (even when the request is
   * rejected). A failed payment aborts the whole call with no effect.
   *
   * @throws AuthorizationError if the caller is not the dispatcher
   * @throws InvariantViolation if the request targets another account
   * @throws ForwardedCallFailure if the shortfall payment fails
   */
  async authorize(
    ctx: InvocationContext,
    request: AuthorizationRequest,
    requestHash: Hex,
    shortfall: bigint,
  ): Promise<AuthorizationOutcome> {
    this.assertDispatcher(ctx.caller, "authorize");
    if (!isAddressEqual(request.sender, this.address)) {
      throw new InvariantViolation(
        `Request sender ${request.sender} is not this account (${this.address})`,
      );
    }

    const route = this.resolveRoute(request.callData);
    const code = route.kind === "module"
      ? route.binding.module.decide({ caller: this.address }, request, requestHash)
      : await this.decideDefault(request, requestHash);

    return this.host.atomic(() => {
      if (shortfall > 0n) {
        const payment = this.host.transfer(this.address, ctx.caller, shortfall);
        if (!payment.success) {
          throw new ForwardedCallFailure(
            `Prefund payment of ${shortfall} failed: ${describeRevert(payment.revertData)}`,
            payment.revertData,
          );
        }
      }

      const outcome = this.settle(request, code);
      if (outcome.accepted) {
        this.emit({
          type: "request_authorized",
          account: this.address,
          requestHash,
          nonce: request.nonce,
          route: route.kind,
          timestamp: this.now(),
        });
      } else {
        this.emit({
          type: "request_rejected",
          account: this.address,
          requestHash,
          nonce: request.nonce,
          route: route.kind,
          code: outcome.code,
          timestamp: this.now(),
        });
      }
      return outcome;
    });
  }

  /**
   * Where a request with this call data would be decided.
   */
  resolveRoute(callData: Hex): Route {
    const key = extractRoutingKey(callData);
    const binding = key !== undefined ? this.registry.lookup(key) : undefined;
    return binding !== undefined ? { kind: "module", binding } : { kind: "default" };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Module management (self-only)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Bind `module` under `key` and run its install hook. A failing hook
   * leaves the key unbound.
   */
  install(
    grant: SelfGrant,
    key: string,
    module: ValidationModule | null | undefined,
    initData: Hex,
  ): ModuleBinding {
    this.assertGrant(grant);
    const routingKey = normalizeRoutingKey(key);
    if (module === null || module === undefined || isAddressEqual(module.address, ZERO_ADDRESS)) {
      throw new InvariantViolation("Module must not be null");
    }

    const binding = this.registry.bind(routingKey, module, this.now());
    try {
      module.onInstall({ caller: this.address }, initData);
    } catch (err) {
      this.registry.unbind(routingKey);
      throw err;
    }

    this.emit({
      type: "module_installed",
      account: this.address,
      key: routingKey,
      module: binding.moduleAddress,
      timestamp: binding.installedAt,
    });
    return binding;
  }

  /**
   * Unbind the module under `key` and run its uninstall hook. A failing
   * hook restores the binding.
   */
  uninstall(grant: SelfGrant, key: string, data: Hex): ModuleBinding {
    this.assertGrant(grant);
    const routingKey = normalizeRoutingKey(key);

    const binding = this.registry.unbind(routingKey);
    try {
      binding.module.onUninstall({ caller: this.address }, data);
    } catch (err) {
      this.registry.bind(routingKey, binding.module, binding.installedAt);
      throw err;
    }

    this.emit({
      type: "module_uninstalled",
      account: this.address,
      key: routingKey,
      module: binding.moduleAddress,
      timestamp: this.now(),
    });
    return binding;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Forwarding
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Call `target` as the account.
   *
   * @throws ForwardedCallFailure carrying the callee's raw revert payload
   */
  forward(invoker: Invoker, target: Address, value: bigint, data: Hex): Hex {
    this.assertInvoker(invoker, "forward");
    return this.callOut(target, value, data);
  }

  /**
   * Call every target in order. If any call fails, none of the batch's
   * effects remain.
   */
  forwardBatch(
    invoker: Invoker,
    targets: readonly Address[],
    values: readonly bigint[],
    datas: readonly Hex[],
  ): readonly Hex[] {
    this.assertInvoker(invoker, "forwardBatch");
    if (targets.length !== values.length || targets.length !== datas.length) {
      throw new InvariantViolation(
        `Batch length mismatch: ${targets.length} targets, ${values.length} values, ${datas.length} payloads`,
      );
    }
    return this.host.atomic(() =>
      targets.map((target, i) => this.callOut(target, values[i], datas[i])),
    );
  }

  /**
   * Run the account call the grant's request describes, then retire the
   * grant.
   */
  executeAuthorized(grant: SelfGrant): readonly Hex[] {
    this.assertGrant(grant);
    try {
      const call = decodeAccountCall(grant.request.callData);
      return call.kind === "routed"
        ? [this.runRouted(grant, call)]
        : this.runAccountCall(grant, call);
    } finally {
      if (this.activeGrant === grant) {
        this.activeGrant = undefined;
      }
    }
  }

  /**
   * Let an installed module execute a call from the account. Failures are
   * returned, not thrown.
   *
   * @throws AuthorizationError if the caller is not an installed module
   */
  executeFromModule(
    ctx: InvocationContext,
    target: Address,
    value: bigint,
    data: Hex,
  ): CallResult {
    if (!this.registry.isInstalled(ctx.caller)) {
      throw new AuthorizationError(`${ctx.caller} is not a module installed on ${this.address}`);
    }
    return this.host.call(this.address, target, value, data);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Call surface
  // ───────────────────────────────────────────────────────────────────────

  handleCall(ctx: CallContext, data: Hex): Hex {
    if (size(data) === 0) {
      return EMPTY_BYTES;
    }

    const call = decodeAccountCall(data);
    switch (call.kind) {
      case "execute":
        return this.forward(this.invokerFor(ctx.caller), call.target, call.value, call.data);
      case "executeBatch":
        return encodeAbiParameters(BATCH_RESULT_PARAMS, [
          [...this.forwardBatch(this.invokerFor(ctx.caller), call.targets, call.values, call.datas)],
        ]);
      case "installModule":
      case "uninstallModule":
        this.runAccountCall(this.selfGrantFor(ctx.caller), call);
        return EMPTY_BYTES;
      case "routed":
        throw new InvariantViolation(
          `Routed payload for key ${call.key} can only run through an accepted request`,
        );
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** Sequence number the next accepted request must carry. */
  get nonce(): bigint {
    return this.sequence;
  }

  getModule(key: string): ModuleBinding | undefined {
    return this.registry.lookup(normalizeRoutingKey(key));
  }

  listModules(): readonly ModuleBinding[] {
    return this.registry.entries();
  }

  getEventHistory(): readonly RouterEvent[] {
    return [...this.events];
  }

  checkpoint(): Restore {
    const restoreRegistry = this.registry.checkpoint();
    const sequence = this.sequence;
    const activeGrant = this.activeGrant;
    const eventCount = this.events.length;
    return () => {
      restoreRegistry();
      this.sequence = sequence;
      this.activeGrant = activeGrant;
      this.events.length = eventCount;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Accepts any signature that recovers a signer from the account-bound
   * digest. The recovered signer is not compared to anything.
   */
  private async decideDefault(
    request: AuthorizationRequest,
    requestHash: Hex,
  ): Promise<ValidationCode> {
    if (size(request.signature) !== SIGNATURE_SIZE) {
      return VALIDATION_FAILED;
    }
    const digest = defaultAuthorizationDigest(requestHash, this.address, this.chainId);
    try {
      const signer = await recoverMessageAddress({
        message: { raw: digest },
        signature: request.signature,
      });
      return isAddressEqual(signer, ZERO_ADDRESS) ? VALIDATION_FAILED : VALIDATION_SUCCESS;
    } catch {
      // Out-of-range r, s or v: nothing recoverable.
      return VALIDATION_FAILED;
    }
  }

  private settle(request: AuthorizationRequest, code: ValidationCode): AuthorizationOutcome {
    if (!isAccepted(code)) {
      return { accepted: false, code };
    }
    if (request.nonce !== this.sequence) {
      return { accepted: false, code: VALIDATION_FAILED };
    }
    const grant = new SelfGrant(this.address, this.sequence, request);
    this.sequence++;
    this.activeGrant = grant;
    return { accepted: true, code, grant };
  }

  private runAccountCall(grant: SelfGrant, call: Exclude<AccountCall, RoutedCall>): readonly Hex[] {
    switch (call.kind) {
      case "execute":
        return [this.forward(grant, call.target, call.value, call.data)];
      case "executeBatch":
        return this.forwardBatch(grant, call.targets, call.values, call.datas);
      case "installModule": {
        const module = this.resolveModule?.(getAddress(call.module));
        if (module === undefined) {
          throw new NotFoundError(`No module deployed at ${call.module}`);
        }
        this.install(grant, call.key, module, call.initData);
        return [];
      }
      case "uninstallModule":
        this.uninstall(grant, call.key, call.data);
        return [];
    }
  }

  /**
   * Forward an approved payload, then report it to the module that
   * decided it. If the module refuses, the call is undone.
   */
  private runRouted(grant: SelfGrant, call: RoutedCall): Hex {
    const binding = this.registry.lookup(call.key);
    if (binding === undefined) {
      throw new NotFoundError(`No module installed under routing key ${call.key}`);
    }
    return this.host.atomic(() => {
      const returnData = this.forward(grant, call.target, call.value, call.data);
      binding.module.onExecuted?.({ caller: this.address }, grant.request);
      return returnData;
    });
  }

  private callOut(target: Address, value: bigint, data: Hex): Hex {
    const result = this.host.call(this.address, target, value, data);
    if (!result.success) {
      throw new ForwardedCallFailure(
        `Call to ${target} failed: ${describeRevert(result.revertData)}`,
        result.revertData,
      );
    }
    return result.returnData;
  }

  private invokerFor(caller: Address): Invoker {
    return isAddressEqual(caller, this.address) ? this.selfGrantFor(caller) : caller;
  }

  private selfGrantFor(caller: Address): SelfGrant {
    if (!isAddressEqual(caller, this.address) || this.activeGrant === undefined) {
      throw new AuthorizationError(`Only ${this.address} may call this while authorized`);
    }
    return this.activeGrant;
  }

  private assertInvoker(invoker: Invoker, operation: string): void {
    if (invoker instanceof SelfGrant) {
      this.assertGrant(invoker);
      return;
    }
    this.assertDispatcher(invoker, operation);
  }

  private assertDispatcher(caller: Address, operation: string): void {
    if (!isAddressEqual(caller, this.dispatcher)) {
      throw new AuthorizationError(`${operation} may only be called by the dispatcher, not ${caller}`);
    }
  }

  private assertGrant(grant: SelfGrant): void {
    if (this.activeGrant === undefined || grant !== this.activeGrant) {
      throw new AuthorizationError("Self-only operation requires the grant of an accepted request");
    }
  }

  private emit(event: RouterEvent): void {
    this.events.push(event);
    this.onEvent?.(event);
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
