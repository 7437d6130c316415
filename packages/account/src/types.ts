/**
 * Account Types
 *
 * The self grant, authorization outcomes and router events.
 */

import type {
  Address,
  AuthorizationRequest,
  ChainId,
  ExecutionHost,
  Hex,
  ValidationCode,
  ValidationModule,
} from "@tessera/types";
import type { RoutingKey } from "./routing.js";

// =============================================================================
// Self grant
// =============================================================================

/**
 * Capability to act as the account itself.
 *
 * Issued only by an accepted `authorize`, valid for that one request, and
 * compared by identity: a look-alike object is never accepted.
 */
export class SelfGrant {
  constructor(
    readonly account: Address,
    readonly sequence: bigint,
    readonly request: AuthorizationRequest,
  ) {
    Object.freeze(this);
  }
}

/**
 * Who may forward calls: the trusted dispatcher (by address) or the
 * account itself (by grant).
 */
export type Invoker = Address | SelfGrant;

// =============================================================================
// Outcomes
// =============================================================================

export type AuthorizationOutcome =
  | { readonly accepted: true; readonly code: ValidationCode; readonly grant: SelfGrant }
  | { readonly accepted: false; readonly code: ValidationCode };

// =============================================================================
// Events
// =============================================================================

export type RouterEvent =
  | ModuleInstalledEvent
  | ModuleUninstalledEvent
  | RequestAuthorizedEvent
  | RequestRejectedEvent;

export interface ModuleInstalledEvent {
  readonly type: "module_installed";
  readonly account: Address;
  readonly key: RoutingKey;
  readonly module: Address;
  readonly timestamp: string;
}

export interface ModuleUninstalledEvent {
  readonly type: "module_uninstalled";
  readonly account: Address;
  readonly key: RoutingKey;
  readonly module: Address;
  readonly timestamp: string;
}

export interface RequestAuthorizedEvent {
  readonly type: "request_authorized";
  readonly account: Address;
  readonly requestHash: Hex;
  readonly nonce: bigint;
  readonly route: "module" | "default";
  readonly timestamp: string;
}

export interface RequestRejectedEvent {
  readonly type: "request_rejected";
  readonly account: Address;
  readonly requestHash: Hex;
  readonly nonce: bigint;
  readonly route: "module" | "default";
  readonly code: ValidationCode;
  readonly timestamp: string;
}

// =============================================================================
// Configuration
// =============================================================================

export interface AccountRouterConfig {
  /** The account's own identity */
  readonly address: Address;

  /** The only external identity allowed to authorize and forward */
  readonly dispatcher: Address;

  readonly chainId: ChainId;

  readonly host: ExecutionHost;

  /** Finds the module deployed at an address (for installs requested by call data) */
  readonly resolveModule?: (address: Address) => ValidationModule | undefined;

  readonly onEvent?: (event: RouterEvent) => void;

  /** Default: () => new Date() */
  readonly clock?: () => Date;
}
