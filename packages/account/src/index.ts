/**
 * @tessera/account: Account Router and trusted dispatcher.
 *
 * An account delegates "is this request authorized?" to the validation
 * module installed under the request's routing key, falling back to a
 * default signature check, and forwards calls on its own behalf once a
 * request has been accepted.
 */

// Router
export { AccountRouter } from "./router.js";
export { SelfGrant } from "./types.js";
export type {
  AccountRouterConfig,
  AuthorizationOutcome,
  Invoker,
  RouterEvent,
  ModuleInstalledEvent,
  ModuleUninstalledEvent,
  RequestAuthorizedEvent,
  RequestRejectedEvent,
} from "./types.js";

// Registry
export { ValidatorRegistry } from "./registry.js";
export type { ModuleBinding } from "./registry.js";

// Routing
export {
  ROUTING_KEY_SIZE,
  normalizeRoutingKey,
  extractRoutingKey,
  payloadAfterKey,
  encodeRoutedCall,
  decodeAccountCall,
} from "./routing.js";
export type { RoutingKey, Route, AccountCall } from "./routing.js";

// Hashing
export { packRequest, getRequestHash, defaultAuthorizationDigest } from "./request-hash.js";

// ABI
export { accountAbi, dispatcherAbi } from "./abi.js";

// Dispatcher
export { InProcessDispatcher } from "./dispatcher.js";
export type {
  InProcessDispatcherConfig,
  RequestReceipt,
  RequestStatus,
} from "./dispatcher.js";
