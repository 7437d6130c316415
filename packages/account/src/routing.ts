/**
 * Routing: routing keys, routes and account call decoding.
 *
 * A request's `callData` starts with a 4-byte routing key. The key either
 * selects one of the account's own functions (execute, executeBatch,
 * installModule, uninstallModule) or, for any other value, marks a routed
 * payload: `key ++ abi.encode(address target, uint256 value, bytes data)`,
 * decided by the module installed under that key.
 */

import {
  BaseError,
  concat,
  decodeAbiParameters,
  decodeFunctionData,
  encodeAbiParameters,
  parseAbiParameters,
  size,
  slice,
  toFunctionSelector,
} from "viem";
import { EMPTY_BYTES, InvariantViolation, isHex } from "@tessera/types";
import type { Address, Hex } from "@tessera/types";
import { accountAbi } from "./abi.js";
import type { ModuleBinding } from "./registry.js";

// =============================================================================
// Routing keys
// =============================================================================

/**
 * 4-byte routing key, lowercase hex.
 */
export type RoutingKey = Hex;

export const ROUTING_KEY_SIZE = 4;

/**
 * Validate and lowercase a routing key.
 *
 * @throws InvariantViolation if the key is not exactly 4 bytes of hex
 */
export function normalizeRoutingKey(key: string): RoutingKey {
  if (!isHex(key) || size(key) !== ROUTING_KEY_SIZE) {
    throw new InvariantViolation(`Routing key must be ${ROUTING_KEY_SIZE} bytes, got "${key}"`);
  }
  return `0x${key.slice(2).toLowerCase()}`;
}

/**
 * The routing key at the front of `callData`, or undefined when the
 * payload is too short to carry one.
 */
export function extractRoutingKey(callData: Hex): RoutingKey | undefined {
  if (size(callData) < ROUTING_KEY_SIZE) return undefined;
  return normalizeRoutingKey(slice(callData, 0, ROUTING_KEY_SIZE));
}

/**
 * The call payload behind the routing key.
 */
export function payloadAfterKey(callData: Hex): Hex {
  if (size(callData) <= ROUTING_KEY_SIZE) return EMPTY_BYTES;
  return slice(callData, ROUTING_KEY_SIZE);
}

// =============================================================================
// Routes
// =============================================================================

/**
 * Where a request's decision is made.
 */
export type Route =
  | { readonly kind: "module"; readonly binding: ModuleBinding }
  | { readonly kind: "default" };

// =============================================================================
// Routed payloads
// =============================================================================

const ROUTED_CALL_PARAMS = parseAbiParameters("address target, uint256 value, bytes data");

/**
 * Build the `callData` of a request routed to the module under `key`.
 */
export function encodeRoutedCall(
  key: Hex,
  target: Address,
  value: bigint,
  data: Hex,
): Hex {
  return concat([
    normalizeRoutingKey(key),
    encodeAbiParameters(ROUTED_CALL_PARAMS, [target, value, data]),
  ]);
}

// =============================================================================
// Account calls
// =============================================================================

export type AccountCall =
  | {
      readonly kind: "execute";
      readonly target: Address;
      readonly value: bigint;
      readonly data: Hex;
    }
  | {
      readonly kind: "executeBatch";
      readonly targets: readonly Address[];
      readonly values: readonly bigint[];
      readonly datas: readonly Hex[];
    }
  | {
      readonly kind: "installModule";
      readonly key: RoutingKey;
      readonly module: Address;
      readonly initData: Hex;
    }
  | {
      readonly kind: "uninstallModule";
      readonly key: RoutingKey;
      readonly data: Hex;
    }
  | {
      readonly kind: "routed";
      readonly key: RoutingKey;
      readonly target: Address;
      readonly value: bigint;
      readonly data: Hex;
    };

const ACCOUNT_SELECTORS: ReadonlySet<string> = new Set(
  accountAbi.map((item) => toFunctionSelector(item)),
);

/**
 * Decode `callData` into the account call it describes.
 *
 * @throws InvariantViolation for payloads that are too short or malformed
 */
export function decodeAccountCall(callData: Hex): AccountCall {
  const key = extractRoutingKey(callData);
  if (key === undefined) {
    throw new InvariantViolation("Call data is shorter than a routing key");
  }

  try {
    return ACCOUNT_SELECTORS.has(key)
      ? decodeOwnCall(callData)
      : decodeRoutedCall(key, callData);
  } catch (err) {
    if (err instanceof BaseError) {
      throw new InvariantViolation(`Malformed call data for key ${key}: ${err.shortMessage}`);
    }
    throw err;
  }
}

function decodeOwnCall(callData: Hex): AccountCall {
  const decoded = decodeFunctionData({ abi: accountAbi, data: callData });

  switch (decoded.functionName) {
    case "execute": {
      const [target, value, data] = decoded.args;
      return { kind: "execute", target, value, data };
    }
    case "executeBatch": {
      const [targets, values, datas] = decoded.args;
      return { kind: "executeBatch", targets, values, datas };
    }
    case "installModule": {
      const [key, module, initData] = decoded.args;
      return { kind: "installModule", key: normalizeRoutingKey(key), module, initData };
    }
    case "uninstallModule": {
      const [key, data] = decoded.args;
      return { kind: "uninstallModule", key: normalizeRoutingKey(key), data };
    }
  }
}

function decodeRoutedCall(key: RoutingKey, callData: Hex): AccountCall {
  const [target, value, data] = decodeAbiParameters(
    ROUTED_CALL_PARAMS,
    payloadAfterKey(callData),
  );
  return { kind: "routed", key, target, value, data };
}
