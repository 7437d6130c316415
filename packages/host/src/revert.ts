/**
 * @tessera/host: Revert payload encoding.
 *
 * Call targets fail by throwing. The host turns the thrown value into the
 * bytes a caller sees:
 * - `CallReverted` / `ForwardedCallFailure` keep their raw payload, so a
 *   failure bubbles through any number of forwarding layers unchanged
 * - anything else becomes an ABI `Error(string)` payload
 */

import { BaseError, decodeErrorResult, encodeErrorResult } from "viem";
import { CallReverted, ForwardedCallFailure } from "@tessera/types";
import type { Hex } from "@tessera/types";

const ERROR_ABI = [
  {
    type: "error",
    name: "Error",
    inputs: [{ name: "message", type: "string" }],
  },
] as const;

/**
 * Encode a revert reason as `Error(string)`.
 */
export function encodeRevertReason(message: string): Hex {
  return encodeErrorResult({
    abi: ERROR_ABI,
    errorName: "Error",
    args: [message],
  });
}

/**
 * Decode an `Error(string)` payload. Returns undefined for any other payload.
 */
export function decodeRevertReason(data: Hex): string | undefined {
  try {
    const { args } = decodeErrorResult({ abi: ERROR_ABI, data });
    const [reason] = args ?? [];
    return typeof reason === "string" ? reason : undefined;
  } catch (err) {
    if (err instanceof BaseError) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Human-readable rendering of a revert payload: the reason when there is
 * one, the raw bytes otherwise.
 */
export function describeRevert(data: Hex): string {
  return decodeRevertReason(data) ?? data;
}

/**
 * Map a value thrown by a call target to its revert payload.
 */
export function toRevertData(thrown: unknown): Hex {
  if (thrown instanceof CallReverted || thrown instanceof ForwardedCallFailure) {
    return thrown.revertData;
  }
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  return encodeRevertReason(message);
}
