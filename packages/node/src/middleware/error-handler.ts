/**
 * Global error handler.
 *
 * Maps engine errors to HTTP status codes by their `code` and renders
 * every failure as an error envelope. Anything that is not an engine
 * error is reported as INTERNAL_ERROR without its message.
 */

import type { Context } from "hono";
import { ForwardedCallFailure, isEngineError } from "@tessera/types";
import type { EngineErrorCode } from "@tessera/types";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Engine Error → HTTP Status Mapping
// =============================================================================

export type ErrorStatus = 400 | 403 | 404 | 409 | 422 | 500 | 502;

export const STATUS_MAP: Readonly<Record<EngineErrorCode, ErrorStatus>> = {
  UNAUTHORIZED: 403,
  NOT_FOUND: 404,
  INVARIANT_VIOLATION: 422,
  ALREADY_IN_STATE: 409,
  INTEGRITY_MISMATCH: 409,
  FORWARDED_CALL_FAILED: 502,
};

// =============================================================================
// Handlers
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (isEngineError(err)) {
    const details = err instanceof ForwardedCallFailure ? { revertData: err.revertData } : undefined;
    return c.json(createErrorEnvelope(err.code, err.message, details), STATUS_MAP[err.code]);
  }

  return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
}

/**
 * Registered as Hono's notFound handler.
 */
export function handleNotFound(c: Context): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}
