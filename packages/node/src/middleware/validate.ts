/**
 * Zod validation middleware.
 *
 * Validates request bodies against a Zod schema. Returns 400 with an
 * error envelope on failure.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodTypeAny, output } from "zod";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Context variables contributed by `validateBody`.
 */
export interface ValidatedEnv<T> {
  Variables: {
    validatedBody: T;
  };
}

/**
 * Validate the JSON request body. On success the parsed value is
 * available to the next handler as `validatedBody`.
 */
export function validateBody<S extends ZodTypeAny>(
  schema: S,
): MiddlewareHandler<ValidatedEnv<output<S>>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    await next();
  };
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
