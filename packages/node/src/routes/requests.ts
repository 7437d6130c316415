/**
 * Request routes.
 *
 * POST /api/v1/requests  Hand a batch of authorization requests to the
 *                        trusted dispatcher; one receipt per request
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { SubmitRequestsSchema } from "../types/dto.js";
import { toJsonValue } from "../types/json.js";
import { validateBody } from "../middleware/validate.js";

export function createRequestRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", validateBody(SubmitRequestsSchema), async (c) => {
    const { requests } = c.get("validatedBody");
    const receipts = await c.get("service").submitRequests(requests);
    return c.json({ data: toJsonValue(receipts) });
  });

  return routes;
}
