/**
 * Health check routes.
 *
 * GET /health  Liveness probe (always 200 if server is running)
 * GET /ready   Readiness probe with the chain identity and account count
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AccountService } from "../services/account-service.js";

export function createHealthRoutes(service: AccountService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    return c.json({
      status: "ready",
      chainId: service.chainId,
      dispatcher: service.dispatcher.address,
      engine: service.engine.address,
      accounts: service.listAccounts().length,
      startedAt: service.startedAt,
    });
  });

  return routes;
}
