/**
 * @tessera/node: Entry point.
 *
 * Loads config, opens the configured accounts, starts the HTTP server
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { Logger } from "pino";
import { loadConfig, parseAccounts } from "./config.js";
import { createApp } from "./app.js";
import { AccountService } from "./services/account-service.js";
import type { ActivityEntry } from "./services/account-service.js";
import { toJsonObject } from "./types/json.js";

function logActivity(logger: Logger, entry: ActivityEntry): void {
  switch (entry.source) {
    case "router":
    case "engine":
      logger.info(toJsonObject(entry.event), `${entry.source}: ${entry.event.type}`);
      return;
    case "dispatcher":
      logger.info(toJsonObject(entry.receipt), `request ${entry.receipt.status}`);
      return;
  }
}

// =============================================================================
// Bootstrap
// =============================================================================

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const service = new AccountService({
    chainId: config.CHAIN_ID,
    dispatcherAddress: config.DISPATCHER_ADDRESS,
    engineAddress: config.ENGINE_ADDRESS,
    onActivity: (entry) => logActivity(logger, entry),
  });

  for (const { address, balance } of parseAccounts(config.ACCOUNTS)) {
    service.openAccount(address, balance);
    logger.info({ account: address, balance: balance.toString() }, "Account opened");
  }

  const { app } = createApp({
    service,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      chainId: config.CHAIN_ID,
      dispatcher: service.dispatcher.address,
      engine: service.engine.address,
    },
    "Tessera node started",
  );

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
