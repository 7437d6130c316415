/**
 * @tessera/node: HTTP surface over an in-process authorization engine.
 */

export { AccountService } from "./services/account-service.js";
export type {
  AccountServiceConfig,
  ActivityEntry,
  AccountSummary,
  ApprovalView,
  ConfirmationsView,
  OwnerView,
  ModuleView,
  AccountEvents,
  TransactionFilter,
} from "./services/account-service.js";
export { loadConfig, parseAccounts, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedAccount } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
