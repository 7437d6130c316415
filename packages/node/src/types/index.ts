/**
 * Type barrel: re-exports all public types from @tessera/node.
 */

// DTOs
export {
  AddressSchema,
  HexSchema,
  UintSchema,
  TransactionIdSchema,
  OpenAccountSchema,
  ListTransactionsQuerySchema,
  AuthorizationRequestSchema,
  SubmitRequestsSchema,
} from "./dto.js";
export type {
  OpenAccountDto,
  ListTransactionsQuery,
  AuthorizationRequestDto,
  SubmitRequestsDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// JSON
export { toJsonValue, toJsonObject } from "./json.js";
export type { JsonValue, JsonObject } from "./json.js";

// App env
export type { AppEnv } from "./api-contract.js";
