/**
 * Account routes.
 *
 * GET  /api/v1/accounts                                       List accounts
 * POST /api/v1/accounts                                       Open an account
 * GET  /api/v1/accounts/:account                              Account summary
 * GET  /api/v1/accounts/:account/approval                     Approval configuration
 * GET  /api/v1/accounts/:account/transactions                 List transactions (?status=)
 * GET  /api/v1/accounts/:account/transactions/:id             One transaction
 * GET  /api/v1/accounts/:account/transactions/:id/confirmations
 * GET  /api/v1/accounts/:account/owners/:owner                Owner status
 * GET  /api/v1/accounts/:account/events                       Router and approval events
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { ZodTypeAny, output } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import {
  AddressSchema,
  ListTransactionsQuerySchema,
  OpenAccountSchema,
  TransactionIdSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { toJsonValue } from "../types/json.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";

type ParamResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly response: Response };

function parseParam<S extends ZodTypeAny>(
  c: Context,
  name: string,
  schema: S,
): ParamResult<output<S>> {
  const raw = c.req.param(name);
  const result = schema.safeParse(raw);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return {
    ok: false,
    response: c.json(
      createErrorEnvelope("VALIDATION_ERROR", `Invalid ${name}: "${raw ?? ""}"`),
      400,
    ),
  };
}

export function createAccountRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // List accounts
  routes.get("/", (c) => {
    const service = c.get("service");
    return c.json({ data: toJsonValue(service.listAccounts()) });
  });

  // Open an account
  routes.post("/", validateBody(OpenAccountSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");
    const account = service.openAccount(body.address, body.balance);
    return c.json({ data: toJsonValue(account) }, 201);
  });

  // Account summary
  routes.get("/:account", (c) => {
    const account = parseParam(c, "account", AddressSchema);
    if (!account.ok) return account.response;
    return c.json({ data: toJsonValue(c.get("service").getAccount(account.value)) });
  });

  // Approval configuration
  routes.get("/:account/approval", (c) => {
    const account = parseParam(c, "account", AddressSchema);
    if (!account.ok) return account.response;
    return c.json({ data: toJsonValue(c.get("service").getApproval(account.value)) });
  });

  // List transactions
  routes.get("/:account/transactions", (c) => {
    const account = parseParam(c, "account", AddressSchema);
    if (!account.ok) return account.response;

    const query = ListTransactionsQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(query.error),
        }),
        400,
      );
    }

    const transactions = c.get("service").listTransactions(account.value, query.data.status);
    return c.json({ data: toJsonValue(transactions) });
  });

  // One transaction
  routes.get("/:account/transactions/:id", (c) => {
    const account = parseParam(c, "account", AddressSchema);
    if (!account.ok) return account.response;
    const id = parseParam(c, "id", TransactionIdSchema);
    if (!id.ok) return id.response;

    const transaction = c.get("service").getTransaction(account.value, id.value);
    return c.json({ data: toJsonValue(transaction) });
  });

  // Confirmations
  routes.get("/:account/transactions/:id/confirmations", (c) => {
    const account = parseParam(c, "account", AddressSchema);
    if (!account.ok) return account.response;
    const id = parseParam(c, "id", TransactionIdSchema);
    if (!id.ok) return id.response;

    const confirmations = c.get("service").getConfirmations(account.value, id.value);
    return c.json({ data: toJsonValue(confirmations) });
  });

  // Owner status
  routes.get("/:account/owners/:owner", (c) => {
    const account = parseParam(c, "account", AddressSchema);
    if (!account.ok) return account.response;
    const owner = parseParam(c, "owner", AddressSchema);
    if (!owner.ok) return owner.response;

    return c.json({ data: toJsonValue(c.get("service").getOwner(account.value, owner.value)) });
  });

  // Event history
  routes.get("/:account/events", (c) => {
    const account = parseParam(c, "account", AddressSchema);
    if (!account.ok) return account.response;
    return c.json({ data: toJsonValue(c.get("service").getEvents(account.value)) });
  });

  return routes;
}
