/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces a consistent
 * error envelope response. Known domain error codes map to HTTP statuses;
 * anything else is a 500 whose message is not exposed.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { VaultError } from "@coffer/vault";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Vault: bad input
  INVALID_AMOUNT: 400,
  INVALID_ADDRESS: 400,
  INVALID_ARGUMENT: 400,
  FEE_EXCEEDS_MAXIMUM: 400,
  INVALID_SNAPSHOT: 400,

  // Vault: access
  UNAUTHORIZED: 403,
  NOT_OPERATOR: 404,

  // Vault: state conflicts
  ALREADY_OPERATOR: 409,
  CANNOT_REMOVE_OWNER: 409,
  REENTRANT_CALL: 409,
  PAUSED: 423,

  // Vault: funds
  WITHDRAWAL_LIMIT_EXCEEDED: 422,
  INSUFFICIENT_BALANCE: 422,
  WITHDRAWAL_TOO_SOON: 429,

  // Token ledger
  INSUFFICIENT_FUNDS: 422,
  INSUFFICIENT_ALLOWANCE: 422,
  INVALID_TRANSFER: 400,

  // Event store
  CONCURRENCY_CONFLICT: 409,
};

function getErrorCode(err: Error): string | undefined {
  if ("code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  const code = getErrorCode(err);
  const status = code !== undefined ? STATUS_MAP[code] : undefined;

  if (code === undefined || status === undefined) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const details = err instanceof VaultError ? err.details : undefined;
  return c.json(createErrorEnvelope(code, err.message, details), status);
}
