/**
 * Authentication middleware.
 *
 * Resolves the account a request acts as. Two modes:
 * 1. Secured: X-Api-Key is looked up in the configured key registry
 * 2. Unsecured (no keys configured): X-Caller names the account directly.
 *    Reads pass without it. For tests and local development only.
 *
 * On success, sets `c.set("caller", address)`. On failure, returns 401.
 * Whether the caller may perform an operation is the vault's decision.
 */

import type { MiddlewareHandler } from "hono";
import type { Address } from "@coffer/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";
export const CALLER_HEADER = "X-Caller";

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

export interface AuthConfig {
  /** Map of API key → account address. Empty selects unsecured mode. */
  readonly apiKeys: ReadonlyMap<string, Address>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  const secured = config.apiKeys.size > 0;

  return async (c, next) => {
    if (secured) {
      const apiKey = c.req.header(API_KEY_HEADER);
      if (apiKey === undefined) {
        return c.json(
          createErrorEnvelope("UNAUTHENTICATED", "Authentication required"),
          401,
        );
      }

      const address = config.apiKeys.get(apiKey);
      if (address === undefined) {
        return c.json(createErrorEnvelope("UNAUTHENTICATED", "Invalid API key"), 401);
      }

      c.set("caller", address);
      return next();
    }

    const caller = c.req.header(CALLER_HEADER)?.trim();
    if (caller !== undefined && caller !== "") {
      c.set("caller", caller);
      return next();
    }

    if (READ_METHODS.has(c.req.method)) {
      return next();
    }

    return c.json(
      createErrorEnvelope("UNAUTHENTICATED", `${CALLER_HEADER} header required`),
      401,
    );
  };
}
