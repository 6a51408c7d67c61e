/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { Address } from "@coffer/types";
import type { VaultService } from "../services/vault-service.js";

/**
 * Hono environment type for the coffer node.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The node's vault service (set by app middleware) */
    service: VaultService;

    /** Account the request acts as (set by auth middleware) */
    caller: Address;
  };
}
