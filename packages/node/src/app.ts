/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Tests create the app through this factory
 * without starting an HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { VaultService } from "./services/vault-service.js";
import type { VaultServiceConfig } from "./services/vault-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import {
  createEventRoutes,
  createHealthRoutes,
  createTokenRoutes,
  createVaultRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: VaultServiceConfig;
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Auth configuration. Without it (or with no keys) the node runs unsecured. */
  readonly auth?: AuthConfig;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new VaultService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handlers ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) => c.json(createErrorEnvelope("NOT_FOUND", "Route not found"), 404));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });
  app.use("/api/*", authMiddleware(options.auth ?? { apiKeys: new Map() }));

  app.route("/api/v1/vault", createVaultRoutes());
  app.route("/api/v1/token", createTokenRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
