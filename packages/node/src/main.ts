/**
 * @coffer/node - Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import type { Address } from "@coffer/types";
import { loadConfig, parseApiKeys, parseSeedBalances } from "./config.js";
import { createApp } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const apiKeys = new Map<string, Address>();
  for (const k of parseApiKeys(config.API_KEYS)) {
    apiKeys.set(k.key, k.address);
  }
  if (apiKeys.size > 0) {
    logger.info({ apiKeyCount: apiKeys.size }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in unsecured mode (X-Caller header)");
  }

  const vaultLogger = logger.child({ component: "vault" });

  const { app, service } = createApp({
    serviceConfig: {
      vault: {
        name: config.VAULT_NAME,
        address: config.VAULT_ADDRESS,
        token: {
          ledgerId: "sandbox",
          symbol: config.TOKEN_SYMBOL,
          decimals: config.TOKEN_DECIMALS,
        },
        owner: config.VAULT_OWNER,
        feeCollector: config.FEE_COLLECTOR,
        feePercentage: config.FEE_PERCENTAGE,
        withdrawalLimit: config.WITHDRAWAL_LIMIT,
        withdrawalTimelock: config.WITHDRAWAL_TIMELOCK,
      },
      seedBalances: parseSeedBalances(config.TOKEN_SEED_BALANCES),
      logFn: (entry) => {
        if (entry.outcome === "committed") {
          vaultLogger.info(entry, `${entry.operation} committed`);
        } else {
          vaultLogger.warn(entry, `${entry.operation} rejected`);
        }
      },
      onHandlerError: (err, event) => {
        vaultLogger.error(
          { err, type: event.event.type, position: event.globalPosition },
          "Event subscriber failed",
        );
      },
    },
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    auth: { apiKeys },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, vault: service.info().address },
    "Coffer node started",
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
