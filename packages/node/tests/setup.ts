/**
 * Test helpers for @coffer/node.
 *
 * Provides a test app factory that creates a Hono app with all
 * middleware and routes, but no HTTP server, on a manual clock.
 */

import { ManualClock } from "@coffer/vault";
import type { Address } from "@coffer/types";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const OWNER = "0xowner";
export const OPERATOR = "0xoperator";
export const ALICE = "0xalice";
export const BOB = "0xbob";
export const FEES = "0xfees";
export const VAULT = "0xvault";

/** One whole token in base units */
export const TOKEN = 10n ** 18n;

export interface TestApp extends AppInstance {
  readonly clock: ManualClock;
}

/**
 * Create a test app. Alice and Bob start with 1000 tokens each and the
 * clock starts at 0.
 */
export function createTestApp(
  options: Pick<CreateAppOptions, "auth" | "logFn"> = {},
): TestApp {
  const clock = new ManualClock();
  const instance = createApp({
    serviceConfig: {
      vault: {
        name: "Test Vault",
        address: VAULT,
        token: { ledgerId: "sandbox", symbol: "CFR", decimals: 18 },
        owner: OWNER,
        feeCollector: FEES,
        feePercentage: 100,
        withdrawalLimit: 10_000n * TOKEN,
        withdrawalTimelock: 86_400,
      },
      seedBalances: [
        { address: ALICE, amount: 1_000n * TOKEN },
        { address: BOB, amount: 1_000n * TOKEN },
      ],
      clock,
    },
    auth: options.auth,
    logFn: options.logFn,
  });

  return { ...instance, clock };
}

/**
 * JSON request helper.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * JSON request sent as `caller` (unsecured mode).
 */
export function callerRequest(
  caller: Address,
  path: string,
  method: string,
  body?: unknown,
): Request {
  return jsonRequest(path, method, body, { "X-Caller": caller });
}

/**
 * Approve the vault and deposit `amount` base units as `caller`.
 */
export async function approveAndDeposit(
  { app }: AppInstance,
  caller: Address,
  amount: bigint,
): Promise<Response> {
  await app.request(
    callerRequest(caller, "/api/v1/token/approve", "POST", { amount: amount.toString() }),
  );
  return app.request(
    callerRequest(caller, "/api/v1/vault/deposit", "POST", { amount: amount.toString() }),
  );
}
