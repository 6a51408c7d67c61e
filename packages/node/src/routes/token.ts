/**
 * Token ledger routes (sandbox ledger only).
 *
 * GET  /api/v1/token/balances/:address - Token balance and allowance to the vault
 * POST /api/v1/token/approve           - Caller approves the vault for an amount
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/balances/:address", async (c) => {
    const service = c.get("service");
    const address = c.req.param("address");
    const [balance, allowance] = await Promise.all([
      service.tokenBalance(address),
      service.allowance(address),
    ]);

    return c.json({
      data: {
        address,
        balance: balance.toString(),
        allowance: allowance.toString(),
      },
    });
  });

  routes.post("/approve", validateBody(AmountSchema), async (c) => {
    const service = c.get("service");
    const caller = c.get("caller");
    const { amount } = c.get("validatedBody");
    const allowance = await service.approve(caller, amount);

    return c.json({
      data: {
        owner: caller,
        spender: service.info().address,
        allowance: allowance.toString(),
      },
    });
  });

  return routes;
}
