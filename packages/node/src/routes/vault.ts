/**
 * Vault routes.
 *
 * GET    /api/v1/vault                     - Vault info
 * GET    /api/v1/vault/balance             - Tokens held by the vault
 * GET    /api/v1/vault/depositors/:address - Withdrawal timing for a depositor
 * GET    /api/v1/vault/operators/:address  - Operator check
 * POST   /api/v1/vault/deposit             - Deposit (prior approval required)
 * POST   /api/v1/vault/withdraw            - Withdraw, fee deducted
 * POST   /api/v1/vault/emergency-withdraw  - Owner drains to self
 * POST   /api/v1/vault/pause | unpause     - Operator circuit breaker
 * PUT    /api/v1/vault/settings/*          - Owner-only settings
 * POST   /api/v1/vault/operators           - Add operator
 * DELETE /api/v1/vault/operators/:address  - Remove operator
 * PUT    /api/v1/vault/owner               - Transfer ownership
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AmountSchema,
  FeeCollectorSchema,
  FeePercentageSchema,
  OperatorSchema,
  OwnerSchema,
  WithdrawalLimitSchema,
  WithdrawalTimelockSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { depositJson, emergencyWithdrawalJson, withdrawalJson } from "./serialize.js";

export function createVaultRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Queries ───────────────────────────────────────────────────────

  routes.get("/", (c) => {
    return c.json({ data: c.get("service").info() });
  });

  routes.get("/balance", async (c) => {
    const service = c.get("service");
    const balance = await service.vaultBalance();
    return c.json({
      data: {
        balance: balance.toString(),
        totalDeposited: service.info().totalDeposited,
      },
    });
  });

  routes.get("/depositors/:address", (c) => {
    return c.json({ data: c.get("service").depositor(c.req.param("address")) });
  });

  routes.get("/operators/:address", (c) => {
    const address = c.req.param("address");
    return c.json({
      data: { address, isOperator: c.get("service").isOperator(address) },
    });
  });

  // ─── Funds ─────────────────────────────────────────────────────────

  routes.post("/deposit", validateBody(AmountSchema), async (c) => {
    const { amount } = c.get("validatedBody");
    const receipt = await c.get("service").deposit(c.get("caller"), amount);
    return c.json({ data: depositJson(receipt) });
  });

  routes.post("/withdraw", validateBody(AmountSchema), async (c) => {
    const { amount } = c.get("validatedBody");
    const receipt = await c.get("service").withdraw(c.get("caller"), amount);
    return c.json({ data: withdrawalJson(receipt) });
  });

  routes.post("/emergency-withdraw", validateBody(AmountSchema), async (c) => {
    const { amount } = c.get("validatedBody");
    const receipt = await c.get("service").emergencyWithdraw(c.get("caller"), amount);
    return c.json({ data: emergencyWithdrawalJson(receipt) });
  });

  // ─── Circuit breaker ───────────────────────────────────────────────

  routes.post("/pause", async (c) => {
    return c.json({ data: await c.get("service").pause(c.get("caller")) });
  });

  routes.post("/unpause", async (c) => {
    return c.json({ data: await c.get("service").unpause(c.get("caller")) });
  });

  // ─── Settings ──────────────────────────────────────────────────────

  routes.put("/settings/fee", validateBody(FeePercentageSchema), async (c) => {
    const { feePercentage } = c.get("validatedBody");
    const info = await c.get("service").setFeePercentage(c.get("caller"), feePercentage);
    return c.json({ data: info });
  });

  routes.put("/settings/fee-collector", validateBody(FeeCollectorSchema), async (c) => {
    const { feeCollector } = c.get("validatedBody");
    const info = await c.get("service").setFeeCollector(c.get("caller"), feeCollector);
    return c.json({ data: info });
  });

  routes.put("/settings/withdrawal-limit", validateBody(WithdrawalLimitSchema), async (c) => {
    const { withdrawalLimit } = c.get("validatedBody");
    const info = await c.get("service").setWithdrawalLimit(c.get("caller"), withdrawalLimit);
    return c.json({ data: info });
  });

  routes.put("/settings/timelock", validateBody(WithdrawalTimelockSchema), async (c) => {
    const { withdrawalTimelock } = c.get("validatedBody");
    const info = await c
      .get("service")
      .setWithdrawalTimelock(c.get("caller"), withdrawalTimelock);
    return c.json({ data: info });
  });

  // ─── Access ────────────────────────────────────────────────────────

  routes.post("/operators", validateBody(OperatorSchema), async (c) => {
    const { address } = c.get("validatedBody");
    const info = await c.get("service").addOperator(c.get("caller"), address);
    return c.json({ data: info }, 201);
  });

  routes.delete("/operators/:address", async (c) => {
    const info = await c
      .get("service")
      .removeOperator(c.get("caller"), c.req.param("address"));
    return c.json({ data: info });
  });

  routes.put("/owner", validateBody(OwnerSchema), async (c) => {
    const { owner } = c.get("validatedBody");
    const info = await c.get("service").transferOwnership(c.get("caller"), owner);
    return c.json({ data: info });
  });

  return routes;
}
