/**
 * Tests for VaultService.
 */

import { describe, it, expect } from "vitest";
import { ManualClock, VaultError } from "@coffer/vault";
import type { VaultLogEntry } from "@coffer/vault";
import { VaultService } from "../src/services/vault-service.js";
import { ALICE, BOB, FEES, OWNER, TOKEN, VAULT } from "./setup.js";

function createService(logFn?: (entry: VaultLogEntry) => void): VaultService {
  return new VaultService({
    vault: {
      name: "Service Vault",
      address: VAULT,
      token: { ledgerId: "sandbox", symbol: "CFR", decimals: 18 },
      owner: OWNER,
      feeCollector: FEES,
      feePercentage: 100,
      withdrawalLimit: 10_000n * TOKEN,
      withdrawalTimelock: 86_400,
    },
    seedBalances: [{ address: ALICE, amount: 1_000n * TOKEN }],
    clock: new ManualClock(1_000),
    logFn,
  });
}

describe("VaultService", () => {
  it("seeds the token ledger", async () => {
    const service = createService();

    expect(await service.tokenBalance(ALICE)).toBe(1_000n * TOKEN);
    expect(await service.tokenBalance(BOB)).toBe(0n);
  });

  it("runs overlapping mutations one after another", async () => {
    const service = createService();
    await service.approve(ALICE, 100n * TOKEN);

    const [receipt, info] = await Promise.all([
      service.deposit(ALICE, 100n * TOKEN),
      service.setFeePercentage(OWNER, 200),
    ]);

    expect(receipt.totalDeposited).toBe(100n * TOKEN);
    expect(info.feePercentage).toBe(200);
    expect(info.totalDeposited).toBe((100n * TOKEN).toString());
  });

  it("keeps serving after a rejected mutation", async () => {
    const service = createService();

    const [rejected, paused] = await Promise.allSettled([
      service.pause(ALICE),
      service.pause(OWNER),
    ]);

    expect(rejected.status).toBe("rejected");
    if (rejected.status === "rejected") {
      expect(rejected.reason).toBeInstanceOf(VaultError);
    }
    expect(paused).toMatchObject({ status: "fulfilled", value: { paused: true } });
  });

  it("stamps events with the injected clock", async () => {
    const service = createService();

    await service.pause(OWNER);

    expect(service.readEvents()[0]?.appendedAt).toBe("1970-01-01T00:16:40.000Z");
  });

  it("reports each vault call to logFn", async () => {
    const entries: VaultLogEntry[] = [];
    const service = createService((entry) => entries.push(entry));

    await service.pause(OWNER);
    await expect(service.unpause(ALICE)).rejects.toThrow(VaultError);

    expect(entries).toMatchObject([
      { operation: "pause", caller: OWNER, outcome: "committed", version: 1 },
      { operation: "unpause", caller: ALICE, outcome: "rejected", code: "UNAUTHORIZED" },
    ]);
  });

  it("keeps a verifiable event chain", async () => {
    const service = createService();
    await service.pause(OWNER);

    expect(service.verifyIntegrity()).toMatchObject({ valid: true, lastVerifiedPosition: 1 });
    expect(service.eventTypes()).toHaveLength(12);
  });
});
