import { describe, it, expect, vi } from "vitest";
import { InMemoryTokenLedger, TokenLedgerError } from "../src/token-ledger.js";
import { ALICE, BOB, VAULT } from "./fixtures.js";

describe("InMemoryTokenLedger", () => {
  it("moves balances on transfer", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.credit(ALICE, 100n);

    await ledger.transfer(ALICE, BOB, 30n);

    expect(await ledger.balanceOf(ALICE)).toBe(70n);
    expect(await ledger.balanceOf(BOB)).toBe(30n);
  });

  it("rejects a transfer beyond the balance", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.credit(ALICE, 10n);

    await expect(ledger.transfer(ALICE, BOB, 11n)).rejects.toHaveProperty("code", "INSUFFICIENT_FUNDS");
  });

  it("rejects invalid parties and negative amounts", async () => {
    const ledger = new InMemoryTokenLedger();

    await expect(ledger.transfer(ALICE, "", 0n)).rejects.toHaveProperty("code", "INVALID_TRANSFER");
    await expect(ledger.transfer(ALICE, BOB, -1n)).rejects.toBeInstanceOf(TokenLedgerError);
    expect(() => ledger.credit(ALICE, -1n)).toThrow(TokenLedgerError);
  });

  it("spends allowance on transferFrom", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.credit(ALICE, 100n);
    await ledger.approve(ALICE, VAULT, 60n);

    await ledger.transferFrom(VAULT, ALICE, VAULT, 40n);

    expect(await ledger.allowance(ALICE, VAULT)).toBe(20n);
    expect(await ledger.balanceOf(VAULT)).toBe(40n);
    await expect(ledger.transferFrom(VAULT, ALICE, VAULT, 21n)).rejects.toHaveProperty(
      "code",
      "INSUFFICIENT_ALLOWANCE",
    );
  });

  it("fires receive hooks after the transfer lands", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.credit(ALICE, 5n);
    const seen: bigint[] = [];
    ledger.onReceive(BOB, async (transfer) => {
      seen.push(await ledger.balanceOf(BOB), transfer.amount);
    });

    await ledger.transfer(ALICE, BOB, 5n);

    expect(seen).toEqual([5n, 5n]);
  });

  it("undoes a transfer whose hook throws", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.credit(ALICE, 5n);
    ledger.onReceive(BOB, () => {
      throw new Error("refused");
    });

    await expect(ledger.transfer(ALICE, BOB, 5n)).rejects.toThrow("refused");
    expect(await ledger.balanceOf(ALICE)).toBe(5n);
    expect(await ledger.balanceOf(BOB)).toBe(0n);
  });

  it("stops calling a hook after unsubscribe", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.credit(ALICE, 2n);
    const hook = vi.fn();
    const registration = ledger.onReceive(BOB, hook);

    await ledger.transfer(ALICE, BOB, 1n);
    registration.unsubscribe();
    await ledger.transfer(ALICE, BOB, 1n);

    expect(hook).toHaveBeenCalledTimes(1);
  });

  it("rolls back every write in a failed atomic scope", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.credit(ALICE, 100n);

    await expect(
      ledger.atomically(async () => {
        await ledger.transfer(ALICE, BOB, 40n);
        await ledger.approve(ALICE, VAULT, 10n);
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    expect(await ledger.balanceOf(ALICE)).toBe(100n);
    expect(await ledger.balanceOf(BOB)).toBe(0n);
    expect(await ledger.allowance(ALICE, VAULT)).toBe(0n);
  });

  it("keeps the outer scope's writes when a nested scope fails and is caught", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.credit(ALICE, 100n);

    await ledger.atomically(async () => {
      await ledger.transfer(ALICE, BOB, 10n);
      await ledger
        .atomically(async () => {
          await ledger.transfer(ALICE, BOB, 20n);
          throw new Error("inner");
        })
        .catch(() => undefined);
    });

    expect(await ledger.balanceOf(BOB)).toBe(10n);
  });
});
