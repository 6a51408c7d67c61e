/**
 * Shared vault fixture: a vault on an in-memory token ledger, a manual
 * clock at 0 and an event store with a fixed append time.
 */

import { InMemoryEventStore } from "@coffer/event-store";
import type { StoredEvent } from "@coffer/event-store";
import { Vault } from "../src/vault.js";
import { InMemoryTokenLedger } from "../src/token-ledger.js";
import { ManualClock } from "../src/clock.js";
import type { VaultConfig, VaultLogEntry } from "../src/types.js";

export const OWNER = "0xowner";
export const OPERATOR = "0xoperator";
export const ALICE = "0xalice";
export const BOB = "0xbob";
export const FEES = "0xfees";
export const VAULT = "0xvault";
export const ZERO = "0x0000000000000000000000000000000000000000";

/** One whole token at 18 decimals */
export const TOKEN = 10n ** 18n;

export const DEFAULT_CONFIG: VaultConfig = {
  name: "Treasury Reserve",
  address: VAULT,
  token: { ledgerId: "sandbox", symbol: "CFR", decimals: 18 },
  owner: OWNER,
  feeCollector: FEES,
  feePercentage: 100,
  withdrawalLimit: 10_000n * TOKEN,
  withdrawalTimelock: 86_400,
};

export interface Fixture {
  readonly vault: Vault;
  readonly ledger: InMemoryTokenLedger;
  readonly clock: ManualClock;
  readonly events: InMemoryEventStore;
  readonly logs: VaultLogEntry[];
}

export function createFixture(overrides: Partial<VaultConfig> = {}): Fixture {
  const ledger = new InMemoryTokenLedger();
  const clock = new ManualClock();
  const events = new InMemoryEventStore({ now: () => new Date("2026-01-01T00:00:00.000Z") });
  const logs: VaultLogEntry[] = [];
  const vault = new Vault(
    { ...DEFAULT_CONFIG, ...overrides },
    { ledger, clock, events, logFn: (entry) => logs.push(entry) },
  );
  return { vault, ledger, clock, events, logs };
}

/** Credit `account` and approve the vault to pull the same amount. */
export async function fund(fixture: Fixture, account: string, amount: bigint): Promise<void> {
  fixture.ledger.credit(account, amount);
  await fixture.ledger.approve(account, fixture.vault.address, amount);
}

export function eventTypes(events: readonly StoredEvent[]): string[] {
  return events.map((e) => e.event.type);
}

/** The error code a synchronous call throws, or undefined if it returns. */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof Error && "code" in error && typeof error.code === "string") {
      return error.code;
    }
    throw error;
  }
  return undefined;
}
