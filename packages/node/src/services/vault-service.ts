/**
 * VaultService - Composition root for the node.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. One node serves one vault backed by an in-process
 * token ledger and event store.
 *
 * The vault rejects overlapping mutating calls (REENTRANT_CALL). HTTP
 * requests arrive concurrently, so every mutation here is queued and
 * runs after the previous one settles.
 */

import type { Address } from "@coffer/types";
import { Vault, InMemoryTokenLedger, systemClock } from "@coffer/vault";
import type {
  Clock,
  DepositReceipt,
  DepositorInfo,
  EmergencyWithdrawalReceipt,
  VaultConfig,
  VaultInfo,
  VaultLogEntry,
  WithdrawalReceipt,
} from "@coffer/vault";
import { InMemoryEventStore } from "@coffer/event-store";
import type {
  EventSchema,
  EventStoreIntegrityResult,
  ReadAllOptions,
  StoredEvent,
} from "@coffer/event-store";
import type { SeedBalance } from "../config.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly vault: VaultConfig;

  /** Opening balances on the in-process token ledger */
  readonly seedBalances?: readonly SeedBalance[];

  /** Default: systemClock */
  readonly clock?: Clock;

  /** Receives one entry per mutating vault call */
  readonly logFn?: (entry: VaultLogEntry) => void;

  /** Receives errors thrown by event store subscribers */
  readonly onHandlerError?: (error: unknown, event: StoredEvent) => void;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly vault: Vault;
  readonly ledger: InMemoryTokenLedger;
  readonly eventStore: InMemoryEventStore;

  private _queue: Promise<unknown> = Promise.resolve();

  constructor(config: VaultServiceConfig) {
    const clock = config.clock ?? systemClock;

    this.ledger = new InMemoryTokenLedger();
    for (const seed of config.seedBalances ?? []) {
      this.ledger.credit(seed.address, seed.amount);
    }

    this.eventStore = new InMemoryEventStore({
      now: () => new Date(clock.now() * 1000),
      onHandlerError: config.onHandlerError,
    });

    this.vault = new Vault(config.vault, {
      ledger: this.ledger,
      clock,
      events: this.eventStore,
      logFn: config.logFn,
    });
  }

  // ─── Funds ─────────────────────────────────────────────────────────

  deposit(caller: Address, amount: bigint): Promise<DepositReceipt> {
    return this._serialize(() => this.vault.deposit(caller, amount));
  }

  withdraw(caller: Address, amount: bigint): Promise<WithdrawalReceipt> {
    return this._serialize(() => this.vault.withdraw(caller, amount));
  }

  emergencyWithdraw(caller: Address, amount: bigint): Promise<EmergencyWithdrawalReceipt> {
    return this._serialize(() => this.vault.emergencyWithdraw(caller, amount));
  }

  // ─── Administration ────────────────────────────────────────────────

  pause(caller: Address): Promise<VaultInfo> {
    return this._mutate(() => this.vault.pause(caller));
  }

  unpause(caller: Address): Promise<VaultInfo> {
    return this._mutate(() => this.vault.unpause(caller));
  }

  setFeePercentage(caller: Address, feePercentage: number): Promise<VaultInfo> {
    return this._mutate(() => this.vault.setFeePercentage(caller, feePercentage));
  }

  setFeeCollector(caller: Address, feeCollector: Address): Promise<VaultInfo> {
    return this._mutate(() => this.vault.setFeeCollector(caller, feeCollector));
  }

  setWithdrawalLimit(caller: Address, withdrawalLimit: bigint): Promise<VaultInfo> {
    return this._mutate(() => this.vault.setWithdrawalLimit(caller, withdrawalLimit));
  }

  setWithdrawalTimelock(caller: Address, withdrawalTimelock: number): Promise<VaultInfo> {
    return this._mutate(() => this.vault.setWithdrawalTimelock(caller, withdrawalTimelock));
  }

  addOperator(caller: Address, address: Address): Promise<VaultInfo> {
    return this._mutate(() => this.vault.addOperator(caller, address));
  }

  removeOperator(caller: Address, address: Address): Promise<VaultInfo> {
    return this._mutate(() => this.vault.removeOperator(caller, address));
  }

  transferOwnership(caller: Address, newOwner: Address): Promise<VaultInfo> {
    return this._mutate(() => this.vault.transferOwnership(caller, newOwner));
  }

  // ─── Token ─────────────────────────────────────────────────────────

  /**
   * Let the vault pull up to `amount` from the caller's account.
   */
  approve(caller: Address, amount: bigint): Promise<bigint> {
    return this._serialize(async () => {
      await this.ledger.approve(caller, this.vault.address, amount);
      return this.ledger.allowance(caller, this.vault.address);
    });
  }

  tokenBalance(account: Address): Promise<bigint> {
    return this.ledger.balanceOf(account);
  }

  allowance(owner: Address): Promise<bigint> {
    return this.ledger.allowance(owner, this.vault.address);
  }

  // ─── Queries ───────────────────────────────────────────────────────

  info(): VaultInfo {
    return this.vault.info();
  }

  depositor(address: Address): DepositorInfo {
    return this.vault.depositor(address);
  }

  isOperator(address: Address): boolean {
    return this.vault.isOperator(address);
  }

  vaultBalance(): Promise<bigint> {
    return this.vault.vaultBalance();
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  eventTypes(): readonly EventSchema[] {
    return this.vault.catalog.listSchemas();
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }

  // ─── Internals ─────────────────────────────────────────────────────

  private _mutate(work: () => void): Promise<VaultInfo> {
    return this._serialize(async () => {
      work();
      return this.vault.info();
    });
  }

  private _serialize<T>(work: () => Promise<T>): Promise<T> {
    const result = this._queue.then(() => work());
    this._queue = result.catch(() => undefined);
    return result;
  }
}
