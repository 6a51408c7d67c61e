/**
 * Vault - custodial token pool with role-gated, throttled, fee-bearing
 * withdrawals.
 *
 * Composes:
 * - AccessRegistry (owner + operators)
 * - PauseGate (deposit/withdraw circuit breaker)
 * - FeeEngine (basis-point fees)
 * - ReentrancyGuard (one mutating call at a time)
 *
 * Every mutating call is a transaction. The vault checkpoints its state,
 * runs the call inside `ledger.atomically`, and appends the call's events
 * to the event store in one batch. Any failure restores the checkpoint,
 * lets the token ledger undo its writes and drops the staged events; the
 * error is rethrown as it was.
 */

import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import type { Address, DomainEvent, EventSource, TokenRef } from "@coffer/types";
import { isBaseUnitAmount, isTokenRef } from "@coffer/types";
import type {
  EventCatalog,
  EventStore,
  VaultEventPayloads,
  VaultEventType,
} from "@coffer/event-store";
import {
  EventStoreError,
  InMemoryEventStore,
  VAULT_EVENTS,
  createVaultCatalog,
} from "@coffer/event-store";
import { AccessRegistry, assertAddress } from "./access-registry.js";
import type { AccessRegistryState } from "./access-registry.js";
import { systemClock } from "./clock.js";
import type { Clock } from "./clock.js";
import { VaultError } from "./errors.js";
import { assertValidFee, computeFee } from "./fee-engine.js";
import { PauseGate } from "./pause-gate.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { TokenLedgerError } from "./token-ledger.js";
import type { TokenLedger } from "./token-ledger.js";
import type {
  DepositReceipt,
  DepositorInfo,
  EmergencyWithdrawalReceipt,
  VaultConfig,
  VaultDeps,
  VaultInfo,
  VaultLogEntry,
  VaultOperation,
  VaultSnapshot,
  WithdrawalReceipt,
} from "./types.js";

// =============================================================================
// Internal state
// =============================================================================

interface LedgerState {
  feeCollector: Address;
  feePercentage: number;
  withdrawalLimit: bigint;
  withdrawalTimelock: number;
  totalDeposited: bigint;
  version: number;
  /** Depositors who never withdrew are absent and read as 0 */
  lastWithdrawal: Map<Address, number>;
}

interface Checkpoint {
  readonly access: AccessRegistryState;
  readonly paused: boolean;
  readonly state: LedgerState;
}

/**
 * Events staged by one call. They reach the store only if the call commits.
 */
class EventBatch {
  readonly correlationId = randomUUID();
  private readonly _events: DomainEvent[] = [];

  constructor(
    private readonly actor: Address,
    private readonly catalog: EventCatalog,
  ) {}

  get events(): readonly DomainEvent[] {
    return this._events;
  }

  stage<K extends VaultEventType>(
    type: K,
    source: EventSource,
    payload: VaultEventPayloads[K],
  ): void {
    if (!this.catalog.validate(type, payload)) {
      throw new VaultError("INVALID_EVENT", `Payload for "${type}" does not match its schema`, {
        type,
      });
    }

    this._events.push({
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: new Date().toISOString(),
        actor: this.actor,
        correlationId: this.correlationId,
        source,
      },
      payload,
    });
  }
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly name: string;
  readonly address: Address;
  readonly token: TokenRef;

  /** Event stream holding this vault's history */
  readonly streamId: string;

  private readonly _access: AccessRegistry;
  private readonly _gate: PauseGate;
  private readonly _guard = new ReentrancyGuard();
  private _state: LedgerState;

  private readonly _ledger: TokenLedger;
  private readonly _clock: Clock;
  private readonly _events: EventStore;
  private readonly _catalog: EventCatalog;
  private readonly _logFn: ((entry: VaultLogEntry) => void) | undefined;

  constructor(config: VaultConfig, deps: VaultDeps) {
    if (config.name.trim() === "") {
      throw new VaultError("INVALID_ARGUMENT", "Vault name must not be empty");
    }
    if (!isTokenRef(config.token)) {
      throw new VaultError("INVALID_ARGUMENT", "Token reference is malformed", {
        token: config.token,
      });
    }
    assertAddress(config.owner, "owner");
    assertAddress(config.address, "vault");
    assertAddress(config.feeCollector, "fee collector");
    assertValidFee(config.feePercentage);
    assertLimit(config.withdrawalLimit);
    assertTimelock(config.withdrawalTimelock);

    this.name = config.name;
    this.address = config.address;
    this.token = { ...config.token };
    this.streamId = `vault:${config.address}`;

    this._access = new AccessRegistry(config.owner);
    this._gate = new PauseGate(this._access);
    this._state = {
      feeCollector: config.feeCollector,
      feePercentage: config.feePercentage,
      withdrawalLimit: config.withdrawalLimit,
      withdrawalTimelock: config.withdrawalTimelock,
      totalDeposited: 0n,
      version: 1,
      lastWithdrawal: new Map(),
    };

    this._ledger = deps.ledger;
    this._clock = deps.clock ?? systemClock;
    this._events = deps.events ?? new InMemoryEventStore();
    this._catalog = deps.catalog ?? createVaultCatalog();
    this._logFn = deps.logFn;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Funds
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Pull `amount` from the caller into the vault. The caller must have
   * approved the vault address on the token ledger beforehand.
   */
  async deposit(caller: Address, amount: bigint): Promise<DepositReceipt> {
    return this._runAsync("deposit", caller, async (batch) => {
      this._gate.requireActive();
      assertPositive(amount);

      const timestamp = this._clock.now();
      await this._ledger.transferFrom(this.address, caller, this.address, amount);
      this._state.totalDeposited += amount;

      batch.stage(VAULT_EVENTS.DEPOSITED, "vault", {
        depositor: caller,
        amount: amount.toString(),
        timestamp,
      });
      return { amount, totalDeposited: this._state.totalDeposited, timestamp };
    });
  }

  /**
   * Release `amount` to the caller, less the fee, which goes to the fee
   * collector. Checked in order: pause, amount, limit, timelock, pool.
   */
  async withdraw(caller: Address, amount: bigint): Promise<WithdrawalReceipt> {
    return this._runAsync("withdraw", caller, async (batch) => {
      this._gate.requireActive();
      assertPositive(amount);

      const state = this._state;
      if (amount > state.withdrawalLimit) {
        throw new VaultError(
          "WITHDRAWAL_LIMIT_EXCEEDED",
          `Withdrawal of ${amount} exceeds the limit of ${state.withdrawalLimit}`,
          { amount: amount.toString(), limit: state.withdrawalLimit.toString() },
        );
      }

      const now = this._clock.now();
      const eligibleAt = this._eligibleAt(caller);
      if (now < eligibleAt) {
        throw new VaultError(
          "WITHDRAWAL_TOO_SOON",
          `"${caller}" may withdraw again in ${eligibleAt - now}s`,
          { eligibleAt, now },
        );
      }

      if (amount > state.totalDeposited) {
        throw new VaultError(
          "INSUFFICIENT_BALANCE",
          `Withdrawal of ${amount} exceeds the ${state.totalDeposited} held in custody`,
          { amount: amount.toString(), totalDeposited: state.totalDeposited.toString() },
        );
      }

      state.totalDeposited -= amount;
      state.lastWithdrawal.set(caller, now);

      const { fee, net } = computeFee(amount, state.feePercentage);
      if (fee > 0n) {
        await this._ledger.transfer(this.address, state.feeCollector, fee);
      }
      await this._ledger.transfer(this.address, caller, net);

      batch.stage(VAULT_EVENTS.WITHDRAWN, "vault", {
        depositor: caller,
        grossAmount: amount.toString(),
        timestamp: now,
      });
      return {
        grossAmount: amount,
        fee,
        net,
        totalDeposited: state.totalDeposited,
        timestamp: now,
      };
    });
  }

  /**
   * Owner-only recovery of tokens held at the vault address. Ignores the
   * pause gate, the limit and the timelock, and takes no fee.
   */
  async emergencyWithdraw(
    caller: Address,
    amount: bigint,
  ): Promise<EmergencyWithdrawalReceipt> {
    return this._runAsync("emergencyWithdraw", caller, async (batch) => {
      this._access.requireOwner(caller);
      assertPositive(amount);

      const held = await this._ledger.balanceOf(this.address);
      if (amount > held) {
        throw new VaultError(
          "INSUFFICIENT_BALANCE",
          `Vault holds ${held}, cannot release ${amount}`,
          { amount: amount.toString(), held: held.toString() },
        );
      }

      // Tokens that arrived outside deposit() are recoverable too, so the
      // pool only shrinks by what it actually tracked.
      const state = this._state;
      state.totalDeposited -= amount < state.totalDeposited ? amount : state.totalDeposited;

      await this._ledger.transfer(this.address, caller, amount);

      batch.stage(VAULT_EVENTS.EMERGENCY_WITHDRAWAL, "vault", {
        by: caller,
        amount: amount.toString(),
      });
      return { amount, totalDeposited: state.totalDeposited };
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Settings (owner only, allowed while paused)
  // ───────────────────────────────────────────────────────────────────────

  setFeePercentage(caller: Address, feePercentage: number): void {
    this._runSync("setFeePercentage", caller, (batch) => {
      this._access.requireOwner(caller);
      assertValidFee(feePercentage);

      const old = this._state.feePercentage;
      this._state.feePercentage = feePercentage;
      this._state.version += 1;
      batch.stage(VAULT_EVENTS.FEE_UPDATED, "vault", { old, new: feePercentage });
    });
  }

  setFeeCollector(caller: Address, feeCollector: Address): void {
    this._runSync("setFeeCollector", caller, (batch) => {
      this._access.requireOwner(caller);
      assertAddress(feeCollector, "fee collector");

      const old = this._state.feeCollector;
      this._state.feeCollector = feeCollector;
      this._state.version += 1;
      batch.stage(VAULT_EVENTS.FEE_COLLECTOR_UPDATED, "vault", { old, new: feeCollector });
    });
  }

  setWithdrawalLimit(caller: Address, withdrawalLimit: bigint): void {
    this._runSync("setWithdrawalLimit", caller, (batch) => {
      this._access.requireOwner(caller);
      assertLimit(withdrawalLimit);

      const old = this._state.withdrawalLimit;
      this._state.withdrawalLimit = withdrawalLimit;
      this._state.version += 1;
      batch.stage(VAULT_EVENTS.WITHDRAWAL_LIMIT_UPDATED, "vault", {
        old: old.toString(),
        new: withdrawalLimit.toString(),
      });
    });
  }

  setWithdrawalTimelock(caller: Address, withdrawalTimelock: number): void {
    this._runSync("setWithdrawalTimelock", caller, (batch) => {
      this._access.requireOwner(caller);
      assertTimelock(withdrawalTimelock);

      const old = this._state.withdrawalTimelock;
      this._state.withdrawalTimelock = withdrawalTimelock;
      this._state.version += 1;
      batch.stage(VAULT_EVENTS.TIMELOCK_UPDATED, "vault", { old, new: withdrawalTimelock });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Access & gate
  // ───────────────────────────────────────────────────────────────────────

  addOperator(caller: Address, address: Address): void {
    this._runSync("addOperator", caller, (batch) => {
      this._access.addOperator(caller, address);
      batch.stage(VAULT_EVENTS.OPERATOR_ADDED, "access", { address });
    });
  }

  removeOperator(caller: Address, address: Address): void {
    this._runSync("removeOperator", caller, (batch) => {
      this._access.removeOperator(caller, address);
      batch.stage(VAULT_EVENTS.OPERATOR_REMOVED, "access", { address });
    });
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this._runSync("transferOwnership", caller, (batch) => {
      const previousOwner = this._access.transferOwnership(caller, newOwner);
      batch.stage(VAULT_EVENTS.OWNERSHIP_TRANSFERRED, "access", { previousOwner, newOwner });
    });
  }

  /** Operators may pause. Pausing a paused vault succeeds and records nothing. */
  pause(caller: Address): void {
    this._runSync("pause", caller, (batch) => {
      if (this._gate.pause(caller)) {
        batch.stage(VAULT_EVENTS.PAUSED, "gate", { by: caller });
      }
    });
  }

  /** Only the owner may unpause. */
  unpause(caller: Address): void {
    this._runSync("unpause", caller, (batch) => {
      if (this._gate.unpause(caller)) {
        batch.stage(VAULT_EVENTS.UNPAUSED, "gate", { by: caller });
      }
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get owner(): Address {
    return this._access.owner;
  }

  get feeCollector(): Address {
    return this._state.feeCollector;
  }

  get feePercentage(): number {
    return this._state.feePercentage;
  }

  get withdrawalLimit(): bigint {
    return this._state.withdrawalLimit;
  }

  get withdrawalTimelock(): number {
    return this._state.withdrawalTimelock;
  }

  get totalDeposited(): bigint {
    return this._state.totalDeposited;
  }

  get version(): number {
    return this._state.version;
  }

  get paused(): boolean {
    return this._gate.paused;
  }

  get events(): EventStore {
    return this._events;
  }

  get catalog(): EventCatalog {
    return this._catalog;
  }

  isOwner(address: Address): boolean {
    return this._access.isOwner(address);
  }

  isOperator(address: Address): boolean {
    return this._access.isOperator(address);
  }

  operators(): readonly Address[] {
    return this._access.operators();
  }

  /** Tokens actually held at the vault address on the token ledger. */
  async vaultBalance(): Promise<bigint> {
    return this._ledger.balanceOf(this.address);
  }

  lastWithdrawalTime(depositor: Address): number {
    return this._state.lastWithdrawal.get(depositor) ?? 0;
  }

  canWithdrawNow(depositor: Address): boolean {
    return this._clock.now() >= this._eligibleAt(depositor);
  }

  /** Seconds until the depositor may withdraw; 0 when eligible. */
  timeUntilWithdrawal(depositor: Address): number {
    return Math.max(0, this._eligibleAt(depositor) - this._clock.now());
  }

  depositor(address: Address): DepositorInfo {
    return {
      address,
      lastWithdrawalTime: this.lastWithdrawalTime(address),
      canWithdrawNow: this.canWithdrawNow(address),
      timeUntilWithdrawal: this.timeUntilWithdrawal(address),
    };
  }

  info(): VaultInfo {
    return {
      name: this.name,
      address: this.address,
      token: { ...this.token },
      owner: this._access.owner,
      operators: this._access.operators(),
      feeCollector: this._state.feeCollector,
      feePercentage: this._state.feePercentage,
      withdrawalLimit: this._state.withdrawalLimit.toString(),
      withdrawalTimelock: this._state.withdrawalTimelock,
      totalDeposited: this._state.totalDeposited.toString(),
      version: this._state.version,
      paused: this._gate.paused,
      streamId: this.streamId,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (persistence)
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): VaultSnapshot {
    const depositors = [...this._state.lastWithdrawal]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([address, lastWithdrawalTime]) => ({ address, lastWithdrawalTime }));

    return {
      version: 1,
      name: this.name,
      address: this.address,
      token: { ...this.token },
      owner: this._access.owner,
      operators: this._access.operators(),
      paused: this._gate.paused,
      feeCollector: this._state.feeCollector,
      feePercentage: this._state.feePercentage,
      withdrawalLimit: this._state.withdrawalLimit.toString(),
      withdrawalTimelock: this._state.withdrawalTimelock,
      totalDeposited: this._state.totalDeposited.toString(),
      vaultVersion: this._state.version,
      depositors,
      savedAt: new Date().toISOString(),
    };
  }

  /**
   * Rebuild a vault from a snapshot. Emits no events.
   */
  static fromSnapshot(snapshot: VaultSnapshot, deps: VaultDeps): Vault {
    if (snapshot.version !== 1) {
      throw new VaultError("INVALID_SNAPSHOT", `Unsupported snapshot version ${String(snapshot.version)}`);
    }
    if (!Number.isSafeInteger(snapshot.vaultVersion) || snapshot.vaultVersion < 1) {
      throw new VaultError("INVALID_SNAPSHOT", `Invalid vault version ${snapshot.vaultVersion}`);
    }

    const vault = new Vault(
      {
        name: snapshot.name,
        address: snapshot.address,
        token: snapshot.token,
        owner: snapshot.owner,
        feeCollector: snapshot.feeCollector,
        feePercentage: snapshot.feePercentage,
        withdrawalLimit: parseSnapshotAmount(snapshot.withdrawalLimit, "withdrawalLimit"),
        withdrawalTimelock: snapshot.withdrawalTimelock,
      },
      deps,
    );

    vault._access.restore({ owner: snapshot.owner, operators: snapshot.operators });
    vault._gate.restore(snapshot.paused);
    vault._state.totalDeposited = parseSnapshotAmount(snapshot.totalDeposited, "totalDeposited");
    vault._state.version = snapshot.vaultVersion;

    for (const { address, lastWithdrawalTime } of snapshot.depositors) {
      assertAddress(address, "depositor");
      if (!Number.isSafeInteger(lastWithdrawalTime) || lastWithdrawalTime < 0) {
        throw new VaultError(
          "INVALID_SNAPSHOT",
          `Invalid last withdrawal time for "${address}": ${lastWithdrawalTime}`,
        );
      }
      vault._state.lastWithdrawal.set(address, lastWithdrawalTime);
    }

    return vault;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transactions
  // ───────────────────────────────────────────────────────────────────────

  private _runSync<T>(
    operation: VaultOperation,
    caller: Address,
    body: (batch: EventBatch) => T,
  ): T {
    const started = performance.now();
    let result: T;

    try {
      result = this._guard.run(() => {
        const checkpoint = this._checkpoint();
        const expectedVersion = this._events.streamVersion(this.streamId);
        const batch = new EventBatch(caller, this._catalog);
        try {
          const value = body(batch);
          this._commit(batch, expectedVersion);
          return value;
        } catch (error) {
          this._restore(checkpoint);
          throw error;
        }
      });
    } catch (error) {
      this._log(operation, caller, started, error);
      throw error;
    }

    this._log(operation, caller, started);
    return result;
  }

  private async _runAsync<T>(
    operation: VaultOperation,
    caller: Address,
    body: (batch: EventBatch) => Promise<T>,
  ): Promise<T> {
    const started = performance.now();
    let result: T;

    try {
      result = await this._guard.runAsync(async () => {
        const checkpoint = this._checkpoint();
        const expectedVersion = this._events.streamVersion(this.streamId);
        const batch = new EventBatch(caller, this._catalog);
        try {
          return await this._ledger.atomically(async () => {
            const value = await body(batch);
            this._commit(batch, expectedVersion);
            return value;
          });
        } catch (error) {
          this._restore(checkpoint);
          throw error;
        }
      });
    } catch (error) {
      this._log(operation, caller, started, error);
      throw error;
    }

    this._log(operation, caller, started);
    return result;
  }

  private _commit(batch: EventBatch, expectedVersion: number): void {
    if (batch.events.length === 0) {
      return;
    }
    this._events.append(this.streamId, batch.events, { expectedVersion });
  }

  private _checkpoint(): Checkpoint {
    return {
      access: this._access.snapshot(),
      paused: this._gate.paused,
      state: { ...this._state, lastWithdrawal: new Map(this._state.lastWithdrawal) },
    };
  }

  private _restore(checkpoint: Checkpoint): void {
    this._access.restore(checkpoint.access);
    this._gate.restore(checkpoint.paused);
    this._state = checkpoint.state;
  }

  private _log(
    operation: VaultOperation,
    caller: Address,
    started: number,
    error?: unknown,
  ): void {
    if (this._logFn === undefined) {
      return;
    }

    const code = errorCode(error);
    this._logFn({
      operation,
      caller,
      outcome: error === undefined ? "committed" : "rejected",
      ...(code !== undefined ? { code } : {}),
      version: this._state.version,
      durationMs: performance.now() - started,
    });
  }

  private _eligibleAt(depositor: Address): number {
    return this.lastWithdrawalTime(depositor) + this._state.withdrawalTimelock;
  }
}

// =============================================================================
// Validation helpers
// =============================================================================

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw new VaultError("INVALID_AMOUNT", `Amount must be positive, got ${amount}`);
  }
}

function assertLimit(limit: bigint): void {
  if (limit < 0n) {
    throw new VaultError("INVALID_AMOUNT", `Withdrawal limit must not be negative, got ${limit}`);
  }
}

function assertTimelock(seconds: number): void {
  if (!Number.isSafeInteger(seconds) || seconds < 0) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `Withdrawal timelock must be non-negative whole seconds, got ${seconds}`,
    );
  }
}

function parseSnapshotAmount(value: string, field: string): bigint {
  if (!isBaseUnitAmount(value)) {
    throw new VaultError("INVALID_SNAPSHOT", `Snapshot field ${field} is not a base-unit amount: "${value}"`);
  }
  return BigInt(value);
}

function errorCode(error: unknown): string | undefined {
  if (
    error instanceof VaultError ||
    error instanceof TokenLedgerError ||
    error instanceof EventStoreError
  ) {
    return error.code;
  }
  return undefined;
}
