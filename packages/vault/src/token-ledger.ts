/**
 * Token Ledger - the external fungible-token ledger the vault holds funds on.
 *
 * The vault never owns balances itself; it moves them through this
 * contract. `atomically` scopes a unit of work: if the work throws, every
 * balance and allowance change made inside it is undone.
 */

import type { Address } from "@coffer/types";
import { isAddress } from "@coffer/types";

// =============================================================================
// Contract
// =============================================================================

export interface TokenLedger {
  balanceOf(account: Address): Promise<bigint>;
  allowance(owner: Address, spender: Address): Promise<bigint>;
  approve(owner: Address, spender: Address, amount: bigint): Promise<void>;
  transfer(from: Address, to: Address, amount: bigint): Promise<void>;
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<void>;
  atomically<T>(work: () => Promise<T>): Promise<T>;
}

export type TokenLedgerErrorCode =
  | "INSUFFICIENT_FUNDS"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_TRANSFER";

export class TokenLedgerError extends Error {
  public readonly code: TokenLedgerErrorCode;
  constructor(code: TokenLedgerErrorCode, message: string) {
    super(message);
    this.name = "TokenLedgerError";
    this.code = code;
  }
}

// =============================================================================
// In-memory ledger
// =============================================================================

export interface TokenTransfer {
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

/**
 * Runs after a transfer to the hooked account has landed. Throwing fails
 * the transfer, and the balances move back.
 */
export type ReceiveHook = (transfer: TokenTransfer) => void | Promise<void>;

interface LedgerState {
  readonly balances: Map<Address, bigint>;
  readonly allowances: Map<Address, Map<Address, bigint>>;
}

/**
 * In-process token ledger for tests, the demo and the sandbox node.
 *
 * Not safe for interleaved `atomically` scopes: a rollback restores the
 * state as it was when that scope began. Callers serialize their work.
 */
export class InMemoryTokenLedger implements TokenLedger {
  private _balances = new Map<Address, bigint>();
  private _allowances = new Map<Address, Map<Address, bigint>>();
  private readonly _hooks = new Map<Address, Set<ReceiveHook>>();

  /**
   * Seed an account with tokens. A test fixture, not a mint.
   */
  credit(account: Address, amount: bigint): void {
    assertParty(account);
    assertAmount(amount);
    this._balances.set(account, this._balance(account) + amount);
  }

  /**
   * Register a hook fired whenever `account` receives tokens.
   */
  onReceive(account: Address, hook: ReceiveHook): { unsubscribe(): void } {
    const hooks = this._hooks.get(account) ?? new Set<ReceiveHook>();
    hooks.add(hook);
    this._hooks.set(account, hooks);

    return {
      unsubscribe: () => {
        hooks.delete(hook);
        if (hooks.size === 0) {
          this._hooks.delete(account);
        }
      },
    };
  }

  // ─── TokenLedger ────────────────────────────────────────────────────

  async balanceOf(account: Address): Promise<bigint> {
    return this._balance(account);
  }

  async allowance(owner: Address, spender: Address): Promise<bigint> {
    return this._allowance(owner, spender);
  }

  async approve(owner: Address, spender: Address, amount: bigint): Promise<void> {
    assertParty(owner);
    assertParty(spender);
    assertAmount(amount);

    const granted = this._allowances.get(owner) ?? new Map<Address, bigint>();
    granted.set(spender, amount);
    this._allowances.set(owner, granted);
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    await this.atomically(async () => {
      this._move(from, to, amount);
      await this._notify(to, { from, to, amount });
    });
  }

  async transferFrom(
    spender: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<void> {
    await this.atomically(async () => {
      assertParty(spender);
      const allowed = this._allowance(from, spender);
      if (allowed < amount) {
        throw new TokenLedgerError(
          "INSUFFICIENT_ALLOWANCE",
          `"${spender}" may move ${allowed} from "${from}", needs ${amount}`,
        );
      }

      this._move(from, to, amount);
      this._allowances.get(from)?.set(spender, allowed - amount);
      await this._notify(to, { from, to, amount });
    });
  }

  async atomically<T>(work: () => Promise<T>): Promise<T> {
    const saved = this._save();
    try {
      return await work();
    } catch (error) {
      this._balances = saved.balances;
      this._allowances = saved.allowances;
      throw error;
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _balance(account: Address): bigint {
    return this._balances.get(account) ?? 0n;
  }

  private _allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(owner)?.get(spender) ?? 0n;
  }

  private _move(from: Address, to: Address, amount: bigint): void {
    assertParty(from);
    assertParty(to);
    assertAmount(amount);

    const available = this._balance(from);
    if (available < amount) {
      throw new TokenLedgerError(
        "INSUFFICIENT_FUNDS",
        `"${from}" holds ${available}, cannot send ${amount}`,
      );
    }

    this._balances.set(from, available - amount);
    this._balances.set(to, this._balance(to) + amount);
  }

  private async _notify(account: Address, transfer: TokenTransfer): Promise<void> {
    for (const hook of [...(this._hooks.get(account) ?? [])]) {
      await hook(transfer);
    }
  }

  private _save(): LedgerState {
    const allowances = new Map<Address, Map<Address, bigint>>();
    for (const [owner, granted] of this._allowances) {
      allowances.set(owner, new Map(granted));
    }
    return { balances: new Map(this._balances), allowances };
  }
}

function assertParty(account: Address): void {
  if (!isAddress(account)) {
    throw new TokenLedgerError("INVALID_TRANSFER", `Invalid account: "${account}"`);
  }
}

function assertAmount(amount: bigint): void {
  if (amount < 0n) {
    throw new TokenLedgerError("INVALID_TRANSFER", `Amount must not be negative, got ${amount}`);
  }
}
