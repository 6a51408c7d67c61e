/**
 * Vault Types
 *
 * Rules:
 * - All types are readonly (immutability by default)
 * - Amounts are bigint base units inside the vault
 * - Amounts are decimal strings in anything JSON-bound (info, snapshots, events)
 */

import type { Address, TokenRef } from "@coffer/types";
import type { EventCatalog, EventStore } from "@coffer/event-store";
import type { Clock } from "./clock.js";
import type { TokenLedger } from "./token-ledger.js";

// =============================================================================
// Construction
// =============================================================================

export interface VaultConfig {
  /** Human-readable name, non-empty */
  readonly name: string;

  /** The vault's own account on the token ledger */
  readonly address: Address;

  readonly token: TokenRef;
  readonly owner: Address;
  readonly feeCollector: Address;

  /** Basis points, 0..MAX_FEE */
  readonly feePercentage: number;

  /** Largest single withdrawal in base units. 0 blocks all withdrawals. */
  readonly withdrawalLimit: bigint;

  /** Seconds a depositor waits between withdrawals */
  readonly withdrawalTimelock: number;
}

export interface VaultDeps {
  readonly ledger: TokenLedger;

  /** Default: systemClock */
  readonly clock?: Clock;

  /** Default: a fresh InMemoryEventStore */
  readonly events?: EventStore;

  /** Default: createVaultCatalog() */
  readonly catalog?: EventCatalog;

  /** Called once per mutating call, after it commits or is rejected */
  readonly logFn?: (entry: VaultLogEntry) => void;
}

// =============================================================================
// Operations & logging
// =============================================================================

export type VaultOperation =
  | "deposit"
  | "withdraw"
  | "emergencyWithdraw"
  | "setFeePercentage"
  | "setFeeCollector"
  | "setWithdrawalLimit"
  | "setWithdrawalTimelock"
  | "addOperator"
  | "removeOperator"
  | "transferOwnership"
  | "pause"
  | "unpause";

export interface VaultLogEntry {
  readonly operation: VaultOperation;
  readonly caller: Address;
  readonly outcome: "committed" | "rejected";

  /** Error code of a rejected call, when it carried one */
  readonly code?: string;

  /** Vault version after the call */
  readonly version: number;

  readonly durationMs: number;
}

// =============================================================================
// Receipts
// =============================================================================

export interface DepositReceipt {
  readonly amount: bigint;
  readonly totalDeposited: bigint;
  readonly timestamp: number;
}

export interface WithdrawalReceipt {
  readonly grossAmount: bigint;
  readonly fee: bigint;
  readonly net: bigint;
  readonly totalDeposited: bigint;
  readonly timestamp: number;
}

export interface EmergencyWithdrawalReceipt {
  readonly amount: bigint;
  readonly totalDeposited: bigint;
}

// =============================================================================
// Views
// =============================================================================

/**
 * JSON-safe view of the whole vault.
 */
export interface VaultInfo {
  readonly name: string;
  readonly address: Address;
  readonly token: TokenRef;
  readonly owner: Address;
  readonly operators: readonly Address[];
  readonly feeCollector: Address;
  readonly feePercentage: number;
  readonly withdrawalLimit: string;
  readonly withdrawalTimelock: number;
  readonly totalDeposited: string;
  readonly version: number;
  readonly paused: boolean;
  readonly streamId: string;
}

export interface DepositorInfo {
  readonly address: Address;
  readonly lastWithdrawalTime: number;
  readonly canWithdrawNow: boolean;
  readonly timeUntilWithdrawal: number;
}

// =============================================================================
// Snapshot
// =============================================================================

export interface DepositorSnapshot {
  readonly address: Address;
  readonly lastWithdrawalTime: number;
}

/**
 * Full vault state for persistence. Restoring emits no events.
 */
export interface VaultSnapshot {
  /** Snapshot format version */
  readonly version: 1;
  readonly name: string;
  readonly address: Address;
  readonly token: TokenRef;
  readonly owner: Address;
  readonly operators: readonly Address[];
  readonly paused: boolean;
  readonly feeCollector: Address;
  readonly feePercentage: number;
  readonly withdrawalLimit: string;
  readonly withdrawalTimelock: number;
  readonly totalDeposited: string;
  /** The vault's configuration version */
  readonly vaultVersion: number;
  readonly depositors: readonly DepositorSnapshot[];
  readonly savedAt: string;
}
