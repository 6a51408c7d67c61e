/**
 * @coffer/vault - Custodial token vault.
 *
 * Holds a pool of fungible tokens for depositors and releases them under
 * role-gated, time-throttled, fee-bearing rules.
 *
 * Components:
 * - AccessRegistry: single owner plus an operator set
 * - PauseGate: circuit breaker for deposits and withdrawals
 * - FeeEngine: basis-point fee split, capped at MAX_FEE
 * - Vault: the ledger aggregate, one transaction per mutating call
 *
 * Design rules:
 * - A failed call changes nothing and records nothing
 * - Every committed call is recorded in the event store
 * - All state is snapshot-able and restorable
 */

// Top-level vault
export { Vault } from "./vault.js";

// Components
export { AccessRegistry } from "./access-registry.js";
export type { AccessRegistryState } from "./access-registry.js";
export { PauseGate } from "./pause-gate.js";
export { computeFee, assertValidFee, MAX_FEE, BPS_DENOMINATOR } from "./fee-engine.js";
export type { FeeBreakdown } from "./fee-engine.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";

// Collaborators
export { InMemoryTokenLedger, TokenLedgerError } from "./token-ledger.js";
export type {
  TokenLedger,
  TokenLedgerErrorCode,
  TokenTransfer,
  ReceiveHook,
} from "./token-ledger.js";
export { systemClock, ManualClock } from "./clock.js";
export type { Clock } from "./clock.js";

// Errors & units
export { VaultError } from "./errors.js";
export type { VaultErrorCode } from "./errors.js";
export { parseUnits, formatUnits } from "./units.js";

// Types
export type {
  VaultConfig,
  VaultDeps,
  VaultOperation,
  VaultLogEntry,
  DepositReceipt,
  WithdrawalReceipt,
  EmergencyWithdrawalReceipt,
  VaultInfo,
  DepositorInfo,
  DepositorSnapshot,
  VaultSnapshot,
} from "./types.js";
