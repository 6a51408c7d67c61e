/**
 * @coffer/event-store - Vault domain event definitions.
 *
 * Naming convention: `<component>.<entity>.<action>`, or
 * `<component>.<action>` for the pause gate.
 *
 * Amounts are decimal strings of base units; `timestamp` fields are the
 * vault clock's whole seconds, not wall-clock ISO strings.
 */

import { isAddress, isBaseUnitAmount, isRecord } from "@coffer/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

/** Every vault payload is a flat JSON object. */
export interface EventPayload {
  readonly [field: string]: unknown;
}

// =============================================================================
// Ledger Events
// =============================================================================

export interface DepositedPayload extends EventPayload {
  readonly depositor: string;
  readonly amount: string;
  readonly timestamp: number;
}

export interface WithdrawnPayload extends EventPayload {
  readonly depositor: string;
  /** Amount before the fee was taken */
  readonly grossAmount: string;
  readonly timestamp: number;
}

export interface EmergencyWithdrawalPayload extends EventPayload {
  readonly by: string;
  readonly amount: string;
}

// =============================================================================
// Settings Events
// =============================================================================

/**
 * `old` → `new` for one administrative setting. Fee percentages are
 * basis-point numbers, timelocks are seconds, limits are amount strings,
 * collectors are addresses.
 */
export interface SettingUpdatedPayload<T> extends EventPayload {
  readonly old: T;
  readonly new: T;
}

export type FeeUpdatedPayload = SettingUpdatedPayload<number>;
export type FeeCollectorUpdatedPayload = SettingUpdatedPayload<string>;
export type WithdrawalLimitUpdatedPayload = SettingUpdatedPayload<string>;
export type TimelockUpdatedPayload = SettingUpdatedPayload<number>;

// =============================================================================
// Access & Gate Events
// =============================================================================

export interface OperatorChangedPayload extends EventPayload {
  readonly address: string;
}

export interface OwnershipTransferredPayload extends EventPayload {
  readonly previousOwner: string;
  readonly newOwner: string;
}

export interface GateToggledPayload extends EventPayload {
  readonly by: string;
}

// =============================================================================
// Event Type Constants
// =============================================================================

export const VAULT_EVENTS = {
  DEPOSITED: "vault.funds.deposited",
  WITHDRAWN: "vault.funds.withdrawn",
  EMERGENCY_WITHDRAWAL: "vault.funds.emergency-withdrawn",
  FEE_UPDATED: "vault.fee.updated",
  FEE_COLLECTOR_UPDATED: "vault.fee-collector.updated",
  WITHDRAWAL_LIMIT_UPDATED: "vault.withdrawal-limit.updated",
  TIMELOCK_UPDATED: "vault.timelock.updated",
  OPERATOR_ADDED: "access.operator.added",
  OPERATOR_REMOVED: "access.operator.removed",
  OWNERSHIP_TRANSFERRED: "access.ownership.transferred",
  PAUSED: "gate.paused",
  UNPAUSED: "gate.unpaused",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

/**
 * Payload shape for each vault event type.
 */
export interface VaultEventPayloads {
  "vault.funds.deposited": DepositedPayload;
  "vault.funds.withdrawn": WithdrawnPayload;
  "vault.funds.emergency-withdrawn": EmergencyWithdrawalPayload;
  "vault.fee.updated": FeeUpdatedPayload;
  "vault.fee-collector.updated": FeeCollectorUpdatedPayload;
  "vault.withdrawal-limit.updated": WithdrawalLimitUpdatedPayload;
  "vault.timelock.updated": TimelockUpdatedPayload;
  "access.operator.added": OperatorChangedPayload;
  "access.operator.removed": OperatorChangedPayload;
  "access.ownership.transferred": OwnershipTransferredPayload;
  "gate.paused": GateToggledPayload;
  "gate.unpaused": GateToggledPayload;
}

// =============================================================================
// Schema Definitions
// =============================================================================

function isSeconds(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

function isBasisPoints(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 10_000;
}

function settingSchema(
  type: VaultEventType,
  description: string,
  check: (value: unknown) => boolean,
): EventSchema {
  return {
    type,
    version: 1,
    description,
    source: "vault",
    validate: (p) => isRecord(p) && check(p.old) && check(p.new),
  };
}

const LEDGER_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.DEPOSITED,
    version: 1,
    description: "Tokens moved from a depositor into custody",
    source: "vault",
    validate: (p) =>
      isRecord(p) &&
      isAddress(p.depositor) &&
      isBaseUnitAmount(p.amount) &&
      isSeconds(p.timestamp),
  },
  {
    type: VAULT_EVENTS.WITHDRAWN,
    version: 1,
    description: "Tokens released to a depositor, gross of the fee",
    source: "vault",
    validate: (p) =>
      isRecord(p) &&
      isAddress(p.depositor) &&
      isBaseUnitAmount(p.grossAmount) &&
      isSeconds(p.timestamp),
  },
  {
    type: VAULT_EVENTS.EMERGENCY_WITHDRAWAL,
    version: 1,
    description: "The owner recovered tokens outside the normal withdrawal rules",
    source: "vault",
    validate: (p) => isRecord(p) && isAddress(p.by) && isBaseUnitAmount(p.amount),
  },
];

const SETTINGS_SCHEMAS: readonly EventSchema[] = [
  settingSchema(VAULT_EVENTS.FEE_UPDATED, "The withdrawal fee rate changed", isBasisPoints),
  settingSchema(VAULT_EVENTS.FEE_COLLECTOR_UPDATED, "The fee collector changed", isAddress),
  settingSchema(
    VAULT_EVENTS.WITHDRAWAL_LIMIT_UPDATED,
    "The per-withdrawal limit changed",
    isBaseUnitAmount,
  ),
  settingSchema(VAULT_EVENTS.TIMELOCK_UPDATED, "The withdrawal timelock changed", isSeconds),
];

const ACCESS_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.OPERATOR_ADDED,
    version: 1,
    description: "An address was granted the operator role",
    source: "access",
    validate: (p) => isRecord(p) && isAddress(p.address),
  },
  {
    type: VAULT_EVENTS.OPERATOR_REMOVED,
    version: 1,
    description: "An address lost the operator role",
    source: "access",
    validate: (p) => isRecord(p) && isAddress(p.address),
  },
  {
    type: VAULT_EVENTS.OWNERSHIP_TRANSFERRED,
    version: 1,
    description: "The owner role moved to a new address",
    source: "access",
    validate: (p) => isRecord(p) && isAddress(p.previousOwner) && isAddress(p.newOwner),
  },
];

const GATE_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.PAUSED,
    version: 1,
    description: "Deposits and withdrawals were halted",
    source: "gate",
    validate: (p) => isRecord(p) && isAddress(p.by),
  },
  {
    type: VAULT_EVENTS.UNPAUSED,
    version: 1,
    description: "Deposits and withdrawals were resumed",
    source: "gate",
    validate: (p) => isRecord(p) && isAddress(p.by),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every vault event type registered at
 * version 1.
 */
export function createVaultCatalog(): EventCatalog {
  const catalog = new EventCatalog();

  for (const schema of [
    ...LEDGER_SCHEMAS,
    ...SETTINGS_SCHEMAS,
    ...ACCESS_SCHEMAS,
    ...GATE_SCHEMAS,
  ]) {
    catalog.register(schema);
  }

  return catalog;
}
