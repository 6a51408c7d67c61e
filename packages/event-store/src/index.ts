/**
 * @coffer/event-store - Append-only event persistence.
 *
 * Provides:
 * - EventStore interface for append-only, hash-chained event streams
 * - InMemoryEventStore
 * - EventCatalog for schema registration and payload validation
 * - Vault domain event definitions (12 event types)
 *
 * @packageDocumentation
 */

// Core types
export type {
  UnhashedStoredEvent,
  StoredEvent,
  ExpectedVersion,
  AppendOptions,
  AppendResult,
  ReadDirection,
  ReadOptions,
  ReadAllOptions,
  EventHandler,
  Subscription,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

// Catalog
export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

// Vault domain events
export { VAULT_EVENTS, createVaultCatalog } from "./vault-events.js";
export type {
  VaultEventType,
  VaultEventPayloads,
  EventPayload,
  DepositedPayload,
  WithdrawnPayload,
  EmergencyWithdrawalPayload,
  SettingUpdatedPayload,
  FeeUpdatedPayload,
  FeeCollectorUpdatedPayload,
  WithdrawalLimitUpdatedPayload,
  TimelockUpdatedPayload,
  OperatorChangedPayload,
  OwnershipTransferredPayload,
  GateToggledPayload,
} from "./vault-events.js";
