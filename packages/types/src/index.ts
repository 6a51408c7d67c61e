/**
 * @coffer/types - Shared domain types for the Coffer stack.
 *
 * - Account and token references
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types - meaning lives in consuming code
 */

// Account types
export type { Address, TokenRef } from "./account.js";
export { ZERO_ADDRESS } from "./account.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Runtime type guards
export {
  isRecord,
  isAddress,
  isBaseUnitAmount,
  isTokenRef,
  isEventSource,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
