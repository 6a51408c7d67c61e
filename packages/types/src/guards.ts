/**
 * Runtime Type Guards
 *
 * Narrowing functions for Coffer domain types.
 * Used at system boundaries (HTTP bodies, restored snapshots,
 * event payload validation).
 */

import { ZERO_ADDRESS } from "./account.js";
import type { Address, TokenRef } from "./account.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// =============================================================================
// Account guards
// =============================================================================

/**
 * A usable account: a non-blank string that is not the zero address.
 */
export function isAddress(value: unknown): value is Address {
  return (
    typeof value === "string" &&
    value.trim() !== "" &&
    value.toLowerCase() !== ZERO_ADDRESS
  );
}

const BASE_UNITS = /^(0|[1-9]\d*)$/;

/**
 * A non-negative integer amount written as a decimal string ("0", "1500").
 */
export function isBaseUnitAmount(value: unknown): value is string {
  return typeof value === "string" && BASE_UNITS.test(value);
}

export function isTokenRef(value: unknown): value is TokenRef {
  if (!isRecord(value)) return false;
  return (
    typeof value.ledgerId === "string" &&
    value.ledgerId !== "" &&
    typeof value.symbol === "string" &&
    value.symbol !== "" &&
    typeof value.decimals === "number" &&
    Number.isInteger(value.decimals) &&
    value.decimals >= 0 &&
    value.decimals <= 36
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "access", "gate"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (!isRecord(value)) return false;
  return (
    typeof value.eventId === "string" &&
    typeof value.timestamp === "string" &&
    typeof value.actor === "string" &&
    typeof value.correlationId === "string" &&
    isEventSource(value.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (!isRecord(value)) return false;
  return (
    typeof value.type === "string" &&
    isEventMetadata(value.metadata) &&
    isRecord(value.payload)
  );
}
