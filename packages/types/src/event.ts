/**
 * Event Types
 *
 * Append-only event architecture.
 * Every committed vault transition is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which call)
 * - Failed calls produce no events
 * - No UPDATE, no DELETE - only new events
 */

/**
 * The component that emitted an event.
 */
export type EventSource = "vault" | "access" | "gate";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address of the caller whose operation produced this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Shared by every event committed by the same vault call */
  readonly correlationId: string;

  readonly source: EventSource;
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.funds.deposited") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (JSON-safe; amounts are decimal strings) */
  readonly payload: Readonly<Record<string, unknown>>;
}
