/**
 * @coffer/event-store - Event Catalog.
 *
 * A registry of every event type a component may emit, with:
 * - Typed event definitions (type string → payload shape)
 * - A schema version per type
 * - Runtime payload validation, applied before events are committed
 */

import type { EventSource } from "@coffer/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "vault.funds.deposited") */
  readonly type: string;

  /** Current schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which component emits this event */
  readonly source: EventSource;

  /** True if the payload is valid for the current version. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

/**
 * Centralized registry of domain event types.
 *
 * ```ts
 * const catalog = new EventCatalog();
 * catalog.register({
 *   type: "gate.paused",
 *   version: 1,
 *   description: "Deposits and withdrawals were halted",
 *   source: "gate",
 *   validate: (p) => isRecord(p) && typeof p.by === "string",
 * });
 * catalog.validate("gate.paused", { by: "ops-1" }); // true
 * ```
 */
export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema. Re-registering the same version is a no-op;
   * a different version replaces the schema.
   *
   * @throws CatalogError if the version is not a positive integer
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }

    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version === schema.version) {
      return;
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  /** All registered event types, sorted. */
  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listSchemas(): readonly EventSchema[] {
    return [...this._schemas.values()];
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return this.listSchemas().filter((s) => s.source === source);
  }

  /**
   * Validate an event payload against its registered schema.
   *
   * @returns false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
