/**
 * @coffer/event-store - In-memory EventStore implementation.
 *
 * Stores events in plain arrays. Backs the vault in tests, the demo and
 * the sandbox node; all state is lost on process exit.
 *
 * Properties:
 * - O(1) append (amortized)
 * - Batches are validated and hashed before anything is stored
 * - Synchronous subscription dispatch after the batch is stored
 */

import type { DomainEvent } from "@coffer/types";
import type {
  AppendOptions,
  AppendResult,
  EventHandler,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
  Subscription,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /**
   * Called when a subscriber throws. A failing subscriber never undoes an
   * append. Defaults to rethrowing on a fresh microtask, which surfaces
   * the error as an uncaught exception. An error thrown from this callback
   * is rethrown the same way, so `append` never throws once it has stored.
   */
  readonly onHandlerError?: (error: unknown, event: StoredEvent) => void;

  /** Clock for `appendedAt`. Defaults to the wall clock. */
  readonly now?: () => Date;
}

function rethrowLater(error: unknown): void {
  queueMicrotask(() => {
    throw error;
  });
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();

  /** All streams, in append order */
  private readonly _globalLog: StoredEvent[] = [];

  private readonly _streamSubscribers = new Map<string, Set<EventHandler>>();
  private readonly _globalSubscribers = new Set<EventHandler>();

  private _lastHash: string = GENESIS_HASH;

  private readonly _onHandlerError: (error: unknown, event: StoredEvent) => void;
  private readonly _now: () => Date;

  constructor(options?: InMemoryEventStoreOptions) {
    this._onHandlerError = options?.onHandlerError ?? rethrowLater;
    this._now = options?.now ?? (() => new Date());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(
    streamId: string,
    events: readonly DomainEvent[],
    options?: AppendOptions,
  ): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const currentVersion = this.streamVersion(streamId);
    this._checkExpectedVersion(streamId, currentVersion, options);

    // Build the whole batch first so a failure leaves the store untouched
    const fromVersion = currentVersion + 1;
    const appendedAt = this._now().toISOString();
    const batch: StoredEvent[] = [];
    let previousHash = this._lastHash;

    events.forEach((event, index) => {
      const base = {
        event: {
          type: event.type,
          metadata: event.metadata,
          payload: event.payload,
        },
        streamId,
        version: fromVersion + index,
        globalPosition: this._globalLog.length + index + 1,
        appendedAt,
      };
      const hash = computeEventHash(base, previousHash);
      batch.push({ ...base, hash, previousHash });
      previousHash = hash;
    });

    const stream = this._streams.get(streamId) ?? [];
    stream.push(...batch);
    this._streams.set(streamId, stream);
    this._globalLog.push(...batch);
    this._lastHash = previousHash;

    this._dispatch(streamId, batch);

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + batch.length - 1,
      count: batch.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const stream = this._streams.get(streamId);
    if (stream === undefined) {
      return [];
    }

    const fromVersion = options?.fromVersion ?? 1;
    if (!Number.isInteger(fromVersion) || fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be an integer >= 1, got ${fromVersion}`,
        streamId,
      );
    }

    const result =
      options?.direction === "backward"
        ? stream.filter((e) => e.version <= fromVersion).reverse()
        : stream.filter((e) => e.version >= fromVersion);

    return limit(filterByType(result, options?.type), options?.maxCount);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = options?.fromPosition ?? 1;

    const result =
      options?.direction === "backward"
        ? this._globalLog.filter((e) => e.globalPosition <= fromPosition).reverse()
        : this._globalLog.filter((e) => e.globalPosition >= fromPosition);

    return limit(filterByType(result, options?.type), options?.maxCount);
  }

  // ─── Subscriptions ──────────────────────────────────────────────────

  subscribe(streamId: string, handler: EventHandler): Subscription {
    this._validateStreamId(streamId);

    const subscribers = this._streamSubscribers.get(streamId) ?? new Set<EventHandler>();
    subscribers.add(handler);
    this._streamSubscribers.set(streamId, subscribers);

    return {
      unsubscribe: () => {
        subscribers.delete(handler);
        if (subscribers.size === 0) {
          this._streamSubscribers.delete(streamId);
        }
      },
    };
  }

  subscribeAll(handler: EventHandler): Subscription {
    this._globalSubscribers.add(handler);

    return {
      unsubscribe: () => {
        this._globalSubscribers.delete(handler);
      },
    };
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamExists(streamId: string): boolean {
    return this.streamVersion(streamId) > 0;
  }

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }

  private _checkExpectedVersion(
    streamId: string,
    currentVersion: number,
    options?: AppendOptions,
  ): void {
    const expected = options?.expectedVersion;
    if (expected === undefined || expected === "any") {
      return;
    }

    if (expected === "no_stream") {
      if (currentVersion !== 0) {
        throw new EventStoreError(
          "CONCURRENCY_CONFLICT",
          `Stream "${streamId}" already exists (version ${currentVersion}), expected no_stream`,
          streamId,
        );
      }
      return;
    }

    if (currentVersion !== expected) {
      throw new EventStoreError(
        "CONCURRENCY_CONFLICT",
        `Stream "${streamId}" is at version ${currentVersion}, expected ${expected}`,
        streamId,
      );
    }
  }

  private _reportHandlerError(error: unknown, event: StoredEvent): void {
    try {
      this._onHandlerError(error, event);
    } catch (reportError) {
      rethrowLater(reportError);
    }
  }

  private _dispatch(streamId: string, events: readonly StoredEvent[]): void {
    const handlers = [
      ...(this._streamSubscribers.get(streamId) ?? []),
      ...this._globalSubscribers,
    ];

    for (const handler of handlers) {
      for (const event of events) {
        try {
          handler(event);
        } catch (error) {
          this._reportHandlerError(error, event);
        }
      }
    }
  }
}

function filterByType(
  events: StoredEvent[],
  type: string | undefined,
): StoredEvent[] {
  return type === undefined ? events : events.filter((e) => e.event.type === type);
}

function limit(events: StoredEvent[], maxCount: number | undefined): StoredEvent[] {
  return maxCount !== undefined && maxCount >= 0 ? events.slice(0, maxCount) : events;
}
