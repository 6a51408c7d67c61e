/**
 * @coffer/event-store - Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous event's hash, forming a chain:
 *
 *   event[1].hash = sha256(canonicalize(event[1]) + "genesis")
 *   event[n].hash = sha256(canonicalize(event[n]) + event[n-1].hash)
 *
 * Any modification to any event breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

/**
 * The `previousHash` of the event at global position 1.
 */
export const GENESIS_HASH = "genesis";

function canonicalEventContent(record: UnhashedStoredEvent): string {
  return canonicalize({
    event: {
      type: record.event.type,
      metadata: record.event.metadata,
      payload: record.event.payload,
    },
    streamId: record.streamId,
    version: record.version,
    globalPosition: record.globalPosition,
    appendedAt: record.appendedAt,
  });
}

/**
 * Compute the SHA-256 hash of an event given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  record: UnhashedStoredEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(record) + previousHash)
    .digest("hex");
}

/**
 * Verify the hash chain of a sequence of events.
 *
 * Events must be contiguous and in global position order. When checking a
 * slice that does not start at position 1, pass the hash of the event just
 * before the slice as `anchor`.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
  anchor: string = GENESIS_HASH,
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = anchor;

  for (const event of events) {
    let intact = true;

    if (event.previousHash !== previousHash) {
      intact = false;
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${event.globalPosition}: expected "${previousHash}", got "${event.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(event, event.previousHash);
    if (event.hash !== expectedHash) {
      intact = false;
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${event.globalPosition}: expected "${expectedHash}", got "${event.hash}"`,
      });
    }

    if (intact && errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }
    previousHash = event.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
