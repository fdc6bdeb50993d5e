/**
 * @tandem/event-store — Hash chain for tamper-evident event logs.
 *
 * Each event is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained to its predecessor:
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
  UnhashedEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

function canonicalEventContent(event: UnhashedEvent): string {
  return canonicalize({
    event: {
      type: event.event.type,
      metadata: event.event.metadata,
      payload: event.event.payload,
    },
    streamId: event.streamId,
    version: event.version,
    globalPosition: event.globalPosition,
    appendedAt: event.appendedAt,
  });
}

/**
 * Hex-encoded SHA-256 of an event linked to `previousHash`.
 */
export function computeEventHash(event: UnhashedEvent, previousHash: string): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Verify a sequence of events in global position order.
 */
export function verifyHashChain(events: readonly StoredEvent[]): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let expectedPrevious = GENESIS_HASH;

  for (const event of events) {
    let ok = true;

    if (event.previousHash !== expectedPrevious) {
      ok = false;
      errors.push({
        position: event.globalPosition,
        reason: `previousHash mismatch at position ${String(event.globalPosition)}: expected "${expectedPrevious}", got "${event.previousHash}"`,
      });
    }

    const recomputed = computeEventHash(event, event.previousHash);
    if (event.hash !== recomputed) {
      ok = false;
      errors.push({
        position: event.globalPosition,
        reason: `Hash mismatch at position ${String(event.globalPosition)}: expected "${recomputed}", got "${event.hash}"`,
      });
    }

    if (ok && errors.length === 0) {
      lastVerifiedPosition = event.globalPosition;
    }
    expectedPrevious = event.hash;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
