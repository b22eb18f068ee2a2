/**
 * @tidepool/event-store — Hash chain for tamper-evident record logs.
 *
 * Each record is hashed using RFC 8785 (JCS) canonicalization + SHA-256.
 * The hash includes the previous record's hash, forming a chain:
 *
 *   record[0].hash = sha256(canonicalize(record[0]) + "genesis")
 *   record[n].hash = sha256(canonicalize(record[n]) + record[n-1].hash)
 *
 * Any modification to any record breaks the chain from that point forward.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedEvent,
} from "./types.js";

/**
 * The hash used as `previousHash` for the first record in the chain.
 */
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
 * Compute the SHA-256 hash of a record given its predecessor's hash.
 *
 * @returns Hex-encoded SHA-256 hash
 */
export function computeEventHash(
  event: UnhashedEvent,
  previousHash: string,
): string {
  return createHash("sha256")
    .update(canonicalEventContent(event) + previousHash)
    .digest("hex");
}

/**
 * Link a record into the chain after `previousHash`.
 */
export function linkEvent(event: UnhashedEvent, previousHash: string): StoredEvent {
  return {
    ...event,
    hash: computeEventHash(event, previousHash),
    previousHash,
  };
}

/**
 * Verify the hash chain of a sequence of records in global position order.
 */
export function verifyHashChain(
  events: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const record of events) {
    if (record.previousHash !== previousHash) {
      errors.push({
        position: record.globalPosition,
        reason: `previousHash mismatch at position ${String(record.globalPosition)}: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(record, record.previousHash);
    if (record.hash !== expectedHash) {
      errors.push({
        position: record.globalPosition,
        reason: `Hash mismatch at position ${String(record.globalPosition)}: expected "${expectedHash}", got "${record.hash}"`,
      });
    }

    previousHash = record.hash;
    if (errors.length === 0) {
      lastVerifiedPosition = record.globalPosition;
    }
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
