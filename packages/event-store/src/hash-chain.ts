/**
 * @lockbox/event-store: Hash chain for the tamper-evident custody log.
 *
 * Each record is hashed using RFC 8785 (JCS) canonicalization + SHA-256,
 * chained onto its predecessor in global order:
 *
 *   record[1].hash = sha256(canonicalize(record[1]) + "genesis")
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
} from "./types.js";

/**
 * `previousHash` of the first record in the chain.
 */
export const GENESIS_HASH = "genesis";

/** The hashed portion of a record: everything but the link fields. */
export type UnhashedEvent = Omit<StoredEvent, "hash" | "previousHash">;

/**
 * Compute the SHA-256 hash of a record given its predecessor's hash.
 *
 * `appendedAt` is included: it is part of the persisted record.
 */
export function computeEventHash(
  record: UnhashedEvent,
  previousHash: string,
): string {
  const content = canonicalize({
    event: record.event,
    streamId: record.streamId,
    version: record.version,
    globalPosition: record.globalPosition,
    appendedAt: record.appendedAt,
  });
  return createHash("sha256").update(content + previousHash).digest("hex");
}

/**
 * Verify the hash chain of records in global position order.
 */
export function verifyHashChain(
  records: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let lastVerifiedPosition = 0;
  let previousHash = GENESIS_HASH;

  for (const record of records) {
    const position = record.globalPosition;
    let intact = true;

    if (record.previousHash !== previousHash) {
      intact = false;
      errors.push({
        position,
        reason: `previousHash mismatch at position ${position}: expected "${previousHash}", got "${record.previousHash}"`,
      });
    }

    const expectedHash = computeEventHash(record, record.previousHash);
    if (record.hash !== expectedHash) {
      intact = false;
      errors.push({
        position,
        reason: `Hash mismatch at position ${position}: expected "${expectedHash}", got "${record.hash}"`,
      });
    }

    if (intact && errors.length === 0) {
      lastVerifiedPosition = position;
    }
    previousHash = record.hash;
  }

  return {
    valid: errors.length === 0,
    lastVerifiedPosition,
    errors,
  };
}
