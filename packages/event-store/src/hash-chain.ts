/**
 * @splitpact/event-store — Hash chain over the global log.
 *
 * Every stored event is hashed as the RFC 8785 (JCS) canonical form of
 * its record, previousHash included, so each hash commits to the whole
 * log before it:
 *
 *   hash[n] = sha256(jcs({ ...record[n], previousHash: hash[n-1] }))
 *   hash[0] uses GENESIS_HASH as its previous hash
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  EventStoreIntegrityResult,
  IntegrityError,
  StoredEvent,
  UnhashedStoredEvent,
} from "./types.js";

export const GENESIS_HASH = "genesis";

/**
 * @returns Hex-encoded SHA-256 of the record
 */
export function computeEventHash(record: UnhashedStoredEvent): string {
  const canonical = canonicalize({
    event: record.event,
    splitId: record.splitId.toString(),
    streamId: record.streamId,
    version: record.version,
    position: record.position,
    appendedAt: record.appendedAt,
    previousHash: record.previousHash,
  });
  return createHash("sha256").update(canonical).digest("hex");
}

/**
 * Walk a log in global order. Reports broken links, recomputed hashes
 * that differ, and positions that skip or repeat.
 */
export function verifyHashChain(
  log: readonly StoredEvent[],
): EventStoreIntegrityResult {
  const errors: IntegrityError[] = [];
  let previousHash = GENESIS_HASH;
  let expectedPosition = 1;
  let lastVerifiedPosition = 0;

  for (const record of log) {
    const at = record.position;
    if (at !== expectedPosition) {
      errors.push({ position: at, reason: `Expected position ${expectedPosition}, found ${at}` });
    }
    if (record.previousHash !== previousHash) {
      errors.push({ position: at, reason: `Broken link at position ${at}` });
    }
    if (computeEventHash(record) !== record.hash) {
      errors.push({ position: at, reason: `Hash mismatch at position ${at}` });
    }

    previousHash = record.hash;
    expectedPosition = at + 1;
    lastVerifiedPosition = at;
  }

  return { valid: errors.length === 0, lastVerifiedPosition, errors };
}
