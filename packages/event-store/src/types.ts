/**
 * @splitpact/event-store — Core types.
 *
 * One stream per split ("split:<id>"), one global log across them, and
 * a hash chain over the global log. Streams only grow: there is no
 * update or delete.
 */

import type { DomainEvent, EventSink, SplitId } from "@splitpact/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A DomainEvent as recorded in the log.
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  /** Split the event belongs to */
  readonly splitId: SplitId;

  /** "split:<splitId>" */
  readonly streamId: string;

  /** Position within the split's stream, from 1 */
  readonly version: number;

  /** Position within the global log, from 1 */
  readonly position: number;

  /** When the store recorded the event */
  readonly appendedAt: string;

  /** Hash of the preceding event in the global log, or GENESIS_HASH */
  readonly previousHash: string;

  /** SHA-256 over the event's canonical form, previousHash included */
  readonly hash: string;
}

/** The fields of a StoredEvent that feed its hash. */
export type UnhashedStoredEvent = Omit<StoredEvent, "hash">;

// =============================================================================
// Reads
// =============================================================================

export interface ReadOptions {
  /** First stream version to return. Default: 1 */
  readonly fromVersion?: number;

  /** Default: unlimited */
  readonly maxCount?: number;
}

export interface ReadAllOptions {
  /** First global position to return. Default: 1 */
  readonly fromPosition?: number;

  /** Default: unlimited */
  readonly maxCount?: number;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;

  /** Global position of the last event checked, 0 if none */
  readonly lastVerifiedPosition: number;

  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Event log of every split.
 *
 * Writes come in through `publish`, the EventSink the ledger and the
 * settlement engine are given. A rejected publish records nothing.
 */
export interface EventStore extends EventSink {
  /** Events of one split in stream order (empty if it has none). */
  read(splitId: SplitId, options?: ReadOptions): readonly StoredEvent[];

  /** Events of every split in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  hasEvents(splitId: SplitId): boolean;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "STREAM_MISMATCH"
  | "INVALID_PAYLOAD"
  | "INVALID_READ";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
