/**
 * Event Types
 *
 * Every observable state change (split created, participant approved,
 * split settled) is published as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Payload bigints travel as decimal strings
 * - Events of a rejected settlement are never published
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Who or what caused this event */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Groups every event of one split ("split:<id>") */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: "ledger" | "settlement";
}

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "split.created") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the framework, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}

/**
 * Receives the events a component publishes.
 * The event store is the usual sink; tests pass an array-backed one.
 */
export interface EventSink {
  publish(streamId: string, events: readonly DomainEvent[]): void;
}

// =============================================================================
// Split events
// =============================================================================

/**
 * Every event type splitpact publishes.
 * Naming convention: `<entity>.<action>`.
 */
export const SPLIT_EVENTS = {
  SPLIT_CREATED: "split.created",
  PARTICIPANT_APPROVED: "participant.approved",
  SPLIT_SETTLED: "split.settled",
} as const;

export type SplitEventType = (typeof SPLIT_EVENTS)[keyof typeof SPLIT_EVENTS];

// Payloads are type aliases so they stay assignable to DomainEvent["payload"].
export type SplitCreatedPayload = {
  readonly splitId: string;
  readonly payer: string;
  readonly token: string;
  readonly totalAmount: string;
  readonly deadline: string;
  readonly metaHash: string;
};

export type ParticipantApprovedPayload = {
  readonly splitId: string;
  readonly participant: string;
  readonly amount: string;
};

export type SplitSettledPayload = {
  readonly splitId: string;
  readonly payer: string;
};

/** Stream and correlation ID shared by every event of one split. */
export function splitStreamId(splitId: bigint): string {
  return `split:${splitId.toString()}`;
}
