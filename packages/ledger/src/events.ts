/**
 * @splitpact/ledger — Domain event construction for split streams.
 */

import { randomUUID } from "node:crypto";
import { splitStreamId } from "@splitpact/types";
import type { DomainEvent, EventMetadata, SplitEventType } from "@splitpact/types";

/**
 * Build a DomainEvent on a split's stream.
 * The split's stream ID doubles as the correlation ID.
 */
export function createSplitEvent(
  type: SplitEventType,
  splitId: bigint,
  source: EventMetadata["source"],
  actor: string,
  payload: Readonly<Record<string, unknown>>,
): DomainEvent {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      actor,
      correlationId: splitStreamId(splitId),
      source,
    },
    payload,
  };
}
