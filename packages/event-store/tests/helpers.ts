import { SPLIT_EVENTS, splitStreamId } from "@splitpact/types";
import type { DomainEvent, EventMetadata } from "@splitpact/types";

export const PAYER = "0x00000000000000000000000000000000000000bb";
export const TOKEN = "0x00000000000000000000000000000000000000aa";
export const PARTICIPANT = "0x0000000000000000000000000000000000000001";

let counter = 0;

export function makeEvent(
  type: string,
  payload: Record<string, unknown> = {},
  splitId = 1n,
  source: EventMetadata["source"] = "settlement",
): DomainEvent {
  counter += 1;
  return {
    type,
    metadata: {
      eventId: `evt-${counter}`,
      timestamp: "2025-01-01T00:00:00.000Z",
      actor: "test",
      correlationId: splitStreamId(splitId),
      source,
    },
    payload,
  };
}

export function makeEvents(count: number, splitId = 1n): DomainEvent[] {
  return Array.from({ length: count }, (_, i) => makeEvent(`event.${i + 1}`, {}, splitId));
}

export function splitCreated(splitId = 1n): DomainEvent {
  return makeEvent(
    SPLIT_EVENTS.SPLIT_CREATED,
    {
      splitId: splitId.toString(),
      payer: PAYER,
      token: TOKEN,
      totalAmount: "100",
      deadline: "0",
      metaHash: `0x${"00".repeat(32)}`,
    },
    splitId,
    "ledger",
  );
}

export function participantApproved(splitId = 1n): DomainEvent {
  return makeEvent(
    SPLIT_EVENTS.PARTICIPANT_APPROVED,
    { splitId: splitId.toString(), participant: PARTICIPANT, amount: "100" },
    splitId,
  );
}

export function splitSettled(splitId = 1n): DomainEvent {
  return makeEvent(SPLIT_EVENTS.SPLIT_SETTLED, { splitId: splitId.toString(), payer: PAYER }, splitId);
}
