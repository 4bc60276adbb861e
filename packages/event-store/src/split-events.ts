/**
 * @splitpact/event-store — Split event schemas.
 *
 * Registers the three event types the ledger and the settlement
 * engine publish. Payload bigints are decimal strings, addresses are
 * 0x-prefixed 20-byte hex.
 */

import { SPLIT_EVENTS } from "@splitpact/types";
import type {
  ParticipantApprovedPayload,
  SplitCreatedPayload,
  SplitSettledPayload,
} from "@splitpact/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null;
}

function hasDecimal(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && /^(0|[1-9][0-9]*)$/.test(value);
}

function hasAddress(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && /^0x[0-9a-fA-F]{40}$/.test(value);
}

function hasBytes32(obj: Record<string, unknown>, key: string): boolean {
  const value = obj[key];
  return typeof value === "string" && /^0x[0-9a-fA-F]{64}$/.test(value);
}

export const SPLIT_EVENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: SPLIT_EVENTS.SPLIT_CREATED,
    version: 1,
    description: "A payer registered a split with its legs",
    source: "ledger",
    validate: (p): p is SplitCreatedPayload =>
      isObject(p) &&
      hasDecimal(p, "splitId") &&
      hasAddress(p, "payer") &&
      hasAddress(p, "token") &&
      hasDecimal(p, "totalAmount") &&
      hasDecimal(p, "deadline") &&
      hasBytes32(p, "metaHash"),
  },
  {
    type: SPLIT_EVENTS.PARTICIPANT_APPROVED,
    version: 1,
    description: "A participant's signed approval was accepted",
    source: "settlement",
    validate: (p): p is ParticipantApprovedPayload =>
      isObject(p) &&
      hasDecimal(p, "splitId") &&
      hasAddress(p, "participant") &&
      hasDecimal(p, "amount"),
  },
  {
    type: SPLIT_EVENTS.SPLIT_SETTLED,
    version: 1,
    description: "Every leg of a split was transferred to the payer",
    source: "settlement",
    validate: (p): p is SplitSettledPayload =>
      isObject(p) && hasDecimal(p, "splitId") && hasAddress(p, "payer"),
  },
];

/**
 * Create an EventCatalog holding every split event at version 1.
 */
export function createSplitEventCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of SPLIT_EVENT_SCHEMAS) {
    catalog.register(schema);
  }
  return catalog;
}
