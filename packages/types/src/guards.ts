/**
 * Runtime Type Guards
 *
 * Narrowing functions for splitpact domain types.
 * Used where values cross a trust boundary (settlement requests,
 * snapshots read back from disk, events from a store).
 */

import { isAddress } from "viem";
import type { Hex } from "viem";
import type { Leg } from "./split.js";
import type { SignatureTriple } from "./approval.js";
import type { DomainEvent, EventMetadata } from "./event.js";

const BYTES32 = /^0x[0-9a-fA-F]{64}$/;

/** 2^256 - 1, the largest value a uint256 field can carry. */
export const MAX_UINT256 = (1n << 256n) - 1n;

// =============================================================================
// Primitive guards
// =============================================================================

export function isBytes32(value: unknown): value is Hex {
  return typeof value === "string" && BYTES32.test(value);
}

export function isUint256(value: unknown): value is bigint {
  return typeof value === "bigint" && value >= 0n && value <= MAX_UINT256;
}

// =============================================================================
// Split guards
// =============================================================================

export function isLeg(value: unknown): value is Leg {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.participant === "string" &&
    isAddress(v.participant, { strict: false }) &&
    isUint256(v.amount) &&
    v.amount > 0n
  );
}

// =============================================================================
// Approval guards
// =============================================================================

export function isSignatureTriple(value: unknown): value is SignatureTriple {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.v === "number" &&
    Number.isInteger(v.v) &&
    isBytes32(v.r) &&
    isBytes32(v.s)
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["ledger", "settlement"]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
