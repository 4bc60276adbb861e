/**
 * @splitpact/types — Shared domain types for the splitpact stack.
 *
 * These types are used across all splitpact packages:
 * - Splits and their legs
 * - Approval messages, signatures and settlement batches
 * - Event architecture
 * - Clocks (unix seconds)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - Amounts and timestamps are bigint
 * - No methods that mutate state (ManualClock aside, a test helper)
 */

// Split types
export type {
  SplitId,
  Leg,
  Split,
  CreateSplitInput,
} from "./split.js";

// Approval types
export type {
  SignatureTriple,
  ApprovalMessage,
  SettlementBatch,
  ApprovalEntry,
} from "./approval.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSink,
  SplitEventType,
  SplitCreatedPayload,
  ParticipantApprovedPayload,
  SplitSettledPayload,
} from "./event.js";

export { SPLIT_EVENTS, splitStreamId } from "./event.js";

// Time
export type { Clock } from "./clock.js";
export { systemClock, ManualClock } from "./clock.js";

// Runtime type guards
export {
  MAX_UINT256,
  isBytes32,
  isUint256,
  isLeg,
  isSignatureTriple,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
