/**
 * @splitpact/ledger — Authoritative store of splits and their legs.
 *
 * Enforces the structural invariants of a split at creation:
 * - At least one leg, every amount positive, no repeated participant
 * - totalAmount equals the sum of the legs, forever
 * - Legs are immutable once stored
 * - `settled` flips false → true at most once
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 * - All arithmetic uses bigint
 */

// Core store
export { SplitLedger } from "./split-ledger.js";

// Leg index and address validation
export { LegIndex, assertAddress } from "./participants.js";

// Amount helpers
export { sumAmounts, assertPositiveAmount, parseUint } from "./amounts.js";

// Events
export { createSplitEvent } from "./events.js";

// Types
export type {
  LedgerErrorCode,
  SplitLedgerOptions,
  SplitLedgerSnapshot,
  SplitSnapshot,
  LegSnapshot,
} from "./types.js";

export { LedgerError, ZERO_HASH } from "./types.js";
