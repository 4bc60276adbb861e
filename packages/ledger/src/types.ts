/**
 * @splitpact/ledger — Internal types for the split ledger.
 *
 * Rules:
 * - All types are readonly
 * - Legs never change after creation
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { Hex } from "viem";
import type { Clock, EventSink } from "@splitpact/types";

/** metaHash used when a split is created without one. */
export const ZERO_HASH: Hex = `0x${"00".repeat(32)}`;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_ADDRESS"
  | "INVALID_AMOUNT"
  | "EMPTY_LEGS"
  | "DUPLICATE_PARTICIPANT"
  | "INVALID_DEADLINE"
  | "INVALID_META_HASH"
  | "SPLIT_NOT_FOUND"
  | "ALREADY_SETTLED"
  | "INVALID_SNAPSHOT";

/**
 * Structured error from the split ledger.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Options ─────────────────────────────────────────────────────────────

export interface SplitLedgerOptions {
  /** Source of createdAt and of "now" for deadline checks. Default: system clock */
  readonly clock?: Clock | undefined;

  /** Receives split.created events. Default: none */
  readonly events?: EventSink | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/** A leg with its amount as a decimal string. */
export interface LegSnapshot {
  readonly participant: string;
  readonly amount: string;
}

/** A split with bigints as decimal strings, legs inlined. */
export interface SplitSnapshot {
  readonly id: string;
  readonly payer: string;
  readonly token: string;
  readonly totalAmount: string;
  readonly createdAt: string;
  readonly deadline: string;
  readonly metaHash: string;
  readonly settled: boolean;
  readonly legs: readonly LegSnapshot[];
}

/**
 * Serializable snapshot of the entire ledger state.
 * JSON-safe: no bigints.
 */
export interface SplitLedgerSnapshot {
  readonly version: 1;
  readonly lastSplitId: string;
  readonly splits: readonly SplitSnapshot[];
}
