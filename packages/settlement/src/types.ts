/**
 * @splitpact/settlement — Settlement types and errors.
 *
 * Rules:
 * - Every rejection is a SettlementError with a code and a category
 * - A rejected settlement leaves no trace: no transfer, no flag, no event
 */

import type { Address } from "viem";
import type { Clock, EventSink, Leg, SplitId } from "@splitpact/types";
import type { SplitLedger } from "@splitpact/ledger";
import type { SigningDomain } from "@splitpact/signing";
import type { ReplayGuard } from "./replay-guard.js";
import type { TokenLedger } from "./token-ledger.js";

// ─── Error Types ─────────────────────────────────────────────────────────

export type SettlementErrorCode =
  | "SPLIT_NOT_FOUND"
  | "ALREADY_SETTLED"
  | "SPLIT_EXPIRED"
  | "LENGTH_MISMATCH"
  | "INCOMPLETE_BATCH"
  | "DUPLICATE_PARTICIPANT"
  | "NOT_A_PARTICIPANT"
  | "AMOUNT_MISMATCH"
  | "ALREADY_APPROVED"
  | "APPROVAL_EXPIRED"
  | "INVALID_SIGNATURE"
  | "INSUFFICIENT_ALLOWANCE"
  | "TRANSFER_FAILED"
  | "REENTRANT_CALL";

/**
 * The five failure families a caller can act on.
 */
export type SettlementErrorCategory =
  | "malformed"
  | "authorization"
  | "temporal"
  | "state_conflict"
  | "external";

const CATEGORY_BY_CODE: Readonly<Record<SettlementErrorCode, SettlementErrorCategory>> = {
  SPLIT_NOT_FOUND: "malformed",
  LENGTH_MISMATCH: "malformed",
  INCOMPLETE_BATCH: "malformed",
  DUPLICATE_PARTICIPANT: "malformed",
  NOT_A_PARTICIPANT: "authorization",
  AMOUNT_MISMATCH: "authorization",
  INVALID_SIGNATURE: "authorization",
  INSUFFICIENT_ALLOWANCE: "authorization",
  SPLIT_EXPIRED: "temporal",
  APPROVAL_EXPIRED: "temporal",
  ALREADY_SETTLED: "state_conflict",
  ALREADY_APPROVED: "state_conflict",
  REENTRANT_CALL: "state_conflict",
  TRANSFER_FAILED: "external",
};

export function categoryOf(code: SettlementErrorCode): SettlementErrorCategory {
  return CATEGORY_BY_CODE[code];
}

export interface SettlementErrorDetails {
  /** Position of the offending batch entry */
  readonly index?: number | undefined;
  readonly participant?: Address | undefined;
  readonly cause?: unknown;
}

/**
 * Structured error from the settlement engine.
 * Always thrown — never returns error codes silently.
 */
export class SettlementError extends Error {
  public readonly code: SettlementErrorCode;
  public readonly category: SettlementErrorCategory;
  public readonly index: number | undefined;
  public readonly participant: Address | undefined;

  constructor(
    code: SettlementErrorCode,
    message: string,
    details: SettlementErrorDetails = {},
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "SettlementError";
    this.code = code;
    this.category = categoryOf(code);
    this.index = details.index;
    this.participant = details.participant;
  }
}

// ─── Results ─────────────────────────────────────────────────────────────

/**
 * What a committed settlement did.
 */
export interface SettlementReceipt {
  readonly splitId: SplitId;
  readonly payer: Address;
  readonly token: Address;
  readonly totalAmount: bigint;

  /** One transfer per leg, in batch order */
  readonly transfers: readonly Leg[];

  readonly settledAt: bigint;
}

/**
 * Outcome of a dry run. Never throws for a rejected batch.
 */
export type SettlementPreview =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: SettlementError };

// ─── Options ─────────────────────────────────────────────────────────────

export interface SettlementEngineOptions {
  readonly ledger: SplitLedger;
  readonly tokens: TokenLedger;

  /** Signing domain; its verifyingContract is the allowance spender */
  readonly domain: SigningDomain;

  /** Default: a fresh ReplayGuard */
  readonly replayGuard?: ReplayGuard | undefined;

  /** Default: system clock */
  readonly clock?: Clock | undefined;

  /** Receives participant.approved and split.settled. Default: none */
  readonly events?: EventSink | undefined;
}
