/**
 * Approval Types
 *
 * A participant authorizes the pull of their leg by signing an
 * Approval message off-core. Settlement presents every participant's
 * signature together as one batch.
 */

import type { Address, Hex } from "viem";
import type { SplitId } from "./split.js";

/**
 * A recoverable secp256k1 signature as (v, r, s).
 * `v` is 27 or 28.
 */
export interface SignatureTriple {
  readonly v: number;
  readonly r: Hex;
  readonly s: Hex;
}

/**
 * The message a participant signs for one leg.
 *
 * `token` and `payer` always come from the stored split, never from
 * the caller, so a signature cannot be replayed against another split.
 */
export interface ApprovalMessage {
  readonly participant: Address;
  readonly splitId: SplitId;
  readonly token: Address;
  readonly payer: Address;
  readonly amount: bigint;

  /** The signature is refused after this timestamp */
  readonly deadline: bigint;

  /** Random 32-byte value chosen by the signer */
  readonly salt: Hex;
}

/**
 * A settlement request in column form: entry `i` is
 * (participants[i], amounts[i], deadlines[i], salts[i], signatures[i]).
 */
export interface SettlementBatch {
  readonly participants: readonly Address[];
  readonly amounts: readonly bigint[];
  readonly deadlines: readonly bigint[];
  readonly salts: readonly Hex[];
  readonly signatures: readonly SignatureTriple[];
}

/**
 * One row of a SettlementBatch.
 */
export interface ApprovalEntry {
  readonly participant: Address;
  readonly amount: bigint;
  readonly deadline: bigint;
  readonly salt: Hex;
  readonly signature: SignatureTriple;
}
