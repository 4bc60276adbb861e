/**
 * @splitpact/signing — Types for digest construction and verification.
 */

import type { Address, Hex } from "viem";

// ─── Domain ──────────────────────────────────────────────────────────────

/**
 * Identity of one deployed coordinator. Digests built under one domain
 * never verify under another.
 */
export interface SigningDomainInput {
  readonly name: string;
  readonly version: string;
  readonly chainId: number;

  /** The coordinator's own address; also the spender participants approve */
  readonly verifyingContract: Address;
}

/**
 * A frozen domain with its separator precomputed.
 */
export interface SigningDomain extends SigningDomainInput {
  readonly separator: Hex;
}

// ─── Errors ──────────────────────────────────────────────────────────────

export type SigningErrorCode = "INVALID_FIELD";

/**
 * Thrown when a digest input is malformed (bad address, salt, or an
 * integer outside uint256). Verification failures never throw.
 */
export class SigningError extends Error {
  public readonly code: SigningErrorCode;
  public readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "SigningError";
    this.code = "INVALID_FIELD";
    this.field = field;
  }
}
