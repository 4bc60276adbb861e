/**
 * @splitpact/signing — Signature recovery and verification.
 *
 * Recovery uses viem's secp256k1 `recoverAddress`. Before recovering,
 * the triple must be canonical:
 * - v is 27 or 28
 * - r and s are non-zero and below the curve order
 * - s is in the lower half of the order (no malleable twin)
 *
 * Nothing here throws on a bad signature: callers get `null` or `false`
 * and decide what a failed verification means.
 */

import {
  concat,
  hexToBigInt,
  hexToNumber,
  isAddress,
  isAddressEqual,
  numberToHex,
  recoverAddress,
  size,
  slice,
  type Address,
  type Hex,
} from "viem";
import { isBytes32, isSignatureTriple } from "@splitpact/types";
import type { SignatureTriple } from "@splitpact/types";
import { SigningError } from "./types.js";

/** Order of the secp256k1 group. */
export const SECP256K1_N =
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;

/** Largest s accepted; anything above has a malleable twin (n - s). */
export const SECP256K1_N_HALF = SECP256K1_N >> 1n;

/**
 * Check that a triple is well-formed and non-malleable.
 */
export function isCanonicalSignature(signature: SignatureTriple): boolean {
  if (!isSignatureTriple(signature)) return false;
  if (signature.v !== 27 && signature.v !== 28) return false;

  const r = hexToBigInt(signature.r);
  const s = hexToBigInt(signature.s);
  if (r === 0n || r >= SECP256K1_N) return false;
  if (s === 0n || s > SECP256K1_N_HALF) return false;
  return true;
}

/**
 * Split a 65-byte compact signature (r ‖ s ‖ v) into a triple.
 * A recovery id of 0 or 1 is lifted to 27 or 28.
 *
 * @throws SigningError if the signature is not 65 bytes
 */
export function splitSignature(signature: Hex): SignatureTriple {
  if (size(signature) !== 65) {
    throw new SigningError(
      "signature",
      `Signature must be 65 bytes, got ${size(signature)}`,
    );
  }
  const v = hexToNumber(slice(signature, 64, 65));
  return {
    r: slice(signature, 0, 32),
    s: slice(signature, 32, 64),
    v: v < 27 ? v + 27 : v,
  };
}

/**
 * Join a triple back into the 65-byte compact form.
 */
export function joinSignature(signature: SignatureTriple): Hex {
  return concat([signature.r, signature.s, numberToHex(signature.v, { size: 1 })]);
}

/**
 * Recover the address that produced `signature` over `digest`.
 *
 * @returns The signer, or null when the signature is malformed,
 *          malleable, or recovery fails
 */
export async function recoverSigner(
  digest: Hex,
  signature: SignatureTriple,
): Promise<Address | null> {
  if (!isBytes32(digest) || !isCanonicalSignature(signature)) {
    return null;
  }

  try {
    return await recoverAddress({ hash: digest, signature: joinSignature(signature) });
  } catch {
    // r is not the x-coordinate of a curve point
    return null;
  }
}

/**
 * Check that `signature` over `digest` was produced by `expected`.
 */
export async function verifyApproval(
  digest: Hex,
  signature: SignatureTriple,
  expected: Address,
): Promise<boolean> {
  if (!isAddress(expected, { strict: false })) {
    return false;
  }
  const signer = await recoverSigner(digest, signature);
  return signer !== null && isAddressEqual(signer, expected);
}
