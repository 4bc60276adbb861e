/**
 * @splitpact/signing — Approval digests and signature verification.
 *
 * Digest Builder:
 * - createSigningDomain() — freeze a deployment's EIP-712 domain
 * - approvalDigest() — the 32-byte digest a participant signs
 * - approvalTypedData() — the same message as an EIP-712 payload
 *
 * Signature Verifier:
 * - recoverSigner() / verifyApproval() — never throw on bad input
 * - splitSignature() / joinSignature() — compact hex <-> (v, r, s)
 */

export {
  createSigningDomain,
  EIP712_DOMAIN_TYPE,
  EIP712_DOMAIN_TYPEHASH,
} from "./domain.js";

export {
  approvalDigest,
  approvalTypedData,
  hashApproval,
  normalizeApproval,
  APPROVAL_TYPE,
  APPROVAL_TYPEHASH,
  APPROVAL_TYPES,
} from "./digest.js";

export {
  isCanonicalSignature,
  joinSignature,
  recoverSigner,
  splitSignature,
  verifyApproval,
  SECP256K1_N,
  SECP256K1_N_HALF,
} from "./verifier.js";

export type {
  SigningDomain,
  SigningDomainInput,
  SigningErrorCode,
} from "./types.js";

export { SigningError } from "./types.js";
