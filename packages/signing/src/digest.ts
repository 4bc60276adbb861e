/**
 * @splitpact/signing — Approval digest construction.
 *
 * digest = keccak256(0x1901 ‖ domainSeparator ‖ hashStruct(Approval))
 *
 * The layout is the EIP-712 one, so `approvalDigest` equals viem's
 * `hashTypedData(approvalTypedData(...))` and any EIP-712 wallet can
 * produce a signature the verifier accepts.
 */

import {
  concat,
  encodeAbiParameters,
  getAddress,
  isAddress,
  keccak256,
  parseAbiParameters,
  toBytes,
  type Address,
  type Hex,
  type TypedDataDefinition,
} from "viem";
import { isBytes32, MAX_UINT256 } from "@splitpact/types";
import type { ApprovalMessage } from "@splitpact/types";
import type { SigningDomain } from "./types.js";
import { SigningError } from "./types.js";

export const APPROVAL_TYPE =
  "Approval(address participant,uint256 splitId,address token,address payer,uint256 amount,uint256 deadline,bytes32 salt)";

export const APPROVAL_TYPEHASH: Hex = keccak256(toBytes(APPROVAL_TYPE));

/** EIP-712 type definition matching APPROVAL_TYPE field for field. */
export const APPROVAL_TYPES = {
  Approval: [
    { name: "participant", type: "address" },
    { name: "splitId", type: "uint256" },
    { name: "token", type: "address" },
    { name: "payer", type: "address" },
    { name: "amount", type: "uint256" },
    { name: "deadline", type: "uint256" },
    { name: "salt", type: "bytes32" },
  ],
} as const;

const APPROVAL_PARAMS = parseAbiParameters(
  "bytes32 typeHash, address participant, uint256 splitId, address token, address payer, uint256 amount, uint256 deadline, bytes32 salt",
);

function assertAddress(field: string, value: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new SigningError(field, `Approval ${field} is not an address: "${value}"`);
  }
  return getAddress(value);
}

function assertUint(field: string, value: bigint): bigint {
  if (value < 0n || value > MAX_UINT256) {
    throw new SigningError(field, `Approval ${field} is outside uint256: ${value.toString()}`);
  }
  return value;
}

/**
 * Validate and normalize an approval message (checksummed addresses).
 *
 * @throws SigningError if any field is malformed
 */
export function normalizeApproval(message: ApprovalMessage): ApprovalMessage {
  if (!isBytes32(message.salt)) {
    throw new SigningError("salt", `Approval salt must be 32 bytes: "${message.salt}"`);
  }
  return {
    participant: assertAddress("participant", message.participant),
    splitId: assertUint("splitId", message.splitId),
    token: assertAddress("token", message.token),
    payer: assertAddress("payer", message.payer),
    amount: assertUint("amount", message.amount),
    deadline: assertUint("deadline", message.deadline),
    salt: message.salt,
  };
}

/**
 * hashStruct of an Approval message.
 */
export function hashApproval(message: ApprovalMessage): Hex {
  const m = normalizeApproval(message);
  return keccak256(
    encodeAbiParameters(APPROVAL_PARAMS, [
      APPROVAL_TYPEHASH,
      m.participant,
      m.splitId,
      m.token,
      m.payer,
      m.amount,
      m.deadline,
      m.salt,
    ]),
  );
}

/**
 * The 32-byte digest a participant signs for one leg.
 *
 * @throws SigningError if any message field is malformed
 */
export function approvalDigest(domain: SigningDomain, message: ApprovalMessage): Hex {
  return keccak256(concat(["0x1901", domain.separator, hashApproval(message)]));
}

/**
 * The EIP-712 payload a wallet passes to `signTypedData` for this approval.
 */
export function approvalTypedData(
  domain: SigningDomain,
  message: ApprovalMessage,
): TypedDataDefinition<typeof APPROVAL_TYPES, "Approval"> {
  const m = normalizeApproval(message);
  return {
    domain: {
      name: domain.name,
      version: domain.version,
      chainId: domain.chainId,
      verifyingContract: domain.verifyingContract,
    },
    types: APPROVAL_TYPES,
    primaryType: "Approval",
    message: {
      participant: m.participant,
      splitId: m.splitId,
      token: m.token,
      payer: m.payer,
      amount: m.amount,
      deadline: m.deadline,
      salt: m.salt,
    },
  };
}
