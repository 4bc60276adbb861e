/**
 * @splitpact/signing — EIP-712 domain separation.
 *
 * The separator binds every digest to one coordinator deployment
 * (name, version, chain, address). It is computed once and frozen.
 */

import {
  encodeAbiParameters,
  getAddress,
  isAddress,
  keccak256,
  parseAbiParameters,
  toBytes,
  type Hex,
} from "viem";
import type { SigningDomain, SigningDomainInput } from "./types.js";
import { SigningError } from "./types.js";

export const EIP712_DOMAIN_TYPE =
  "EIP712Domain(string name,string version,uint256 chainId,address verifyingContract)";

export const EIP712_DOMAIN_TYPEHASH: Hex = keccak256(toBytes(EIP712_DOMAIN_TYPE));

const DOMAIN_PARAMS = parseAbiParameters(
  "bytes32 typeHash, bytes32 nameHash, bytes32 versionHash, uint256 chainId, address verifyingContract",
);

/**
 * Build a signing domain and compute its separator.
 *
 * @throws SigningError if any field is malformed
 */
export function createSigningDomain(input: SigningDomainInput): SigningDomain {
  if (input.name.length === 0) {
    throw new SigningError("name", "Domain name must be non-empty");
  }
  if (input.version.length === 0) {
    throw new SigningError("version", "Domain version must be non-empty");
  }
  if (!Number.isSafeInteger(input.chainId) || input.chainId <= 0) {
    throw new SigningError(
      "chainId",
      `Domain chainId must be a positive integer, got ${input.chainId}`,
    );
  }
  if (!isAddress(input.verifyingContract, { strict: false })) {
    throw new SigningError(
      "verifyingContract",
      `Domain verifyingContract is not an address: "${input.verifyingContract}"`,
    );
  }

  const verifyingContract = getAddress(input.verifyingContract);
  const separator = keccak256(
    encodeAbiParameters(DOMAIN_PARAMS, [
      EIP712_DOMAIN_TYPEHASH,
      keccak256(toBytes(input.name)),
      keccak256(toBytes(input.version)),
      BigInt(input.chainId),
      verifyingContract,
    ]),
  );

  return Object.freeze({
    name: input.name,
    version: input.version,
    chainId: input.chainId,
    verifyingContract,
    separator,
  });
}
