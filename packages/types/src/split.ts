/**
 * Split Types
 *
 * A split is one bill-division event: a payer who fronted a payment
 * and one or more legs, each naming a participant and the fixed
 * amount that participant owes.
 *
 * Rules:
 * - Amounts and timestamps are bigint (uint256 semantics, unix seconds)
 * - Identities are EVM addresses
 * - Everything except `settled` is fixed at creation
 */

import type { Address, Hex } from "viem";

/** Monotonically increasing split identifier (first split is 1). */
export type SplitId = bigint;

/**
 * One participant's obligation within a split.
 */
export interface Leg {
  /** Identity owing funds */
  readonly participant: Address;

  /** Positive quantity owed, in the token's smallest unit */
  readonly amount: bigint;
}

/**
 * A stored split.
 */
export interface Split {
  readonly id: SplitId;

  /** Receives every leg's amount on settlement */
  readonly payer: Address;

  /** The fungible asset being moved */
  readonly token: Address;

  /** Sum of all leg amounts at creation, never recomputed */
  readonly totalAmount: bigint;

  readonly createdAt: bigint;

  /** Settlement is refused after this timestamp. 0n means no expiry. */
  readonly deadline: bigint;

  /** Opaque hash of off-core metadata (receipt, description) */
  readonly metaHash: Hex;

  /** Terminal flag, flips to true exactly once */
  readonly settled: boolean;
}

/**
 * Input for creating a split.
 */
export interface CreateSplitInput {
  readonly payer: Address;
  readonly token: Address;
  readonly legs: readonly Leg[];

  /** Defaults to 0n (no expiry) */
  readonly deadline?: bigint | undefined;

  /** Defaults to the zero hash */
  readonly metaHash?: Hex | undefined;
}
