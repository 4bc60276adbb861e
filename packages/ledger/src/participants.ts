/**
 * @splitpact/ledger — Address validation and the per-split leg index.
 *
 * Legs are kept twice: in their original order (for enumeration and
 * auditing) and in a map from participant to position, so the amount
 * a participant owes is one lookup rather than a scan.
 *
 * Rules:
 * - A participant appears at most once per split
 * - Lookups are case-insensitive on addresses
 * - Once built, an index cannot be modified
 */

import { getAddress, isAddress, zeroAddress, type Address } from "viem";
import type { Leg } from "@splitpact/types";
import { assertPositiveAmount } from "./amounts.js";
import { LedgerError } from "./types.js";

/**
 * Validate and checksum an address, refusing the zero address.
 */
export function assertAddress(value: string, context: string): Address {
  if (typeof value !== "string" || !isAddress(value, { strict: false })) {
    throw new LedgerError(
      "INVALID_ADDRESS",
      `${context} is not an address: "${String(value)}"`,
    );
  }
  const address = getAddress(value);
  if (address === zeroAddress) {
    throw new LedgerError("INVALID_ADDRESS", `${context} must not be the zero address`);
  }
  return address;
}

function key(address: string): string {
  return address.toLowerCase();
}

/**
 * Ordered, immutable legs of one split plus a participant index.
 */
export class LegIndex {
  private readonly _legs: readonly Leg[];
  private readonly _positions: ReadonlyMap<string, number>;

  private constructor(legs: readonly Leg[], positions: ReadonlyMap<string, number>) {
    this._legs = legs;
    this._positions = positions;
  }

  /**
   * Validate legs and build the index.
   *
   * Throws LedgerError on an empty list, a malformed or zero participant,
   * a non-positive amount, or a repeated participant.
   */
  static build(legs: readonly Leg[]): LegIndex {
    if (legs.length === 0) {
      throw new LedgerError("EMPTY_LEGS", "A split needs at least one leg");
    }

    const stored: Leg[] = [];
    const positions = new Map<string, number>();

    legs.forEach((leg, i) => {
      const participant = assertAddress(leg.participant, `Leg ${i} participant`);
      const amount = assertPositiveAmount(leg.amount, `Leg ${i}`);

      const first = positions.get(key(participant));
      if (first !== undefined) {
        throw new LedgerError(
          "DUPLICATE_PARTICIPANT",
          `Participant ${participant} appears in legs ${first} and ${i}`,
        );
      }

      positions.set(key(participant), i);
      stored.push(Object.freeze({ participant, amount }));
    });

    return new LegIndex(Object.freeze(stored), positions);
  }

  /**
   * Amount owed by a participant, or 0n if they have no leg.
   */
  amountOf(participant: string): bigint {
    const position = this._positions.get(key(participant));
    if (position === undefined) {
      return 0n;
    }
    return this._legs[position]?.amount ?? 0n;
  }

  /**
   * Check whether a participant has a leg.
   */
  has(participant: string): boolean {
    return this._positions.has(key(participant));
  }

  /**
   * Position of a participant's leg, or undefined.
   */
  positionOf(participant: string): number | undefined {
    return this._positions.get(key(participant));
  }

  /**
   * All legs in creation order.
   */
  get legs(): readonly Leg[] {
    return this._legs;
  }

  get count(): number {
    return this._legs.length;
  }
}
