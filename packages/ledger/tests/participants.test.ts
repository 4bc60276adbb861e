/**
 * Tests for the leg index and address validation.
 */

import { describe, it, expect } from "vitest";
import type { Leg } from "@splitpact/types";
import { LegIndex, assertAddress } from "../src/participants.js";
import { LedgerError } from "../src/types.js";

const ALICE = "0x3000000000000000000000000000000000000003";
const BOB = "0x4000000000000000000000000000000000000004";

describe("assertAddress", () => {
  it("returns a valid address unchanged when it has no letters", () => {
    expect(assertAddress(ALICE, "Payer")).toBe(ALICE);
  });

  it("names the field in its message", () => {
    expect(() => assertAddress("nope", "Token")).toThrow('Token is not an address: "nope"');
  });

  it("refuses the zero address", () => {
    expect(() => assertAddress("0x0000000000000000000000000000000000000000", "Payer")).toThrow(
      "Payer must not be the zero address",
    );
  });
});

describe("LegIndex", () => {
  it("keeps order and answers lookups", () => {
    const index = LegIndex.build([
      { participant: BOB, amount: 5n },
      { participant: ALICE, amount: 7n },
    ]);

    expect(index.count).toBe(2);
    expect(index.legs.map((l) => l.participant)).toEqual([BOB, ALICE]);
    expect(index.amountOf(ALICE)).toBe(7n);
    expect(index.positionOf(ALICE)).toBe(1);
    expect(index.has(BOB)).toBe(true);
  });

  it("returns 0n and undefined for strangers", () => {
    const index = LegIndex.build([{ participant: ALICE, amount: 1n }]);
    expect(index.amountOf(BOB)).toBe(0n);
    expect(index.positionOf(BOB)).toBeUndefined();
    expect(index.has(BOB)).toBe(false);
  });

  it("freezes the stored legs", () => {
    const index = LegIndex.build([{ participant: ALICE, amount: 1n }]);
    expect(Object.isFrozen(index.legs)).toBe(true);
    expect(Object.isFrozen(index.legs[0])).toBe(true);
  });

  it("does not alias the caller's array", () => {
    const input: Leg[] = [{ participant: ALICE, amount: 1n }];
    const index = LegIndex.build(input);
    input.push({ participant: BOB, amount: 2n });
    expect(index.count).toBe(1);
  });

  it("reports both positions of a repeated participant", () => {
    expect(() =>
      LegIndex.build([
        { participant: ALICE, amount: 1n },
        { participant: BOB, amount: 1n },
        { participant: ALICE, amount: 2n },
      ]),
    ).toThrow(`Participant ${ALICE} appears in legs 0 and 2`);
  });

  it("throws EMPTY_LEGS on no legs", () => {
    expect(() => LegIndex.build([])).toThrow(LedgerError);
  });
});
