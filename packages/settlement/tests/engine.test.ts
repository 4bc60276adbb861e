import { describe, it, expect } from "vitest";
import { getAddress, hashTypedData } from "viem";
import { approvalTypedData } from "@splitpact/signing";
import { batchFromEntries } from "../src/batch.js";
import {
  ALICE,
  BOB,
  CAROL,
  COORDINATOR,
  createSplit,
  DOMAIN,
  fund,
  NOW,
  ONE_DAY,
  PAYER,
  rejection,
  salt,
  setup,
  signEntry,
  TOKEN,
} from "./fixtures.js";
import type { Harness } from "./fixtures.js";

/** Split A=100, B=50 with both participants funded and signed. */
async function standardSplit(h: Harness) {
  fund(h, ALICE, 1_000n, 100n);
  fund(h, BOB, 1_000n, 50n);
  const splitId = createSplit(h, [
    { participant: ALICE.address, amount: 100n },
    { participant: BOB.address, amount: 50n },
  ]);
  const alice = await signEntry(h, ALICE, splitId, { salt: salt(1) });
  const bob = await signEntry(h, BOB, splitId, { salt: salt(2) });
  return { splitId, alice, bob };
}

function expectUntouched(h: Harness, splitId: bigint): void {
  expect(h.tokens.balanceOf(TOKEN, ALICE.address)).toBe(1_000n);
  expect(h.tokens.balanceOf(TOKEN, BOB.address)).toBe(1_000n);
  expect(h.tokens.balanceOf(TOKEN, PAYER)).toBe(0n);
  expect(h.ledger.getSplit(splitId)?.settled).toBe(false);
  expect(h.engine.isApproved(splitId, ALICE.address)).toBe(false);
  expect(h.engine.isApproved(splitId, BOB.address)).toBe(false);
  expect(h.sink.types()).toEqual([["split.created"]]);
}

// =============================================================================
// Scenarios
// =============================================================================

describe("settleSplit", () => {
  it("moves every leg to the payer and settles the split", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);

    const receipt = await h.engine.settleSplit(splitId, batchFromEntries([alice, bob]));

    expect(receipt).toEqual({
      splitId: 1n,
      payer: getAddress(PAYER),
      token: getAddress(TOKEN),
      totalAmount: 150n,
      transfers: [
        { participant: ALICE.address, amount: 100n },
        { participant: BOB.address, amount: 50n },
      ],
      settledAt: NOW,
    });
    expect(h.tokens.balanceOf(TOKEN, ALICE.address)).toBe(900n);
    expect(h.tokens.balanceOf(TOKEN, BOB.address)).toBe(950n);
    expect(h.tokens.balanceOf(TOKEN, PAYER)).toBe(150n);
    expect(h.ledger.getSplit(splitId)?.settled).toBe(true);
    expect(h.engine.isApproved(splitId, ALICE.address)).toBe(true);
    expect(h.engine.isApproved(splitId, BOB.address)).toBe(true);
    expect(h.engine.approvedParticipants(splitId)).toEqual([ALICE.address, BOB.address]);
  });

  it("publishes the approvals and the settlement in one batch", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);

    await h.engine.settleSplit(splitId, batchFromEntries([alice, bob]));

    expect(h.sink.types()).toEqual([
      ["split.created"],
      ["participant.approved", "participant.approved", "split.settled"],
    ]);
    const settlement = h.sink.published[1];
    expect(settlement?.streamId).toBe("split:1");
    expect(settlement?.events.map((e) => e.payload)).toEqual([
      { splitId: "1", participant: ALICE.address, amount: "100" },
      { splitId: "1", participant: BOB.address, amount: "50" },
      { splitId: "1", payer: getAddress(PAYER) },
    ]);
    expect(settlement?.events.every((e) => e.metadata.source === "settlement")).toBe(true);
    expect(settlement?.events[0]?.metadata.actor).toBe(ALICE.address);
    expect(settlement?.events[2]?.metadata.correlationId).toBe("split:1");
  });

  it("rejects a batch claiming 99 for a 100 leg", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);

    const error = await rejection(
      h.engine.settleSplit(splitId, batchFromEntries([{ ...alice, amount: 99n }, bob])),
    );

    expect(error.code).toBe("AMOUNT_MISMATCH");
    expect(error.category).toBe("authorization");
    expect(error.index).toBe(0);
    expect(error.participant).toBe(ALICE.address);
    expectUntouched(h, splitId);
  });

  it("rejects settling the same split twice", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);
    const batch = batchFromEntries([alice, bob]);
    await h.engine.settleSplit(splitId, batch);

    const error = await rejection(h.engine.settleSplit(splitId, batch));

    expect(error.code).toBe("ALREADY_SETTLED");
    expect(error.category).toBe("state_conflict");
    expect(h.tokens.balanceOf(TOKEN, PAYER)).toBe(150n);
  });

  it("rejects a batch re-presenting a participant who already approved", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);
    h.replay.markApproved(splitId, ALICE.address);

    const error = await rejection(h.engine.settleSplit(splitId, batchFromEntries([alice, bob])));

    expect(error.code).toBe("ALREADY_APPROVED");
    expect(error.category).toBe("state_conflict");
    expect(error.index).toBe(0);
    expect(error.participant).toBe(ALICE.address);
    expect(error.message).toBe(`${ALICE.address} already approved split ${splitId.toString()}`);
    expect(h.engine.approvedParticipants(splitId)).toEqual([ALICE.address]);
    expect(h.tokens.balanceOf(TOKEN, ALICE.address)).toBe(1_000n);
    expect(h.tokens.balanceOf(TOKEN, BOB.address)).toBe(1_000n);
    expect(h.tokens.balanceOf(TOKEN, PAYER)).toBe(0n);
    expect(h.ledger.getSplit(splitId)?.settled).toBe(false);
    expect(h.sink.types()).toEqual([["split.created"]]);
  });

  it("rejects the whole batch when one allowance is short", async () => {
    const h = setup();
    fund(h, ALICE, 1_000n, 100n);
    fund(h, BOB, 1_000n, 40n);
    const splitId = createSplit(h, [
      { participant: ALICE.address, amount: 100n },
      { participant: BOB.address, amount: 50n },
    ]);
    const alice = await signEntry(h, ALICE, splitId);
    const bob = await signEntry(h, BOB, splitId);

    const error = await rejection(h.engine.settleSplit(splitId, batchFromEntries([alice, bob])));

    expect(error.code).toBe("INSUFFICIENT_ALLOWANCE");
    expect(error.index).toBe(1);
    expect(error.participant).toBe(BOB.address);
    expect(error.message).toBe(`${BOB.address} allows 40, owes 50`);
    expectUntouched(h, splitId);
  });
});

// =============================================================================
// Malformed batches
// =============================================================================

describe("batch shape", () => {
  it("rejects an unknown split", async () => {
    const h = setup();

    const error = await rejection(h.engine.settleSplit(7n, batchFromEntries([])));

    expect(error.code).toBe("SPLIT_NOT_FOUND");
    expect(error.message).toBe("Unknown split: 7");
  });

  it("rejects columns of different lengths", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);
    const batch = batchFromEntries([alice, bob]);

    const error = await rejection(
      h.engine.settleSplit(splitId, { ...batch, salts: [salt(1)] }),
    );

    expect(error.code).toBe("LENGTH_MISMATCH");
    expect(error.category).toBe("malformed");
  });

  it("rejects a batch that leaves a leg out", async () => {
    const h = setup();
    const { splitId, alice } = await standardSplit(h);

    const error = await rejection(h.engine.settleSplit(splitId, batchFromEntries([alice])));

    expect(error.code).toBe("INCOMPLETE_BATCH");
    expect(error.message).toBe("Split 1 has 2 legs but the batch has 1 entries");
    expectUntouched(h, splitId);
  });

  it("rejects a participant presented twice", async () => {
    const h = setup();
    const { splitId, alice } = await standardSplit(h);

    const error = await rejection(
      h.engine.settleSplit(splitId, batchFromEntries([alice, alice])),
    );

    expect(error.code).toBe("DUPLICATE_PARTICIPANT");
    expect(error.index).toBe(1);
  });

  it("rejects an address with no leg", async () => {
    const h = setup();
    const { splitId, alice } = await standardSplit(h);
    const carol = { ...alice, participant: CAROL.address, amount: 50n };

    const error = await rejection(
      h.engine.settleSplit(splitId, batchFromEntries([alice, carol])),
    );

    expect(error.code).toBe("NOT_A_PARTICIPANT");
    expect(error.participant).toBe(CAROL.address);
  });
});

// =============================================================================
// Time
// =============================================================================

describe("deadlines", () => {
  it("accepts settlement at the split deadline and rejects it one second later", async () => {
    const h = setup();
    fund(h, ALICE, 1_000n, 100n);
    const first = createSplit(h, [{ participant: ALICE.address, amount: 100n }], NOW + 10n);
    const second = createSplit(h, [{ participant: ALICE.address, amount: 100n }], NOW + 10n);
    const a1 = await signEntry(h, ALICE, first);
    const a2 = await signEntry(h, ALICE, second);

    h.clock.set(NOW + 10n);
    await h.engine.settleSplit(first, batchFromEntries([a1]));

    h.clock.set(NOW + 11n);
    const error = await rejection(h.engine.settleSplit(second, batchFromEntries([a2])));
    expect(error.code).toBe("SPLIT_EXPIRED");
    expect(error.category).toBe("temporal");
  });

  it("rejects an expired approval even though the split is open", async () => {
    const h = setup();
    const { splitId, bob } = await standardSplit(h);
    const alice = await signEntry(h, ALICE, splitId, { deadline: NOW + 5n });
    h.clock.advance(6n);

    const error = await rejection(h.engine.settleSplit(splitId, batchFromEntries([alice, bob])));

    expect(error.code).toBe("APPROVAL_EXPIRED");
    expect(error.index).toBe(0);
  });

  it("rejects an expired split even though every approval is still valid", async () => {
    const h = setup();
    fund(h, ALICE, 1_000n, 100n);
    const splitId = createSplit(h, [{ participant: ALICE.address, amount: 100n }], NOW + 60n);
    const alice = await signEntry(h, ALICE, splitId, { deadline: NOW + ONE_DAY });
    h.clock.advance(61n);

    const error = await rejection(h.engine.settleSplit(splitId, batchFromEntries([alice])));

    expect(error.code).toBe("SPLIT_EXPIRED");
  });
});

// =============================================================================
// Signatures
// =============================================================================

describe("signatures", () => {
  it("rejects a signature by someone other than the participant", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);
    const forged = { ...bob, signature: alice.signature };

    const error = await rejection(h.engine.settleSplit(splitId, batchFromEntries([alice, forged])));

    expect(error.code).toBe("INVALID_SIGNATURE");
    expect(error.index).toBe(1);
    expectUntouched(h, splitId);
  });

  it("rejects a signature whose salt was swapped after signing", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);

    const error = await rejection(
      h.engine.settleSplit(splitId, batchFromEntries([{ ...alice, salt: salt(9) }, bob])),
    );

    expect(error.code).toBe("INVALID_SIGNATURE");
  });

  it("rejects an approval replayed against another split with the same legs", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);
    const other = createSplit(h, [
      { participant: ALICE.address, amount: 100n },
      { participant: BOB.address, amount: 50n },
    ]);
    await h.engine.settleSplit(splitId, batchFromEntries([alice, bob]));
    h.tokens.approve(TOKEN, ALICE.address, COORDINATOR, 100n);
    h.tokens.approve(TOKEN, BOB.address, COORDINATOR, 50n);

    const error = await rejection(h.engine.settleSplit(other, batchFromEntries([alice, bob])));

    expect(error.code).toBe("INVALID_SIGNATURE");
    expect(h.ledger.getSplit(other)?.settled).toBe(false);
  });

  it("rejects a high-s signature", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);
    const n = 0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n;
    const highS = n - BigInt(alice.signature.s);
    const flipped = {
      ...alice,
      signature: {
        v: alice.signature.v === 27 ? 28 : 27,
        r: alice.signature.r,
        s: `0x${highS.toString(16).padStart(64, "0")}` as const,
      },
    };

    const error = await rejection(h.engine.settleSplit(splitId, batchFromEntries([flipped, bob])));

    expect(error.code).toBe("INVALID_SIGNATURE");
  });
});

// =============================================================================
// Helpers exposed to signers
// =============================================================================

describe("approval digests", () => {
  it("matches the EIP-712 hash of the stored split's approval", async () => {
    const h = setup();
    const { splitId } = await standardSplit(h);

    const digest = h.engine.approvalDigestFor(splitId, BOB.address, NOW + ONE_DAY, salt(2));

    expect(digest).toBe(
      hashTypedData(
        approvalTypedData(DOMAIN, {
          participant: BOB.address,
          splitId,
          token: TOKEN,
          payer: PAYER,
          amount: 50n,
          deadline: NOW + ONE_DAY,
          salt: salt(2),
        }),
      ),
    );
  });

  it("refuses a digest for an address with no leg", async () => {
    const h = setup();
    const { splitId } = await standardSplit(h);

    expect(() => h.engine.approvalDigestFor(splitId, CAROL.address, NOW, salt(1))).toThrow(
      `${CAROL.address} has no leg in split 1`,
    );
  });

  it("names the coordinator as spender", () => {
    expect(setup().engine.spender).toBe(getAddress(COORDINATOR));
  });
});

// =============================================================================
// Preview
// =============================================================================

describe("previewSettlement", () => {
  it("accepts a valid batch without settling it", async () => {
    const h = setup();
    const { splitId, alice, bob } = await standardSplit(h);
    const batch = batchFromEntries([alice, bob]);

    expect(await h.engine.previewSettlement(splitId, batch)).toEqual({ ok: true });
    expectUntouched(h, splitId);

    await h.engine.settleSplit(splitId, batch);
    expect(h.ledger.getSplit(splitId)?.settled).toBe(true);
  });

  it("returns the error a settlement would throw", async () => {
    const h = setup();
    const { splitId, alice } = await standardSplit(h);

    const preview = await h.engine.previewSettlement(splitId, batchFromEntries([alice]));

    expect(preview.ok).toBe(false);
    if (!preview.ok) {
      expect(preview.error.code).toBe("INCOMPLETE_BATCH");
    }
  });
});
