/**
 * @splitpact/ledger — Core SplitLedger class.
 *
 * The authoritative store of splits. A split and all of its legs are
 * written together, once; afterwards the only change a split can see
 * is its `settled` flag flipping to true.
 *
 * API surface:
 * - createSplit() — Validate and store a split with its legs
 * - requiredAmount() — Amount a participant owes (0n = not a participant)
 * - getSplit() / getLegs() / listSplits() — Queries
 * - markSettled() — Terminal transition, used by settlement
 * - snapshot() / fromSnapshot() — Persistence
 *
 * There is NO update() or delete().
 */

import type { Hex } from "viem";
import { isBytes32, MAX_UINT256, SPLIT_EVENTS, splitStreamId, systemClock } from "@splitpact/types";
import type {
  Clock,
  CreateSplitInput,
  EventSink,
  Leg,
  Split,
  SplitCreatedPayload,
  SplitId,
} from "@splitpact/types";
import { parseUint, sumAmounts } from "./amounts.js";
import { createSplitEvent } from "./events.js";
import { assertAddress, LegIndex } from "./participants.js";
import type {
  SplitLedgerOptions,
  SplitLedgerSnapshot,
  SplitSnapshot,
} from "./types.js";
import { LedgerError, ZERO_HASH } from "./types.js";

interface SplitRecord {
  split: Split;
  readonly legs: LegIndex;
}

/**
 * Store of splits, their legs, and the split counter.
 */
export class SplitLedger {
  private readonly _splits = new Map<SplitId, SplitRecord>();
  private readonly _clock: Clock;
  private readonly _events: EventSink | undefined;
  private _lastSplitId: SplitId = 0n;

  constructor(options: SplitLedgerOptions = {}) {
    this._clock = options.clock ?? systemClock;
    this._events = options.events;
  }

  // ─── Creation (The Only Structural Write) ────────────────────────────

  /**
   * Create a split with its legs.
   *
   * Validation rules (fail-closed — all must pass before anything is stored):
   * 1. payer and token are valid, non-zero addresses
   * 2. legs is non-empty, each participant valid and non-zero,
   *    each amount positive, no participant repeated
   * 3. the total fits in uint256
   * 4. deadline is 0n or not already past
   * 5. metaHash is 32 bytes
   *
   * Emits split.created. Throws LedgerError if any validation fails.
   */
  createSplit(input: CreateSplitInput): SplitId {
    const payer = assertAddress(input.payer, "Payer");
    const token = assertAddress(input.token, "Token");
    const legs = LegIndex.build(input.legs);
    const totalAmount = sumAmounts(legs.legs.map((leg) => leg.amount));

    const now = this._clock.now();
    const deadline = input.deadline ?? 0n;
    if (deadline < 0n || deadline > MAX_UINT256) {
      throw new LedgerError(
        "INVALID_DEADLINE",
        `Deadline must be a uint256, got ${deadline.toString()}`,
      );
    }
    if (deadline !== 0n && deadline < now) {
      throw new LedgerError(
        "INVALID_DEADLINE",
        `Deadline ${deadline.toString()} is already past (now ${now.toString()})`,
      );
    }

    const metaHash = input.metaHash ?? ZERO_HASH;
    if (!isBytes32(metaHash)) {
      throw new LedgerError(
        "INVALID_META_HASH",
        `metaHash must be 32 bytes of hex, got "${metaHash}"`,
      );
    }

    // All validations passed. The event goes out before the split is
    // stored: a sink that refuses it leaves the ledger untouched.
    const id = this._lastSplitId + 1n;
    const split: Split = {
      id,
      payer,
      token,
      totalAmount,
      createdAt: now,
      deadline,
      metaHash,
      settled: false,
    };

    const payload: SplitCreatedPayload = {
      splitId: id.toString(),
      payer,
      token,
      totalAmount: totalAmount.toString(),
      deadline: deadline.toString(),
      metaHash,
    };
    this._events?.publish(splitStreamId(id), [
      createSplitEvent(SPLIT_EVENTS.SPLIT_CREATED, id, "ledger", payer, payload),
    ]);

    this._lastSplitId = id;
    this._splits.set(id, { split, legs });

    return id;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Amount a participant owes in a split.
   * Returns 0n when the split does not exist or the address has no leg.
   */
  requiredAmount(splitId: SplitId, participant: string): bigint {
    const record = this._splits.get(splitId);
    if (record === undefined) {
      return 0n;
    }
    return record.legs.amountOf(participant);
  }

  /**
   * Get a split by ID.
   */
  getSplit(splitId: SplitId): Split | undefined {
    return this._splits.get(splitId)?.split;
  }

  /**
   * Get a split by ID. Throws if not found.
   */
  assertSplit(splitId: SplitId): Split {
    const record = this._splits.get(splitId);
    if (record === undefined) {
      throw new LedgerError("SPLIT_NOT_FOUND", `Unknown split: ${splitId.toString()}`);
    }
    return record.split;
  }

  /**
   * Check if a split exists.
   */
  hasSplit(splitId: SplitId): boolean {
    return this._splits.has(splitId);
  }

  /**
   * Legs of a split in creation order, or undefined if it does not exist.
   */
  getLegs(splitId: SplitId): readonly Leg[] | undefined {
    return this._splits.get(splitId)?.legs.legs;
  }

  /**
   * Get all splits in creation order, optionally only (un)settled ones.
   */
  listSplits(filter?: { readonly settled?: boolean | undefined }): readonly Split[] {
    const splits = [...this._splits.values()].map((r) => r.split);
    if (filter?.settled === undefined) {
      return splits;
    }
    return splits.filter((s) => s.settled === filter.settled);
  }

  /**
   * Number of splits ever created.
   */
  get splitCount(): number {
    return this._splits.size;
  }

  // ─── Settlement Transition ───────────────────────────────────────────

  /**
   * Flip a split to settled. Irreversible.
   * Throws if the split does not exist or is already settled.
   */
  markSettled(splitId: SplitId): Split {
    const record = this._splits.get(splitId);
    if (record === undefined) {
      throw new LedgerError("SPLIT_NOT_FOUND", `Unknown split: ${splitId.toString()}`);
    }
    if (record.split.settled) {
      throw new LedgerError("ALREADY_SETTLED", `Split ${splitId.toString()} is already settled`);
    }
    record.split = { ...record.split, settled: true };
    return record.split;
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a JSON-safe snapshot of the ledger.
   * Can be restored with SplitLedger.fromSnapshot().
   */
  snapshot(): SplitLedgerSnapshot {
    return {
      version: 1,
      lastSplitId: this._lastSplitId.toString(),
      splits: [...this._splits.values()].map(({ split, legs }) => ({
        id: split.id.toString(),
        payer: split.payer,
        token: split.token,
        totalAmount: split.totalAmount.toString(),
        createdAt: split.createdAt.toString(),
        deadline: split.deadline.toString(),
        metaHash: split.metaHash,
        settled: split.settled,
        legs: legs.legs.map((leg) => ({
          participant: leg.participant,
          amount: leg.amount.toString(),
        })),
      })),
    };
  }

  /**
   * Restore a ledger from a snapshot.
   *
   * Every split goes back through leg validation; the stored total must
   * equal the sum of its legs. Past deadlines are kept as they were.
   * No events are published.
   */
  static fromSnapshot(
    snapshot: SplitLedgerSnapshot,
    options: SplitLedgerOptions = {},
  ): SplitLedger {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const ledger = new SplitLedger(options);
    const lastSplitId = parseUint(snapshot.lastSplitId, "lastSplitId");

    for (const entry of snapshot.splits) {
      const record = SplitLedger._restoreRecord(entry);
      const id = record.split.id;
      if (id === 0n || id > lastSplitId) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Split id ${id.toString()} is outside 1..${lastSplitId.toString()}`,
        );
      }
      if (ledger._splits.has(id)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Split id ${id.toString()} appears twice`);
      }
      ledger._splits.set(id, record);
    }

    ledger._lastSplitId = lastSplitId;
    return ledger;
  }

  private static _restoreRecord(entry: SplitSnapshot): SplitRecord {
    const legs = LegIndex.build(
      entry.legs.map((leg, i) => ({
        participant: assertAddress(leg.participant, `Leg ${i} participant`),
        amount: parseUint(leg.amount, `legs[${i}].amount`),
      })),
    );

    const totalAmount = parseUint(entry.totalAmount, "totalAmount");
    const sum = sumAmounts(legs.legs.map((leg) => leg.amount));
    if (totalAmount !== sum) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Split ${entry.id} total ${entry.totalAmount} does not match its legs (${sum.toString()})`,
      );
    }

    if (!isBytes32(entry.metaHash)) {
      throw new LedgerError("INVALID_SNAPSHOT", `Split ${entry.id} has a malformed metaHash`);
    }
    const metaHash: Hex = entry.metaHash;

    return {
      split: {
        id: parseUint(entry.id, "id"),
        payer: assertAddress(entry.payer, "Payer"),
        token: assertAddress(entry.token, "Token"),
        totalAmount,
        createdAt: parseUint(entry.createdAt, "createdAt"),
        deadline: parseUint(entry.deadline, "deadline"),
        metaHash,
        settled: entry.settled,
      },
      legs,
    };
  }
}
