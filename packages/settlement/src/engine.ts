/**
 * @splitpact/settlement — Settlement Engine.
 *
 * Settles a split all-or-nothing: every entry of the batch is checked
 * before any funds move, and every transfer runs inside one atomic
 * unit of the token ledger.
 *
 * Pipeline (aborts on the first failure):
 *  1. split exists and is not settled
 *  2. split deadline not passed
 *  3. columns of equal length, one entry per leg, no repeats
 *  4. every claimed amount equals the recorded leg
 *  5. no participant approved already
 *  6. approval deadlines not passed, signatures recover to participants
 *  7. allowances to the coordinator cover every amount
 *  8. approval flags set, approval events staged
 *  9. transfers and event publication, atomically
 * 10. split settled
 *
 * The whole call holds a non-reentrant guard.
 */

import type { Address, Hex } from "viem";
import { SPLIT_EVENTS, splitStreamId, systemClock } from "@splitpact/types";
import type {
  ApprovalEntry,
  ApprovalMessage,
  Clock,
  DomainEvent,
  EventSink,
  ParticipantApprovedPayload,
  SettlementBatch,
  Split,
  SplitId,
  SplitSettledPayload,
} from "@splitpact/types";
import { createSplitEvent } from "@splitpact/ledger";
import type { SplitLedger } from "@splitpact/ledger";
import { approvalDigest, SigningError, verifyApproval } from "@splitpact/signing";
import type { SigningDomain } from "@splitpact/signing";
import { entriesOf } from "./batch.js";
import { NonReentrantGuard } from "./reentrancy-guard.js";
import { ReplayGuard } from "./replay-guard.js";
import type { TokenLedger } from "./token-ledger.js";
import type {
  SettlementEngineOptions,
  SettlementPreview,
  SettlementReceipt,
} from "./types.js";
import { SettlementError } from "./types.js";

/** A batch that passed steps 1–7. */
interface SettlementPlan {
  readonly split: Split;
  readonly entries: readonly ApprovalEntry[];
  readonly now: bigint;
}

export class SettlementEngine {
  private readonly _ledger: SplitLedger;
  private readonly _tokens: TokenLedger;
  private readonly _domain: SigningDomain;
  private readonly _replay: ReplayGuard;
  private readonly _clock: Clock;
  private readonly _events: EventSink | undefined;
  private readonly _guard = new NonReentrantGuard();

  constructor(options: SettlementEngineOptions) {
    this._ledger = options.ledger;
    this._tokens = options.tokens;
    this._domain = options.domain;
    this._replay = options.replayGuard ?? new ReplayGuard();
    this._clock = options.clock ?? systemClock;
    this._events = options.events;
  }

  /** The address allowances must be granted to. */
  get spender(): Address {
    return this._domain.verifyingContract;
  }

  // ─── Settlement ──────────────────────────────────────────────────────

  /**
   * Settle a split with one signed approval per leg.
   *
   * @throws SettlementError on any rejection; nothing is changed then
   */
  async settleSplit(splitId: SplitId, batch: SettlementBatch): Promise<SettlementReceipt> {
    return this._guard.run(async () => {
      const plan = await this._validate(splitId, batch);
      return this._commit(plan);
    });
  }

  /**
   * Run steps 1–7 without changing anything.
   * Errors other than SettlementError (a failing allowance query) propagate.
   */
  async previewSettlement(splitId: SplitId, batch: SettlementBatch): Promise<SettlementPreview> {
    try {
      await this._validate(splitId, batch);
      return { ok: true };
    } catch (error) {
      if (error instanceof SettlementError) {
        return { ok: false, error };
      }
      throw error;
    }
  }

  // ─── Digests ─────────────────────────────────────────────────────────

  /**
   * The approval a participant must sign, with token, payer and amount
   * taken from the stored split.
   */
  approvalMessageFor(
    splitId: SplitId,
    participant: Address,
    deadline: bigint,
    salt: Hex,
  ): ApprovalMessage {
    const split = this._ledger.getSplit(splitId);
    if (split === undefined) {
      throw new SettlementError("SPLIT_NOT_FOUND", `Unknown split: ${splitId.toString()}`);
    }
    const amount = this._ledger.requiredAmount(splitId, participant);
    if (amount === 0n) {
      throw new SettlementError(
        "NOT_A_PARTICIPANT",
        `${participant} has no leg in split ${splitId.toString()}`,
        { participant },
      );
    }
    return {
      participant,
      splitId,
      token: split.token,
      payer: split.payer,
      amount,
      deadline,
      salt,
    };
  }

  approvalDigestFor(splitId: SplitId, participant: Address, deadline: bigint, salt: Hex): Hex {
    return approvalDigest(this._domain, this.approvalMessageFor(splitId, participant, deadline, salt));
  }

  isApproved(splitId: SplitId, participant: string): boolean {
    return this._replay.isApproved(splitId, participant);
  }

  approvedParticipants(splitId: SplitId): readonly Address[] {
    return this._replay.approvedParticipants(splitId);
  }

  // ─── Validation (steps 1–7) ──────────────────────────────────────────

  private async _validate(splitId: SplitId, batch: SettlementBatch): Promise<SettlementPlan> {
    const id = splitId.toString();

    // 1. existence and state
    const split = this._ledger.getSplit(splitId);
    if (split === undefined) {
      throw new SettlementError("SPLIT_NOT_FOUND", `Unknown split: ${id}`);
    }
    if (split.settled) {
      throw new SettlementError("ALREADY_SETTLED", `Split ${id} is already settled`);
    }

    // 2. split deadline
    const now = this._clock.now();
    if (split.deadline !== 0n && now > split.deadline) {
      throw new SettlementError(
        "SPLIT_EXPIRED",
        `Split ${id} expired at ${split.deadline.toString()} (now ${now.toString()})`,
      );
    }

    // 3. shape
    const entries = entriesOf(batch);
    if (entries === undefined) {
      throw new SettlementError(
        "LENGTH_MISMATCH",
        `Batch columns differ in length: participants ${batch.participants.length}, ` +
          `amounts ${batch.amounts.length}, deadlines ${batch.deadlines.length}, ` +
          `salts ${batch.salts.length}, signatures ${batch.signatures.length}`,
      );
    }
    const legCount = this._ledger.getLegs(splitId)?.length ?? 0;
    if (entries.length !== legCount) {
      throw new SettlementError(
        "INCOMPLETE_BATCH",
        `Split ${id} has ${legCount} legs but the batch has ${entries.length} entries`,
      );
    }
    const seen = new Map<string, number>();
    entries.forEach((entry, index) => {
      const k = entry.participant.toLowerCase();
      const first = seen.get(k);
      if (first !== undefined) {
        throw new SettlementError(
          "DUPLICATE_PARTICIPANT",
          `${entry.participant} appears at entries ${first} and ${index}`,
          { index, participant: entry.participant },
        );
      }
      seen.set(k, index);
    });

    // 4. amounts
    entries.forEach((entry, index) => {
      const required = this._ledger.requiredAmount(splitId, entry.participant);
      if (required === 0n) {
        throw new SettlementError(
          "NOT_A_PARTICIPANT",
          `${entry.participant} has no leg in split ${id}`,
          { index, participant: entry.participant },
        );
      }
      if (entry.amount !== required) {
        throw new SettlementError(
          "AMOUNT_MISMATCH",
          `${entry.participant} owes ${required.toString()}, batch claims ${entry.amount.toString()}`,
          { index, participant: entry.participant },
        );
      }
    });

    // 5. replay
    entries.forEach((entry, index) => {
      if (this._replay.isApproved(splitId, entry.participant)) {
        throw new SettlementError(
          "ALREADY_APPROVED",
          `${entry.participant} already approved split ${id}`,
          { index, participant: entry.participant },
        );
      }
    });

    // 6. approval deadlines and signatures
    for (const [index, entry] of entries.entries()) {
      if (now > entry.deadline) {
        throw new SettlementError(
          "APPROVAL_EXPIRED",
          `Approval of ${entry.participant} expired at ${entry.deadline.toString()} (now ${now.toString()})`,
          { index, participant: entry.participant },
        );
      }
      const digest = this._digestOf(split, entry, index);
      if (!(await verifyApproval(digest, entry.signature, entry.participant))) {
        throw new SettlementError(
          "INVALID_SIGNATURE",
          `Signature at entry ${index} does not recover to ${entry.participant}`,
          { index, participant: entry.participant },
        );
      }
    }

    // 7. allowances
    for (const [index, entry] of entries.entries()) {
      const allowance = await this._tokens.allowanceOf(split.token, entry.participant, this.spender);
      if (allowance < entry.amount) {
        throw new SettlementError(
          "INSUFFICIENT_ALLOWANCE",
          `${entry.participant} allows ${allowance.toString()}, owes ${entry.amount.toString()}`,
          { index, participant: entry.participant },
        );
      }
    }

    return { split, entries, now };
  }

  /**
   * Digest of an entry, bound to the stored token and payer. Fields the
   * digest cannot encode make the signature invalid.
   */
  private _digestOf(split: Split, entry: ApprovalEntry, index: number): Hex {
    try {
      return approvalDigest(this._domain, {
        participant: entry.participant,
        splitId: split.id,
        token: split.token,
        payer: split.payer,
        amount: entry.amount,
        deadline: entry.deadline,
        salt: entry.salt,
      });
    } catch (error) {
      if (error instanceof SigningError) {
        throw new SettlementError(
          "INVALID_SIGNATURE",
          `Entry ${index} cannot be signed: ${error.message}`,
          { index, participant: entry.participant, cause: error },
        );
      }
      throw error;
    }
  }

  // ─── Commit (steps 8–10) ─────────────────────────────────────────────

  private async _commit(plan: SettlementPlan): Promise<SettlementReceipt> {
    const { split, entries, now } = plan;
    const staged: DomainEvent[] = [];
    const checkpoint = this._replay.checkpoint();

    try {
      // 8. flags
      for (const entry of entries) {
        this._replay.markApproved(split.id, entry.participant);
        const payload: ParticipantApprovedPayload = {
          splitId: split.id.toString(),
          participant: entry.participant,
          amount: entry.amount.toString(),
        };
        staged.push(
          createSplitEvent(SPLIT_EVENTS.PARTICIPANT_APPROVED, split.id, "settlement", entry.participant, payload),
        );
      }

      // 9. transfers, then the staged events
      await this._tokens.atomic(async (tx) => {
        for (const [index, entry] of entries.entries()) {
          let moved: boolean;
          try {
            moved = await tx.transferFrom(split.token, this.spender, entry.participant, split.payer, entry.amount);
          } catch (cause) {
            throw new SettlementError(
              "TRANSFER_FAILED",
              `Transfer from ${entry.participant} threw`,
              { index, participant: entry.participant, cause },
            );
          }
          if (!moved) {
            throw new SettlementError(
              "TRANSFER_FAILED",
              `Transfer from ${entry.participant} was refused`,
              { index, participant: entry.participant },
            );
          }
        }

        const settled: SplitSettledPayload = {
          splitId: split.id.toString(),
          payer: split.payer,
        };
        staged.push(createSplitEvent(SPLIT_EVENTS.SPLIT_SETTLED, split.id, "settlement", split.payer, settled));
        try {
          this._events?.publish(splitStreamId(split.id), staged);
        } catch (cause) {
          throw new SettlementError("TRANSFER_FAILED", "Settlement events were refused by the event sink", {
            cause,
          });
        }
      });
    } catch (error) {
      this._replay.restore(checkpoint);
      if (error instanceof SettlementError) {
        throw error;
      }
      throw new SettlementError("TRANSFER_FAILED", "Token ledger aborted the settlement", { cause: error });
    }

    // 10. terminal state
    this._ledger.markSettled(split.id);

    return {
      splitId: split.id,
      payer: split.payer,
      token: split.token,
      totalAmount: split.totalAmount,
      transfers: entries.map((e) => ({ participant: e.participant, amount: e.amount })),
      settledAt: now,
    };
  }
}
