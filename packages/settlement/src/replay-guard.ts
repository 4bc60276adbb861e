/**
 * @splitpact/settlement — Replay Guard.
 *
 * One approval flag per (split, participant). A flag is set when the
 * participant's signature is accepted in a settlement and is never
 * cleared, so the same approval cannot be consumed twice.
 *
 * checkpoint()/restore() exist for the engine alone: they undo the
 * flags of a settlement whose transfers were discarded.
 */

import type { Address } from "viem";
import type { SplitId } from "@splitpact/types";
import { SettlementError } from "./types.js";

/** Opaque copy of every flag at one moment. */
export interface ReplayCheckpoint {
  readonly approvals: ReadonlyMap<SplitId, ReadonlyMap<string, Address>>;
}

function key(participant: string): string {
  return participant.toLowerCase();
}

export class ReplayGuard {
  private _approvals = new Map<SplitId, Map<string, Address>>();

  isApproved(splitId: SplitId, participant: string): boolean {
    return this._approvals.get(splitId)?.has(key(participant)) ?? false;
  }

  /**
   * Set the flag for a participant.
   * Throws ALREADY_APPROVED if it is set already.
   */
  markApproved(splitId: SplitId, participant: Address): void {
    let approved = this._approvals.get(splitId);
    if (approved === undefined) {
      approved = new Map();
      this._approvals.set(splitId, approved);
    }
    if (approved.has(key(participant))) {
      throw new SettlementError(
        "ALREADY_APPROVED",
        `${participant} already approved split ${splitId.toString()}`,
        { participant },
      );
    }
    approved.set(key(participant), participant);
  }

  /**
   * Approved participants of a split, in approval order.
   */
  approvedParticipants(splitId: SplitId): readonly Address[] {
    return [...(this._approvals.get(splitId)?.values() ?? [])];
  }

  checkpoint(): ReplayCheckpoint {
    return { approvals: copy(this._approvals) };
  }

  restore(checkpoint: ReplayCheckpoint): void {
    this._approvals = copy(checkpoint.approvals);
  }
}

function copy(
  source: ReadonlyMap<SplitId, ReadonlyMap<string, Address>>,
): Map<SplitId, Map<string, Address>> {
  const result = new Map<SplitId, Map<string, Address>>();
  for (const [splitId, approved] of source) {
    result.set(splitId, new Map(approved));
  }
  return result;
}
