/**
 * @splitpact/settlement — Conversions between batch rows and columns.
 */

import type { ApprovalEntry, SettlementBatch } from "@splitpact/types";

/**
 * Build the column form the engine takes from a list of rows.
 */
export function batchFromEntries(entries: readonly ApprovalEntry[]): SettlementBatch {
  return {
    participants: entries.map((e) => e.participant),
    amounts: entries.map((e) => e.amount),
    deadlines: entries.map((e) => e.deadline),
    salts: entries.map((e) => e.salt),
    signatures: entries.map((e) => e.signature),
  };
}

/**
 * Rows of a batch, or undefined when its columns differ in length.
 */
export function entriesOf(batch: SettlementBatch): readonly ApprovalEntry[] | undefined {
  const n = batch.participants.length;
  if (
    batch.amounts.length !== n ||
    batch.deadlines.length !== n ||
    batch.salts.length !== n ||
    batch.signatures.length !== n
  ) {
    return undefined;
  }
  const entries: ApprovalEntry[] = [];
  for (let i = 0; i < n; i++) {
    const participant = batch.participants[i];
    const amount = batch.amounts[i];
    const deadline = batch.deadlines[i];
    const salt = batch.salts[i];
    const signature = batch.signatures[i];
    if (
      participant === undefined ||
      amount === undefined ||
      deadline === undefined ||
      salt === undefined ||
      signature === undefined
    ) {
      return undefined;
    }
    entries.push({ participant, amount, deadline, salt, signature });
  }
  return entries;
}
