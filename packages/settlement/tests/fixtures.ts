/**
 * Shared fixtures for settlement tests.
 */

import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import type { Address, Hex } from "viem";
import { ManualClock } from "@splitpact/types";
import type { ApprovalEntry, DomainEvent, EventSink, Leg, SplitId } from "@splitpact/types";
import { SplitLedger } from "@splitpact/ledger";
import { approvalTypedData, createSigningDomain, splitSignature } from "@splitpact/signing";
import { SettlementEngine } from "../src/engine.js";
import { ReplayGuard } from "../src/replay-guard.js";
import { InMemoryTokenLedger } from "../src/token-ledger.js";
import type { TokenLedger } from "../src/token-ledger.js";
import { SettlementError } from "../src/types.js";

export const ALICE = privateKeyToAccount(`0x${"11".repeat(32)}`);
export const BOB = privateKeyToAccount(`0x${"22".repeat(32)}`);
export const CAROL = privateKeyToAccount(`0x${"33".repeat(32)}`);

export const TOKEN: Address = "0x00000000000000000000000000000000000000aa";
export const PAYER: Address = "0x00000000000000000000000000000000000000bb";
export const COORDINATOR: Address = "0x00000000000000000000000000000000000000cc";

export const NOW = 1_700_000_000n;
export const ONE_DAY = 86_400n;

export const DOMAIN = createSigningDomain({
  name: "splitpact",
  version: "1",
  chainId: 1,
  verifyingContract: COORDINATOR,
});

export function salt(n: number): Hex {
  return `0x${n.toString(16).padStart(64, "0")}`;
}

export class RecordingSink implements EventSink {
  readonly published: { streamId: string; events: readonly DomainEvent[] }[] = [];

  /** When set, publish throws this instead of recording. */
  failWith: Error | undefined;

  publish(streamId: string, events: readonly DomainEvent[]): void {
    if (this.failWith !== undefined) {
      throw this.failWith;
    }
    this.published.push({ streamId, events });
  }

  types(): string[][] {
    return this.published.map((p) => p.events.map((e) => e.type));
  }
}

export interface Harness {
  readonly clock: ManualClock;
  readonly ledger: SplitLedger;
  readonly tokens: InMemoryTokenLedger;
  readonly replay: ReplayGuard;
  readonly sink: RecordingSink;
  readonly engine: SettlementEngine;
}

/**
 * Ledger, engine and an in-memory token ledger sharing one clock and
 * one event sink. `tokens` replaces the ledger the engine talks to,
 * while `harness.tokens` stays the in-memory one for funding.
 */
export function setup(wrap?: (inner: InMemoryTokenLedger) => TokenLedger): Harness {
  const clock = new ManualClock(NOW);
  const sink = new RecordingSink();
  const ledger = new SplitLedger({ clock, events: sink });
  const tokens = new InMemoryTokenLedger();
  const replay = new ReplayGuard();
  const engine = new SettlementEngine({
    ledger,
    tokens: wrap === undefined ? tokens : wrap(tokens),
    domain: DOMAIN,
    replayGuard: replay,
    clock,
    events: sink,
  });
  return { clock, ledger, tokens, replay, sink, engine };
}

/**
 * Give a participant a balance and an allowance to the coordinator.
 */
export function fund(
  h: Harness,
  account: PrivateKeyAccount,
  balance: bigint,
  allowance: bigint = balance,
): void {
  h.tokens.mint(TOKEN, account.address, balance);
  h.tokens.approve(TOKEN, account.address, COORDINATOR, allowance);
}

export function createSplit(h: Harness, legs: readonly Leg[], deadline = 0n): SplitId {
  return h.ledger.createSplit({ payer: PAYER, token: TOKEN, legs, deadline });
}

/**
 * A signed approval for the participant's recorded leg.
 */
export async function signEntry(
  h: Harness,
  account: PrivateKeyAccount,
  splitId: SplitId,
  options: { readonly deadline?: bigint; readonly salt?: Hex } = {},
): Promise<ApprovalEntry> {
  const deadline = options.deadline ?? NOW + ONE_DAY;
  const entrySalt = options.salt ?? salt(1);
  const message = h.engine.approvalMessageFor(splitId, account.address, deadline, entrySalt);
  const signature = await account.signTypedData(approvalTypedData(DOMAIN, message));
  return {
    participant: account.address,
    amount: message.amount,
    deadline,
    salt: entrySalt,
    signature: splitSignature(signature),
  };
}

/**
 * Await a promise that must reject with a SettlementError.
 */
export async function rejection(promise: Promise<unknown>): Promise<SettlementError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof SettlementError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a SettlementError, but the promise resolved");
}
