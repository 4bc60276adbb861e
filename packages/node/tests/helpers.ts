/**
 * Test helpers for @splitpact/node.
 */

import type { DestinationStream } from "pino";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import type { Address, Hex } from "viem";
import { ManualClock } from "@splitpact/types";
import type { ApprovalEntry, SplitId } from "@splitpact/types";
import { splitSignature } from "@splitpact/signing";
import { InMemoryTokenLedger } from "@splitpact/settlement";
import { bootstrap } from "../src/bootstrap.js";
import type { Coordinator } from "../src/bootstrap.js";
import type { CoordinatorService } from "../src/services/coordinator-service.js";

export const ALICE = privateKeyToAccount(`0x${"11".repeat(32)}`);
export const BOB = privateKeyToAccount(`0x${"22".repeat(32)}`);

export const TOKEN: Address = "0x00000000000000000000000000000000000000aa";
export const PAYER: Address = "0x00000000000000000000000000000000000000bb";
export const COORDINATOR: Address = "0x00000000000000000000000000000000000000cc";

export const NOW = 1_700_000_000n;

export interface LogLine {
  readonly level: number;
  readonly msg: string;
  readonly [key: string]: unknown;
}

/**
 * Collects pino's JSON lines.
 */
export class LogCapture implements DestinationStream {
  readonly lines: LogLine[] = [];

  write(msg: string): void {
    const parsed: unknown = JSON.parse(msg);
    if (isLogLine(parsed)) {
      this.lines.push(parsed);
    }
  }

  messages(level: number): string[] {
    return this.lines.filter((l) => l.level === level).map((l) => l.msg);
  }
}

function isLogLine(value: unknown): value is LogLine {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number" &&
    "msg" in value &&
    typeof value.msg === "string"
  );
}

export const LEVEL = { debug: 20, info: 30, warn: 40, error: 50 } as const;

export interface TestCoordinator extends Coordinator {
  readonly tokens: InMemoryTokenLedger;
  readonly logs: LogCapture;
  readonly clock: ManualClock;
}

export function createTestCoordinator(env: Record<string, string> = {}): TestCoordinator {
  const tokens = new InMemoryTokenLedger();
  const logs = new LogCapture();
  const clock = new ManualClock(NOW);
  const coordinator = bootstrap({
    tokens,
    env: { COORDINATOR_ADDRESS: COORDINATOR, LOG_LEVEL: "debug", NODE_ENV: "test", ...env },
    destination: logs,
    clock,
  });
  return { ...coordinator, tokens, logs, clock };
}

export async function signEntry(
  service: CoordinatorService,
  account: PrivateKeyAccount,
  splitId: SplitId,
  salt: Hex = `0x${"01".repeat(32)}`,
): Promise<ApprovalEntry> {
  const deadline = NOW + 3_600n;
  const typedData = service.approvalTypedData(splitId, account.address, deadline, salt);
  const signature = await account.signTypedData(typedData);
  return {
    participant: account.address,
    amount: service.requiredAmount(splitId, account.address),
    deadline,
    salt,
    signature: splitSignature(signature),
  };
}
