/**
 * Shared fixtures for signing tests.
 */

import { privateKeyToAccount } from "viem/accounts";
import type { Address } from "viem";
import type { ApprovalMessage } from "@splitpact/types";
import { createSigningDomain } from "../src/domain.js";

export const ALICE = privateKeyToAccount(`0x${"11".repeat(32)}`);
export const BOB = privateKeyToAccount(`0x${"22".repeat(32)}`);

export const TOKEN: Address = "0x00000000000000000000000000000000000000aa";
export const PAYER: Address = "0x00000000000000000000000000000000000000bb";
export const COORDINATOR: Address = "0x00000000000000000000000000000000000000cc";

export const SALT_1 = `0x${"01".repeat(32)}` as const;
export const SALT_2 = `0x${"02".repeat(32)}` as const;

export const DOMAIN = createSigningDomain({
  name: "splitpact",
  version: "1",
  chainId: 1,
  verifyingContract: COORDINATOR,
});

export function aliceApproval(overrides: Partial<ApprovalMessage> = {}): ApprovalMessage {
  return {
    participant: ALICE.address,
    splitId: 1n,
    token: TOKEN,
    payer: PAYER,
    amount: 100n,
    deadline: 1_700_000_000n,
    salt: SALT_1,
    ...overrides,
  };
}
