/**
 * @splitpact/ledger — uint256 amount helpers.
 *
 * Rules:
 * - No floating-point operations
 * - Every stored amount fits in uint256
 * - Decimal strings are the only serialized form
 */

import { MAX_UINT256 } from "@splitpact/types";
import { LedgerError } from "./types.js";

/**
 * Sum amounts, failing if the total leaves uint256.
 */
export function sumAmounts(amounts: readonly bigint[]): bigint {
  let total = 0n;
  for (const amount of amounts) {
    total += amount;
  }
  if (total > MAX_UINT256) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Total amount exceeds uint256: ${total.toString()}`,
    );
  }
  return total;
}

/**
 * Assert an amount is strictly positive and fits in uint256.
 * Zero is reserved as "not a participant".
 */
export function assertPositiveAmount(amount: bigint, context: string): bigint {
  if (typeof amount !== "bigint") {
    throw new LedgerError("INVALID_AMOUNT", `${context}: amount must be a bigint`);
  }
  if (amount <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${context}: amount must be positive, got ${amount.toString()}`,
    );
  }
  if (amount > MAX_UINT256) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${context}: amount exceeds uint256`,
    );
  }
  return amount;
}

/**
 * Parse a non-negative decimal string (snapshot form) into a bigint.
 */
export function parseUint(value: string, field: string): bigint {
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new LedgerError(
      "INVALID_SNAPSHOT",
      `Snapshot field "${field}" must be a decimal string, got "${String(value)}"`,
    );
  }
  const parsed = BigInt(value);
  if (parsed > MAX_UINT256) {
    throw new LedgerError(
      "INVALID_SNAPSHOT",
      `Snapshot field "${field}" exceeds uint256`,
    );
  }
  return parsed;
}
