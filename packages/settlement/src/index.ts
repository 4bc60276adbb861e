/**
 * @splitpact/settlement — All-or-nothing settlement of splits.
 *
 * - SettlementEngine: validates a batch of signed approvals, then pulls
 *   every leg to the payer in one atomic unit
 * - ReplayGuard: one-shot approval flags per (split, participant)
 * - NonReentrantGuard: scoped lock around each settle call
 * - TokenLedger: the external allowance/transfer collaborator, with an
 *   in-memory implementation
 *
 * @packageDocumentation
 */

export { SettlementEngine } from "./engine.js";
export { ReplayGuard } from "./replay-guard.js";
export type { ReplayCheckpoint } from "./replay-guard.js";
export { NonReentrantGuard } from "./reentrancy-guard.js";
export { InMemoryTokenLedger } from "./token-ledger.js";
export type { TokenLedger, TokenTransfers } from "./token-ledger.js";
export { batchFromEntries, entriesOf } from "./batch.js";

export type {
  SettlementErrorCode,
  SettlementErrorCategory,
  SettlementErrorDetails,
  SettlementReceipt,
  SettlementPreview,
  SettlementEngineOptions,
} from "./types.js";
export { SettlementError, categoryOf } from "./types.js";
