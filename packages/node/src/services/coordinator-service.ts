/**
 * CoordinatorService — Composition root for all domain packages.
 *
 * Wires one ledger, one settlement engine and one event store behind a
 * single signing domain, and logs what happens to splits. Callers never
 * import the domain packages directly.
 */

import type { Address, Hex, TypedDataDefinition } from "viem";
import type { Logger } from "pino";
import { systemClock } from "@splitpact/types";
import type {
  Clock,
  CreateSplitInput,
  Leg,
  SettlementBatch,
  Split,
  SplitId,
} from "@splitpact/types";
import { LedgerError, SplitLedger } from "@splitpact/ledger";
import { approvalTypedData, createSigningDomain } from "@splitpact/signing";
import type { APPROVAL_TYPES, SigningDomain, SigningDomainInput } from "@splitpact/signing";
import {
  ReplayGuard,
  SettlementEngine,
  SettlementError,
} from "@splitpact/settlement";
import type {
  SettlementPreview,
  SettlementReceipt,
  TokenLedger,
} from "@splitpact/settlement";
import {
  createSplitEventCatalog,
  InMemoryEventStore,
} from "@splitpact/event-store";
import type {
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "@splitpact/event-store";

// =============================================================================
// Configuration
// =============================================================================

export interface CoordinatorServiceConfig {
  readonly domain: SigningDomainInput;

  /** The external ledger holding balances and allowances */
  readonly tokens: TokenLedger;

  readonly logger: Logger;

  /** Default: system clock */
  readonly clock?: Clock | undefined;
}

// =============================================================================
// Service
// =============================================================================

export class CoordinatorService {
  readonly domain: SigningDomain;
  readonly ledger: SplitLedger;
  readonly engine: SettlementEngine;
  readonly eventStore: InMemoryEventStore;

  private readonly _log: Logger;

  constructor(config: CoordinatorServiceConfig) {
    const clock = config.clock ?? systemClock;
    this._log = config.logger;
    this.domain = createSigningDomain(config.domain);
    this.eventStore = new InMemoryEventStore({ catalog: createSplitEventCatalog() });
    this.ledger = new SplitLedger({ clock, events: this.eventStore });
    this.engine = new SettlementEngine({
      ledger: this.ledger,
      tokens: config.tokens,
      domain: this.domain,
      replayGuard: new ReplayGuard(),
      clock,
      events: this.eventStore,
    });

    this._log.debug(
      {
        name: this.domain.name,
        version: this.domain.version,
        chainId: this.domain.chainId,
        verifyingContract: this.domain.verifyingContract,
        separator: this.domain.separator,
      },
      "Signing domain ready",
    );
  }

  // ─── Splits ────────────────────────────────────────────────────────

  createSplit(input: CreateSplitInput): SplitId {
    let splitId: SplitId;
    try {
      splitId = this.ledger.createSplit(input);
    } catch (error) {
      if (error instanceof LedgerError) {
        this._log.warn({ code: error.code, payer: input.payer }, `Split rejected: ${error.message}`);
      }
      throw error;
    }

    const split = this.ledger.assertSplit(splitId);
    this._log.info(
      {
        splitId: splitId.toString(),
        payer: split.payer,
        token: split.token,
        legs: input.legs.length,
        totalAmount: split.totalAmount.toString(),
        deadline: split.deadline.toString(),
      },
      "Split created",
    );
    return splitId;
  }

  requiredAmount(splitId: SplitId, participant: Address): bigint {
    return this.ledger.requiredAmount(splitId, participant);
  }

  getSplit(splitId: SplitId): Split | undefined {
    return this.ledger.getSplit(splitId);
  }

  getLegs(splitId: SplitId): readonly Leg[] | undefined {
    return this.ledger.getLegs(splitId);
  }

  listSplits(settled?: boolean): readonly Split[] {
    return this.ledger.listSplits({ settled });
  }

  // ─── Approvals ─────────────────────────────────────────────────────

  approvalDigest(splitId: SplitId, participant: Address, deadline: bigint, salt: Hex): Hex {
    return this.engine.approvalDigestFor(splitId, participant, deadline, salt);
  }

  /**
   * The EIP-712 payload a participant's wallet signs.
   */
  approvalTypedData(
    splitId: SplitId,
    participant: Address,
    deadline: bigint,
    salt: Hex,
  ): TypedDataDefinition<typeof APPROVAL_TYPES, "Approval"> {
    return approvalTypedData(
      this.domain,
      this.engine.approvalMessageFor(splitId, participant, deadline, salt),
    );
  }

  isApproved(splitId: SplitId, participant: Address): boolean {
    return this.engine.isApproved(splitId, participant);
  }

  // ─── Settlement ────────────────────────────────────────────────────

  async settleSplit(splitId: SplitId, batch: SettlementBatch): Promise<SettlementReceipt> {
    try {
      const receipt = await this.engine.settleSplit(splitId, batch);
      this._log.info(
        {
          splitId: splitId.toString(),
          payer: receipt.payer,
          transfers: receipt.transfers.length,
          totalAmount: receipt.totalAmount.toString(),
        },
        "Split settled",
      );
      return receipt;
    } catch (error) {
      if (error instanceof SettlementError) {
        this._log.warn(
          {
            splitId: splitId.toString(),
            code: error.code,
            category: error.category,
            index: error.index,
            participant: error.participant,
          },
          `Settlement rejected: ${error.message}`,
        );
      } else {
        this._log.error({ splitId: splitId.toString(), err: error }, "Settlement failed");
      }
      throw error;
    }
  }

  previewSettlement(splitId: SplitId, batch: SettlementBatch): Promise<SettlementPreview> {
    return this.engine.previewSettlement(splitId, batch);
  }

  // ─── Events ────────────────────────────────────────────────────────

  readEvents(splitId: SplitId, options?: ReadOptions): readonly StoredEvent[] {
    return this.eventStore.read(splitId, options);
  }

  readAllEvents(options?: ReadAllOptions): readonly StoredEvent[] {
    return this.eventStore.readAll(options);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return this.eventStore.verifyIntegrity();
  }
}
