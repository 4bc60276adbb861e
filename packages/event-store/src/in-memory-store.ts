/**
 * @splitpact/event-store — In-memory event store.
 *
 * Keeps the global log and a per-split index in memory; everything is
 * lost on process exit. A publish is checked in full (stream ID, each
 * event's correlation, catalog schema and source) before the first
 * event is recorded, so a rejected publish leaves no trace.
 */

import type { DomainEvent, SplitId } from "@splitpact/types";
import type { EventCatalog } from "./catalog.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";
import type {
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";

const STREAM_ID = /^split:([1-9][0-9]*)$/;

export interface InMemoryEventStoreOptions {
  /** When set, every event must match a registered schema */
  readonly catalog?: EventCatalog;

  /** Source of appendedAt timestamps. Default: wall clock */
  readonly now?: () => Date;
}

export class InMemoryEventStore implements EventStore {
  private readonly _log: StoredEvent[] = [];
  private readonly _bySplit = new Map<SplitId, StoredEvent[]>();
  private readonly _catalog: EventCatalog | undefined;
  private readonly _now: () => Date;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._catalog = options.catalog;
    this._now = options.now ?? (() => new Date());
  }

  // ─── Write ──────────────────────────────────────────────────────────

  publish(streamId: string, events: readonly DomainEvent[]): void {
    const splitId = parseStreamId(streamId);
    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }
    for (const event of events) {
      this._check(streamId, event);
    }

    const stream = this._bySplit.get(splitId) ?? [];
    const appendedAt = this._now().toISOString();
    let previousHash = this._log.at(-1)?.hash ?? GENESIS_HASH;

    const records = events.map((event, i): StoredEvent => {
      const unhashed = {
        event,
        splitId,
        streamId,
        version: stream.length + i + 1,
        position: this._log.length + i + 1,
        appendedAt,
        previousHash,
      };
      const hash = computeEventHash(unhashed);
      previousHash = hash;
      return { ...unhashed, hash };
    });

    this._log.push(...records);
    this._bySplit.set(splitId, [...stream, ...records]);
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(splitId: SplitId, options: ReadOptions = {}): readonly StoredEvent[] {
    const fromVersion = startAt("fromVersion", options.fromVersion);
    const stream = this._bySplit.get(splitId) ?? [];
    return limit(stream.slice(fromVersion - 1), options.maxCount);
  }

  readAll(options: ReadAllOptions = {}): readonly StoredEvent[] {
    const fromPosition = startAt("fromPosition", options.fromPosition);
    return limit(this._log.slice(fromPosition - 1), options.maxCount);
  }

  hasEvents(splitId: SplitId): boolean {
    return this._bySplit.has(splitId);
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._log);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _check(streamId: string, event: DomainEvent): void {
    if (event.metadata.correlationId !== streamId) {
      throw new EventStoreError(
        "STREAM_MISMATCH",
        `Event "${event.type}" belongs to "${event.metadata.correlationId}", not "${streamId}"`,
        streamId,
      );
    }

    const catalog = this._catalog;
    if (catalog === undefined) {
      return;
    }
    const schema = catalog.getSchema(event.type);
    if (schema === undefined) {
      throw new EventStoreError(
        "INVALID_PAYLOAD",
        `Event type "${event.type}" is not registered in the catalog`,
        streamId,
      );
    }
    if (schema.source !== event.metadata.source) {
      throw new EventStoreError(
        "INVALID_PAYLOAD",
        `"${event.type}" is emitted by ${schema.source}, not ${event.metadata.source}`,
        streamId,
      );
    }
    if (!schema.validate(event.payload)) {
      throw new EventStoreError(
        "INVALID_PAYLOAD",
        `Payload of "${event.type}" does not match its schema`,
        streamId,
      );
    }
  }
}

function parseStreamId(streamId: string): SplitId {
  const digits = STREAM_ID.exec(streamId)?.[1];
  if (digits === undefined) {
    throw new EventStoreError(
      "INVALID_STREAM_ID",
      `Stream ID must look like "split:<id>", got "${streamId}"`,
      streamId,
    );
  }
  return BigInt(digits);
}

function startAt(name: string, value: number | undefined): number {
  const start = value ?? 1;
  if (!Number.isInteger(start) || start < 1) {
    throw new EventStoreError("INVALID_READ", `${name} must be an integer >= 1, got ${start}`);
  }
  return start;
}

function limit(events: StoredEvent[], maxCount: number | undefined): readonly StoredEvent[] {
  if (maxCount === undefined) {
    return events;
  }
  if (!Number.isInteger(maxCount) || maxCount < 0) {
    throw new EventStoreError("INVALID_READ", `maxCount must be a non-negative integer, got ${maxCount}`);
  }
  return events.slice(0, maxCount);
}
