/**
 * @splitpact/event-store — Event log of every split.
 *
 * Provides:
 * - InMemoryEventStore, the EventSink of the ledger and the
 *   settlement engine, read back per split or globally
 * - A SHA-256 hash chain over the global log
 * - EventCatalog with the split event schemas
 *
 * @packageDocumentation
 */

export type {
  StoredEvent,
  UnhashedStoredEvent,
  ReadOptions,
  ReadAllOptions,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

export { InMemoryEventStore } from "./in-memory-store.js";
export type { InMemoryEventStoreOptions } from "./in-memory-store.js";

export type { EventSchema } from "./catalog.js";
export { EventCatalog, CatalogError } from "./catalog.js";

export { SPLIT_EVENT_SCHEMAS, createSplitEventCatalog } from "./split-events.js";
