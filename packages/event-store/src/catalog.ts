/**
 * @splitpact/event-store — Event Catalog.
 *
 * Maps each event type to the subsystem allowed to emit it and a
 * payload check. A store given a catalog refuses events outside it.
 */

import type { EventMetadata } from "@splitpact/types";

export interface EventSchema {
  /** Event type string (e.g., "split.created") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** The only subsystem that may emit this type */
  readonly source: EventMetadata["source"];

  validate(payload: unknown): boolean;
}

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register a schema. Registering a type again replaces it.
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer, got ${schema.version}`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }
}

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
