/**
 * @tidepool/event-store — Event Catalog.
 *
 * A registry of every record type the system emits:
 * - Typed event definitions (type string → payload shape)
 * - A schema version per type
 * - Runtime payload validation
 *
 * Unknown event types are never rejected by the store itself; the
 * catalog is consulted by emitters before they append.
 */

import type { EventSource } from "@tidepool/types";

// =============================================================================
// Event Schema Definition
// =============================================================================

export interface EventSchema {
  /** Event type string (e.g., "vault.deposit.recorded") */
  readonly type: string;

  /** Schema version (positive integer) */
  readonly version: number;

  readonly description: string;

  /** Which subsystem emits this event */
  readonly source: EventSource;

  /** True if the payload matches this schema. */
  validate(payload: unknown): boolean;
}

// =============================================================================
// Event Catalog
// =============================================================================

export class EventCatalog {
  private readonly _schemas = new Map<string, EventSchema>();

  /**
   * Register an event schema.
   *
   * Re-registering the same version is a no-op; a different version
   * for an existing type replaces it only if newer.
   *
   * @throws CatalogError on a version downgrade
   */
  register(schema: EventSchema): void {
    if (!Number.isInteger(schema.version) || schema.version < 1) {
      throw new CatalogError(
        `Schema version for "${schema.type}" must be a positive integer`,
      );
    }
    const existing = this._schemas.get(schema.type);
    if (existing !== undefined && existing.version > schema.version) {
      throw new CatalogError(
        `Cannot downgrade "${schema.type}" from version ${String(existing.version)} to ${String(schema.version)}`,
      );
    }
    this._schemas.set(schema.type, schema);
  }

  getSchema(eventType: string): EventSchema | undefined {
    return this._schemas.get(eventType);
  }

  has(eventType: string): boolean {
    return this._schemas.has(eventType);
  }

  listTypes(): readonly string[] {
    return [...this._schemas.keys()].sort();
  }

  listBySource(source: EventSource): readonly EventSchema[] {
    return [...this._schemas.values()].filter((s) => s.source === source);
  }

  /**
   * Validate a payload against its registered schema.
   *
   * @returns false if invalid or unregistered
   */
  validate(eventType: string, payload: unknown): boolean {
    const schema = this._schemas.get(eventType);
    return schema !== undefined && schema.validate(payload);
  }

  get size(): number {
    return this._schemas.size;
  }
}

// =============================================================================
// Errors
// =============================================================================

export class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CatalogError";
  }
}
