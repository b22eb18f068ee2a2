/**
 * Record Types
 *
 * Every state change in the vault is reported as a DomainEvent on an
 * append-only side channel.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Payload amounts are decimal-digit strings, never bigint or number
 * - Core logic never depends on event delivery succeeding
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Principal that invoked the operation */
  readonly actor: string;

  /** ID of the event that caused this event (causal chain) */
  readonly causationId?: string;

  /** Shared by every event emitted by the same operation */
  readonly correlationId: string;

  /** Which subsystem emitted this event */
  readonly source: EventSource;
}

export type EventSource = "vault" | "treasury" | "strategy";

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "vault.deposit.recorded") */
  readonly type: string;

  /** Event metadata */
  readonly metadata: EventMetadata;

  /** Event-specific payload (opaque to the log, typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
