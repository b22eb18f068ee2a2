/**
 * @tidepool/event-store — Core types.
 *
 * Defines the interfaces and types for the append-only record log.
 *
 * Design principles:
 * - Records are immutable after creation
 * - Streams are append-only (no UPDATE, no DELETE)
 * - Every record has a monotonically increasing version within its stream
 * - Every stored record is linked into a SHA-256 hash chain
 */

import type { DomainEvent } from "@tidepool/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * A record as persisted in the store, before it is hashed.
 */
export interface UnhashedEvent {
  /** The domain event */
  readonly event: DomainEvent;

  /** Stream this event belongs to */
  readonly streamId: string;

  /** Position within this stream (1-based, monotonically increasing) */
  readonly version: number;

  /** Position across all streams (1-based, monotonically increasing) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;
}

/**
 * A persisted record linked into the hash chain.
 */
export interface StoredEvent extends UnhashedEvent {
  /** SHA-256 of this record's canonical content plus `previousHash` */
  readonly hash: string;

  /** Hash of the preceding record, or "genesis" for the first */
  readonly previousHash: string;
}

// =============================================================================
// Append / Read
// =============================================================================

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

export interface ReadOptions {
  /** First version to return (inclusive, 1-based). Default: 1 */
  readonly fromVersion?: number;
}

export interface ReadAllOptions {
  /** First global position to return (inclusive). Default: 1 */
  readonly fromPosition?: number;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  /** Global position of the last record whose chain link verified */
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only record log.
 *
 * The vault writes here after each committed operation. Nothing in the
 * vault reads it back; it exists for observers (audit, HTTP).
 *
 * Invariants:
 * - Records are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are contiguous across all streams
 */
export interface EventStore {
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  /** Read a single stream (empty if the stream doesn't exist). */
  read(streamId: string, options?: ReadOptions): readonly StoredEvent[];

  /** Read across all streams in global order. */
  readAll(options?: ReadAllOptions): readonly StoredEvent[];

  /** Version of the last event in the stream, or 0. */
  streamVersion(streamId: string): number;

  /** Position of the last event, or 0 if the store is empty. */
  globalPosition(): number;

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND"
  | "INVALID_VERSION";

/**
 * Error thrown by EventStore operations.
 */
export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
