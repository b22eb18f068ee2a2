/**
 * @tidepool/event-store — In-memory EventStore implementation.
 *
 * Stores records in plain arrays. Suitable for:
 * - Unit and integration tests
 * - A single-process node whose record log is served over HTTP
 *
 * All state is lost on process exit.
 */

import type { DomainEvent } from "@tidepool/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  ReadAllOptions,
  ReadOptions,
  StoredEvent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { GENESIS_HASH, linkEvent, verifyHashChain } from "./hash-chain.js";

export interface InMemoryEventStoreOptions {
  /** Clock for `appendedAt`. Defaults to the wall clock. */
  readonly now?: () => string;
}

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private readonly _now: () => string;
  private _lastHash: string = GENESIS_HASH;

  constructor(options: InMemoryEventStoreOptions = {}) {
    this._now = options.now ?? (() => new Date().toISOString());
  }

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const stream = this._streams.get(streamId) ?? [];
    this._streams.set(streamId, stream);

    const fromVersion = stream.length + 1;
    const appendedAt = this._now();
    events.forEach((event, i) => {
      const record = linkEvent(
        {
          event,
          streamId,
          version: fromVersion + i,
          globalPosition: this._globalLog.length + 1,
          appendedAt,
        },
        this._lastHash,
      );
      this._lastHash = record.hash;
      stream.push(record);
      this._globalLog.push(record);
    });

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + events.length - 1,
      count: events.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string, options?: ReadOptions): readonly StoredEvent[] {
    this._validateStreamId(streamId);

    const fromVersion = options?.fromVersion ?? 1;
    if (fromVersion < 1) {
      throw new EventStoreError(
        "INVALID_VERSION",
        `fromVersion must be >= 1, got ${String(fromVersion)}`,
        streamId,
      );
    }

    const stream = this._streams.get(streamId) ?? [];
    return stream.slice(fromVersion - 1);
  }

  readAll(options?: ReadAllOptions): readonly StoredEvent[] {
    const fromPosition = Math.max(options?.fromPosition ?? 1, 1);
    return this._globalLog.slice(fromPosition - 1);
  }

  // ─── Query ──────────────────────────────────────────────────────────

  streamVersion(streamId: string): number {
    return this._streams.get(streamId)?.length ?? 0;
  }

  globalPosition(): number {
    return this._globalLog.length;
  }

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }
}
