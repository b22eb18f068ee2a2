/**
 * Append-only audit log for recording who-did-what-when.
 *
 * Route handlers record every accepted mutation; the error handler
 * records authorization denials. In-memory only — survives as long as
 * the process.
 */

// =============================================================================
// Types
// =============================================================================

export interface AuditLogEntry {
  readonly timestamp: string;
  readonly action: string;
  readonly resourceType: string;
  readonly resourceId: string;
  readonly actor: string;
  readonly detail?: string | undefined;
}

export interface AuditLogQuery {
  readonly action?: string | undefined;
  readonly resourceType?: string | undefined;
  readonly resourceId?: string | undefined;
  readonly actor?: string | undefined;
  readonly limit?: number | undefined;
}

// =============================================================================
// AuditLog
// =============================================================================

export class AuditLog {
  private readonly _entries: AuditLogEntry[] = [];
  private readonly _now: () => string;

  constructor(now: () => string = () => new Date().toISOString()) {
    this._now = now;
  }

  append(entry: Omit<AuditLogEntry, "timestamp">): void {
    this._entries.push({ ...entry, timestamp: this._now() });
  }

  /**
   * Query entries with optional filters, newest first.
   */
  query(filter: AuditLogQuery = {}): readonly AuditLogEntry[] {
    const results = this._entries.filter(
      (e) =>
        (filter.action === undefined || e.action === filter.action) &&
        (filter.resourceType === undefined || e.resourceType === filter.resourceType) &&
        (filter.resourceId === undefined || e.resourceId === filter.resourceId) &&
        (filter.actor === undefined || e.actor === filter.actor),
    );
    results.reverse();

    if (filter.limit !== undefined && filter.limit > 0) {
      return results.slice(0, filter.limit);
    }
    return results;
  }

  get size(): number {
    return this._entries.length;
  }
}
