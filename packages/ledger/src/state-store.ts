/**
 * @tidepool/ledger — Versioned keyed state with atomic transactions.
 *
 * The ledger's persistent state is three keyed tables:
 * - assets:   assetId → AssetState
 * - wallets:  walletId → WalletAccount
 * - requests: (walletId, requestId) → WithdrawRequest
 *
 * Every row carries a version that increments on each write.
 * A transaction records the version of every row it reads and stages
 * its writes. Commit re-checks the read versions (optimistic locking)
 * and then applies all staged writes, or none.
 *
 * The in-memory implementation is the reference substrate; a durable
 * store only needs to honour the same commit contract.
 */

import type {
  AssetState,
  WalletAccount,
  WalletId,
  WithdrawRequest,
} from "@tidepool/types";
import { LedgerError } from "./types.js";

interface Row<V> {
  readonly value: V;
  readonly version: number;
}

// =============================================================================
// Table
// =============================================================================

/**
 * A keyed table whose rows carry a monotonically increasing version.
 *
 * With `groupOf`, keys are also indexed by group so that a prefix equal
 * to a group is answered without touching the rest of the table.
 */
export class VersionedTable<V> {
  private readonly _rows = new Map<string, Row<V>>();
  private readonly _groups = new Map<string, Set<string>>();

  constructor(
    readonly name: string,
    private readonly _groupOf?: (key: string) => string,
  ) {}

  get(key: string): V | undefined {
    return this._rows.get(key)?.value;
  }

  /** Current version of a row, 0 if absent. */
  versionOf(key: string): number {
    return this._rows.get(key)?.version ?? 0;
  }

  has(key: string): boolean {
    return this._rows.has(key);
  }

  keys(): readonly string[] {
    return [...this._rows.keys()].sort();
  }

  /** Keys starting with `prefix`, in key order. */
  keysWithPrefix(prefix: string): readonly string[] {
    if (this._groupOf !== undefined && this._groupOf(prefix) === prefix) {
      return [...(this._groups.get(prefix) ?? [])].sort();
    }
    return [...this._rows.keys()].filter((k) => k.startsWith(prefix)).sort();
  }

  values(): readonly V[] {
    return this.keys().flatMap((k) => {
      const row = this._rows.get(k);
      return row === undefined ? [] : [row.value];
    });
  }

  get size(): number {
    return this._rows.size;
  }

  /** Write a row, bumping its version. Only called on commit. */
  write(key: string, value: V): void {
    if (this._groupOf !== undefined && !this._rows.has(key)) {
      const group = this._groupOf(key);
      const members = this._groups.get(group) ?? new Set<string>();
      this._groups.set(group, members);
      members.add(key);
    }
    this._rows.set(key, { value, version: this.versionOf(key) + 1 });
  }
}

// =============================================================================
// Table Transaction
// =============================================================================

/**
 * A transaction's view of one table: reads see staged writes first.
 */
export class TableTransaction<V> {
  private readonly _reads = new Map<string, number>();
  private readonly _writes = new Map<string, V>();

  constructor(private readonly _table: VersionedTable<V>) {}

  get(key: string): V | undefined {
    const staged = this._writes.get(key);
    if (staged !== undefined) {
      return staged;
    }
    this._track(key);
    return this._table.get(key);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  put(key: string, value: V): void {
    this._track(key);
    this._writes.set(key, value);
  }

  /**
   * All rows whose key starts with `prefix`, in key order,
   * merged with staged writes.
   */
  scan(prefix: string): readonly V[] {
    const keys = new Set<string>(this._table.keysWithPrefix(prefix));
    for (const k of this._writes.keys()) {
      if (k.startsWith(prefix)) keys.add(k);
    }
    return [...keys].sort().flatMap((k) => {
      const v = this.get(k);
      return v === undefined ? [] : [v];
    });
  }

  get writeCount(): number {
    return this._writes.size;
  }

  /** Keys read by this transaction that have since been rewritten. */
  conflicts(): readonly string[] {
    const stale: string[] = [];
    for (const [key, version] of this._reads) {
      if (this._table.versionOf(key) !== version) {
        stale.push(`${this._table.name}/${key}`);
      }
    }
    return stale;
  }

  apply(): void {
    for (const [key, value] of this._writes) {
      this._table.write(key, value);
    }
  }

  private _track(key: string): void {
    if (!this._reads.has(key)) {
      this._reads.set(key, this._table.versionOf(key));
    }
  }
}

// =============================================================================
// Store
// =============================================================================

/**
 * One atomic unit of work spanning all ledger tables.
 */
export class StoreTransaction {
  readonly assets: TableTransaction<AssetState>;
  readonly wallets: TableTransaction<WalletAccount>;
  readonly requests: TableTransaction<WithdrawRequest>;

  constructor(store: LedgerStore) {
    this.assets = new TableTransaction(store.assets);
    this.wallets = new TableTransaction(store.wallets);
    this.requests = new TableTransaction(store.requests);
  }

  conflicts(): readonly string[] {
    return [
      ...this.assets.conflicts(),
      ...this.wallets.conflicts(),
      ...this.requests.conflicts(),
    ];
  }

  apply(): void {
    this.assets.apply();
    this.wallets.apply();
    this.requests.apply();
  }
}

/**
 * Row key for a withdraw request. Ids are zero-padded so that key
 * order matches request order.
 */
export function requestKey(walletId: WalletId, requestId: number): string {
  return `${walletId}:${String(requestId).padStart(12, "0")}`;
}

/** Key prefix covering every request of a wallet. */
export function requestPrefix(walletId: WalletId): string {
  return `${walletId}:`;
}

/** The wallet prefix a request key belongs to. */
function requestGroup(key: string): string {
  return key.slice(0, key.lastIndexOf(":") + 1);
}

export class LedgerStore {
  readonly assets = new VersionedTable<AssetState>("assets");
  readonly wallets = new VersionedTable<WalletAccount>("wallets");
  readonly requests = new VersionedTable<WithdrawRequest>("requests", requestGroup);

  begin(): StoreTransaction {
    return new StoreTransaction(this);
  }

  /**
   * Validate read versions and apply all staged writes.
   *
   * @throws LedgerError CONCURRENT_MODIFICATION if any row read by the
   *   transaction changed since it was read; nothing is applied.
   */
  commit(tx: StoreTransaction): void {
    const stale = tx.conflicts();
    if (stale.length > 0) {
      throw new LedgerError(
        "CONCURRENT_MODIFICATION",
        `Rows modified by a concurrent operation: ${stale.join(", ")}`,
      );
    }
    tx.apply();
  }

  /**
   * Run `work` in a transaction and commit it. If `work` throws,
   * every staged write is discarded.
   */
  transaction<T>(work: (tx: StoreTransaction) => T): T {
    const tx = this.begin();
    const result = work(tx);
    this.commit(tx);
    return result;
  }

  /**
   * Async variant for work that awaits external calls between its reads
   * and the commit. Other transactions may commit in the meantime, so
   * conflicts are more likely here than in `transaction`.
   */
  async transactionAsync<T>(work: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const tx = this.begin();
    const result = await work(tx);
    this.commit(tx);
    return result;
  }
}
