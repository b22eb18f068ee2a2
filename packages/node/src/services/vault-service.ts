/**
 * VaultService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never construct domain
 * objects themselves. One instance backs the whole node: a single vault,
 * its record log, the in-memory custody it settles against, the
 * registered strategies and the swap venue.
 */

import pino from "pino";
import type { Logger } from "pino";
import {
  FixedRateSwapVenue,
  InMemoryCustody,
  InMemoryStrategy,
  RoleAuthorizer,
  StrategyRegistry,
  Vault,
} from "@tidepool/vault";
import { InMemoryEventStore } from "@tidepool/event-store";
import type {
  EventStoreIntegrityResult,
  StoredEvent,
} from "@tidepool/event-store";
import type { AssetId, WalletId } from "@tidepool/types";
import type { ApiKeyRecord } from "../types/auth.js";
import { ROLE_CAPABILITIES } from "../types/auth.js";
import { AuditLog } from "./audit-log.js";

// =============================================================================
// Configuration
// =============================================================================

export interface VaultServiceConfig {
  readonly vaultAccount: string;
  readonly feeRecipient: string;
  readonly systemFeeBps: number;
  readonly referralPercents: readonly number[];
  readonly maxReferralLevels: number;
  /** Tags of the in-memory strategies registered at startup */
  readonly strategies: readonly string[];
  /** Callers whose roles become vault capabilities */
  readonly principals: readonly ApiKeyRecord[];
}

export interface VaultServiceOptions {
  readonly logger?: Logger | undefined;
  readonly now?: (() => string) | undefined;
}

export interface RecordLogStatus {
  readonly integrity: EventStoreIntegrityResult;
  readonly recordCount: number;
}

// =============================================================================
// Service
// =============================================================================

export class VaultService {
  readonly vault: Vault;
  readonly records: InMemoryEventStore;
  readonly custody: InMemoryCustody;
  readonly authorizer: RoleAuthorizer;
  readonly swapVenue: FixedRateSwapVenue;
  readonly auditLog: AuditLog;

  private readonly _strategies = new Map<string, InMemoryStrategy>();
  private readonly _logger: Logger;
  private _ready = false;

  constructor(config: VaultServiceConfig, options: VaultServiceOptions = {}) {
    this._logger = options.logger ?? pino({ level: "silent" });
    const now = options.now ?? (() => new Date().toISOString());

    this.records = new InMemoryEventStore({ now });
    this.custody = new InMemoryCustody();
    this.swapVenue = new FixedRateSwapVenue(this.custody);
    this.auditLog = new AuditLog(now);

    this.authorizer = new RoleAuthorizer();
    for (const { principal, role } of config.principals) {
      this.authorizer.grant(principal, ...ROLE_CAPABILITIES[role]);
    }

    const registry = new StrategyRegistry();
    for (const tag of config.strategies) {
      const strategy = new InMemoryStrategy(tag, this.custody);
      registry.register(strategy);
      this._strategies.set(tag, strategy);
    }

    this.vault = new Vault(
      {
        vaultAccount: config.vaultAccount,
        feeRecipient: config.feeRecipient,
        defaultFees: {
          systemFeeBps: config.systemFeeBps,
          referralPercents: config.referralPercents,
        },
        maxReferralLevels: config.maxReferralLevels,
      },
      {
        records: this.records,
        authorizer: this.authorizer,
        custody: this.custody,
        strategies: registry,
        swapVenue: this.swapVenue,
        now,
        onRecordError: (err, record) => {
          this._logger.error(
            { err, streamId: record.streamId, type: record.type },
            "Record append failed",
          );
        },
      },
    );

    this._ready = true;
  }

  // ─── Records ───────────────────────────────────────────────────────

  readAllRecords(afterPosition?: number): readonly StoredEvent[] {
    return this.records.readAll(
      afterPosition !== undefined ? { fromPosition: afterPosition + 1 } : undefined,
    );
  }

  readStreamRecords(streamId: string, afterVersion?: number): readonly StoredEvent[] {
    return this.records.read(
      streamId,
      afterVersion !== undefined ? { fromVersion: afterVersion + 1 } : undefined,
    );
  }

  // ─── Strategies ────────────────────────────────────────────────────

  strategyTags(): readonly string[] {
    return this.vault.strategies.tags();
  }

  /**
   * Credit interest to a wallet's holding in an in-memory strategy.
   *
   * @returns false when no strategy is registered under the tag
   */
  accrueInterest(tag: string, walletId: WalletId, assetId: AssetId, amount: bigint): boolean {
    const strategy = this._strategies.get(tag);
    if (strategy === undefined) {
      return false;
    }
    strategy.accrue(walletId, assetId, amount);
    return true;
  }

  // ─── Health & Integrity ──────────────────────────────────────────

  /**
   * Verify the record log's hash chain.
   * Called by /ready.
   */
  checkRecordLog(): RecordLogStatus {
    return {
      integrity: this.records.verifyIntegrity(),
      recordCount: this.records.globalPosition(),
    };
  }

  isReady(): boolean {
    return this._ready && this.checkRecordLog().integrity.valid;
  }

  stop(): void {
    this._ready = false;
  }
}
