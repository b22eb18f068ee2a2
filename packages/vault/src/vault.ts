/**
 * Vault — pooled-asset vault top-level coordinator.
 *
 * Composes:
 * - LedgerStore (asset, wallet and request tables)
 * - Positions (deposit / withdraw / redeem / swap / yield)
 * - Withdrawal Request Engine
 * - Referral rewards and the Strategy Allocation Gateway
 *
 * Every operation checks authorization, runs in one store transaction
 * and, once committed, appends its records to the event store. Record
 * delivery is a side channel: a failed append is reported to
 * `onRecordError` and never undoes the operation.
 */

import { randomUUID } from "node:crypto";
import type {
  AssetId,
  AssetState,
  DomainEvent,
  Principal,
  WalletAccount,
  WithdrawRequest,
} from "@tidepool/types";
import type { AssetConfig, AssetConfigPatch, WalletRegistration } from "@tidepool/ledger";
import {
  LedgerStore,
  assignReferrer,
  exchangeRate as rateOf,
  normalizeWalletId,
  registerAsset,
  registerWallet,
  requireAsset,
  requireWallet,
  updateAssetConfig,
} from "@tidepool/ledger";
import type {
  AssetRegisteredPayload,
  AssetUpdatedPayload,
  EventCatalog,
  EventStore,
  ReferrerAssignedPayload,
  WalletRegisteredPayload,
} from "@tidepool/event-store";
import {
  VAULT_EVENTS,
  assetStream,
  createVaultCatalog,
  walletStream,
} from "@tidepool/event-store";
import { validateFeeSchedule } from "@tidepool/treasury";
import { requireCapability } from "./authorization.js";
import type { OperationContext, StrategyOperationContext } from "./context.js";
import { stageRecord } from "./context.js";
import * as positions from "./positions.js";
import * as rewards from "./rewards.js";
import * as gateway from "./strategy-gateway.js";
import { StrategyRegistry } from "./strategy.js";
import * as requests from "./withdraw-requests.js";
import type {
  Authorizer,
  ClaimResult,
  CustodyGateway,
  DepositResult,
  RecordErrorHandler,
  StrategyDepositResult,
  StrategyWithdrawResult,
  SwapResult,
  SwapVenue,
  VaultConfig,
  VaultRecord,
  WithdrawRequestFilter,
  WithdrawRequestUpdate,
  WithdrawResult,
  WithdrawalState,
} from "./types.js";
import { VaultError } from "./types.js";

export interface VaultDependencies {
  readonly records: EventStore;
  readonly authorizer: Authorizer;
  readonly custody: CustodyGateway;
  readonly store?: LedgerStore | undefined;
  readonly catalog?: EventCatalog | undefined;
  readonly strategies?: StrategyRegistry | undefined;
  readonly swapVenue?: SwapVenue | undefined;
  /** ISO 8601 clock. */
  readonly now?: (() => string) | undefined;
  readonly newId?: (() => string) | undefined;
  /** Defaults to collecting failures in `undeliveredRecords`. */
  readonly onRecordError?: RecordErrorHandler | undefined;
}

interface UndeliveredRecord {
  readonly record: VaultRecord;
  readonly error: unknown;
}

// =============================================================================
// Vault
// =============================================================================

export class Vault {
  readonly config: VaultConfig;
  readonly strategies: StrategyRegistry;
  private readonly _store: LedgerStore;
  private readonly _records: EventStore;
  private readonly _catalog: EventCatalog;
  private readonly _authorizer: Authorizer;
  private readonly _custody: CustodyGateway;
  private readonly _swapVenue: SwapVenue | undefined;
  private readonly _now: () => string;
  private readonly _newId: () => string;
  private readonly _onRecordError: RecordErrorHandler;
  private readonly _undelivered: UndeliveredRecord[] = [];

  constructor(config: VaultConfig, deps: VaultDependencies) {
    validateFeeSchedule(config.defaultFees);
    this.config = config;
    this.strategies = deps.strategies ?? new StrategyRegistry();
    this._store = deps.store ?? new LedgerStore();
    this._records = deps.records;
    this._catalog = deps.catalog ?? createVaultCatalog();
    this._authorizer = deps.authorizer;
    this._custody = deps.custody;
    this._swapVenue = deps.swapVenue;
    this._now = deps.now ?? (() => new Date().toISOString());
    this._newId = deps.newId ?? randomUUID;
    this._onRecordError =
      deps.onRecordError ?? ((error, record) => this._undelivered.push({ record, error }));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Assets
  // ───────────────────────────────────────────────────────────────────────

  registerAsset(actor: Principal, config: AssetConfig): AssetState {
    requireCapability(this._authorizer, actor, "asset-admin");
    return this._run(actor, (ctx) => {
      const asset = registerAsset(ctx.tx.assets, config, ctx.timestamp);
      stageRecord(ctx, assetStream(asset.assetId), VAULT_EVENTS.ASSET_REGISTERED, {
        assetId: asset.assetId,
        symbol: asset.symbol,
        decimals: asset.decimals,
        minDeposit: asset.minDeposit.toString(),
        maxDeposit: asset.maxDeposit.toString(),
        minWithdraw: asset.minWithdraw.toString(),
        maxWithdraw: asset.maxWithdraw.toString(),
        enabledForDeposit: asset.enabledForDeposit,
        enabledForWithdraw: asset.enabledForWithdraw,
      } satisfies AssetRegisteredPayload);
      return asset;
    });
  }

  updateAsset(actor: Principal, assetId: AssetId, patch: AssetConfigPatch): AssetState {
    requireCapability(this._authorizer, actor, "asset-admin");
    return this._run(actor, (ctx) => {
      const asset = updateAssetConfig(ctx.tx.assets, assetId, patch, ctx.timestamp);
      const changes: Record<string, string | boolean> = {};
      for (const [key, value] of Object.entries(patch)) {
        if (typeof value === "bigint") changes[key] = value.toString();
        if (typeof value === "boolean") changes[key] = value;
      }
      stageRecord(ctx, assetStream(assetId), VAULT_EVENTS.ASSET_UPDATED, {
        assetId,
        changes,
      } satisfies AssetUpdatedPayload);
      return asset;
    });
  }

  getAsset(assetId: AssetId): AssetState | undefined {
    return this._store.assets.get(assetId);
  }

  getAssets(): readonly AssetState[] {
    return this._store.assets.values();
  }

  /** Units of asset per share, as an 18-decimal string. */
  exchangeRate(assetId: AssetId): string {
    return rateOf(requireAsset(this._store.begin().assets, assetId));
  }

  /**
   * Move pool-wide yield from `actor`'s custody into the vault.
   */
  injectYield(actor: Principal, assetId: AssetId, amount: bigint): AssetState {
    requireCapability(this._authorizer, actor, "backend");
    return this._run(actor, (ctx) => positions.injectYield(ctx, actor, assetId, amount));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Wallets
  // ───────────────────────────────────────────────────────────────────────

  registerWallet(actor: Principal, registration: WalletRegistration): WalletAccount {
    requireCapability(this._authorizer, actor, "registration");
    return this._run(actor, (ctx) => {
      const wallet = registerWallet(ctx.tx.wallets, registration, ctx.timestamp);
      stageRecord(ctx, walletStream(wallet.walletId), VAULT_EVENTS.WALLET_REGISTERED, {
        walletId: wallet.walletId,
        owner: wallet.owner,
        referrerId: wallet.referrerId ?? null,
        referralPercents: wallet.referralPercents,
        systemFeeBps: wallet.systemFeeBps ?? null,
      } satisfies WalletRegisteredPayload);
      return wallet;
    });
  }

  assignReferrer(actor: Principal, walletId: string, referrerId: string): WalletAccount {
    requireCapability(this._authorizer, actor, "registration");
    const id = normalizeWalletId(walletId);
    return this._run(actor, (ctx) => {
      const wallet = assignReferrer(ctx.tx.wallets, id, referrerId);
      stageRecord(ctx, walletStream(id), VAULT_EVENTS.REFERRER_ASSIGNED, {
        walletId: id,
        referrerId: wallet.referrerId ?? "",
      } satisfies ReferrerAssignedPayload);
      return wallet;
    });
  }

  getWallet(walletId: string): WalletAccount | undefined {
    return this._store.wallets.get(normalizeWalletId(walletId));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Deposit / Withdraw
  // ───────────────────────────────────────────────────────────────────────

  deposit(principal: Principal, walletId: string, assetId: AssetId, amount: bigint): DepositResult {
    const id = normalizeWalletId(walletId);
    return this._run(principal, (ctx) => positions.deposit(ctx, principal, id, assetId, amount));
  }

  withdraw(principal: Principal, walletId: string, assetId: AssetId, amount: bigint): WithdrawResult {
    const id = normalizeWalletId(walletId);
    return this._run(principal, (ctx) => positions.withdraw(ctx, principal, id, assetId, amount));
  }

  /** Burn `shares` (all shares when 0) for their current value. */
  redeem(principal: Principal, walletId: string, assetId: AssetId, shares: bigint): WithdrawResult {
    const id = normalizeWalletId(walletId);
    return this._run(principal, (ctx) => positions.redeem(ctx, principal, id, assetId, shares));
  }

  swap(
    principal: Principal,
    walletId: string,
    fromAssetId: AssetId,
    toAssetId: AssetId,
    amountIn: bigint,
  ): SwapResult {
    const venue = this._swapVenue;
    if (venue === undefined) {
      throw new VaultError("SWAP_UNAVAILABLE", "No swap venue is configured");
    }
    const id = normalizeWalletId(walletId);
    return this._run(principal, (ctx) =>
      positions.swap(ctx, venue, principal, id, fromAssetId, toAssetId, amountIn),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Withdraw Requests
  // ───────────────────────────────────────────────────────────────────────

  requestWithdraw(
    principal: Principal,
    walletId: string,
    assetId: AssetId,
    amount: bigint,
  ): WithdrawRequest {
    const id = normalizeWalletId(walletId);
    return this._run(principal, (ctx) =>
      requests.requestWithdraw(ctx, principal, id, assetId, amount),
    );
  }

  updateWithdrawRequestStatus(
    actor: Principal,
    walletId: string,
    requestId: number,
    update: WithdrawRequestUpdate,
  ): WithdrawRequest {
    requireCapability(this._authorizer, actor, "backend");
    const id = normalizeWalletId(walletId);
    return this._run(actor, (ctx) =>
      requests.updateWithdrawRequestStatus(ctx, id, requestId, update),
    );
  }

  /** Withdraw everything sourced so far for the wallet's requests. */
  withdrawRequestedAmount(principal: Principal, walletId: string, assetId: AssetId): WithdrawResult {
    const id = normalizeWalletId(walletId);
    return this._run(principal, (ctx) =>
      requests.withdrawRequestedAmount(ctx, principal, id, assetId),
    );
  }

  getWithdrawalState(walletId: string, assetId: AssetId): WithdrawalState {
    return requests.withdrawalState(this._store.begin(), normalizeWalletId(walletId), assetId);
  }

  getWithdrawRequest(walletId: string, requestId: number): WithdrawRequest {
    return requests.requireRequest(this._store.begin(), normalizeWalletId(walletId), requestId);
  }

  listWithdrawRequests(walletId: string, filter?: WithdrawRequestFilter): readonly WithdrawRequest[] {
    const tx = this._store.begin();
    const id = normalizeWalletId(walletId);
    requireWallet(tx.wallets, id);
    return requests.listWithdrawRequests(tx, id, filter);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Referral Rewards
  // ───────────────────────────────────────────────────────────────────────

  getPendingReferralFees(walletId: string): Readonly<Record<AssetId, bigint>> {
    const wallet = requireWallet(this._store.begin().wallets, normalizeWalletId(walletId));
    return rewards.pendingReferralFees(wallet);
  }

  claimReferralRewards(principal: Principal, walletId: string, assetId: AssetId): ClaimResult {
    const id = normalizeWalletId(walletId);
    return this._run(principal, (ctx) =>
      rewards.claimReferralRewards(ctx, principal, id, assetId),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Strategies
  // ───────────────────────────────────────────────────────────────────────

  async depositToStrategy(
    actor: Principal,
    walletId: string,
    assetId: AssetId,
    strategyTag: string,
    amount: bigint,
  ): Promise<StrategyDepositResult> {
    requireCapability(this._authorizer, actor, "backend");
    const strategy = this.strategies.require(strategyTag);
    const id = normalizeWalletId(walletId);
    return this._runStrategy(actor, (ctx) =>
      gateway.depositToStrategy(ctx, strategy, id, assetId, amount),
    );
  }

  async withdrawFromStrategy(
    actor: Principal,
    walletId: string,
    assetId: AssetId,
    strategyTag: string,
    amount: bigint,
    interestAmount?: bigint,
  ): Promise<StrategyWithdrawResult> {
    requireCapability(this._authorizer, actor, "backend");
    const strategy = this.strategies.require(strategyTag);
    const id = normalizeWalletId(walletId);
    return this._runStrategy(actor, (ctx) =>
      gateway.withdrawFromStrategy(ctx, strategy, id, assetId, amount, interestAmount),
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Records
  // ───────────────────────────────────────────────────────────────────────

  /** Records that could not be appended to the log. */
  get undeliveredRecords(): readonly UndeliveredRecord[] {
    return this._undelivered;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internals
  // ───────────────────────────────────────────────────────────────────────

  private _run<T>(actor: Principal, work: (ctx: OperationContext) => T): T {
    const timestamp = this._now();
    const records: VaultRecord[] = [];
    const afterCommit: (() => void)[] = [];

    const result = this._store.transaction((tx) =>
      work({ tx, timestamp, config: this.config, custody: this._custody, records, afterCommit }),
    );

    for (const action of afterCommit) action();
    this._emit(actor, timestamp, records);
    return result;
  }

  private async _runStrategy<T>(
    actor: Principal,
    work: (ctx: StrategyOperationContext) => Promise<T>,
  ): Promise<T> {
    const timestamp = this._now();
    const records: VaultRecord[] = [];
    const afterCommit: (() => void)[] = [];
    const compensations: (() => Promise<void>)[] = [];

    let result: T;
    try {
      result = await this._store.transactionAsync((tx) =>
        work({
          tx,
          timestamp,
          config: this.config,
          custody: this._custody,
          records,
          afterCommit,
          compensations,
        }),
      );
    } catch (err) {
      await this._compensate(compensations, err);
      throw err;
    }

    for (const action of afterCommit) action();
    this._emit(actor, timestamp, records);
    return result;
  }

  private async _compensate(
    compensations: readonly (() => Promise<void>)[],
    cause: unknown,
  ): Promise<void> {
    for (const undo of [...compensations].reverse()) {
      try {
        await undo();
      } catch (undoErr) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        const detail = undoErr instanceof Error ? undoErr.message : String(undoErr);
        throw new VaultError(
          "INVARIANT_VIOLATION",
          `Compensation after "${reason}" failed: ${detail}`,
        );
      }
    }
  }

  private _emit(actor: Principal, timestamp: string, records: readonly VaultRecord[]): void {
    if (records.length === 0) return;
    const correlationId = this._newId();

    for (const record of records) {
      if (!this._catalog.validate(record.type, record.payload)) {
        this._onRecordError(
          new VaultError(
            "INVARIANT_VIOLATION",
            `Record payload does not match the "${record.type}" schema`,
          ),
          record,
        );
        continue;
      }

      const event: DomainEvent = {
        type: record.type,
        metadata: {
          eventId: this._newId(),
          timestamp,
          actor,
          correlationId,
          source: record.source,
        },
        payload: record.payload,
      };
      try {
        this._records.append(record.streamId, [event]);
      } catch (err) {
        this._onRecordError(err, record);
      }
    }
  }
}
