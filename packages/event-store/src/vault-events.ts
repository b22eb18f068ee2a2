/**
 * @tidepool/event-store — Vault Record Definitions.
 *
 * The catalog of all records emitted by the vault stack.
 *
 * Naming convention: `<subsystem>.<entity>.<action>`
 *
 * Amounts in payloads are decimal-digit strings of base units.
 * Wallet records go to `wallet:<walletId>`; asset-wide records go to
 * `asset:<assetId>`.
 */

import { isAmountString, isWithdrawStatus } from "@tidepool/types";
import type { EventSchema } from "./catalog.js";
import { EventCatalog } from "./catalog.js";

// =============================================================================
// Event Types
// =============================================================================

export const VAULT_EVENTS = {
  ASSET_REGISTERED: "vault.asset.registered",
  ASSET_UPDATED: "vault.asset.updated",
  WALLET_REGISTERED: "vault.wallet.registered",
  REFERRER_ASSIGNED: "vault.referrer.assigned",
  DEPOSIT_RECORDED: "vault.deposit.recorded",
  WITHDRAWAL_RECORDED: "vault.withdrawal.recorded",
  WITHDRAW_REQUEST_CREATED: "vault.withdraw-request.created",
  WITHDRAW_REQUEST_UPDATED: "vault.withdraw-request.updated",
  YIELD_INJECTED: "vault.yield.injected",
  SWAP_RECORDED: "vault.swap.recorded",
  FEE_SHARE_DISTRIBUTED: "treasury.fee-share.distributed",
  REWARD_CLAIMED: "treasury.reward.claimed",
  STRATEGY_DEPOSIT_RECORDED: "strategy.deposit.recorded",
  STRATEGY_WITHDRAWAL_RECORDED: "strategy.withdrawal.recorded",
} as const;

export type VaultEventType = (typeof VAULT_EVENTS)[keyof typeof VAULT_EVENTS];

export function walletStream(walletId: string): string {
  return `wallet:${walletId}`;
}

export function assetStream(assetId: string): string {
  return `asset:${assetId}`;
}

// =============================================================================
// Payloads
// =============================================================================

export interface AssetRegisteredPayload {
  readonly assetId: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly minDeposit: string;
  readonly maxDeposit: string;
  readonly minWithdraw: string;
  readonly maxWithdraw: string;
  readonly enabledForDeposit: boolean;
  readonly enabledForWithdraw: boolean;
}

export interface AssetUpdatedPayload {
  readonly assetId: string;
  readonly changes: Readonly<Record<string, string | boolean>>;
}

export interface WalletRegisteredPayload {
  readonly walletId: string;
  readonly owner: string;
  readonly referrerId: string | null;
  readonly referralPercents: readonly number[];
  readonly systemFeeBps: number | null;
}

export interface ReferrerAssignedPayload {
  readonly walletId: string;
  readonly referrerId: string;
}

export interface DepositRecordedPayload {
  readonly walletId: string;
  readonly assetId: string;
  readonly amount: string;
  readonly sharesMinted: string;
}

export interface WithdrawalRecordedPayload {
  readonly walletId: string;
  readonly assetId: string;
  readonly amount: string;
  readonly sharesBurned: string;
  readonly path: "instant" | "request";
  readonly requestIds: readonly number[];
}

export interface WithdrawRequestCreatedPayload {
  readonly walletId: string;
  readonly assetId: string;
  readonly requestId: number;
  readonly requestedAmount: string;
}

export interface WithdrawRequestUpdatedPayload {
  readonly walletId: string;
  readonly assetId: string;
  readonly requestId: number;
  readonly status: string;
  readonly addAvailable: string;
  readonly availableAmount: string;
  readonly settledAmount: string;
  readonly errorMessage: string;
  readonly version: number;
}

export interface YieldInjectedPayload {
  readonly assetId: string;
  readonly amount: string;
  readonly totalAmount: string;
  readonly totalLpShares: string;
}

export interface SwapRecordedPayload {
  readonly walletId: string;
  readonly fromAssetId: string;
  readonly toAssetId: string;
  readonly amountIn: string;
  readonly amountOut: string;
  readonly sharesBurned: string;
  readonly sharesMinted: string;
}

export interface FeeShareDistributedPayload {
  readonly walletId: string;
  readonly assetId: string;
  readonly interestAmount: string;
  readonly systemFee: string;
  readonly netInterest: string;
  readonly retainedFee: string;
  readonly feeRecipient: string;
  readonly rewards: readonly {
    readonly level: number;
    readonly walletId: string;
    readonly amount: string;
  }[];
}

export interface RewardClaimedPayload {
  readonly walletId: string;
  readonly assetId: string;
  readonly amount: string;
}

export interface StrategyDepositRecordedPayload {
  readonly walletId: string;
  readonly assetId: string;
  readonly strategyTag: string;
  readonly amount: string;
}

export interface StrategyWithdrawalRecordedPayload {
  readonly walletId: string;
  readonly assetId: string;
  readonly strategyTag: string;
  readonly amount: string;
  readonly interestAmount: string;
  readonly sharesMinted: string;
}

// =============================================================================
// Schema Registrations
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasString(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "string";
}

function hasNumber(obj: Record<string, unknown>, key: string): boolean {
  return typeof obj[key] === "number";
}

function hasAmount(obj: Record<string, unknown>, key: string): boolean {
  return isAmountString(obj[key]);
}

function hasWalletAsset(p: Record<string, unknown>): boolean {
  return hasString(p, "walletId") && hasString(p, "assetId");
}

const VAULT_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.ASSET_REGISTERED,
    version: 1,
    description: "An asset was registered with its bounds and gates",
    source: "vault",
    validate: (p) => isObject(p) && hasString(p, "assetId") && hasNumber(p, "decimals"),
  },
  {
    type: VAULT_EVENTS.ASSET_UPDATED,
    version: 1,
    description: "An asset's bounds or gates were changed",
    source: "vault",
    validate: (p) => isObject(p) && hasString(p, "assetId") && isObject(p["changes"]),
  },
  {
    type: VAULT_EVENTS.WALLET_REGISTERED,
    version: 1,
    description: "A wallet was registered",
    source: "vault",
    validate: (p) => isObject(p) && hasString(p, "walletId") && hasString(p, "owner"),
  },
  {
    type: VAULT_EVENTS.REFERRER_ASSIGNED,
    version: 1,
    description: "A referrer was linked to a wallet",
    source: "vault",
    validate: (p) => isObject(p) && hasString(p, "walletId") && hasString(p, "referrerId"),
  },
  {
    type: VAULT_EVENTS.DEPOSIT_RECORDED,
    version: 1,
    description: "Funds were deposited and LP shares minted",
    source: "vault",
    validate: (p) =>
      isObject(p) && hasWalletAsset(p) && hasAmount(p, "amount") && hasAmount(p, "sharesMinted"),
  },
  {
    type: VAULT_EVENTS.WITHDRAWAL_RECORDED,
    version: 1,
    description: "Funds were withdrawn and LP shares burned",
    source: "vault",
    validate: (p) =>
      isObject(p) &&
      hasWalletAsset(p) &&
      hasAmount(p, "amount") &&
      hasAmount(p, "sharesBurned") &&
      (p["path"] === "instant" || p["path"] === "request") &&
      Array.isArray(p["requestIds"]),
  },
  {
    type: VAULT_EVENTS.WITHDRAW_REQUEST_CREATED,
    version: 1,
    description: "A deferred withdrawal was requested",
    source: "vault",
    validate: (p) =>
      isObject(p) && hasWalletAsset(p) && hasNumber(p, "requestId") && hasAmount(p, "requestedAmount"),
  },
  {
    type: VAULT_EVENTS.WITHDRAW_REQUEST_UPDATED,
    version: 1,
    description: "A backend sourced funds for, completed or failed a withdrawal request",
    source: "vault",
    validate: (p) =>
      isObject(p) && hasWalletAsset(p) && hasNumber(p, "requestId") && isWithdrawStatus(p["status"]),
  },
  {
    type: VAULT_EVENTS.YIELD_INJECTED,
    version: 1,
    description: "Pool-wide yield raised the exchange rate",
    source: "vault",
    validate: (p) => isObject(p) && hasString(p, "assetId") && hasAmount(p, "amount"),
  },
  {
    type: VAULT_EVENTS.SWAP_RECORDED,
    version: 1,
    description: "A position was swapped from one asset into another",
    source: "vault",
    validate: (p) =>
      isObject(p) &&
      hasString(p, "walletId") &&
      hasString(p, "fromAssetId") &&
      hasString(p, "toAssetId") &&
      hasAmount(p, "amountIn") &&
      hasAmount(p, "amountOut"),
  },
];

const TREASURY_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.FEE_SHARE_DISTRIBUTED,
    version: 1,
    description: "Strategy interest was split into net yield, referral rewards and retained fee",
    source: "treasury",
    validate: (p) =>
      isObject(p) &&
      hasWalletAsset(p) &&
      hasAmount(p, "systemFee") &&
      hasAmount(p, "retainedFee") &&
      Array.isArray(p["rewards"]),
  },
  {
    type: VAULT_EVENTS.REWARD_CLAIMED,
    version: 1,
    description: "A referrer claimed pending rewards",
    source: "treasury",
    validate: (p) => isObject(p) && hasWalletAsset(p) && hasAmount(p, "amount"),
  },
];

const STRATEGY_SCHEMAS: readonly EventSchema[] = [
  {
    type: VAULT_EVENTS.STRATEGY_DEPOSIT_RECORDED,
    version: 1,
    description: "Principal was deployed to a strategy",
    source: "strategy",
    validate: (p) =>
      isObject(p) && hasWalletAsset(p) && hasString(p, "strategyTag") && hasAmount(p, "amount"),
  },
  {
    type: VAULT_EVENTS.STRATEGY_WITHDRAWAL_RECORDED,
    version: 1,
    description: "Principal and interest were recalled from a strategy",
    source: "strategy",
    validate: (p) =>
      isObject(p) &&
      hasWalletAsset(p) &&
      hasString(p, "strategyTag") &&
      hasAmount(p, "amount") &&
      hasAmount(p, "interestAmount"),
  },
];

// =============================================================================
// Factory
// =============================================================================

/**
 * Create an EventCatalog with every vault record type at version 1.
 */
export function createVaultCatalog(): EventCatalog {
  const catalog = new EventCatalog();
  for (const schema of [...VAULT_SCHEMAS, ...TREASURY_SCHEMAS, ...STRATEGY_SCHEMAS]) {
    catalog.register(schema);
  }
  return catalog;
}
