/**
 * Vault Types
 *
 * Core records of the pooled-asset vault.
 *
 * Rules:
 * - All monetary fields are unsigned bigint base units (no floating point)
 * - Percentages are basis points (10000 = 100%)
 * - Entities reference each other only by key, never by embedded object
 * - Records are immutable; every mutation produces a new record
 */

/** 32-byte wallet identifier, normalised to "0x" + 64 lowercase hex chars. */
export type WalletId = string;

/** Asset identifier (token symbol or chain-qualified token address). */
export type AssetId = string;

/** An authenticated caller identity (e.g. an owning address or service key). */
export type Principal = string;

/** Integer percentage scaled by 10000. */
export type BasisPoints = number;

/**
 * Per-asset aggregate state.
 *
 * `totalAmount` counts custody under vault control, including funds
 * currently deployed to strategies. It excludes pending referral rewards,
 * which are tracked separately in `totalPendingRewards`.
 */
export interface AssetState {
  readonly assetId: AssetId;
  readonly symbol: string;
  readonly decimals: number;

  readonly totalAmount: bigint;
  readonly totalLpShares: bigint;

  /** Principal currently deployed to strategies. */
  readonly totalDistributedAmount: bigint;

  /** Cumulative principal ever sent to strategies (monotonic). */
  readonly lifetimeDistributedAmount: bigint;

  /** Liquidity earmarked for withdrawal requests but not yet settled. */
  readonly totalReservedAmount: bigint;

  /** Referral rewards held in custody until claimed. */
  readonly totalPendingRewards: bigint;

  readonly minDeposit: bigint;
  readonly maxDeposit: bigint;
  readonly minWithdraw: bigint;
  readonly maxWithdraw: bigint;

  readonly enabledForDeposit: boolean;
  readonly enabledForWithdraw: boolean;

  readonly registeredAt: string;
  readonly updatedAt: string;
}

/**
 * A wallet's position in one asset.
 */
export interface AccountAsset {
  /** Net principal position. */
  readonly currentAmount: bigint;
  readonly depositedAmount: bigint;
  /** LP shares held. */
  readonly lpAmount: bigint;
  readonly swapInAmount: bigint;
  readonly swapOutAmount: bigint;
  /** Principal currently deployed to strategies on this wallet's behalf. */
  readonly distributedAmount: bigint;
  readonly withdrawnAmount: bigint;
  /** Gross yield attributed. */
  readonly interestAmount: bigint;
  /** Net yield after system fee. */
  readonly interestShareAmount: bigint;
  /** Pending referral rewards keyed by the asset that generated them. */
  readonly rewards: Readonly<Record<AssetId, bigint>>;
}

/**
 * A registered wallet.
 *
 * `walletId` and `referrerId` are immutable once set.
 */
export interface WalletAccount {
  readonly walletId: WalletId;
  readonly owner: Principal;
  readonly referrerId?: WalletId | undefined;
  /** Level 1 first. Empty means the global default schedule applies. */
  readonly referralPercents: readonly BasisPoints[];
  /** Overrides the global system fee when present. */
  readonly systemFeeBps?: BasisPoints | undefined;
  readonly assets: Readonly<Record<AssetId, AccountAsset>>;
  /** Next withdraw request id to allocate (monotonic per wallet). */
  readonly nextRequestId: number;
  readonly registeredAt: string;
}

export type WithdrawStatus = "pending" | "success" | "failed";

/**
 * A deferred withdrawal claim, fulfilled incrementally by a backend actor.
 *
 * Invariant: availableAmount + settledAmount <= requestedAmount.
 */
export interface WithdrawRequest {
  readonly requestId: number;
  readonly walletId: WalletId;
  readonly assetId: AssetId;
  readonly requestedAmount: bigint;
  /** Sourced by the backend, not yet withdrawn by the owner. */
  readonly availableAmount: bigint;
  /** Already withdrawn by the owner. */
  readonly settledAmount: bigint;
  readonly status: WithdrawStatus;
  readonly requestedAt: string;
  readonly updatedAt: string;
  /** Non-empty only when status is "failed". */
  readonly errorMessage: string;
  /** Optimistic concurrency counter, bumped on every mutation. */
  readonly version: number;
}
