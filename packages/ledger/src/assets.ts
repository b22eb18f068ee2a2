/**
 * @tidepool/ledger — Asset book.
 *
 * Registration, configuration and gating of supported assets.
 * Assets are never deleted; they can only be disabled.
 *
 * Rules:
 * - No duplicate asset IDs
 * - min ≤ max for both deposit and withdraw bounds
 * - Gates and bounds are checked before any mutation
 */

import type { AssetId, AssetState } from "@tidepool/types";
import { checkedSub } from "./money-math.js";
import type { TableTransaction } from "./state-store.js";
import type { AssetConfig, AssetConfigPatch } from "./types.js";
import { LedgerError } from "./types.js";

type AssetTable = TableTransaction<AssetState>;

function assertBounds(
  label: string,
  min: bigint,
  max: bigint,
): void {
  if (min < 0n || max < 0n) {
    throw new LedgerError(
      "INVALID_ASSET_CONFIG",
      `${label} bounds must be non-negative`,
    );
  }
  if (min > max) {
    throw new LedgerError(
      "INVALID_ASSET_CONFIG",
      `${label} minimum ${min.toString()} exceeds maximum ${max.toString()}`,
    );
  }
}

/**
 * Register a new asset with empty totals.
 */
export function registerAsset(
  assets: AssetTable,
  config: AssetConfig,
  timestamp: string,
): AssetState {
  if (config.assetId.trim() === "") {
    throw new LedgerError("INVALID_ASSET_CONFIG", "Asset ID must be non-empty");
  }
  if (assets.has(config.assetId)) {
    throw new LedgerError("ASSET_EXISTS", `Asset already registered: "${config.assetId}"`);
  }
  if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > 36) {
    throw new LedgerError(
      "INVALID_ASSET_CONFIG",
      `Asset decimals must be an integer in [0, 36], got ${String(config.decimals)}`,
    );
  }
  assertBounds("Deposit", config.minDeposit, config.maxDeposit);
  assertBounds("Withdraw", config.minWithdraw, config.maxWithdraw);

  const asset: AssetState = {
    assetId: config.assetId,
    symbol: config.symbol,
    decimals: config.decimals,
    totalAmount: 0n,
    totalLpShares: 0n,
    totalDistributedAmount: 0n,
    lifetimeDistributedAmount: 0n,
    totalReservedAmount: 0n,
    totalPendingRewards: 0n,
    minDeposit: config.minDeposit,
    maxDeposit: config.maxDeposit,
    minWithdraw: config.minWithdraw,
    maxWithdraw: config.maxWithdraw,
    enabledForDeposit: config.enabledForDeposit ?? true,
    enabledForWithdraw: config.enabledForWithdraw ?? true,
    registeredAt: timestamp,
    updatedAt: timestamp,
  };

  assets.put(asset.assetId, asset);
  return asset;
}

/**
 * Apply a configuration patch (bounds and enable flags).
 */
export function updateAssetConfig(
  assets: AssetTable,
  assetId: AssetId,
  patch: AssetConfigPatch,
  timestamp: string,
): AssetState {
  const current = requireAsset(assets, assetId);
  const updated: AssetState = {
    ...current,
    minDeposit: patch.minDeposit ?? current.minDeposit,
    maxDeposit: patch.maxDeposit ?? current.maxDeposit,
    minWithdraw: patch.minWithdraw ?? current.minWithdraw,
    maxWithdraw: patch.maxWithdraw ?? current.maxWithdraw,
    enabledForDeposit: patch.enabledForDeposit ?? current.enabledForDeposit,
    enabledForWithdraw: patch.enabledForWithdraw ?? current.enabledForWithdraw,
    updatedAt: timestamp,
  };
  assertBounds("Deposit", updated.minDeposit, updated.maxDeposit);
  assertBounds("Withdraw", updated.minWithdraw, updated.maxWithdraw);

  assets.put(assetId, updated);
  return updated;
}

/**
 * Get an asset or throw ASSET_NOT_SUPPORTED.
 */
export function requireAsset(assets: AssetTable, assetId: AssetId): AssetState {
  const asset = assets.get(assetId);
  if (asset === undefined) {
    throw new LedgerError("ASSET_NOT_SUPPORTED", `Asset not supported: "${assetId}"`);
  }
  return asset;
}

/**
 * Check the deposit gate and bounds for `amount`.
 */
export function assertDepositAllowed(asset: AssetState, amount: bigint): void {
  if (!asset.enabledForDeposit) {
    throw new LedgerError("DEPOSIT_DISABLED", `Deposits are disabled for "${asset.assetId}"`);
  }
  if (amount < asset.minDeposit || amount > asset.maxDeposit) {
    throw new LedgerError(
      "AMOUNT_OUT_OF_RANGE",
      `Deposit of ${amount.toString()} is outside [${asset.minDeposit.toString()}, ${asset.maxDeposit.toString()}] for "${asset.assetId}"`,
    );
  }
}

/**
 * Check the withdraw gate and bounds for `amount`.
 */
export function assertWithdrawAllowed(asset: AssetState, amount: bigint): void {
  if (!asset.enabledForWithdraw) {
    throw new LedgerError("WITHDRAW_DISABLED", `Withdrawals are disabled for "${asset.assetId}"`);
  }
  if (amount < asset.minWithdraw || amount > asset.maxWithdraw) {
    throw new LedgerError(
      "AMOUNT_OUT_OF_RANGE",
      `Withdrawal of ${amount.toString()} is outside [${asset.minWithdraw.toString()}, ${asset.maxWithdraw.toString()}] for "${asset.assetId}"`,
    );
  }
}

/**
 * Custody that is neither deployed to strategies nor reserved for
 * withdrawal requests.
 */
export function idleLiquidity(asset: AssetState): bigint {
  return checkedSub(
    checkedSub(asset.totalAmount, asset.totalDistributedAmount, `${asset.assetId} idle custody`),
    asset.totalReservedAmount,
    `${asset.assetId} unreserved custody`,
  );
}
