/**
 * Referral rewards — crediting fee shares and paying out claims.
 *
 * A reward earned from interest in asset X is held as
 * `referrer.assets[X].rewards[X]` and counted in
 * `X.totalPendingRewards` until the referrer claims it.
 */

import type {
  AccountAsset,
  AssetId,
  AssetState,
  Principal,
  WalletAccount,
  WalletId,
} from "@tidepool/types";
import type { FeeShareResult } from "@tidepool/treasury";
import {
  accountAssetOf,
  checkedSub,
  requireAsset,
  requireWallet,
  withAccountAsset,
} from "@tidepool/ledger";
import { VAULT_EVENTS, walletStream } from "@tidepool/event-store";
import type { RewardClaimedPayload } from "@tidepool/event-store";
import { requireOwnedWallet } from "./authorization.js";
import type { OperationContext } from "./context.js";
import { stageRecord } from "./context.js";
import type { ClaimResult } from "./types.js";
import { VaultError } from "./types.js";

function pendingReward(position: AccountAsset, assetId: AssetId): bigint {
  return position.rewards[assetId] ?? 0n;
}

function withReward(position: AccountAsset, assetId: AssetId, amount: bigint): AccountAsset {
  return { ...position, rewards: { ...position.rewards, [assetId]: amount } };
}

/**
 * Credit every level reward of `fees` to its referrer. Returns `asset`
 * with the pending-rewards total raised; the caller stages it.
 */
export function creditFeeShares(
  ctx: OperationContext,
  asset: AssetState,
  fees: FeeShareResult,
): AssetState {
  for (const reward of fees.rewards) {
    const referrer = requireWallet(ctx.tx.wallets, reward.walletId);
    const position = accountAssetOf(referrer, asset.assetId);
    const credited = withReward(
      position,
      asset.assetId,
      pendingReward(position, asset.assetId) + reward.amount,
    );
    ctx.tx.wallets.put(referrer.walletId, withAccountAsset(referrer, asset.assetId, credited));
  }
  return { ...asset, totalPendingRewards: asset.totalPendingRewards + fees.totalRewards };
}

/**
 * Non-zero pending rewards of a wallet, by asset.
 */
export function pendingReferralFees(wallet: WalletAccount): Readonly<Record<AssetId, bigint>> {
  const pending: Record<AssetId, bigint> = {};
  for (const position of Object.values(wallet.assets)) {
    for (const [assetId, amount] of Object.entries(position.rewards)) {
      if (amount > 0n) {
        pending[assetId] = (pending[assetId] ?? 0n) + amount;
      }
    }
  }
  return pending;
}

export function claimReferralRewards(
  ctx: OperationContext,
  principal: Principal,
  walletId: WalletId,
  assetId: AssetId,
): ClaimResult {
  const wallet = requireOwnedWallet(ctx.tx, walletId, principal);
  const asset = requireAsset(ctx.tx.assets, assetId);
  const position = accountAssetOf(wallet, assetId);
  const amount = pendingReward(position, assetId);
  if (amount === 0n) {
    throw new VaultError(
      "NO_PENDING_REWARDS",
      `Wallet "${walletId}" has no pending ${assetId} rewards`,
    );
  }

  ctx.tx.wallets.put(walletId, withAccountAsset(wallet, assetId, withReward(position, assetId, 0n)));
  ctx.tx.assets.put(assetId, {
    ...asset,
    totalPendingRewards: checkedSub(
      asset.totalPendingRewards,
      amount,
      `${assetId} totalPendingRewards`,
    ),
  });
  ctx.custody.transfer(assetId, ctx.config.vaultAccount, wallet.owner, amount);

  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.REWARD_CLAIMED, {
    walletId,
    assetId,
    amount: amount.toString(),
  } satisfies RewardClaimedPayload);

  return { walletId, assetId, amount };
}
