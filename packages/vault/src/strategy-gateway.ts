/**
 * Strategy Allocation Gateway — deploys wallet principal to strategies
 * and brings it back with interest.
 *
 * Ledger writes are staged first and the strategy is called last, so a
 * failed strategy call leaves nothing behind. Once the strategy has
 * moved funds, a compensation is registered; the coordinator runs it
 * if the commit is then rejected.
 */

import type { AccountAsset, AssetId, WalletId } from "@tidepool/types";
import {
  accountAssetOf,
  assertPositiveAmount,
  idleLiquidity,
  referralChain,
  requireAsset,
  requireWallet,
  sharesForDeposit,
  withAccountAsset,
} from "@tidepool/ledger";
import { computeFeeShares, resolveFeeSchedule } from "@tidepool/treasury";
import { VAULT_EVENTS, walletStream } from "@tidepool/event-store";
import type {
  FeeShareDistributedPayload,
  StrategyDepositRecordedPayload,
  StrategyWithdrawalRecordedPayload,
} from "@tidepool/event-store";
import type { StrategyOperationContext } from "./context.js";
import { stageRecord } from "./context.js";
import { mintShares } from "./positions.js";
import { creditFeeShares } from "./rewards.js";
import type {
  Strategy,
  StrategyDepositResult,
  StrategyTransfer,
  StrategyWithdrawResult,
} from "./types.js";
import { VaultError } from "./types.js";

export async function depositToStrategy(
  ctx: StrategyOperationContext,
  strategy: Strategy,
  walletId: WalletId,
  assetId: AssetId,
  amount: bigint,
): Promise<StrategyDepositResult> {
  assertPositiveAmount(amount);
  const wallet = requireWallet(ctx.tx.wallets, walletId);
  const asset = requireAsset(ctx.tx.assets, assetId);
  const current = accountAssetOf(wallet, assetId);

  const undeployed = current.currentAmount - current.distributedAmount;
  if (amount > undeployed) {
    throw new VaultError(
      "INSUFFICIENT_FUND",
      `Wallet "${walletId}" has ${(undeployed > 0n ? undeployed : 0n).toString()} ${assetId} undeployed, cannot deploy ${amount.toString()}`,
    );
  }
  const idle = idleLiquidity(asset);
  if (amount > idle) {
    throw new VaultError(
      "INSUFFICIENT_IDLE_LIQUIDITY",
      `Only ${idle.toString()} ${assetId} is idle, cannot deploy ${amount.toString()}`,
    );
  }

  const position: AccountAsset = {
    ...current,
    distributedAmount: current.distributedAmount + amount,
  };
  const updatedAsset = {
    ...asset,
    totalDistributedAmount: asset.totalDistributedAmount + amount,
    lifetimeDistributedAmount: asset.lifetimeDistributedAmount + amount,
  };
  ctx.tx.wallets.put(walletId, withAccountAsset(wallet, assetId, position));
  ctx.tx.assets.put(assetId, updatedAsset);

  const transfer: StrategyTransfer = {
    walletId,
    assetId,
    amount,
    interestAmount: 0n,
    vaultAccount: ctx.config.vaultAccount,
  };
  await strategy.deposit(transfer);
  ctx.compensations.push(() => strategy.withdraw(transfer));

  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.STRATEGY_DEPOSIT_RECORDED, {
    walletId,
    assetId,
    strategyTag: strategy.tag,
    amount: amount.toString(),
  } satisfies StrategyDepositRecordedPayload);

  return { walletId, assetId, strategyTag: strategy.tag, amount, position, asset: updatedAsset };
}

/**
 * Recall `amount` of deployed principal plus interest. The interest is
 * split by the fee schedule; the depositor's net share is compounded
 * into new shares at the current rate.
 */
export async function withdrawFromStrategy(
  ctx: StrategyOperationContext,
  strategy: Strategy,
  walletId: WalletId,
  assetId: AssetId,
  amount: bigint,
  interestAmount?: bigint,
): Promise<StrategyWithdrawResult> {
  assertPositiveAmount(amount);
  const wallet = requireWallet(ctx.tx.wallets, walletId);
  const asset = requireAsset(ctx.tx.assets, assetId);
  const current = accountAssetOf(wallet, assetId);

  if (amount > current.distributedAmount) {
    throw new VaultError(
      "INSUFFICIENT_FUND",
      `Wallet "${walletId}" has ${current.distributedAmount.toString()} ${assetId} deployed, cannot recall ${amount.toString()}`,
    );
  }

  const interest = interestAmount ?? (await strategy.reportInterest({ walletId, assetId }));
  if (interest < 0n) {
    throw new VaultError("INVALID_AMOUNT", `Interest must be non-negative, got ${interest.toString()}`);
  }

  const schedule = resolveFeeSchedule(ctx.config.defaultFees, {
    systemFeeBps: wallet.systemFeeBps,
    referralPercents: wallet.referralPercents,
  });
  const levels = Math.min(ctx.config.maxReferralLevels, schedule.referralPercents.length);
  const fees = computeFeeShares({
    interestAmount: interest,
    systemFeeBps: schedule.systemFeeBps,
    referralPercents: schedule.referralPercents,
    referralChain: referralChain(ctx.tx.wallets, walletId, levels),
  });

  const sharesMinted = sharesForDeposit(asset, fees.netInterest);
  const compounded = mintShares(
    { ...current, distributedAmount: current.distributedAmount - amount },
    { ...asset, totalDistributedAmount: asset.totalDistributedAmount - amount },
    fees.netInterest,
    sharesMinted,
  );
  const position: AccountAsset = {
    ...compounded.position,
    interestAmount: compounded.position.interestAmount + interest,
    interestShareAmount: compounded.position.interestShareAmount + fees.netInterest,
  };

  ctx.tx.wallets.put(walletId, withAccountAsset(wallet, assetId, position));
  const updatedAsset = creditFeeShares(ctx, compounded.asset, fees);
  ctx.tx.assets.put(assetId, updatedAsset);

  const transfer: StrategyTransfer = {
    walletId,
    assetId,
    amount,
    interestAmount: interest,
    vaultAccount: ctx.config.vaultAccount,
  };
  await strategy.withdraw(transfer);
  ctx.compensations.push(() => strategy.deposit(transfer));

  const { feeRecipient, vaultAccount } = ctx.config;
  ctx.afterCommit.push(() => {
    ctx.custody.transfer(assetId, vaultAccount, feeRecipient, fees.retainedFee);
  });

  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.STRATEGY_WITHDRAWAL_RECORDED, {
    walletId,
    assetId,
    strategyTag: strategy.tag,
    amount: amount.toString(),
    interestAmount: interest.toString(),
    sharesMinted: sharesMinted.toString(),
  } satisfies StrategyWithdrawalRecordedPayload);

  if (interest > 0n) {
    stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.FEE_SHARE_DISTRIBUTED, {
      walletId,
      assetId,
      interestAmount: interest.toString(),
      systemFee: fees.systemFee.toString(),
      netInterest: fees.netInterest.toString(),
      retainedFee: fees.retainedFee.toString(),
      feeRecipient,
      rewards: fees.rewards.map((r) => ({
        level: r.level,
        walletId: r.walletId,
        amount: r.amount.toString(),
      })),
    } satisfies FeeShareDistributedPayload);
  }

  return {
    walletId,
    assetId,
    strategyTag: strategy.tag,
    amount,
    fees,
    sharesMinted,
    position,
    asset: updatedAsset,
  };
}
