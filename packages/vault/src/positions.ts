/**
 * Positions — synchronous deposit, withdraw, redeem, swap and yield.
 *
 * Each function stages its writes in `ctx.tx` and moves custody as its
 * last step, so a thrown error leaves both the ledger and custody
 * untouched.
 *
 * Rules:
 * - Minting rounds down; burning for an exact payout rounds up
 * - Principal (`currentAmount`) shrinks pro-rata to the shares burned
 * - A wallet can never withdraw value already claimed by its open
 *   withdrawal requests
 * - Instant withdrawals only draw on idle, unreserved liquidity
 */

import type {
  AccountAsset,
  AssetId,
  AssetState,
  Principal,
  WalletAccount,
  WalletId,
} from "@tidepool/types";
import type { StoreTransaction } from "@tidepool/ledger";
import {
  accountAssetOf,
  amountForShares,
  assertDepositAllowed,
  assertPositiveAmount,
  assertWithdrawAllowed,
  checkedSub,
  idleLiquidity,
  minAmount,
  mulDivFloor,
  requestPrefix,
  requireAsset,
  sharesForDeposit,
  sharesForWithdrawal,
  withAccountAsset,
} from "@tidepool/ledger";
import {
  VAULT_EVENTS,
  assetStream,
  walletStream,
} from "@tidepool/event-store";
import type {
  DepositRecordedPayload,
  SwapRecordedPayload,
  WithdrawalRecordedPayload,
  YieldInjectedPayload,
} from "@tidepool/event-store";
import { requireOwnedWallet } from "./authorization.js";
import type { OperationContext } from "./context.js";
import { stageRecord } from "./context.js";
import type { DepositResult, SwapResult, SwapVenue, WithdrawResult } from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Share arithmetic on positions
// =============================================================================

interface PoolUpdate {
  readonly position: AccountAsset;
  readonly asset: AssetState;
}

/**
 * What the wallet's shares are worth at the current rate.
 */
export function positionValue(asset: AssetState, position: AccountAsset): bigint {
  return amountForShares(asset, position.lpAmount);
}

/**
 * Value still owed to the wallet by its open requests in `assetId`:
 * requested minus settled, over every request that has not failed.
 */
export function outstandingClaims(
  tx: StoreTransaction,
  walletId: WalletId,
  assetId: AssetId,
): bigint {
  return tx.requests
    .scan(requestPrefix(walletId))
    .filter((r) => r.assetId === assetId && r.status !== "failed")
    .reduce((sum, r) => sum + (r.requestedAmount - r.settledAmount), 0n);
}

export function assertFundsAvailable(
  tx: StoreTransaction,
  wallet: WalletAccount,
  asset: AssetState,
  amount: bigint,
): void {
  const position = accountAssetOf(wallet, asset.assetId);
  const free =
    positionValue(asset, position) - outstandingClaims(tx, wallet.walletId, asset.assetId);
  if (amount > free) {
    throw new VaultError(
      "INSUFFICIENT_FUND",
      `Wallet "${wallet.walletId}" can withdraw at most ${(free > 0n ? free : 0n).toString()} ${asset.assetId}, requested ${amount.toString()}`,
    );
  }
}

function assertHoldsShares(walletId: WalletId, position: AccountAsset, shares: bigint): void {
  if (position.lpAmount === 0n) {
    throw new VaultError("INSUFFICIENT_SHARES", `Wallet "${walletId}" holds no shares`);
  }
  if (shares > position.lpAmount) {
    throw new VaultError(
      "INSUFFICIENT_SHARES",
      `Wallet "${walletId}" holds ${position.lpAmount.toString()} shares, needs ${shares.toString()}`,
    );
  }
}

/**
 * Burn `shares` paying out `amount`. Principal falls pro-rata; burning
 * the last share clears it entirely.
 */
export function burnShares(
  position: AccountAsset,
  asset: AssetState,
  shares: bigint,
  amount: bigint,
): PoolUpdate {
  if (shares > position.lpAmount) {
    throw new VaultError(
      "INSUFFICIENT_SHARES",
      `Cannot burn ${shares.toString()} of ${position.lpAmount.toString()} shares`,
    );
  }
  const principal =
    shares === position.lpAmount
      ? position.currentAmount
      : minAmount(
          position.currentAmount,
          mulDivFloor(position.currentAmount, shares, position.lpAmount),
        );

  return {
    position: {
      ...position,
      lpAmount: position.lpAmount - shares,
      currentAmount: position.currentAmount - principal,
    },
    asset: {
      ...asset,
      totalAmount: checkedSub(asset.totalAmount, amount, `${asset.assetId} totalAmount`),
      totalLpShares: checkedSub(asset.totalLpShares, shares, `${asset.assetId} totalLpShares`),
    },
  };
}

/**
 * Credit `amount` of principal backed by `shares` freshly minted.
 */
export function mintShares(
  position: AccountAsset,
  asset: AssetState,
  amount: bigint,
  shares: bigint,
): PoolUpdate {
  return {
    position: {
      ...position,
      lpAmount: position.lpAmount + shares,
      currentAmount: position.currentAmount + amount,
    },
    asset: {
      ...asset,
      totalAmount: asset.totalAmount + amount,
      totalLpShares: asset.totalLpShares + shares,
    },
  };
}

function mintableShares(asset: AssetState, amount: bigint): bigint {
  const shares = sharesForDeposit(asset, amount);
  if (shares === 0n) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `${amount.toString()} ${asset.assetId} is worth less than one share`,
    );
  }
  return shares;
}

// =============================================================================
// Deposit
// =============================================================================

export function deposit(
  ctx: OperationContext,
  principal: Principal,
  walletId: WalletId,
  assetId: AssetId,
  amount: bigint,
): DepositResult {
  assertPositiveAmount(amount);
  const wallet = requireOwnedWallet(ctx.tx, walletId, principal);
  const asset = requireAsset(ctx.tx.assets, assetId);
  assertDepositAllowed(asset, amount);

  const shares = mintableShares(asset, amount);
  const minted = mintShares(accountAssetOf(wallet, assetId), asset, amount, shares);
  const position: AccountAsset = {
    ...minted.position,
    depositedAmount: minted.position.depositedAmount + amount,
  };

  ctx.tx.wallets.put(walletId, withAccountAsset(wallet, assetId, position));
  ctx.tx.assets.put(assetId, minted.asset);
  ctx.custody.transfer(assetId, principal, ctx.config.vaultAccount, amount);

  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.DEPOSIT_RECORDED, {
    walletId,
    assetId,
    amount: amount.toString(),
    sharesMinted: shares.toString(),
  } satisfies DepositRecordedPayload);

  return { walletId, assetId, amount, sharesMinted: shares, position, asset: minted.asset };
}

// =============================================================================
// Withdraw / Redeem
// =============================================================================

function payOut(
  ctx: OperationContext,
  wallet: WalletAccount,
  asset: AssetState,
  amount: bigint,
  shares: bigint,
): WithdrawResult {
  const { walletId } = wallet;
  const { assetId } = asset;

  assertFundsAvailable(ctx.tx, wallet, asset, amount);
  const idle = idleLiquidity(asset);
  if (amount > idle) {
    throw new VaultError(
      "INSUFFICIENT_LIQUIDITY",
      `Only ${idle.toString()} ${assetId} is idle, cannot pay ${amount.toString()}; request a deferred withdrawal instead`,
    );
  }

  const burned = burnShares(accountAssetOf(wallet, assetId), asset, shares, amount);
  const position: AccountAsset = {
    ...burned.position,
    withdrawnAmount: burned.position.withdrawnAmount + amount,
  };

  ctx.tx.wallets.put(walletId, withAccountAsset(wallet, assetId, position));
  ctx.tx.assets.put(assetId, burned.asset);
  ctx.custody.transfer(assetId, ctx.config.vaultAccount, wallet.owner, amount);

  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.WITHDRAWAL_RECORDED, {
    walletId,
    assetId,
    amount: amount.toString(),
    sharesBurned: shares.toString(),
    path: "instant",
    requestIds: [],
  } satisfies WithdrawalRecordedPayload);

  return {
    walletId,
    assetId,
    amount,
    sharesBurned: shares,
    requestIds: [],
    position,
    asset: burned.asset,
  };
}

/**
 * Withdraw an exact amount, burning the shares it costs (rounded up).
 */
export function withdraw(
  ctx: OperationContext,
  principal: Principal,
  walletId: WalletId,
  assetId: AssetId,
  amount: bigint,
): WithdrawResult {
  assertPositiveAmount(amount);
  const wallet = requireOwnedWallet(ctx.tx, walletId, principal);
  const asset = requireAsset(ctx.tx.assets, assetId);
  assertWithdrawAllowed(asset, amount);

  const position = accountAssetOf(wallet, assetId);
  assertHoldsShares(walletId, position, 0n);
  const shares = sharesForWithdrawal(asset, amount);
  assertHoldsShares(walletId, position, shares);

  return payOut(ctx, wallet, asset, amount, shares);
}

/**
 * Burn an exact share count for whatever it is worth (rounded down).
 * `shares = 0` redeems the whole position.
 */
export function redeem(
  ctx: OperationContext,
  principal: Principal,
  walletId: WalletId,
  assetId: AssetId,
  shares: bigint,
): WithdrawResult {
  if (shares < 0n) {
    throw new VaultError("INVALID_AMOUNT", `Shares must be non-negative, got ${shares.toString()}`);
  }
  const wallet = requireOwnedWallet(ctx.tx, walletId, principal);
  const asset = requireAsset(ctx.tx.assets, assetId);

  const position = accountAssetOf(wallet, assetId);
  const burn = shares === 0n ? position.lpAmount : shares;
  assertHoldsShares(walletId, position, burn);

  const amount = amountForShares(asset, burn);
  if (amount === 0n) {
    throw new VaultError("INVALID_AMOUNT", `${burn.toString()} shares are worth nothing`);
  }
  assertWithdrawAllowed(asset, amount);

  return payOut(ctx, wallet, asset, amount, burn);
}

// =============================================================================
// Yield
// =============================================================================

/**
 * Move pool-wide yield from `actor` into custody. Raises totalAmount
 * without minting, so every share is worth more.
 */
export function injectYield(
  ctx: OperationContext,
  actor: Principal,
  assetId: AssetId,
  amount: bigint,
): AssetState {
  assertPositiveAmount(amount);
  const asset = requireAsset(ctx.tx.assets, assetId);
  if (asset.totalLpShares === 0n) {
    throw new VaultError(
      "INSUFFICIENT_SHARES",
      `No ${assetId} shares outstanding to receive yield`,
    );
  }

  const updated: AssetState = { ...asset, totalAmount: asset.totalAmount + amount };
  ctx.tx.assets.put(assetId, updated);
  ctx.custody.transfer(assetId, actor, ctx.config.vaultAccount, amount);

  stageRecord(ctx, assetStream(assetId), VAULT_EVENTS.YIELD_INJECTED, {
    assetId,
    amount: amount.toString(),
    totalAmount: updated.totalAmount.toString(),
    totalLpShares: updated.totalLpShares.toString(),
  } satisfies YieldInjectedPayload);

  return updated;
}

// =============================================================================
// Swap
// =============================================================================

/**
 * Convert part of a position in `fromAssetId` into a position in
 * `toAssetId` through `venue`. The burn side is checked like a
 * withdrawal, the mint side like a deposit.
 */
export function swap(
  ctx: OperationContext,
  venue: SwapVenue,
  principal: Principal,
  walletId: WalletId,
  fromAssetId: AssetId,
  toAssetId: AssetId,
  amountIn: bigint,
): SwapResult {
  assertPositiveAmount(amountIn, "amountIn");
  if (fromAssetId === toAssetId) {
    throw new VaultError("INVALID_SWAP", `Cannot swap "${fromAssetId}" into itself`);
  }
  const wallet = requireOwnedWallet(ctx.tx, walletId, principal);
  const fromAsset = requireAsset(ctx.tx.assets, fromAssetId);
  const toAsset = requireAsset(ctx.tx.assets, toAssetId);

  // Burn side
  assertWithdrawAllowed(fromAsset, amountIn);
  const fromPosition = accountAssetOf(wallet, fromAssetId);
  assertHoldsShares(walletId, fromPosition, 0n);
  const sharesBurned = sharesForWithdrawal(fromAsset, amountIn);
  assertHoldsShares(walletId, fromPosition, sharesBurned);
  assertFundsAvailable(ctx.tx, wallet, fromAsset, amountIn);
  const idle = idleLiquidity(fromAsset);
  if (amountIn > idle) {
    throw new VaultError(
      "INSUFFICIENT_LIQUIDITY",
      `Only ${idle.toString()} ${fromAssetId} is idle, cannot swap ${amountIn.toString()}`,
    );
  }

  // Mint side
  const amountOut = venue.quote(fromAssetId, toAssetId, amountIn);
  if (amountOut <= 0n) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `Swapping ${amountIn.toString()} ${fromAssetId} yields nothing`,
    );
  }
  assertDepositAllowed(toAsset, amountOut);
  const sharesMinted = mintableShares(toAsset, amountOut);

  const burned = burnShares(fromPosition, fromAsset, sharesBurned, amountIn);
  const minted = mintShares(accountAssetOf(wallet, toAssetId), toAsset, amountOut, sharesMinted);

  const afterBurn = withAccountAsset(wallet, fromAssetId, {
    ...burned.position,
    swapOutAmount: burned.position.swapOutAmount + amountIn,
  });
  const afterMint = withAccountAsset(afterBurn, toAssetId, {
    ...minted.position,
    swapInAmount: minted.position.swapInAmount + amountOut,
  });

  ctx.tx.wallets.put(walletId, afterMint);
  ctx.tx.assets.put(fromAssetId, burned.asset);
  ctx.tx.assets.put(toAssetId, minted.asset);
  venue.execute({
    fromAssetId,
    toAssetId,
    amountIn,
    amountOut,
    vaultAccount: ctx.config.vaultAccount,
  });

  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.SWAP_RECORDED, {
    walletId,
    fromAssetId,
    toAssetId,
    amountIn: amountIn.toString(),
    amountOut: amountOut.toString(),
    sharesBurned: sharesBurned.toString(),
    sharesMinted: sharesMinted.toString(),
  } satisfies SwapRecordedPayload);

  return { walletId, fromAssetId, toAssetId, amountIn, amountOut, sharesBurned, sharesMinted };
}
