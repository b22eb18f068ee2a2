/**
 * Withdrawal Request Engine — deferred withdrawals sourced by a backend.
 *
 * Lifecycle:
 *
 *   pending ──(addAvailable)──▶ pending
 *      │
 *      ├──(final fill)────────▶ success
 *      └──(errorMessage)──────▶ failed
 *
 * Rules:
 * - success and failed are terminal; a failed request is never reopened
 * - availableAmount + settledAmount ≤ requestedAmount at all times
 * - Sourced amounts are reserved out of idle liquidity until the owner
 *   settles them, or released when the request fails
 * - Every mutation bumps the request version (optimistic concurrency)
 */

import type {
  AccountAsset,
  AssetId,
  Principal,
  WalletAccount,
  WalletId,
  WithdrawRequest,
} from "@tidepool/types";
import { isTerminalStatus } from "@tidepool/types";
import type { StoreTransaction } from "@tidepool/ledger";
import {
  accountAssetOf,
  assertPositiveAmount,
  assertWithdrawAllowed,
  checkedSub,
  idleLiquidity,
  requestKey,
  requestPrefix,
  requireAsset,
  requireWallet,
  sharesForWithdrawal,
  withAccountAsset,
} from "@tidepool/ledger";
import { VAULT_EVENTS, walletStream } from "@tidepool/event-store";
import type {
  WithdrawRequestCreatedPayload,
  WithdrawRequestUpdatedPayload,
  WithdrawalRecordedPayload,
} from "@tidepool/event-store";
import { requireOwnedWallet } from "./authorization.js";
import type { OperationContext } from "./context.js";
import { stageRecord } from "./context.js";
import { burnShares, outstandingClaims } from "./positions.js";
import type {
  WithdrawRequestFilter,
  WithdrawRequestUpdate,
  WithdrawResult,
  WithdrawalState,
} from "./types.js";
import { VaultError } from "./types.js";

export function requireRequest(
  tx: StoreTransaction,
  walletId: WalletId,
  requestId: number,
): WithdrawRequest {
  const request = tx.requests.get(requestKey(walletId, requestId));
  if (request === undefined) {
    throw new VaultError(
      "REQUEST_NOT_FOUND",
      `Withdraw request ${String(requestId)} not found for wallet "${walletId}"`,
    );
  }
  return request;
}

// =============================================================================
// Request
// =============================================================================

/**
 * Requests draw on principal, not on share value: yield only leaves
 * through the instant path.
 */
function assertPrincipalAvailable(
  tx: StoreTransaction,
  wallet: WalletAccount,
  assetId: AssetId,
  amount: bigint,
): void {
  const { currentAmount } = accountAssetOf(wallet, assetId);
  const free = currentAmount - outstandingClaims(tx, wallet.walletId, assetId);
  if (amount > free) {
    throw new VaultError(
      "INSUFFICIENT_FUND",
      `Wallet "${wallet.walletId}" can request at most ${(free > 0n ? free : 0n).toString()} ${assetId}, requested ${amount.toString()}`,
    );
  }
}

export function requestWithdraw(
  ctx: OperationContext,
  principal: Principal,
  walletId: WalletId,
  assetId: AssetId,
  amount: bigint,
): WithdrawRequest {
  assertPositiveAmount(amount);
  const wallet = requireOwnedWallet(ctx.tx, walletId, principal);
  const asset = requireAsset(ctx.tx.assets, assetId);
  assertWithdrawAllowed(asset, amount);
  assertPrincipalAvailable(ctx.tx, wallet, assetId, amount);

  const request: WithdrawRequest = {
    requestId: wallet.nextRequestId,
    walletId,
    assetId,
    requestedAmount: amount,
    availableAmount: 0n,
    settledAmount: 0n,
    status: "pending",
    requestedAt: ctx.timestamp,
    updatedAt: ctx.timestamp,
    errorMessage: "",
    version: 1,
  };

  ctx.tx.requests.put(requestKey(walletId, request.requestId), request);
  ctx.tx.wallets.put(walletId, { ...wallet, nextRequestId: wallet.nextRequestId + 1 });

  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.WITHDRAW_REQUEST_CREATED, {
    walletId,
    assetId,
    requestId: request.requestId,
    requestedAmount: amount.toString(),
  } satisfies WithdrawRequestCreatedPayload);

  return request;
}

// =============================================================================
// Backend Status Update
// =============================================================================

function invalidUpdate(request: WithdrawRequest, reason: string): VaultError {
  return new VaultError(
    "INVALID_STATUS_UPDATE",
    `Request ${String(request.requestId)} of wallet "${request.walletId}": ${reason}`,
  );
}

function assertUpdateShape(request: WithdrawRequest, update: WithdrawRequestUpdate): void {
  const hasMessage = update.errorMessage.trim() !== "";
  const sourced = request.availableAmount + request.settledAmount + update.addAvailable;

  if (update.addAvailable < 0n) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `addAvailable must be non-negative, got ${update.addAvailable.toString()}`,
    );
  }
  if (sourced > request.requestedAmount) {
    throw new VaultError(
      "INVALID_AMOUNT",
      `Sourcing ${update.addAvailable.toString()} more would exceed the requested ${request.requestedAmount.toString()}`,
    );
  }

  switch (update.status) {
    case "pending":
      if (update.addAvailable === 0n) throw invalidUpdate(request, "a pending update must add an available amount");
      if (hasMessage) throw invalidUpdate(request, "a pending update cannot carry an error message");
      break;
    case "success":
      if (hasMessage) throw invalidUpdate(request, "a success update cannot carry an error message");
      if (sourced !== request.requestedAmount) {
        throw invalidUpdate(
          request,
          `success requires the full ${request.requestedAmount.toString()} to be sourced, got ${sourced.toString()}`,
        );
      }
      break;
    case "failed":
      if (!hasMessage) throw invalidUpdate(request, "a failed update requires an error message");
      if (update.addAvailable !== 0n) throw invalidUpdate(request, "a failed update cannot add an available amount");
      break;
  }
}

/**
 * Apply a backend update: source more funds, complete, or fail a
 * pending request.
 */
export function updateWithdrawRequestStatus(
  ctx: OperationContext,
  walletId: WalletId,
  requestId: number,
  update: WithdrawRequestUpdate,
): WithdrawRequest {
  requireWallet(ctx.tx.wallets, walletId);
  const request = requireRequest(ctx.tx, walletId, requestId);

  if (isTerminalStatus(request.status)) {
    throw new VaultError(
      "INVALID_STATE_TRANSITION",
      `Request ${String(requestId)} is ${request.status}; cannot move to ${update.status}`,
    );
  }
  if (update.expectedVersion !== undefined && update.expectedVersion !== request.version) {
    throw new VaultError(
      "CONCURRENT_MODIFICATION",
      `Request ${String(requestId)} is at version ${String(request.version)}, expected ${String(update.expectedVersion)}`,
    );
  }
  assertUpdateShape(request, update);

  const asset = requireAsset(ctx.tx.assets, request.assetId);
  let totalReservedAmount = asset.totalReservedAmount;
  let availableAmount = request.availableAmount;

  if (update.addAvailable > 0n) {
    const idle = idleLiquidity(asset);
    if (update.addAvailable > idle) {
      throw new VaultError(
        "INSUFFICIENT_LIQUIDITY",
        `Only ${idle.toString()} ${asset.assetId} is idle, cannot reserve ${update.addAvailable.toString()}`,
      );
    }
    totalReservedAmount += update.addAvailable;
    availableAmount += update.addAvailable;
  }

  if (update.status === "failed") {
    totalReservedAmount = checkedSub(
      totalReservedAmount,
      availableAmount,
      `${asset.assetId} totalReservedAmount`,
    );
    availableAmount = 0n;
  }

  const updated: WithdrawRequest = {
    ...request,
    availableAmount,
    status: update.status,
    errorMessage: update.status === "failed" ? update.errorMessage.trim() : "",
    updatedAt: ctx.timestamp,
    version: request.version + 1,
  };

  ctx.tx.requests.put(requestKey(walletId, requestId), updated);
  if (totalReservedAmount !== asset.totalReservedAmount) {
    ctx.tx.assets.put(asset.assetId, { ...asset, totalReservedAmount });
  }

  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.WITHDRAW_REQUEST_UPDATED, {
    walletId,
    assetId: request.assetId,
    requestId,
    status: updated.status,
    addAvailable: update.addAvailable.toString(),
    availableAmount: updated.availableAmount.toString(),
    settledAmount: updated.settledAmount.toString(),
    errorMessage: updated.errorMessage,
    version: updated.version,
  } satisfies WithdrawRequestUpdatedPayload);

  return updated;
}

// =============================================================================
// Settlement
// =============================================================================

/**
 * Withdraw everything the backend has sourced for the wallet's requests
 * in `assetId`, pending or already successful.
 */
export function withdrawRequestedAmount(
  ctx: OperationContext,
  principal: Principal,
  walletId: WalletId,
  assetId: AssetId,
): WithdrawResult {
  const wallet = requireOwnedWallet(ctx.tx, walletId, principal);
  const asset = requireAsset(ctx.tx.assets, assetId);

  const settling = ctx.tx.requests
    .scan(requestPrefix(walletId))
    .filter((r) => r.assetId === assetId && r.status !== "failed" && r.availableAmount > 0n);
  const amount = settling.reduce((sum, r) => sum + r.availableAmount, 0n);
  if (amount === 0n) {
    throw new VaultError(
      "NO_AVAILABLE_AMOUNT",
      `Wallet "${walletId}" has nothing available to withdraw in ${assetId}`,
    );
  }

  const current = accountAssetOf(wallet, assetId);
  const shares = sharesForWithdrawal(asset, amount);
  const burned = burnShares(current, asset, shares, amount);
  const position: AccountAsset = {
    ...burned.position,
    withdrawnAmount: burned.position.withdrawnAmount + amount,
  };
  const updatedAsset = {
    ...burned.asset,
    totalReservedAmount: checkedSub(
      burned.asset.totalReservedAmount,
      amount,
      `${assetId} totalReservedAmount`,
    ),
  };

  for (const request of settling) {
    const settledAmount = request.settledAmount + request.availableAmount;
    ctx.tx.requests.put(requestKey(walletId, request.requestId), {
      ...request,
      availableAmount: 0n,
      settledAmount,
      status: settledAmount === request.requestedAmount ? "success" : request.status,
      updatedAt: ctx.timestamp,
      version: request.version + 1,
    });
  }
  ctx.tx.wallets.put(walletId, withAccountAsset(wallet, assetId, position));
  ctx.tx.assets.put(assetId, updatedAsset);
  ctx.custody.transfer(assetId, ctx.config.vaultAccount, wallet.owner, amount);

  const requestIds = settling.map((r) => r.requestId);
  stageRecord(ctx, walletStream(walletId), VAULT_EVENTS.WITHDRAWAL_RECORDED, {
    walletId,
    assetId,
    amount: amount.toString(),
    sharesBurned: shares.toString(),
    path: "request",
    requestIds,
  } satisfies WithdrawalRecordedPayload);

  return {
    walletId,
    assetId,
    amount,
    sharesBurned: shares,
    requestIds,
    position,
    asset: updatedAsset,
  };
}

// =============================================================================
// Queries
// =============================================================================

export function listWithdrawRequests(
  tx: StoreTransaction,
  walletId: WalletId,
  filter: WithdrawRequestFilter = {},
): readonly WithdrawRequest[] {
  return tx.requests
    .scan(requestPrefix(walletId))
    .filter(
      (r) =>
        (filter.status === undefined || r.status === filter.status) &&
        (filter.assetId === undefined || r.assetId === filter.assetId),
    );
}

export function withdrawalState(
  tx: StoreTransaction,
  walletId: WalletId,
  assetId: AssetId,
): WithdrawalState {
  requireWallet(tx.wallets, walletId);
  const requests = listWithdrawRequests(tx, walletId, { assetId });
  const pending = requests.filter((r) => r.status === "pending");

  return {
    requestedAmount: pending.reduce((sum, r) => sum + r.requestedAmount, 0n),
    availableAmount: pending.reduce((sum, r) => sum + r.availableAmount, 0n),
    settledAmount: pending.reduce((sum, r) => sum + r.settledAmount, 0n),
    isSettled: pending.length === 0,
    requests,
  };
}
