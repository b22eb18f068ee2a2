/**
 * @tidepool/ledger — Wallet account book.
 *
 * Wallets are registered once and keyed by a normalised 32-byte id.
 * Each wallet holds one AccountAsset per asset it has touched and an
 * optional referrer link.
 *
 * Rules:
 * - Wallet IDs are "0x" + 64 lowercase hex chars; the all-zero id is reserved
 * - A referrer is set at most once and must already be registered
 * - The referral graph stays acyclic
 */

import type {
  AccountAsset,
  AssetId,
  WalletAccount,
  WalletId,
} from "@tidepool/types";
import { isWalletId, isZeroWalletId } from "@tidepool/types";
import { assertBps, assertReferralPercents } from "./money-math.js";
import type { TableTransaction } from "./state-store.js";
import type { ReferralLink, WalletRegistration } from "./types.js";
import { LedgerError } from "./types.js";

type WalletTable = TableTransaction<WalletAccount>;

// ─── Identity ────────────────────────────────────────────────────────────

/**
 * Normalise a raw wallet id: trims, lowercases and adds the "0x" prefix.
 *
 * "ABC…" (64 hex) → "0xabc…"
 */
export function normalizeWalletId(raw: string): WalletId {
  const lowered = raw.trim().toLowerCase();
  const id = lowered.startsWith("0x") ? lowered : `0x${lowered}`;
  if (!isWalletId(id)) {
    throw new LedgerError(
      "INVALID_WALLET_ID",
      `Wallet ID must be 32 bytes of hex, got "${raw}"`,
    );
  }
  return id;
}

/**
 * Normalise an optional referrer id. Empty, undefined or all-zero ids
 * mean "no referrer".
 */
export function normalizeReferrerId(raw: string | undefined): WalletId | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const id = normalizeWalletId(raw);
  return isZeroWalletId(id) ? undefined : id;
}

// ─── Registration ────────────────────────────────────────────────────────

export function registerWallet(
  wallets: WalletTable,
  registration: WalletRegistration,
  timestamp: string,
): WalletAccount {
  const walletId = normalizeWalletId(registration.walletId);
  if (isZeroWalletId(walletId)) {
    throw new LedgerError("INVALID_WALLET_ID", "The zero wallet ID is reserved");
  }
  if (wallets.has(walletId)) {
    throw new LedgerError("WALLET_EXISTS", `Wallet already registered: "${walletId}"`);
  }

  const referralPercents = registration.referralPercents ?? [];
  assertReferralPercents(referralPercents);
  if (registration.systemFeeBps !== undefined) {
    assertBps(registration.systemFeeBps, "systemFeeBps");
  }

  const referrerId = normalizeReferrerId(registration.referrerId);
  if (referrerId !== undefined) {
    if (referrerId === walletId) {
      throw new LedgerError("INVALID_REFERRER", "A wallet cannot refer itself");
    }
    requireReferrer(wallets, referrerId);
  }

  const wallet: WalletAccount = {
    walletId,
    owner: registration.owner,
    referrerId,
    referralPercents: [...referralPercents],
    systemFeeBps: registration.systemFeeBps,
    assets: {},
    nextRequestId: 1,
    registeredAt: timestamp,
  };

  wallets.put(walletId, wallet);
  return wallet;
}

/**
 * Get a wallet or throw WALLET_NOT_FOUND.
 */
export function requireWallet(wallets: WalletTable, walletId: WalletId): WalletAccount {
  const wallet = wallets.get(walletId);
  if (wallet === undefined) {
    throw new LedgerError("WALLET_NOT_FOUND", `Wallet not found: "${walletId}"`);
  }
  return wallet;
}

function requireReferrer(wallets: WalletTable, referrerId: WalletId): WalletAccount {
  const referrer = wallets.get(referrerId);
  if (referrer === undefined) {
    throw new LedgerError("REFERRER_NOT_FOUND", `Referrer not found: "${referrerId}"`);
  }
  return referrer;
}

// ─── Per-asset positions ─────────────────────────────────────────────────

export function emptyAccountAsset(): AccountAsset {
  return {
    currentAmount: 0n,
    depositedAmount: 0n,
    lpAmount: 0n,
    swapInAmount: 0n,
    swapOutAmount: 0n,
    distributedAmount: 0n,
    withdrawnAmount: 0n,
    interestAmount: 0n,
    interestShareAmount: 0n,
    rewards: {},
  };
}

/**
 * The wallet's position in `assetId`, or an empty one if it has none yet.
 */
export function accountAssetOf(wallet: WalletAccount, assetId: AssetId): AccountAsset {
  return wallet.assets[assetId] ?? emptyAccountAsset();
}

/**
 * A copy of `wallet` with the position in `assetId` replaced.
 */
export function withAccountAsset(
  wallet: WalletAccount,
  assetId: AssetId,
  position: AccountAsset,
): WalletAccount {
  return {
    ...wallet,
    assets: { ...wallet.assets, [assetId]: position },
  };
}

// ─── Referrals ───────────────────────────────────────────────────────────

/**
 * Walk up to `maxLevels` referrers, nearest first. Stops at the first
 * wallet without a referrer.
 */
export function referralChain(
  wallets: WalletTable,
  walletId: WalletId,
  maxLevels: number,
): readonly ReferralLink[] {
  const chain: ReferralLink[] = [];
  let current = requireWallet(wallets, walletId);

  while (chain.length < maxLevels && current.referrerId !== undefined) {
    const referrer = requireWallet(wallets, current.referrerId);
    chain.push({ level: chain.length + 1, walletId: referrer.walletId });
    current = referrer;
  }
  return chain;
}

/**
 * Link `walletId` to `referrerId`. Only allowed while the wallet has no
 * referrer, and only if the link does not close a cycle.
 */
export function assignReferrer(
  wallets: WalletTable,
  walletId: WalletId,
  rawReferrerId: string,
): WalletAccount {
  const wallet = requireWallet(wallets, walletId);
  if (wallet.referrerId !== undefined) {
    throw new LedgerError(
      "REFERRER_ALREADY_SET",
      `Wallet "${walletId}" already has referrer "${wallet.referrerId}"`,
    );
  }

  const referrerId = normalizeReferrerId(rawReferrerId);
  if (referrerId === undefined) {
    throw new LedgerError("INVALID_REFERRER", "Referrer ID must not be empty or zero");
  }

  // Walk the referrer's ancestry; meeting walletId means a cycle.
  const visited = new Set<WalletId>();
  let cursor: WalletAccount | undefined = requireReferrer(wallets, referrerId);
  while (cursor !== undefined && !visited.has(cursor.walletId)) {
    if (cursor.walletId === walletId) {
      throw new LedgerError(
        "INVALID_REFERRER",
        `Assigning "${referrerId}" as referrer of "${walletId}" would create a cycle`,
      );
    }
    visited.add(cursor.walletId);
    cursor = cursor.referrerId === undefined
      ? undefined
      : requireWallet(wallets, cursor.referrerId);
  }

  const updated: WalletAccount = { ...wallet, referrerId };
  wallets.put(walletId, updated);
  return updated;
}
