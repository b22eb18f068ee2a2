/**
 * @tidepool/ledger — Ledger-specific types and errors.
 *
 * Rules:
 * - All records are readonly
 * - Fail-closed: invalid input throws, never silently succeeds
 */

import type { AssetId, BasisPoints, Principal, WalletId } from "@tidepool/types";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVARIANT_VIOLATION"
  | "CONCURRENT_MODIFICATION"
  | "ASSET_NOT_SUPPORTED"
  | "ASSET_EXISTS"
  | "INVALID_ASSET_CONFIG"
  | "DEPOSIT_DISABLED"
  | "WITHDRAW_DISABLED"
  | "AMOUNT_OUT_OF_RANGE"
  | "INVALID_WALLET_ID"
  | "INVALID_PERCENTS"
  | "WALLET_EXISTS"
  | "WALLET_NOT_FOUND"
  | "REFERRER_NOT_FOUND"
  | "REFERRER_ALREADY_SET"
  | "INVALID_REFERRER";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Asset Registration ──────────────────────────────────────────────────

/**
 * Configuration supplied when an asset is first registered.
 */
export interface AssetConfig {
  readonly assetId: AssetId;
  readonly symbol: string;
  readonly decimals: number;
  readonly minDeposit: bigint;
  readonly maxDeposit: bigint;
  readonly minWithdraw: bigint;
  readonly maxWithdraw: bigint;
  readonly enabledForDeposit?: boolean | undefined;
  readonly enabledForWithdraw?: boolean | undefined;
}

/**
 * Mutable subset of an asset's configuration.
 */
export interface AssetConfigPatch {
  readonly minDeposit?: bigint | undefined;
  readonly maxDeposit?: bigint | undefined;
  readonly minWithdraw?: bigint | undefined;
  readonly maxWithdraw?: bigint | undefined;
  readonly enabledForDeposit?: boolean | undefined;
  readonly enabledForWithdraw?: boolean | undefined;
}

// ─── Wallet Registration ─────────────────────────────────────────────────

export interface WalletRegistration {
  /** Raw wallet id; normalised on registration. */
  readonly walletId: string;
  readonly owner: Principal;
  /** Empty, undefined or all-zero means no referrer. */
  readonly referrerId?: string | undefined;
  readonly referralPercents?: readonly BasisPoints[] | undefined;
  readonly systemFeeBps?: BasisPoints | undefined;
}

/**
 * One hop of a referral chain, nearest referrer first.
 */
export interface ReferralLink {
  readonly level: number;
  readonly walletId: WalletId;
}
