/**
 * @tidepool/treasury domain types.
 *
 * The treasury splits strategy interest between the depositor, the
 * depositor's referral chain and the protocol:
 *
 *   interest ─┬─ netInterest            → depositor
 *             └─ systemFee ─┬─ rewards  → referrers, level by level
 *                           └─ retained → fee recipient
 *
 * All amounts are bigint base units; percentages are basis points.
 */

import type { BasisPoints, WalletId } from "@tidepool/types";

// =============================================================================
// Fee Schedule
// =============================================================================

/**
 * Fee parameters in force for one wallet.
 */
export interface FeeSchedule {
  readonly systemFeeBps: BasisPoints;
  /** Level 1 (direct referrer) first. */
  readonly referralPercents: readonly BasisPoints[];
}

/**
 * Per-wallet overrides; anything absent or empty falls back to the default.
 */
export interface FeeOverrides {
  readonly systemFeeBps?: BasisPoints | undefined;
  readonly referralPercents?: readonly BasisPoints[] | undefined;
}

// =============================================================================
// Computation
// =============================================================================

/**
 * One referrer in the chain, nearest first.
 */
export interface ReferralLevel {
  readonly level: number;
  readonly walletId: WalletId;
}

export interface FeeShareInput {
  readonly interestAmount: bigint;
  readonly systemFeeBps: BasisPoints;
  readonly referralPercents: readonly BasisPoints[];
  readonly referralChain: readonly ReferralLevel[];
}

export interface LevelReward {
  readonly level: number;
  readonly walletId: WalletId;
  readonly percent: BasisPoints;
  readonly amount: bigint;
}

/**
 * Result of splitting one interest amount.
 *
 * Invariants:
 * - netInterest + systemFee = interestAmount
 * - Σ rewards + retainedFee = systemFee
 */
export interface FeeShareResult {
  readonly interestAmount: bigint;
  readonly systemFee: bigint;
  readonly netInterest: bigint;
  readonly rewards: readonly LevelReward[];
  readonly totalRewards: bigint;
  readonly retainedFee: bigint;
}
