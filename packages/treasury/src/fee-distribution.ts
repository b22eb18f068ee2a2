/**
 * Fee Distribution Engine — system fee and multi-level referral rewards.
 *
 * Splits an interest amount into:
 * - netInterest: what the depositor keeps
 * - systemFee: floor(interest × systemFeeBps / 10000)
 * - one reward per referral level: floor(systemFee × percent[i] / 10000)
 * - retainedFee: whatever of the system fee is not paid as rewards
 *
 * Rules:
 * - Basis points are integers in [0, 10000]; referral percents sum to ≤ 10000
 * - A missing referrer pays nothing; its share stays in the retained fee
 * - Rounding dust stays in the retained fee
 * - Pure computation: no state, no I/O
 */

import { applyBps } from "@tidepool/ledger";
import type { BasisPoints } from "@tidepool/types";
import type {
  FeeOverrides,
  FeeSchedule,
  FeeShareInput,
  FeeShareResult,
  LevelReward,
} from "./types.js";

// =============================================================================
// Error
// =============================================================================

export type FeeDistributionErrorCode = "INVALID_SHARES" | "INVALID_AMOUNT";

export class FeeDistributionError extends Error {
  public readonly code: FeeDistributionErrorCode;
  constructor(code: FeeDistributionErrorCode, message: string) {
    super(message);
    this.name = "FeeDistributionError";
    this.code = code;
  }
}

// =============================================================================
// Validation
// =============================================================================

function assertShare(value: BasisPoints, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 10000) {
    throw new FeeDistributionError(
      "INVALID_SHARES",
      `${label} must be an integer between 0 and 10000 basis points, got ${String(value)}`,
    );
  }
}

/**
 * Validate a fee schedule: system fee and every level in range, and
 * referral percents totalling at most 10000 basis points.
 */
export function validateFeeSchedule(schedule: FeeSchedule): void {
  assertShare(schedule.systemFeeBps, "systemFeeBps");

  let total = 0;
  schedule.referralPercents.forEach((p, i) => {
    assertShare(p, `referral level ${String(i + 1)}`);
    total += p;
  });
  if (total > 10000) {
    throw new FeeDistributionError(
      "INVALID_SHARES",
      `Referral shares total ${String(total)} basis points, maximum is 10000`,
    );
  }
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * The schedule in force for a wallet: its own values where set,
 * the default otherwise. An empty referral list means "use default".
 */
export function resolveFeeSchedule(
  defaults: FeeSchedule,
  overrides: FeeOverrides,
): FeeSchedule {
  const referralPercents =
    overrides.referralPercents !== undefined && overrides.referralPercents.length > 0
      ? overrides.referralPercents
      : defaults.referralPercents;

  return {
    systemFeeBps: overrides.systemFeeBps ?? defaults.systemFeeBps,
    referralPercents,
  };
}

// =============================================================================
// Computation
// =============================================================================

/**
 * Split `interestAmount` into net interest, level rewards and retained fee.
 */
export function computeFeeShares(input: FeeShareInput): FeeShareResult {
  validateFeeSchedule(input);
  if (input.interestAmount < 0n) {
    throw new FeeDistributionError(
      "INVALID_AMOUNT",
      `Interest must be non-negative, got ${input.interestAmount.toString()}`,
    );
  }

  const systemFee = applyBps(input.interestAmount, input.systemFeeBps);
  const netInterest = input.interestAmount - systemFee;

  const rewards: LevelReward[] = [];
  let totalRewards = 0n;
  const levels = Math.min(input.referralPercents.length, input.referralChain.length);

  for (let i = 0; i < levels; i++) {
    const referrer = input.referralChain[i];
    const percent = input.referralPercents[i];
    if (referrer === undefined || percent === undefined) break;

    const amount = applyBps(systemFee, percent);
    if (amount === 0n) continue;

    rewards.push({ level: referrer.level, walletId: referrer.walletId, percent, amount });
    totalRewards += amount;
  }

  return {
    interestAmount: input.interestAmount,
    systemFee,
    netInterest,
    rewards,
    totalRewards,
    retainedFee: systemFee - totalRewards,
  };
}
