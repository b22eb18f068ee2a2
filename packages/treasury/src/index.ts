/**
 * @tidepool/treasury — Fee and referral reward distribution.
 *
 * Pure computation over bigint base units:
 * - System fee on strategy interest
 * - Multi-level referral rewards carved from the system fee
 * - Retained fee for the protocol
 */

export {
  computeFeeShares,
  resolveFeeSchedule,
  validateFeeSchedule,
  FeeDistributionError,
} from "./fee-distribution.js";
export type { FeeDistributionErrorCode } from "./fee-distribution.js";

export type {
  FeeSchedule,
  FeeOverrides,
  ReferralLevel,
  FeeShareInput,
  FeeShareResult,
  LevelReward,
} from "./types.js";
