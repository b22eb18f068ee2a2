/**
 * @tidepool/ledger — LP exchange-rate engine.
 *
 * Converts between asset amounts and LP shares at the rate
 * totalAmount / totalLpShares. The first depositor of an asset
 * receives one share per unit.
 *
 * Every conversion rounds in favour of the pool: minting and payouts
 * round down, burns for an exact payout round up. Residual dust stays
 * in the pool.
 */

import type { AssetState } from "@tidepool/types";
import { formatAmount, mulDivCeil, mulDivFloor } from "./money-math.js";
import { LedgerError } from "./types.js";

/** The two totals the rate depends on. */
export type PoolTotals = Pick<AssetState, "totalAmount" | "totalLpShares">;

const RATE_DECIMALS = 18;
const RATE_SCALE = 10n ** BigInt(RATE_DECIMALS);

function assertPricedPool(pool: PoolTotals): void {
  if (pool.totalAmount <= 0n) {
    throw new LedgerError(
      "INVARIANT_VIOLATION",
      `Pool has ${pool.totalLpShares.toString()} shares outstanding but no backing amount`,
    );
  }
}

/**
 * Shares minted for depositing `amount`. Rounds down.
 */
export function sharesForDeposit(pool: PoolTotals, amount: bigint): bigint {
  if (pool.totalLpShares === 0n) {
    return amount;
  }
  assertPricedPool(pool);
  return mulDivFloor(amount, pool.totalLpShares, pool.totalAmount);
}

/**
 * Amount paid out for burning `shares`. Rounds down.
 */
export function amountForShares(pool: PoolTotals, shares: bigint): bigint {
  if (shares === 0n) {
    return 0n;
  }
  if (shares > pool.totalLpShares) {
    throw new LedgerError(
      "INVARIANT_VIOLATION",
      `Cannot price ${shares.toString()} shares against ${pool.totalLpShares.toString()} outstanding`,
    );
  }
  return mulDivFloor(shares, pool.totalAmount, pool.totalLpShares);
}

/**
 * Shares that must be burned to pay out exactly `amount`. Rounds up.
 */
export function sharesForWithdrawal(pool: PoolTotals, amount: bigint): bigint {
  if (amount === 0n) {
    return 0n;
  }
  if (pool.totalLpShares === 0n) {
    throw new LedgerError("INVARIANT_VIOLATION", "No shares outstanding to burn");
  }
  assertPricedPool(pool);
  return mulDivCeil(amount, pool.totalLpShares, pool.totalAmount);
}

/**
 * Units of asset per share as an 18-decimal string ("1.000000000000000000"
 * for an empty pool).
 */
export function exchangeRate(pool: PoolTotals): string {
  if (pool.totalLpShares === 0n) {
    return formatAmount(RATE_SCALE, RATE_DECIMALS);
  }
  return formatAmount(
    mulDivFloor(pool.totalAmount, RATE_SCALE, pool.totalLpShares),
    RATE_DECIMALS,
  );
}
