/**
 * Property-Based Tests for @tidepool/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY valid input:
 *
 * 1. Share monotonicity (more deposited never mints fewer shares)
 * 2. Round-trip bound (deposit then redeem never returns more than deposited)
 * 3. Burn cost covers payout (sharesForWithdrawal pays at least the amount)
 * 4. Yield never lowers the exchange rate
 * 5. parse → format → parse is the identity
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  sharesForDeposit,
  amountForShares,
  sharesForWithdrawal,
} from "../src/exchange-rate.js";
import type { PoolTotals } from "../src/exchange-rate.js";
import { parseAmount, formatAmount } from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

const arbAmount = fc.bigInt({ min: 1n, max: 10n ** 24n });

/**
 * A priced pool: shares outstanding and a backing amount of at least
 * one unit per share (yield only ever raises the rate).
 */
const arbPool: fc.Arbitrary<PoolTotals> = fc
  .tuple(fc.bigInt({ min: 1n, max: 10n ** 24n }), fc.bigInt({ min: 0n, max: 10n ** 24n }))
  .map(([totalLpShares, yieldAmount]) => ({
    totalLpShares,
    totalAmount: totalLpShares + yieldAmount,
  }));

// =============================================================================
// Properties
// =============================================================================

describe("property: share monotonicity", () => {
  it("a larger deposit never mints fewer shares", () => {
    fc.assert(
      fc.property(arbPool, arbAmount, arbAmount, (pool, a, b) => {
        const [small, large] = a <= b ? [a, b] : [b, a];
        expect(sharesForDeposit(pool, small) <= sharesForDeposit(pool, large)).toBe(true);
      }),
      { numRuns: 300 },
    );
  });
});

describe("property: round-trip bound", () => {
  it("depositing then redeeming the minted shares returns at most the deposit", () => {
    fc.assert(
      fc.property(arbPool, arbAmount, (pool, amount) => {
        const shares = sharesForDeposit(pool, amount);
        const after: PoolTotals = {
          totalAmount: pool.totalAmount + amount,
          totalLpShares: pool.totalLpShares + shares,
        };
        expect(amountForShares(after, shares) <= amount).toBe(true);
      }),
      { numRuns: 300 },
    );
  });

  it("the first deposit round-trips exactly", () => {
    fc.assert(
      fc.property(arbAmount, (amount) => {
        const shares = sharesForDeposit({ totalAmount: 0n, totalLpShares: 0n }, amount);
        expect(amountForShares({ totalAmount: amount, totalLpShares: shares }, shares)).toBe(amount);
      }),
    );
  });
});

describe("property: burn cost covers payout", () => {
  it("burning sharesForWithdrawal(x) is worth at least x", () => {
    fc.assert(
      fc.property(arbPool, arbAmount, (pool, amount) => {
        fc.pre(amount <= pool.totalAmount);
        const burned = sharesForWithdrawal(pool, amount);
        expect(burned <= pool.totalLpShares).toBe(true);
        expect(amountForShares(pool, burned) >= amount).toBe(true);
      }),
      { numRuns: 300 },
    );
  });
});

describe("property: yield raises the rate", () => {
  it("adding yield never lowers the value of a share", () => {
    fc.assert(
      fc.property(arbPool, arbAmount, (pool, yieldAmount) => {
        const before = amountForShares(pool, pool.totalLpShares);
        const after = amountForShares(
          { ...pool, totalAmount: pool.totalAmount + yieldAmount },
          pool.totalLpShares,
        );
        expect(after - before).toBe(yieldAmount);
      }),
    );
  });
});

describe("property: amount string roundtrip", () => {
  it("parse → format → parse is the identity", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 10n ** 30n }), fc.integer({ min: 0, max: 18 }), (scaled, decimals) => {
        const text = formatAmount(scaled, decimals);
        expect(parseAmount(text, decimals)).toBe(scaled);
      }),
      { numRuns: 300 },
    );
  });
});
