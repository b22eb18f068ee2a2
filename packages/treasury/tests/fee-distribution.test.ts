/**
 * Tests for the fee distribution engine.
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  computeFeeShares,
  resolveFeeSchedule,
  validateFeeSchedule,
  FeeDistributionError,
} from "../src/fee-distribution.js";
import type { FeeSchedule, ReferralLevel } from "../src/types.js";

function wallet(ch: string): string {
  return `0x${ch.repeat(64)}`;
}

function chain(...ids: string[]): ReferralLevel[] {
  return ids.map((walletId, i) => ({ level: i + 1, walletId }));
}

const DEFAULTS: FeeSchedule = { systemFeeBps: 1000, referralPercents: [500, 200] };

describe("computeFeeShares", () => {
  // ─── Splits ────────────────────────────────────────────────────────

  describe("splits", () => {
    it("pays each referral level a share of the system fee", () => {
      const result = computeFeeShares({
        interestAmount: 10_000n,
        systemFeeBps: 1000,
        referralPercents: [500, 200],
        referralChain: chain(wallet("b"), wallet("c")),
      });

      expect(result.systemFee).toBe(1000n);
      expect(result.netInterest).toBe(9000n);
      expect(result.rewards.map((r) => r.amount)).toEqual([50n, 20n]);
      expect(result.rewards.map((r) => r.walletId)).toEqual([wallet("b"), wallet("c")]);
      expect(result.totalRewards).toBe(70n);
      expect(result.retainedFee).toBe(930n);
    });

    it("keeps the share of a missing level in the retained fee", () => {
      const result = computeFeeShares({
        interestAmount: 10_000n,
        systemFeeBps: 1000,
        referralPercents: [500, 200],
        referralChain: chain(wallet("b")),
      });

      expect(result.rewards).toHaveLength(1);
      expect(result.retainedFee).toBe(950n);
    });

    it("ignores referrers beyond the configured levels", () => {
      const result = computeFeeShares({
        interestAmount: 10_000n,
        systemFeeBps: 1000,
        referralPercents: [500],
        referralChain: chain(wallet("b"), wallet("c"), wallet("d")),
      });

      expect(result.rewards.map((r) => r.level)).toEqual([1]);
      expect(result.retainedFee).toBe(950n);
    });

    it("retains the whole fee without a referrer", () => {
      const result = computeFeeShares({
        interestAmount: 777n,
        systemFeeBps: 2500,
        referralPercents: [500, 200],
        referralChain: [],
      });

      expect(result.systemFee).toBe(194n);
      expect(result.netInterest).toBe(583n);
      expect(result.retainedFee).toBe(194n);
    });

    it("rounds each reward down and leaves the dust retained", () => {
      // fee = floor(999 × 1000 / 10000) = 99; reward = floor(99 × 3333 / 10000) = 32
      const result = computeFeeShares({
        interestAmount: 999n,
        systemFeeBps: 1000,
        referralPercents: [3333],
        referralChain: chain(wallet("b")),
      });

      expect(result.systemFee).toBe(99n);
      expect(result.rewards[0]?.amount).toBe(32n);
      expect(result.retainedFee).toBe(67n);
    });

    it("charges nothing at a zero fee", () => {
      const result = computeFeeShares({
        interestAmount: 5000n,
        systemFeeBps: 0,
        referralPercents: [500],
        referralChain: chain(wallet("b")),
      });

      expect(result.netInterest).toBe(5000n);
      expect(result.rewards).toEqual([]);
      expect(result.retainedFee).toBe(0n);
    });
  });

  // ─── Validation ─────────────────────────────────────────────────────

  describe("validation", () => {
    it("rejects an out-of-range system fee", () => {
      expect(() =>
        computeFeeShares({
          interestAmount: 1n,
          systemFeeBps: 10_001,
          referralPercents: [],
          referralChain: [],
        }),
      ).toThrow(FeeDistributionError);
    });

    it("rejects referral percents over 100% in total", () => {
      expect(() => validateFeeSchedule({ systemFeeBps: 1000, referralPercents: [6000, 4001] })).toThrow(
        "Referral shares total 10001 basis points, maximum is 10000",
      );
    });

    it("rejects fractional percents", () => {
      try {
        validateFeeSchedule({ systemFeeBps: 1000, referralPercents: [12.5] });
        expect.fail("Should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(FeeDistributionError);
        if (err instanceof FeeDistributionError) {
          expect(err.code).toBe("INVALID_SHARES");
        }
      }
    });

    it("rejects negative interest", () => {
      expect(() =>
        computeFeeShares({
          interestAmount: -1n,
          systemFeeBps: 1000,
          referralPercents: [],
          referralChain: [],
        }),
      ).toThrow(/non-negative/);
    });
  });

  // ─── Properties ─────────────────────────────────────────────────────

  describe("properties", () => {
    it("conserves the interest and the system fee", () => {
      const arbPercents = fc
        .array(fc.integer({ min: 0, max: 5000 }), { maxLength: 5 })
        .filter((ps) => ps.reduce((a, b) => a + b, 0) <= 10000);

      fc.assert(
        fc.property(
          fc.bigInt({ min: 0n, max: 10n ** 24n }),
          fc.integer({ min: 0, max: 10000 }),
          arbPercents,
          fc.integer({ min: 0, max: 5 }),
          (interestAmount, systemFeeBps, referralPercents, depth) => {
            const result = computeFeeShares({
              interestAmount,
              systemFeeBps,
              referralPercents,
              referralChain: chain(...["1", "2", "3", "4", "5"].slice(0, depth).map(wallet)),
            });

            expect(result.netInterest + result.systemFee).toBe(interestAmount);
            expect(result.totalRewards + result.retainedFee).toBe(result.systemFee);
            expect(result.retainedFee >= 0n).toBe(true);
          },
        ),
        { numRuns: 300 },
      );
    });
  });
});

describe("resolveFeeSchedule", () => {
  it("uses the defaults without overrides", () => {
    expect(resolveFeeSchedule(DEFAULTS, {})).toEqual(DEFAULTS);
  });

  it("prefers wallet overrides", () => {
    expect(resolveFeeSchedule(DEFAULTS, { systemFeeBps: 0, referralPercents: [1000] })).toEqual({
      systemFeeBps: 0,
      referralPercents: [1000],
    });
  });

  it("treats an empty referral list as unset", () => {
    expect(resolveFeeSchedule(DEFAULTS, { referralPercents: [] }).referralPercents).toEqual([500, 200]);
  });
});
