/**
 * @tidepool/ledger — Deterministic unsigned monetary arithmetic.
 *
 * All arithmetic uses bigint base units.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are never negative; an underflow is an invariant violation
 * - Division rounds down unless the caller asks for ceiling
 */

import { isBasisPoints } from "@tidepool/types";
import { LedgerError } from "./types.js";

/** 10000 basis points = 100%. */
export const BPS_DENOMINATOR = 10_000n;

// ─── Conversions ─────────────────────────────────────────────────────────

/**
 * Parse an unsigned decimal string into base units scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the asset allows ${String(decimals)}`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

/**
 * Format base units as a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 5n with decimals=6 → "0.000005"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  assertNonNegative(scaled, "amount");
  if (decimals === 0) {
    return scaled.toString();
  }

  const str = scaled.toString().padStart(decimals + 1, "0");
  return `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
}

// ─── Guards ──────────────────────────────────────────────────────────────

export function assertNonNegative(value: bigint, label: string): void {
  if (value < 0n) {
    throw new LedgerError(
      "INVARIANT_VIOLATION",
      `${label} would become negative (${value.toString()})`,
    );
  }
}

/**
 * Reject zero or negative caller-supplied amounts.
 */
export function assertPositiveAmount(value: bigint, label = "amount"): void {
  if (value <= 0n) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `${label} must be positive, got ${value.toString()}`,
    );
  }
}

/**
 * Validate a basis-point value (integer in [0, 10000]).
 */
export function assertBps(value: number, label: string): void {
  if (!isBasisPoints(value)) {
    throw new LedgerError(
      "INVALID_PERCENTS",
      `${label} must be an integer between 0 and 10000, got ${String(value)}`,
    );
  }
}

/**
 * Validate a referral schedule: each level in range, total ≤ 100%.
 */
export function assertReferralPercents(percents: readonly number[]): void {
  let total = 0;
  percents.forEach((p, i) => {
    assertBps(p, `referral level ${String(i + 1)}`);
    total += p;
  });
  if (total > 10000) {
    throw new LedgerError(
      "INVALID_PERCENTS",
      `Referral percents total ${String(total)} basis points, maximum is 10000`,
    );
  }
}

// ─── Arithmetic ──────────────────────────────────────────────────────────

/**
 * a - b, throwing an invariant violation instead of going negative.
 */
export function checkedSub(a: bigint, b: bigint, label: string): bigint {
  const result = a - b;
  assertNonNegative(result, label);
  return result;
}

/** floor(a * b / denominator) */
export function mulDivFloor(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new LedgerError("INVARIANT_VIOLATION", "Division by a non-positive denominator");
  }
  return (a * b) / denominator;
}

/** ceil(a * b / denominator) */
export function mulDivCeil(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) {
    throw new LedgerError("INVARIANT_VIOLATION", "Division by a non-positive denominator");
  }
  const product = a * b;
  const quotient = product / denominator;
  return product % denominator === 0n ? quotient : quotient + 1n;
}

/** floor(amount * bps / 10000) */
export function applyBps(amount: bigint, bps: number): bigint {
  return mulDivFloor(amount, BigInt(bps), BPS_DENOMINATOR);
}

export function minAmount(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
