/**
 * Runtime Type Guards
 *
 * Narrowing functions for vault domain types.
 * Used where untyped input enters: request bodies, wallet ids and
 * record payloads checked by the event catalog.
 */

import type { WalletId, WithdrawStatus } from "./vault.js";

// =============================================================================
// Identifier guards
// =============================================================================

const WALLET_ID_PATTERN = /^0x[0-9a-f]{64}$/;

/**
 * True for a normalised 32-byte wallet id ("0x" + 64 lowercase hex chars).
 */
export function isWalletId(value: unknown): value is WalletId {
  return typeof value === "string" && WALLET_ID_PATTERN.test(value);
}

/**
 * True for the all-zero wallet id, which stands for "no referrer".
 */
export function isZeroWalletId(value: string): boolean {
  return /^(0x)?0{64}$/i.test(value);
}

// =============================================================================
// Amount guards
// =============================================================================

/** Decimal-digit string representing an unsigned base-unit amount. */
export function isAmountString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

/** Integer in [0, 10000]. */
export function isBasisPoints(value: unknown): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= 10000
  );
}

// =============================================================================
// Withdraw request guards
// =============================================================================

const WITHDRAW_STATUSES = new Set<string>(["pending", "success", "failed"]);

export function isWithdrawStatus(value: unknown): value is WithdrawStatus {
  return typeof value === "string" && WITHDRAW_STATUSES.has(value);
}

export function isTerminalStatus(status: WithdrawStatus): boolean {
  return status !== "pending";
}
