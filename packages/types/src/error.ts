/**
 * Error taxonomy shared across packages.
 *
 * Each package throws its own error class with a string `code`.
 * The category decides how a caller should react:
 *
 * - validation:     bad input, rejected before any mutation; retry with corrected input
 * - authorization:  caller lacks the capability or does not own the wallet
 * - not-found:      the referenced entity does not exist
 * - state-conflict: current state forbids the operation; wait or take another path
 * - invariant:      a core bug; never reachable through valid input
 */

export type ErrorCategory =
  | "validation"
  | "authorization"
  | "not-found"
  | "state-conflict"
  | "invariant";

const CATEGORY_BY_CODE: Readonly<Record<string, ErrorCategory>> = {
  // validation
  INVALID_AMOUNT: "validation",
  INVALID_WALLET_ID: "validation",
  INVALID_ASSET_CONFIG: "validation",
  INVALID_PERCENTS: "validation",
  INVALID_SHARES: "validation",
  INVALID_REFERRER: "validation",
  INVALID_STATUS_UPDATE: "validation",
  INVALID_SWAP: "validation",
  INVALID_TRANSFER: "validation",
  AMOUNT_OUT_OF_RANGE: "validation",
  ASSET_NOT_SUPPORTED: "validation",
  VALIDATION_ERROR: "validation",
  INVALID_STREAM_ID: "validation",
  INVALID_VERSION: "validation",
  EMPTY_APPEND: "validation",

  // authorization
  NOT_AUTHORIZED: "authorization",

  // not-found
  WALLET_NOT_FOUND: "not-found",
  REFERRER_NOT_FOUND: "not-found",
  REQUEST_NOT_FOUND: "not-found",
  STRATEGY_NOT_FOUND: "not-found",

  // state-conflict
  ASSET_EXISTS: "state-conflict",
  WALLET_EXISTS: "state-conflict",
  REFERRER_ALREADY_SET: "state-conflict",
  DEPOSIT_DISABLED: "state-conflict",
  WITHDRAW_DISABLED: "state-conflict",
  INSUFFICIENT_SHARES: "state-conflict",
  INSUFFICIENT_FUND: "state-conflict",
  INSUFFICIENT_LIQUIDITY: "state-conflict",
  INSUFFICIENT_IDLE_LIQUIDITY: "state-conflict",
  INSUFFICIENT_BALANCE: "state-conflict",
  INVALID_STATE_TRANSITION: "state-conflict",
  NO_AVAILABLE_AMOUNT: "state-conflict",
  NO_PENDING_REWARDS: "state-conflict",
  CONCURRENT_MODIFICATION: "state-conflict",
  STRATEGY_EXISTS: "state-conflict",
  SWAP_UNAVAILABLE: "state-conflict",

  // invariant
  INVARIANT_VIOLATION: "invariant",
};

/**
 * Classify an error code. Unknown codes are treated as invariant
 * violations so they never leak details to callers.
 */
export function errorCategory(code: string): ErrorCategory {
  return CATEGORY_BY_CODE[code] ?? "invariant";
}
