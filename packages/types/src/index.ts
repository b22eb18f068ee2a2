/**
 * @tidepool/types — Shared domain types for the Tidepool vault stack.
 *
 * These types are used across all Tidepool packages:
 * - Asset and wallet ledger records
 * - Withdraw requests
 * - Record (event) architecture
 * - Error taxonomy
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Vault records
export type {
  WalletId,
  AssetId,
  Principal,
  BasisPoints,
  AssetState,
  AccountAsset,
  WalletAccount,
  WithdrawStatus,
  WithdrawRequest,
} from "./vault.js";

// Event types
export type {
  DomainEvent,
  EventMetadata,
  EventSource,
} from "./event.js";

// Error taxonomy
export { errorCategory } from "./error.js";
export type { ErrorCategory } from "./error.js";

// Runtime type guards
export {
  isWalletId,
  isZeroWalletId,
  isAmountString,
  isBasisPoints,
  isWithdrawStatus,
  isTerminalStatus,
} from "./guards.js";
