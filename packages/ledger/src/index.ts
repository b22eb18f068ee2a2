/**
 * @tidepool/ledger — Share ledger for a pooled-asset vault.
 *
 * A pure TypeScript ledger with zero runtime dependencies:
 * - Unsigned bigint money math (no floating point)
 * - LP exchange-rate engine (mint/burn/price shares)
 * - Versioned keyed state store with optimistic, all-or-nothing commits
 * - Asset book and wallet account book operating inside a transaction
 *
 * Design rules:
 * - All records are readonly; every mutation stages a new record
 * - Fail-closed: invalid input throws, never silently succeeds
 * - Conversions round in favour of the pool
 */

// State store
export {
  LedgerStore,
  StoreTransaction,
  TableTransaction,
  VersionedTable,
  requestKey,
  requestPrefix,
} from "./state-store.js";

// Asset book
export {
  registerAsset,
  updateAssetConfig,
  requireAsset,
  assertDepositAllowed,
  assertWithdrawAllowed,
  idleLiquidity,
} from "./assets.js";

// Wallet book
export {
  normalizeWalletId,
  normalizeReferrerId,
  registerWallet,
  requireWallet,
  emptyAccountAsset,
  accountAssetOf,
  withAccountAsset,
  referralChain,
  assignReferrer,
} from "./wallets.js";

// Exchange rate
export {
  sharesForDeposit,
  amountForShares,
  sharesForWithdrawal,
  exchangeRate,
} from "./exchange-rate.js";
export type { PoolTotals } from "./exchange-rate.js";

// Money arithmetic
export {
  BPS_DENOMINATOR,
  parseAmount,
  formatAmount,
  assertNonNegative,
  assertPositiveAmount,
  assertBps,
  assertReferralPercents,
  checkedSub,
  mulDivFloor,
  mulDivCeil,
  applyBps,
  minAmount,
} from "./money-math.js";

// Types
export type {
  LedgerErrorCode,
  AssetConfig,
  AssetConfigPatch,
  WalletRegistration,
  ReferralLink,
} from "./types.js";

export { LedgerError } from "./types.js";
