/**
 * @tidepool/vault — Pooled-asset vault.
 *
 * Users deposit assets and receive LP shares priced at
 * totalAmount / totalLpShares. Withdrawals are instant from idle
 * liquidity or deferred through backend-sourced requests. Principal
 * can be deployed to strategies; their interest is split between the
 * depositor, a multi-level referral chain and the protocol.
 *
 * Design rules:
 * - Authorization is checked before any state is touched
 * - Every operation commits atomically or not at all
 * - Records are emitted after commit and never roll state back
 */

// Top-level vault
export { Vault } from "./vault.js";
export type { VaultDependencies } from "./vault.js";

// Collaborators
export { RoleAuthorizer, requireCapability, requireOwnedWallet } from "./authorization.js";
export { InMemoryCustody, CustodyError } from "./custody.js";
export type { CustodyErrorCode } from "./custody.js";
export { StrategyRegistry, InMemoryStrategy } from "./strategy.js";
export { FixedRateSwapVenue } from "./swap-venue.js";

// Subsystems
export {
  positionValue,
  outstandingClaims,
  burnShares,
  mintShares,
} from "./positions.js";
export { pendingReferralFees } from "./rewards.js";

// Types
export { VaultError } from "./types.js";
export type {
  VaultErrorCode,
  Capability,
  Authorizer,
  CustodyGateway,
  Strategy,
  StrategyTransfer,
  InterestQuery,
  SwapOrder,
  SwapVenue,
  VaultConfig,
  VaultRecord,
  RecordErrorHandler,
  WithdrawRequestUpdate,
  WithdrawalState,
  WithdrawRequestFilter,
  DepositResult,
  WithdrawResult,
  SwapResult,
  ClaimResult,
  StrategyDepositResult,
  StrategyWithdrawResult,
} from "./types.js";
