/**
 * @tidepool/vault domain types.
 *
 * The vault coordinates the ledger, the record log and three external
 * collaborators, each modelled as an interface:
 * - CustodyGateway: moves real funds between accounts
 * - Strategy:       yield source that principal can be deployed to
 * - SwapVenue:      converts one asset into another
 *
 * Amounts are bigint base units throughout.
 */

import type {
  AccountAsset,
  AssetId,
  AssetState,
  EventSource,
  Principal,
  WalletId,
  WithdrawRequest,
  WithdrawStatus,
} from "@tidepool/types";
import type { FeeSchedule, FeeShareResult } from "@tidepool/treasury";
import type { VaultEventType } from "@tidepool/event-store";

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "NOT_AUTHORIZED"
  | "INVALID_AMOUNT"
  | "INVALID_STATUS_UPDATE"
  | "INVALID_SWAP"
  | "INSUFFICIENT_SHARES"
  | "INSUFFICIENT_FUND"
  | "INSUFFICIENT_LIQUIDITY"
  | "INSUFFICIENT_IDLE_LIQUIDITY"
  | "INVALID_STATE_TRANSITION"
  | "NO_AVAILABLE_AMOUNT"
  | "NO_PENDING_REWARDS"
  | "REQUEST_NOT_FOUND"
  | "STRATEGY_NOT_FOUND"
  | "STRATEGY_EXISTS"
  | "SWAP_UNAVAILABLE"
  | "CONCURRENT_MODIFICATION"
  | "INVARIANT_VIOLATION";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  constructor(code: VaultErrorCode, message: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
  }
}

// =============================================================================
// Authorization
// =============================================================================

/**
 * Capabilities granted to principals. Wallet owners need none: owner
 * operations are checked against `WalletAccount.owner` instead.
 */
export type Capability = "asset-admin" | "registration" | "backend";

export interface Authorizer {
  authorize(principal: Principal, capability: Capability): boolean;
}

// =============================================================================
// Collaborators
// =============================================================================

/**
 * Moves funds between custody accounts. A transfer either completes
 * or throws; it never partially applies.
 */
export interface CustodyGateway {
  transfer(assetId: AssetId, from: string, to: string, amount: bigint): void;
  balanceOf(assetId: AssetId, account: string): bigint;
}

/**
 * Funds moving between the vault and a strategy on behalf of a wallet.
 * On withdraw the strategy pays `amount + interestAmount` into
 * `vaultAccount`; on deposit it takes the same sum from it.
 */
export interface StrategyTransfer {
  readonly walletId: WalletId;
  readonly assetId: AssetId;
  readonly amount: bigint;
  readonly interestAmount: bigint;
  readonly vaultAccount: string;
}

export interface InterestQuery {
  readonly walletId: WalletId;
  readonly assetId: AssetId;
}

/**
 * A pluggable yield source, registered under a unique tag.
 */
export interface Strategy {
  readonly tag: string;
  deposit(transfer: StrategyTransfer): Promise<void>;
  withdraw(transfer: StrategyTransfer): Promise<void>;
  /** Interest accrued for the wallet and not yet withdrawn. */
  reportInterest(query: InterestQuery): Promise<bigint>;
}

export interface SwapOrder {
  readonly fromAssetId: AssetId;
  readonly toAssetId: AssetId;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  readonly vaultAccount: string;
}

/**
 * Quotes and settles asset conversions against vault custody.
 * `execute` delivers exactly `order.amountOut` or throws.
 */
export interface SwapVenue {
  quote(fromAssetId: AssetId, toAssetId: AssetId, amountIn: bigint): bigint;
  execute(order: SwapOrder): void;
}

// =============================================================================
// Configuration
// =============================================================================

export interface VaultConfig {
  /** Custody account holding pooled funds. */
  readonly vaultAccount: string;
  /** Custody account receiving the retained system fee. */
  readonly feeRecipient: string;
  /** Applies wherever a wallet has no override. */
  readonly defaultFees: FeeSchedule;
  readonly maxReferralLevels: number;
}

// =============================================================================
// Records
// =============================================================================

/**
 * A record staged by an operation, appended to the log after commit.
 */
export interface VaultRecord {
  readonly streamId: string;
  readonly type: VaultEventType;
  readonly source: EventSource;
  readonly payload: Readonly<Record<string, unknown>>;
}

export type RecordErrorHandler = (error: unknown, record: VaultRecord) => void;

// =============================================================================
// Withdraw Requests
// =============================================================================

export interface WithdrawRequestUpdate {
  readonly status: WithdrawStatus;
  readonly addAvailable: bigint;
  readonly errorMessage: string;
  /** Rejects the update if the stored request version differs. */
  readonly expectedVersion?: number | undefined;
}

/**
 * Amounts aggregated over the pending requests of one wallet and asset.
 */
export interface WithdrawalState {
  readonly requestedAmount: bigint;
  readonly availableAmount: bigint;
  readonly settledAmount: bigint;
  /** True when no pending request remains. */
  readonly isSettled: boolean;
  readonly requests: readonly WithdrawRequest[];
}

export interface WithdrawRequestFilter {
  readonly status?: WithdrawStatus | undefined;
  readonly assetId?: AssetId | undefined;
}

// =============================================================================
// Operation Results
// =============================================================================

export interface DepositResult {
  readonly walletId: WalletId;
  readonly assetId: AssetId;
  readonly amount: bigint;
  readonly sharesMinted: bigint;
  readonly position: AccountAsset;
  readonly asset: AssetState;
}

export interface WithdrawResult {
  readonly walletId: WalletId;
  readonly assetId: AssetId;
  readonly amount: bigint;
  readonly sharesBurned: bigint;
  /** Requests settled by this withdrawal; empty for instant withdrawals. */
  readonly requestIds: readonly number[];
  readonly position: AccountAsset;
  readonly asset: AssetState;
}

export interface SwapResult {
  readonly walletId: WalletId;
  readonly fromAssetId: AssetId;
  readonly toAssetId: AssetId;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
  readonly sharesBurned: bigint;
  readonly sharesMinted: bigint;
}

export interface ClaimResult {
  readonly walletId: WalletId;
  readonly assetId: AssetId;
  readonly amount: bigint;
}

export interface StrategyDepositResult {
  readonly walletId: WalletId;
  readonly assetId: AssetId;
  readonly strategyTag: string;
  readonly amount: bigint;
  readonly position: AccountAsset;
  readonly asset: AssetState;
}

export interface StrategyWithdrawResult {
  readonly walletId: WalletId;
  readonly assetId: AssetId;
  readonly strategyTag: string;
  readonly amount: bigint;
  readonly fees: FeeShareResult;
  readonly sharesMinted: bigint;
  readonly position: AccountAsset;
  readonly asset: AssetState;
}
