/**
 * Strategies — open registry of yield sources keyed by tag, plus an
 * in-process reference strategy backed by custody.
 */

import type { AssetId, WalletId } from "@tidepool/types";
import { CustodyError } from "./custody.js";
import type { InMemoryCustody } from "./custody.js";
import type { InterestQuery, Strategy, StrategyTransfer } from "./types.js";
import { VaultError } from "./types.js";

// =============================================================================
// Registry
// =============================================================================

export class StrategyRegistry {
  private readonly _strategies = new Map<string, Strategy>();

  register(strategy: Strategy): void {
    if (this._strategies.has(strategy.tag)) {
      throw new VaultError("STRATEGY_EXISTS", `Strategy already registered: "${strategy.tag}"`);
    }
    this._strategies.set(strategy.tag, strategy);
  }

  get(tag: string): Strategy | undefined {
    return this._strategies.get(tag);
  }

  require(tag: string): Strategy {
    const strategy = this._strategies.get(tag);
    if (strategy === undefined) {
      throw new VaultError("STRATEGY_NOT_FOUND", `Strategy not found: "${tag}"`);
    }
    return strategy;
  }

  tags(): readonly string[] {
    return [...this._strategies.keys()].sort();
  }
}

// =============================================================================
// In-memory strategy
// =============================================================================

interface Holding {
  principal: bigint;
  interest: bigint;
}

/**
 * Holds deployed funds in its own custody account, `strategy:<tag>`.
 * Interest appears only when a test or operator calls `accrue`.
 */
export class InMemoryStrategy implements Strategy {
  readonly account: string;
  private readonly _holdings = new Map<string, Holding>();

  constructor(
    readonly tag: string,
    private readonly _custody: InMemoryCustody,
  ) {
    this.account = `strategy:${tag}`;
  }

  async deposit(transfer: StrategyTransfer): Promise<void> {
    this._custody.transfer(
      transfer.assetId,
      transfer.vaultAccount,
      this.account,
      transfer.amount + transfer.interestAmount,
    );
    const holding = this._holding(transfer.walletId, transfer.assetId);
    holding.principal += transfer.amount;
    holding.interest += transfer.interestAmount;
  }

  async withdraw(transfer: StrategyTransfer): Promise<void> {
    const holding = this._holding(transfer.walletId, transfer.assetId);
    if (transfer.amount > holding.principal) {
      throw new CustodyError(
        "INSUFFICIENT_BALANCE",
        `Strategy "${this.tag}" holds ${holding.principal.toString()} ${transfer.assetId} principal for "${transfer.walletId}", cannot return ${transfer.amount.toString()}`,
      );
    }
    this._custody.transfer(
      transfer.assetId,
      this.account,
      transfer.vaultAccount,
      transfer.amount + transfer.interestAmount,
    );
    holding.principal -= transfer.amount;
    holding.interest =
      transfer.interestAmount >= holding.interest ? 0n : holding.interest - transfer.interestAmount;
  }

  async reportInterest(query: InterestQuery): Promise<bigint> {
    return this._holding(query.walletId, query.assetId).interest;
  }

  /** Simulate yield earned on a wallet's deployed principal. */
  accrue(walletId: WalletId, assetId: AssetId, amount: bigint): void {
    this._custody.credit(assetId, this.account, amount);
    this._holding(walletId, assetId).interest += amount;
  }

  principalOf(walletId: WalletId, assetId: AssetId): bigint {
    return this._holding(walletId, assetId).principal;
  }

  private _holding(walletId: WalletId, assetId: AssetId): Holding {
    const key = `${walletId}:${assetId}`;
    const holding = this._holdings.get(key) ?? { principal: 0n, interest: 0n };
    this._holdings.set(key, holding);
    return holding;
  }
}
