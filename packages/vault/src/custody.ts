/**
 * Custody — in-process reference implementation of CustodyGateway.
 *
 * Balances are keyed by (assetId, account). Funds enter only through
 * `credit`, which stands in for an external deposit.
 */

import type { AssetId } from "@tidepool/types";
import type { CustodyGateway } from "./types.js";

export type CustodyErrorCode = "INSUFFICIENT_BALANCE" | "INVALID_TRANSFER";

export class CustodyError extends Error {
  public readonly code: CustodyErrorCode;
  constructor(code: CustodyErrorCode, message: string) {
    super(message);
    this.name = "CustodyError";
    this.code = code;
  }
}

export class InMemoryCustody implements CustodyGateway {
  private readonly _balances = new Map<string, bigint>();

  balanceOf(assetId: AssetId, account: string): bigint {
    return this._balances.get(key(assetId, account)) ?? 0n;
  }

  credit(assetId: AssetId, account: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new CustodyError("INVALID_TRANSFER", `Credit must be positive, got ${amount.toString()}`);
    }
    this._balances.set(key(assetId, account), this.balanceOf(assetId, account) + amount);
  }

  transfer(assetId: AssetId, from: string, to: string, amount: bigint): void {
    if (amount < 0n) {
      throw new CustodyError("INVALID_TRANSFER", `Transfer must be non-negative, got ${amount.toString()}`);
    }
    if (amount === 0n || from === to) return;

    const available = this.balanceOf(assetId, from);
    if (available < amount) {
      throw new CustodyError(
        "INSUFFICIENT_BALANCE",
        `"${from}" holds ${available.toString()} ${assetId}, cannot transfer ${amount.toString()}`,
      );
    }
    this._balances.set(key(assetId, from), available - amount);
    this._balances.set(key(assetId, to), this.balanceOf(assetId, to) + amount);
  }
}

function key(assetId: AssetId, account: string): string {
  return `${assetId}\u0000${account}`;
}
