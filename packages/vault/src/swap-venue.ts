/**
 * In-process SwapVenue with fixed conversion rates.
 *
 * The venue keeps its own liquidity in custody under `account` and
 * trades against vault custody: `amountIn` flows in, `amountOut` flows
 * back out.
 */

import type { AssetId } from "@tidepool/types";
import { mulDivFloor } from "@tidepool/ledger";
import { CustodyError } from "./custody.js";
import type { CustodyGateway, SwapOrder, SwapVenue } from "./types.js";
import { VaultError } from "./types.js";

interface Rate {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

export class FixedRateSwapVenue implements SwapVenue {
  private readonly _rates = new Map<string, Rate>();

  constructor(
    private readonly _custody: CustodyGateway,
    readonly account = "swap-venue",
  ) {}

  /**
   * One unit of `fromAssetId` buys `numerator / denominator` units of
   * `toAssetId`.
   */
  setRate(fromAssetId: AssetId, toAssetId: AssetId, numerator: bigint, denominator: bigint): void {
    if (numerator <= 0n || denominator <= 0n) {
      throw new VaultError("INVALID_SWAP", "Swap rate terms must be positive");
    }
    this._rates.set(pairKey(fromAssetId, toAssetId), { numerator, denominator });
  }

  quote(fromAssetId: AssetId, toAssetId: AssetId, amountIn: bigint): bigint {
    const rate = this._rates.get(pairKey(fromAssetId, toAssetId));
    if (rate === undefined) {
      throw new VaultError("SWAP_UNAVAILABLE", `No route from "${fromAssetId}" to "${toAssetId}"`);
    }
    return mulDivFloor(amountIn, rate.numerator, rate.denominator);
  }

  execute(order: SwapOrder): void {
    const liquidity = this._custody.balanceOf(order.toAssetId, this.account);
    if (liquidity < order.amountOut) {
      throw new CustodyError(
        "INSUFFICIENT_BALANCE",
        `Venue holds ${liquidity.toString()} ${order.toAssetId}, cannot deliver ${order.amountOut.toString()}`,
      );
    }
    this._custody.transfer(order.fromAssetId, order.vaultAccount, this.account, order.amountIn);
    this._custody.transfer(order.toAssetId, this.account, order.vaultAccount, order.amountOut);
  }
}

function pairKey(fromAssetId: AssetId, toAssetId: AssetId): string {
  return `${fromAssetId}->${toAssetId}`;
}
