/**
 * Tests for the in-process collaborators: custody, authorization,
 * strategy registry and swap venue.
 */

import { describe, it, expect } from "vitest";
import { CustodyError, InMemoryCustody } from "../src/custody.js";
import { RoleAuthorizer, requireCapability } from "../src/authorization.js";
import { InMemoryStrategy, StrategyRegistry } from "../src/strategy.js";
import { FixedRateSwapVenue } from "../src/swap-venue.js";
import { ETH, USDC, W_ALICE, codeOf } from "./fixtures.js";

describe("InMemoryCustody", () => {
  it("moves balances between accounts", () => {
    const custody = new InMemoryCustody();
    custody.credit(USDC, "alice", 100n);

    custody.transfer(USDC, "alice", "vault", 30n);

    expect(custody.balanceOf(USDC, "alice")).toBe(70n);
    expect(custody.balanceOf(USDC, "vault")).toBe(30n);
    expect(custody.balanceOf(ETH, "vault")).toBe(0n);
  });

  it("refuses overdrafts and leaves balances unchanged", () => {
    const custody = new InMemoryCustody();
    custody.credit(USDC, "alice", 10n);

    expect(() => custody.transfer(USDC, "alice", "vault", 11n)).toThrow(CustodyError);
    expect(custody.balanceOf(USDC, "alice")).toBe(10n);
    expect(custody.balanceOf(USDC, "vault")).toBe(0n);
  });

  it("treats zero transfers as no-ops and rejects negative ones", () => {
    const custody = new InMemoryCustody();

    custody.transfer(USDC, "alice", "vault", 0n);
    expect(codeOf(() => custody.transfer(USDC, "alice", "vault", -1n))).toBe("INVALID_TRANSFER");
    expect(codeOf(() => custody.credit(USDC, "alice", 0n))).toBe("INVALID_TRANSFER");
  });
});

describe("RoleAuthorizer", () => {
  it("grants and revokes capabilities", () => {
    const authorizer = new RoleAuthorizer({ ops: ["backend"] });
    authorizer.grant("ops", "asset-admin");

    expect(authorizer.capabilitiesOf("ops")).toEqual(["asset-admin", "backend"]);

    authorizer.revoke("ops", "backend");
    expect(authorizer.authorize("ops", "backend")).toBe(false);
    expect(authorizer.authorize("ops", "asset-admin")).toBe(true);
    expect(authorizer.authorize("nobody", "asset-admin")).toBe(false);
  });

  it("names the missing capability", () => {
    expect(() => requireCapability(new RoleAuthorizer(), "ops", "registration")).toThrow(
      'Principal "ops" lacks the "registration" capability',
    );
  });
});

describe("StrategyRegistry", () => {
  it("registers strategies under unique tags", () => {
    const custody = new InMemoryCustody();
    const registry = new StrategyRegistry();
    registry.register(new InMemoryStrategy("lending", custody));
    registry.register(new InMemoryStrategy("basis", custody));

    expect(registry.tags()).toEqual(["basis", "lending"]);
    expect(registry.get("lending")?.tag).toBe("lending");
    expect(registry.get("staking")).toBeUndefined();
    expect(codeOf(() => registry.register(new InMemoryStrategy("lending", custody)))).toBe(
      "STRATEGY_EXISTS",
    );
    expect(codeOf(() => registry.require("staking"))).toBe("STRATEGY_NOT_FOUND");
  });
});

describe("InMemoryStrategy", () => {
  it("tracks principal and interest per wallet", async () => {
    const custody = new InMemoryCustody();
    custody.credit(USDC, "vault", 500n);
    const strategy = new InMemoryStrategy("lending", custody);
    const transfer = { walletId: W_ALICE, assetId: USDC, amount: 400n, interestAmount: 0n, vaultAccount: "vault" };

    await strategy.deposit(transfer);
    strategy.accrue(W_ALICE, USDC, 25n);

    expect(await strategy.reportInterest({ walletId: W_ALICE, assetId: USDC })).toBe(25n);
    expect(custody.balanceOf(USDC, "strategy:lending")).toBe(425n);

    await strategy.withdraw({ ...transfer, interestAmount: 25n });

    expect(strategy.principalOf(W_ALICE, USDC)).toBe(0n);
    expect(await strategy.reportInterest({ walletId: W_ALICE, assetId: USDC })).toBe(0n);
    expect(custody.balanceOf(USDC, "vault")).toBe(525n);
  });

  it("refuses to return more principal than it holds", async () => {
    const strategy = new InMemoryStrategy("lending", new InMemoryCustody());

    await expect(
      strategy.withdraw({ walletId: W_ALICE, assetId: USDC, amount: 1n, interestAmount: 0n, vaultAccount: "vault" }),
    ).rejects.toBeInstanceOf(CustodyError);
  });
});

describe("FixedRateSwapVenue", () => {
  it("quotes at the configured rate, rounding down", () => {
    const venue = new FixedRateSwapVenue(new InMemoryCustody());
    venue.setRate(USDC, ETH, 2n, 3n);

    expect(venue.quote(USDC, ETH, 10n)).toBe(6n);
    expect(codeOf(() => venue.quote(ETH, USDC, 10n))).toBe("SWAP_UNAVAILABLE");
    expect(codeOf(() => venue.setRate(USDC, ETH, 0n, 1n))).toBe("INVALID_SWAP");
  });

  it("settles against vault custody", () => {
    const custody = new InMemoryCustody();
    custody.credit(USDC, "vault", 100n);
    custody.credit(ETH, "swap-venue", 50n);
    const venue = new FixedRateSwapVenue(custody);

    venue.execute({ fromAssetId: USDC, toAssetId: ETH, amountIn: 100n, amountOut: 50n, vaultAccount: "vault" });

    expect(custody.balanceOf(USDC, "swap-venue")).toBe(100n);
    expect(custody.balanceOf(ETH, "vault")).toBe(50n);
    expect(custody.balanceOf(ETH, "swap-venue")).toBe(0n);
  });
});
