/**
 * Tests for the versioned state store.
 *
 * Covers:
 * - Staged writes visible inside the transaction only
 * - All-or-nothing commit
 * - Optimistic conflict detection on stale reads
 * - Prefix scans merged with staged writes
 * - Per-wallet request key index
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { WithdrawRequest } from "@tidepool/types";
import { LedgerStore, VersionedTable, requestKey, requestPrefix } from "../src/state-store.js";
import { registerAsset } from "../src/assets.js";
import type { AssetConfig } from "../src/types.js";
import { LedgerError } from "../src/types.js";

const TS = "2024-01-01T00:00:00.000Z";
const WALLET = `0x${"a".repeat(64)}`;

const USDC: AssetConfig = {
  assetId: "USDC",
  symbol: "USDC",
  decimals: 6,
  minDeposit: 1n,
  maxDeposit: 1_000_000n,
  minWithdraw: 1n,
  maxWithdraw: 1_000_000n,
};

function request(requestId: number): WithdrawRequest {
  return {
    requestId,
    walletId: WALLET,
    assetId: "USDC",
    requestedAmount: 100n,
    availableAmount: 0n,
    settledAmount: 0n,
    status: "pending",
    requestedAt: TS,
    updatedAt: TS,
    errorMessage: "",
    version: 1,
  };
}

describe("LedgerStore", () => {
  let store: LedgerStore;

  beforeEach(() => {
    store = new LedgerStore();
  });

  it("hides staged writes until commit", () => {
    const tx = store.begin();
    registerAsset(tx.assets, USDC, TS);
    expect(tx.assets.get("USDC")?.symbol).toBe("USDC");
    expect(store.assets.get("USDC")).toBeUndefined();

    store.commit(tx);
    expect(store.assets.get("USDC")?.symbol).toBe("USDC");
    expect(store.assets.versionOf("USDC")).toBe(1);
  });

  it("discards every write when the work throws", () => {
    expect(() =>
      store.transaction((tx) => {
        registerAsset(tx.assets, USDC, TS);
        throw new Error("boom");
      }),
    ).toThrow("boom");
    expect(store.assets.size).toBe(0);
  });

  it("rejects a commit whose reads went stale", () => {
    store.transaction((tx) => registerAsset(tx.assets, USDC, TS));

    const slow = store.begin();
    const asset = slow.assets.get("USDC");
    expect(asset).toBeDefined();

    store.transaction((tx) => {
      const current = tx.assets.get("USDC");
      if (current !== undefined) {
        tx.assets.put("USDC", { ...current, totalAmount: 5n });
      }
    });

    if (asset !== undefined) {
      slow.assets.put("USDC", { ...asset, totalAmount: 9n });
    }
    expect(() => store.commit(slow)).toThrow(LedgerError);
    expect(() => store.commit(slow)).toThrow(/assets\/USDC/);
    expect(store.assets.get("USDC")?.totalAmount).toBe(5n);
  });

  it("detects a concurrent insert of a key read as absent", () => {
    const a = store.begin();
    const b = store.begin();
    registerAsset(a.assets, USDC, TS);
    registerAsset(b.assets, USDC, TS);

    store.commit(a);
    expect(() => store.commit(b)).toThrow(/concurrent operation/);
  });

  it("commits independent transactions", () => {
    const a = store.begin();
    const b = store.begin();
    registerAsset(a.assets, USDC, TS);
    registerAsset(b.assets, { ...USDC, assetId: "DAI", symbol: "DAI" }, TS);

    store.commit(a);
    store.commit(b);
    expect(store.assets.keys()).toEqual(["DAI", "USDC"]);
  });

  it("runs async work before committing", async () => {
    const result = await store.transactionAsync(async (tx) => {
      await Promise.resolve();
      registerAsset(tx.assets, USDC, TS);
      return "done";
    });
    expect(result).toBe("done");
    expect(store.assets.has("USDC")).toBe(true);
  });

  it("scans by prefix in request order, including staged rows", () => {
    store.transaction((tx) => {
      tx.requests.put(requestKey(WALLET, 2), request(2));
      tx.requests.put(requestKey(WALLET, 10), request(10));
    });

    const tx = store.begin();
    tx.requests.put(requestKey(WALLET, 1), request(1));
    tx.requests.put(`0x${"b".repeat(64)}:000000000001`, { ...request(1), walletId: "other" });

    const ids = tx.requests.scan(requestPrefix(WALLET)).map((r) => r.requestId);
    expect(ids).toEqual([1, 2, 10]);
  });

  it("pads request keys", () => {
    expect(requestKey(WALLET, 7)).toBe(`${WALLET}:000000000007`);
  });
});

describe("VersionedTable key groups", () => {
  const OTHER = `0x${"b".repeat(64)}`;

  it("answers a wallet prefix from its own keys", () => {
    const store = new LedgerStore();
    store.transaction((tx) => {
      tx.requests.put(requestKey(WALLET, 10), request(10));
      tx.requests.put(requestKey(OTHER, 1), { ...request(1), walletId: OTHER });
      tx.requests.put(requestKey(WALLET, 2), request(2));
    });
    store.transaction((tx) => {
      tx.requests.put(requestKey(WALLET, 2), { ...request(2), status: "failed" });
    });

    expect(store.requests.keysWithPrefix(requestPrefix(WALLET))).toEqual([
      requestKey(WALLET, 2),
      requestKey(WALLET, 10),
    ]);
    expect(store.requests.keysWithPrefix(requestPrefix(OTHER))).toEqual([requestKey(OTHER, 1)]);
    expect(store.requests.keysWithPrefix(requestPrefix(`0x${"c".repeat(64)}`))).toEqual([]);
  });

  it("falls back to filtering for prefixes that are not groups", () => {
    const table = new VersionedTable<number>("plain");
    table.write("usdc", 1);
    table.write("usdt", 2);
    table.write("dai", 3);

    expect(table.keysWithPrefix("us")).toEqual(["usdc", "usdt"]);
  });
});
