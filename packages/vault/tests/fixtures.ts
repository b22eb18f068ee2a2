/**
 * Shared test fixtures for the vault package.
 */

import { InMemoryEventStore } from "@tidepool/event-store";
import type { EventStore } from "@tidepool/event-store";
import type { AssetConfig } from "@tidepool/ledger";
import { Vault } from "../src/vault.js";
import type { VaultDependencies } from "../src/vault.js";
import { RoleAuthorizer } from "../src/authorization.js";
import { InMemoryCustody } from "../src/custody.js";
import { InMemoryStrategy, StrategyRegistry } from "../src/strategy.js";
import { FixedRateSwapVenue } from "../src/swap-venue.js";
import type { VaultConfig } from "../src/types.js";

// ─── Principals and wallets ──────────────────────────────────────────────

export const ADMIN = "admin";
export const BACKEND = "backend-service";
export const REGISTRAR = "registrar";
export const ALICE = "alice";
export const BOB = "bob";
export const CAROL = "carol";
export const DAVE = "dave";

export function wid(ch: string): string {
  return `0x${ch.repeat(64)}`;
}

export const W_ALICE = wid("a");
export const W_BOB = wid("b");
export const W_CAROL = wid("c");
export const W_DAVE = wid("d");

export const USDC = "USDC";
export const ETH = "ETH";
export const TS = "2026-01-01T00:00:00.000Z";

export const CONFIG: VaultConfig = {
  vaultAccount: "vault",
  feeRecipient: "fee-recipient",
  defaultFees: { systemFeeBps: 1000, referralPercents: [500, 200] },
  maxReferralLevels: 3,
};

export const USDC_CONFIG: AssetConfig = {
  assetId: USDC,
  symbol: "USDC",
  decimals: 6,
  minDeposit: 1n,
  maxDeposit: 10n ** 12n,
  minWithdraw: 1n,
  maxWithdraw: 10n ** 12n,
};

export const ETH_CONFIG: AssetConfig = {
  assetId: ETH,
  symbol: "ETH",
  decimals: 18,
  minDeposit: 1n,
  maxDeposit: 10n ** 24n,
  minWithdraw: 1n,
  maxWithdraw: 10n ** 24n,
};

// ─── Harness ─────────────────────────────────────────────────────────────

export interface Harness {
  readonly vault: Vault;
  readonly custody: InMemoryCustody;
  readonly records: EventStore;
  readonly strategy: InMemoryStrategy;
  readonly venue: FixedRateSwapVenue;
}

export function createHarness(overrides: Partial<VaultDependencies> = {}): Harness {
  const custody = new InMemoryCustody();
  const records = overrides.records ?? new InMemoryEventStore({ now: () => TS });
  const strategies = overrides.strategies ?? new StrategyRegistry();
  const strategy = new InMemoryStrategy("lending", custody);
  strategies.register(strategy);
  const venue = new FixedRateSwapVenue(custody);

  let ids = 0;
  const vault = new Vault(CONFIG, {
    authorizer: new RoleAuthorizer({
      [ADMIN]: ["asset-admin", "registration", "backend"],
      [BACKEND]: ["backend"],
      [REGISTRAR]: ["registration"],
    }),
    custody,
    swapVenue: venue,
    now: () => TS,
    newId: () => `id-${String(++ids)}`,
    ...overrides,
    records,
    strategies,
  });

  return { vault, custody, records, strategy, venue };
}

/**
 * USDC registered; alice, bob and carol registered with 10 000 USDC of
 * custody each. No referral links.
 */
export function createFundedHarness(overrides: Partial<VaultDependencies> = {}): Harness {
  const h = createHarness(overrides);
  h.vault.registerAsset(ADMIN, USDC_CONFIG);
  for (const [walletId, owner] of [
    [W_ALICE, ALICE],
    [W_BOB, BOB],
    [W_CAROL, CAROL],
  ] as const) {
    h.vault.registerWallet(REGISTRAR, { walletId, owner });
    h.custody.credit(USDC, owner, 10_000n);
  }
  return h;
}

/**
 * The error code of whatever `fn` throws, or undefined if it does not.
 */
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof Error && "code" in err && typeof err.code === "string") {
      return err.code;
    }
    throw err;
  }
  return undefined;
}
