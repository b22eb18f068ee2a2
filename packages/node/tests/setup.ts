/**
 * Test helpers for @tidepool/node.
 *
 * Builds the Hono app around a fresh VaultService with a fixed clock
 * and a known set of API keys, but no HTTP server.
 */

import type { Logger } from "pino";
import { createApp } from "../src/app.js";
import type { AppInstance } from "../src/app.js";
import { VaultService } from "../src/services/vault-service.js";
import type { VaultServiceConfig } from "../src/services/vault-service.js";
import type { ApiKeyRecord } from "../src/types/auth.js";

export const NOW = "2026-01-01T00:00:00.000Z";

export const KEYS = {
  admin: "test-admin-key",
  registrar: "test-registrar-key",
  backend: "test-backend-key",
  alice: "test-alice-key",
  bob: "test-bob-key",
} as const;

export const API_KEYS: readonly ApiKeyRecord[] = [
  { key: KEYS.admin, role: "admin", principal: "ops" },
  { key: KEYS.registrar, role: "registrar", principal: "registrar" },
  { key: KEYS.backend, role: "backend", principal: "backend" },
  { key: KEYS.alice, role: "user", principal: "alice" },
  { key: KEYS.bob, role: "user", principal: "bob" },
];

export const ALICE_WALLET = `0x${"a1".repeat(32)}`;
export const BOB_WALLET = `0x${"b2".repeat(32)}`;

export const USDC = {
  assetId: "USDC",
  symbol: "USDC",
  decimals: 6,
  minDeposit: "1",
  maxDeposit: "1000000",
  minWithdraw: "1",
  maxWithdraw: "1000000",
};

export function createTestApp(
  overrides: Partial<VaultServiceConfig> = {},
  logger?: Logger,
): AppInstance {
  const service = new VaultService(
    {
      vaultAccount: "vault",
      feeRecipient: "fee-recipient",
      systemFeeBps: 1000,
      referralPercents: [500, 200],
      maxReferralLevels: 3,
      strategies: ["aave"],
      principals: API_KEYS,
      ...overrides,
    },
    { now: () => NOW },
  );
  return createApp({ service, apiKeys: API_KEYS, logger });
}

/**
 * JSON request helper. `key` becomes the X-Api-Key header.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  key?: string,
): Request {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  if (key !== undefined) {
    headers["X-Api-Key"] = key;
  }

  const init: RequestInit = { method, headers };
  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * Register USDC, register a wallet for alice and fund her custody
 * account with 10000 units.
 */
export async function seedPool({ app }: AppInstance): Promise<void> {
  const steps: Request[] = [
    jsonRequest("/api/v1/assets", "POST", USDC, KEYS.admin),
    jsonRequest(
      "/api/v1/wallets",
      "POST",
      { walletId: ALICE_WALLET, owner: "alice" },
      KEYS.registrar,
    ),
    jsonRequest(
      "/api/v1/custody/USDC/credit",
      "POST",
      { account: "alice", amount: "10000" },
      KEYS.admin,
    ),
  ];
  for (const req of steps) {
    const res = await app.request(req);
    if (!res.ok) {
      throw new Error(`Seeding ${req.method} ${new URL(req.url).pathname} failed: ${String(res.status)}`);
    }
  }
}
