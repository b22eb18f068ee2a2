/**
 * Wallet routes.
 *
 * POST /api/v1/wallets                                   — Register a wallet (registration)
 * GET  /api/v1/wallets/:walletId                         — Wallet with its positions
 * POST /api/v1/wallets/:walletId/referrer                — Assign a referrer (registration)
 * POST /api/v1/wallets/:walletId/deposit                 — Deposit (owner)
 * POST /api/v1/wallets/:walletId/withdraw                — Instant withdraw by amount (owner)
 * POST /api/v1/wallets/:walletId/redeem                  — Instant withdraw by shares (owner)
 * POST /api/v1/wallets/:walletId/swap                    — Convert a position (owner)
 * GET  /api/v1/wallets/:walletId/rewards                 — Pending referral rewards
 * POST /api/v1/wallets/:walletId/rewards/:assetId/claim  — Claim rewards (owner)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AssetAmountSchema,
  AssignReferrerSchema,
  RedeemSchema,
  RegisterWalletSchema,
  SwapSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { toJson } from "../types/serialize.js";
import type { VaultService } from "../services/vault-service.js";

export function createWalletRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { vault, auditLog } = service;

  // ─── Registration ───────────────────────────────────────────────

  routes.post("/", validateBody(RegisterWalletSchema), (c) => {
    const actor = c.get("auth").principal;
    const wallet = vault.registerWallet(actor, c.req.valid("json"));

    auditLog.append({
      action: "register",
      resourceType: "wallet",
      resourceId: wallet.walletId,
      actor,
    });
    return c.json({ data: toJson(wallet) }, 201);
  });

  routes.get("/:walletId", (c) => {
    const walletId = c.req.param("walletId");
    const wallet = vault.getWallet(walletId);
    if (wallet === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Wallet "${walletId}" not found`), 404);
    }
    return c.json({ data: toJson(wallet) });
  });

  routes.post("/:walletId/referrer", validateBody(AssignReferrerSchema), (c) => {
    const actor = c.get("auth").principal;
    const { referrerId } = c.req.valid("json");

    const wallet = vault.assignReferrer(actor, c.req.param("walletId"), referrerId);

    auditLog.append({
      action: "assign-referrer",
      resourceType: "wallet",
      resourceId: wallet.walletId,
      actor,
      detail: wallet.referrerId,
    });
    return c.json({ data: toJson(wallet) });
  });

  // ─── Positions ──────────────────────────────────────────────────

  routes.post("/:walletId/deposit", validateBody(AssetAmountSchema), (c) => {
    const actor = c.get("auth").principal;
    const { assetId, amount } = c.req.valid("json");

    const result = vault.deposit(actor, c.req.param("walletId"), assetId, amount);

    auditLog.append({
      action: "deposit",
      resourceType: "wallet",
      resourceId: result.walletId,
      actor,
      detail: `${amount.toString()} ${assetId}`,
    });
    return c.json({ data: toJson(result) });
  });

  routes.post("/:walletId/withdraw", validateBody(AssetAmountSchema), (c) => {
    const actor = c.get("auth").principal;
    const { assetId, amount } = c.req.valid("json");

    const result = vault.withdraw(actor, c.req.param("walletId"), assetId, amount);

    auditLog.append({
      action: "withdraw",
      resourceType: "wallet",
      resourceId: result.walletId,
      actor,
      detail: `${result.amount.toString()} ${assetId}`,
    });
    return c.json({ data: toJson(result) });
  });

  routes.post("/:walletId/redeem", validateBody(RedeemSchema), (c) => {
    const actor = c.get("auth").principal;
    const { assetId, shares } = c.req.valid("json");

    const result = vault.redeem(actor, c.req.param("walletId"), assetId, shares);

    auditLog.append({
      action: "withdraw",
      resourceType: "wallet",
      resourceId: result.walletId,
      actor,
      detail: `${result.amount.toString()} ${assetId}`,
    });
    return c.json({ data: toJson(result) });
  });

  routes.post("/:walletId/swap", validateBody(SwapSchema), (c) => {
    const actor = c.get("auth").principal;
    const { fromAssetId, toAssetId, amountIn } = c.req.valid("json");

    const result = vault.swap(actor, c.req.param("walletId"), fromAssetId, toAssetId, amountIn);

    auditLog.append({
      action: "swap",
      resourceType: "wallet",
      resourceId: result.walletId,
      actor,
      detail: `${result.amountIn.toString()} ${fromAssetId} -> ${result.amountOut.toString()} ${toAssetId}`,
    });
    return c.json({ data: toJson(result) });
  });

  // ─── Referral Rewards ───────────────────────────────────────────

  routes.get("/:walletId/rewards", (c) => {
    return c.json({ data: toJson(vault.getPendingReferralFees(c.req.param("walletId"))) });
  });

  routes.post("/:walletId/rewards/:assetId/claim", (c) => {
    const actor = c.get("auth").principal;

    const result = vault.claimReferralRewards(
      actor,
      c.req.param("walletId"),
      c.req.param("assetId"),
    );

    auditLog.append({
      action: "claim-rewards",
      resourceType: "wallet",
      resourceId: result.walletId,
      actor,
      detail: `${result.amount.toString()} ${result.assetId}`,
    });
    return c.json({ data: toJson(result) });
  });

  return routes;
}
