/**
 * Strategy routes.
 *
 * GET  /api/v1/strategies                                    — Registered strategy tags
 * POST /api/v1/strategies/:tag/accrue                        — Simulate earned interest (admin)
 * POST /api/v1/wallets/:walletId/strategies/:tag/deposit     — Deploy principal (backend)
 * POST /api/v1/wallets/:walletId/strategies/:tag/withdraw    — Recall principal and interest (backend)
 */

import { Hono } from "hono";
import { z } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { AmountSchema, AssetAmountSchema, StrategyWithdrawSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireRole } from "../middleware/auth.js";
import { createErrorEnvelope } from "../types/error.js";
import { toJson } from "../types/serialize.js";
import type { VaultService } from "../services/vault-service.js";

const AccrueSchema = z.object({
  walletId: z.string().min(1),
  assetId: z.string().min(1),
  amount: AmountSchema,
});

export function createStrategyRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { vault, auditLog } = service;

  routes.get("/strategies", (c) => {
    return c.json({ data: service.strategyTags() });
  });

  routes.post(
    "/strategies/:tag/accrue",
    requireRole("admin"),
    validateBody(AccrueSchema),
    (c) => {
      const tag = c.req.param("tag");
      const { walletId, assetId, amount } = c.req.valid("json");
      const wallet = vault.getWallet(walletId);
      if (wallet === undefined) {
        return c.json(createErrorEnvelope("NOT_FOUND", `Wallet "${walletId}" not found`), 404);
      }
      if (!service.accrueInterest(tag, wallet.walletId, assetId, amount)) {
        return c.json(createErrorEnvelope("NOT_FOUND", `Strategy "${tag}" not found`), 404);
      }
      return c.json({ data: { tag, walletId: wallet.walletId, assetId, amount: amount.toString() } });
    },
  );

  routes.post(
    "/wallets/:walletId/strategies/:tag/deposit",
    validateBody(AssetAmountSchema),
    async (c) => {
      const actor = c.get("auth").principal;
      const tag = c.req.param("tag");
      const { assetId, amount } = c.req.valid("json");

      const result = await vault.depositToStrategy(
        actor,
        c.req.param("walletId"),
        assetId,
        tag,
        amount,
      );

      auditLog.append({
        action: "strategy-deposit",
        resourceType: "wallet",
        resourceId: result.walletId,
        actor,
        detail: `${amount.toString()} ${assetId} -> ${tag}`,
      });
      return c.json({ data: toJson(result) });
    },
  );

  routes.post(
    "/wallets/:walletId/strategies/:tag/withdraw",
    validateBody(StrategyWithdrawSchema),
    async (c) => {
      const actor = c.get("auth").principal;
      const tag = c.req.param("tag");
      const { assetId, amount, interestAmount } = c.req.valid("json");

      const result = await vault.withdrawFromStrategy(
        actor,
        c.req.param("walletId"),
        assetId,
        tag,
        amount,
        interestAmount,
      );

      auditLog.append({
        action: "strategy-withdraw",
        resourceType: "wallet",
        resourceId: result.walletId,
        actor,
        detail: `${amount.toString()} ${assetId} <- ${tag}`,
      });
      return c.json({ data: toJson(result) });
    },
  );

  return routes;
}
