/**
 * Simulated custody routes. The node settles against in-memory custody,
 * so an operator funds accounts and prices swap routes through here.
 *
 * POST /api/v1/custody/:assetId/credit    — Mint funds into an account (admin)
 * GET  /api/v1/custody/:assetId/:account  — Account balance
 * POST /api/v1/swap-rates                 — Set a swap venue rate (admin)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { CreditCustodySchema, SwapRateSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { requireRole } from "../middleware/auth.js";
import type { VaultService } from "../services/vault-service.js";

export function createCustodyRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { custody, swapVenue, auditLog } = service;

  routes.post(
    "/custody/:assetId/credit",
    requireRole("admin"),
    validateBody(CreditCustodySchema),
    (c) => {
      const assetId = c.req.param("assetId");
      const { account, amount } = c.req.valid("json");

      custody.credit(assetId, account, amount);

      auditLog.append({
        action: "credit",
        resourceType: "custody",
        resourceId: `${assetId}/${account}`,
        actor: c.get("auth").principal,
        detail: amount.toString(),
      });
      return c.json({
        data: {
          assetId,
          account,
          balance: custody.balanceOf(assetId, account).toString(),
        },
      });
    },
  );

  routes.get("/custody/:assetId/:account", (c) => {
    const assetId = c.req.param("assetId");
    const account = c.req.param("account");
    return c.json({
      data: { assetId, account, balance: custody.balanceOf(assetId, account).toString() },
    });
  });

  routes.post("/swap-rates", requireRole("admin"), validateBody(SwapRateSchema), (c) => {
    const { fromAssetId, toAssetId, numerator, denominator } = c.req.valid("json");

    swapVenue.setRate(fromAssetId, toAssetId, numerator, denominator);

    auditLog.append({
      action: "set-rate",
      resourceType: "swap-rate",
      resourceId: `${fromAssetId}->${toAssetId}`,
      actor: c.get("auth").principal,
      detail: `${numerator.toString()}/${denominator.toString()}`,
    });
    return c.json({
      data: {
        fromAssetId,
        toAssetId,
        numerator: numerator.toString(),
        denominator: denominator.toString(),
      },
    });
  });

  return routes;
}
