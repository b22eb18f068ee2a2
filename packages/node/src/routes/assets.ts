/**
 * Asset routes.
 *
 * GET   /api/v1/assets                 — List registered assets
 * GET   /api/v1/assets/:assetId        — Asset state plus exchange rate
 * POST  /api/v1/assets                 — Register an asset (asset-admin)
 * PATCH /api/v1/assets/:assetId        — Update limits and gates (asset-admin)
 * POST  /api/v1/assets/:assetId/yield  — Inject pool-wide yield (backend)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { InjectYieldSchema, RegisterAssetSchema, UpdateAssetSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { toJson } from "../types/serialize.js";
import type { VaultService } from "../services/vault-service.js";

export function createAssetRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { vault, auditLog } = service;

  routes.get("/", (c) => {
    return c.json({ data: toJson(vault.getAssets()) });
  });

  routes.get("/:assetId", (c) => {
    const assetId = c.req.param("assetId");
    const asset = vault.getAsset(assetId);
    if (asset === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Asset "${assetId}" not found`), 404);
    }
    return c.json({
      data: toJson({ ...asset, exchangeRate: vault.exchangeRate(assetId) }),
    });
  });

  routes.post("/", validateBody(RegisterAssetSchema), (c) => {
    const actor = c.get("auth").principal;
    const body = c.req.valid("json");

    const asset = vault.registerAsset(actor, body);

    auditLog.append({
      action: "register",
      resourceType: "asset",
      resourceId: asset.assetId,
      actor,
    });
    return c.json({ data: toJson(asset) }, 201);
  });

  routes.patch("/:assetId", validateBody(UpdateAssetSchema), (c) => {
    const actor = c.get("auth").principal;
    const assetId = c.req.param("assetId");

    const asset = vault.updateAsset(actor, assetId, c.req.valid("json"));

    auditLog.append({ action: "update", resourceType: "asset", resourceId: assetId, actor });
    return c.json({ data: toJson(asset) });
  });

  routes.post("/:assetId/yield", validateBody(InjectYieldSchema), (c) => {
    const actor = c.get("auth").principal;
    const assetId = c.req.param("assetId");
    const { amount } = c.req.valid("json");

    const asset = vault.injectYield(actor, assetId, amount);

    auditLog.append({
      action: "inject-yield",
      resourceType: "asset",
      resourceId: assetId,
      actor,
      detail: amount.toString(),
    });
    return c.json({
      data: toJson({ ...asset, exchangeRate: vault.exchangeRate(assetId) }),
    });
  });

  return routes;
}
