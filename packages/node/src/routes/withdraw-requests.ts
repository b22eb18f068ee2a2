/**
 * Deferred withdrawal routes.
 *
 * POST  /api/v1/wallets/:walletId/withdraw-requests                  — Open a request (owner)
 * GET   /api/v1/wallets/:walletId/withdraw-requests                  — List requests
 * GET   /api/v1/wallets/:walletId/withdraw-requests/:requestId       — Get a single request
 * PATCH /api/v1/wallets/:walletId/withdraw-requests/:requestId       — Source funds or fail (backend)
 * POST  /api/v1/wallets/:walletId/withdraw-requests/:assetId/settle  — Withdraw sourced funds (owner)
 * GET   /api/v1/wallets/:walletId/withdrawal-state/:assetId          — Aggregated request amounts
 */

import { Hono } from "hono";
import type { Context } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AssetAmountSchema,
  ListWithdrawRequestsQuerySchema,
  UpdateWithdrawRequestSchema,
} from "../types/dto.js";
import { validateBody, validateQuery } from "../middleware/validate.js";
import { createErrorEnvelope } from "../types/error.js";
import { toJson } from "../types/serialize.js";
import type { VaultService } from "../services/vault-service.js";

const REQUEST_ID = /^[1-9][0-9]{0,8}$/;

function invalidRequestId(c: Context<AppEnv>, raw: string): Response {
  return c.json(
    createErrorEnvelope("VALIDATION_ERROR", `Request ID must be a positive integer, got "${raw}"`),
    400,
  );
}

export function createWithdrawRequestRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();
  const { vault, auditLog } = service;

  routes.post("/:walletId/withdraw-requests", validateBody(AssetAmountSchema), (c) => {
    const actor = c.get("auth").principal;
    const { assetId, amount } = c.req.valid("json");

    const request = vault.requestWithdraw(actor, c.req.param("walletId"), assetId, amount);

    auditLog.append({
      action: "request-withdraw",
      resourceType: "withdraw-request",
      resourceId: `${request.walletId}/${request.requestId}`,
      actor,
      detail: `${amount.toString()} ${assetId}`,
    });
    return c.json({ data: toJson(request) }, 201);
  });

  routes.get(
    "/:walletId/withdraw-requests",
    validateQuery(ListWithdrawRequestsQuerySchema),
    (c) => {
      const requests = vault.listWithdrawRequests(c.req.param("walletId"), c.req.valid("query"));
      return c.json({ data: toJson(requests) });
    },
  );

  routes.get("/:walletId/withdraw-requests/:requestId", (c) => {
    const raw = c.req.param("requestId");
    if (!REQUEST_ID.test(raw)) {
      return invalidRequestId(c, raw);
    }
    const request = vault.getWithdrawRequest(c.req.param("walletId"), Number(raw));
    return c.json({ data: toJson(request) });
  });

  routes.patch(
    "/:walletId/withdraw-requests/:requestId",
    validateBody(UpdateWithdrawRequestSchema),
    (c) => {
      const actor = c.get("auth").principal;
      const raw = c.req.param("requestId");
      if (!REQUEST_ID.test(raw)) {
        return invalidRequestId(c, raw);
      }

      const request = vault.updateWithdrawRequestStatus(
        actor,
        c.req.param("walletId"),
        Number(raw),
        c.req.valid("json"),
      );

      auditLog.append({
        action: "update-withdraw-request",
        resourceType: "withdraw-request",
        resourceId: `${request.walletId}/${request.requestId}`,
        actor,
        detail: request.status,
      });
      return c.json({ data: toJson(request) });
    },
  );

  routes.post("/:walletId/withdraw-requests/:assetId/settle", (c) => {
    const actor = c.get("auth").principal;
    const assetId = c.req.param("assetId");

    const result = vault.withdrawRequestedAmount(actor, c.req.param("walletId"), assetId);

    auditLog.append({
      action: "settle-withdraw-requests",
      resourceType: "wallet",
      resourceId: result.walletId,
      actor,
      detail: `${result.amount.toString()} ${assetId}`,
    });
    return c.json({ data: toJson(result) });
  });

  routes.get("/:walletId/withdrawal-state/:assetId", (c) => {
    const state = vault.getWithdrawalState(c.req.param("walletId"), c.req.param("assetId"));
    return c.json({ data: toJson(state) });
  });

  return routes;
}
