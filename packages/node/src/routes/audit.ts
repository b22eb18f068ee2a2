/**
 * GET /api/v1/audit — Audit log, newest first (admin only).
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AuditQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { requireRole } from "../middleware/auth.js";
import type { AuditLog } from "../services/audit-log.js";

export function createAuditRoutes(auditLog: AuditLog): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requireRole("admin"), validateQuery(AuditQuerySchema), (c) => {
    const entries = auditLog.query(c.req.valid("query"));
    return c.json({ data: entries, total: auditLog.size });
  });

  return routes;
}
