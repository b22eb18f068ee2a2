/**
 * Record log query routes.
 *
 * GET /api/v1/records            — All records (cursor pagination)
 * GET /api/v1/records/:streamId  — Records of one stream
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { paginate } from "../types/pagination.js";
import { ListRecordsQuerySchema, ListStreamRecordsQuerySchema } from "../types/dto.js";
import { validateQuery } from "../middleware/validate.js";
import { toJson } from "../types/serialize.js";
import type { VaultService } from "../services/vault-service.js";

export function createRecordRoutes(service: VaultService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", validateQuery(ListRecordsQuerySchema), (c) => {
    const query = c.req.valid("query");
    const records = service.readAllRecords(query.afterPosition);

    const result = paginate(
      records,
      { cursor: query.cursor, limit: query.limit },
      (r) => r.globalPosition,
      "globalPosition",
    );

    return c.json({ data: toJson(result.data), pagination: result.pagination });
  });

  routes.get("/:streamId", validateQuery(ListStreamRecordsQuerySchema), (c) => {
    const query = c.req.valid("query");
    const records = service.readStreamRecords(c.req.param("streamId"), query.afterVersion);

    const result = paginate(
      records,
      { cursor: query.cursor, limit: query.limit },
      (r) => r.version,
      "version",
    );

    return c.json({ data: toJson(result.data), pagination: result.pagination });
  });

  return routes;
}
