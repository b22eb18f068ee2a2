/**
 * Authentication middleware.
 *
 * Looks the X-Api-Key header up in the configured key registry.
 * On success, sets `c.set("auth", authContext)`; otherwise 401.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, Role } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

export function authMiddleware(config: AuthConfig): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const apiKey = c.req.header(API_KEY_HEADER);
    if (apiKey === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Authentication required"),
        401,
      );
    }

    const record = config.apiKeys.get(apiKey);
    if (record === undefined) {
      return c.json(
        createErrorEnvelope("UNAUTHORIZED", "Invalid API key"),
        401,
      );
    }

    c.set("auth", { type: "api-key", principal: record.principal, role: record.role });
    return next();
  };
}

/**
 * Guard for endpoints outside the vault's own capability checks
 * (audit log, custody simulation). Must run AFTER authMiddleware.
 */
export function requireRole(...roles: Role[]): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!roles.includes(auth.role)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' may not access this endpoint`,
        ),
        403,
      );
    }
    return next();
  };
}
