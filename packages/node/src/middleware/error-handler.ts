/**
 * Global error handler.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response. Domain errors carry a `code`;
 * its category decides the HTTP status:
 *
 *   validation → 400, authorization → 403, not-found → 404,
 *   state-conflict → 409 (422 when funds or liquidity are short),
 *   invariant → 500 with the message hidden.
 *
 * Authorization failures are written to the audit log.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import type { Logger } from "pino";
import { errorCategory } from "@tidepool/types";
import type { ErrorCategory } from "@tidepool/types";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import type { AuditLog } from "../services/audit-log.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_BY_CATEGORY: Record<ErrorCategory, ContentfulStatusCode> = {
  validation: 400,
  authorization: 403,
  "not-found": 404,
  "state-conflict": 409,
  invariant: 500,
};

/** Short of funds or liquidity: the request was fine, the balance was not. */
const UNPROCESSABLE = new Set([
  "INSUFFICIENT_FUND",
  "INSUFFICIENT_SHARES",
  "INSUFFICIENT_LIQUIDITY",
  "INSUFFICIENT_IDLE_LIQUIDITY",
  "INSUFFICIENT_BALANCE",
]);

export function statusForCode(code: string): ContentfulStatusCode {
  if (UNPROCESSABLE.has(code)) {
    return 422;
  }
  return STATUS_BY_CATEGORY[errorCategory(code)];
}

function codeOf(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Handler
// =============================================================================

export interface ErrorHandlerDeps {
  readonly logger: Logger;
  readonly auditLog: AuditLog;
}

/**
 * Create the handler registered as Hono's onError.
 */
export function createErrorHandler(deps: ErrorHandlerDeps) {
  return (err: Error, c: Context<AppEnv>): Response => {
    const log = deps.logger.child({ requestId: c.get("requestId") });

    if (err instanceof HTTPException) {
      // Hono raises these for malformed request bodies
      if (err.status >= 500) {
        log.error({ err }, "HTTP exception");
        return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
      }
      return c.json(createErrorEnvelope("VALIDATION_ERROR", err.message), 400);
    }

    const code = codeOf(err);
    if (code === undefined) {
      log.error({ err }, "Unhandled error");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    const status = statusForCode(code);
    if (status === 500) {
      log.error({ err, code }, "Invariant violation");
      return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
    }

    if (status === 403) {
      const principal = c.get("auth")?.principal ?? "anonymous";
      log.warn({ code, principal, path: c.req.path }, err.message);
      deps.auditLog.append({
        action: "denied",
        resourceType: "request",
        resourceId: `${c.req.method} ${c.req.path}`,
        actor: principal,
        detail: err.message,
      });
    }

    return c.json(createErrorEnvelope(code, err.message), status);
  };
}
