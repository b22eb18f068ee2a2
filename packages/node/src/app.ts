/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { ApiKeyRecord } from "./types/auth.js";
import type { AppConfig } from "./config.js";
import { VaultService } from "./services/vault-service.js";
import type { VaultServiceConfig } from "./services/vault-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import {
  createAssetRoutes,
  createAuditRoutes,
  createCustodyRoutes,
  createHealthRoutes,
  createRecordRoutes,
  createStrategyRoutes,
  createWalletRoutes,
  createWithdrawRequestRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: VaultService;
  readonly apiKeys: readonly ApiKeyRecord[];
  /** Request and error logger. Default: silent */
  readonly logger?: Logger | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: VaultService;
}

/**
 * Map loaded configuration onto the vault service's settings.
 */
export function serviceConfigFrom(
  config: AppConfig,
  apiKeys: readonly ApiKeyRecord[],
): VaultServiceConfig {
  return {
    vaultAccount: config.VAULT_ADDRESS,
    feeRecipient: config.FEE_RECIPIENT,
    systemFeeBps: config.SYSTEM_FEE_BPS,
    referralPercents: config.REFERRAL_PERCENTS,
    maxReferralLevels: config.MAX_REFERRAL_LEVELS,
    strategies: config.STRATEGIES,
    principals: apiKeys,
  };
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const logger = options.logger ?? pino({ level: "silent" });
  const apiKeys = new Map(options.apiKeys.map((k) => [k.key, k]));

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());
  app.use("*", loggerMiddleware(logger));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler({ logger, auditLog: service.auditLog }));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", authMiddleware({ apiKeys }));

  app.route("/api/v1/assets", createAssetRoutes(service));
  app.route("/api/v1/wallets", createWalletRoutes(service));
  app.route("/api/v1/wallets", createWithdrawRequestRoutes(service));
  app.route("/api/v1", createStrategyRoutes(service));
  app.route("/api/v1", createCustodyRoutes(service));
  app.route("/api/v1/records", createRecordRoutes(service));
  app.route("/api/v1/audit", createAuditRoutes(service.auditLog));

  return { app, service };
}
