/**
 * @tidepool/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
import { createApp, serviceConfigFrom } from "./app.js";
import { VaultService } from "./services/vault-service.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const apiKeys = parseApiKeys(config.API_KEYS);
  if (apiKeys.length === 0) {
    logger.warn("No API keys configured; every /api request will be rejected");
  } else {
    logger.info({ apiKeyCount: apiKeys.length }, "Auth configured");
  }

  const service = new VaultService(serviceConfigFrom(config, apiKeys), { logger });
  const { app } = createApp({ service, apiKeys, logger });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      vaultAccount: config.VAULT_ADDRESS,
      strategies: config.STRATEGIES,
    },
    "Tidepool node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    service.stop();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
