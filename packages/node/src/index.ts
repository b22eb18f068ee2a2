/**
 * @tidepool/node — HTTP node for the pooled-asset vault.
 *
 * Package public API. `main.ts` is the executable entry point.
 */

export { VaultService } from "./services/vault-service.js";
export type {
  VaultServiceConfig,
  VaultServiceOptions,
  RecordLogStatus,
} from "./services/vault-service.js";
export { AuditLog } from "./services/audit-log.js";
export type { AuditLogEntry, AuditLogQuery } from "./services/audit-log.js";
export { loadConfig, parseApiKeys, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp, serviceConfigFrom } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
