/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createAssetRoutes } from "./assets.js";
export { createWalletRoutes } from "./wallets.js";
export { createWithdrawRequestRoutes } from "./withdraw-requests.js";
export { createStrategyRoutes } from "./strategies.js";
export { createCustodyRoutes } from "./custody.js";
export { createRecordRoutes } from "./records.js";
export { createAuditRoutes } from "./audit.js";
