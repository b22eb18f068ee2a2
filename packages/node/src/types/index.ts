/**
 * Types barrel — re-exports all API types.
 */

export type { AppEnv } from "./api-contract.js";
export type { Role, AuthContext, ApiKeyRecord } from "./auth.js";
export { ROLE_CAPABILITIES, hasCapability } from "./auth.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";
export { createErrorEnvelope } from "./error.js";
export type { PaginationQuery, PaginationMeta, PaginatedResponse } from "./pagination.js";
export { encodeCursor, decodeCursor, paginate } from "./pagination.js";
export type { JsonValue } from "./serialize.js";
export { toJson } from "./serialize.js";
export * from "./dto.js";
