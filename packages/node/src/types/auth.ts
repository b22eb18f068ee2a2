/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an API key (X-Api-Key header). Each key
 * names a role and the principal it acts as. Roles only grant vault
 * capabilities; wallet operations are checked against wallet ownership
 * inside the vault.
 */

import type { Capability } from "@tidepool/vault";

// =============================================================================
// Roles & Capabilities
// =============================================================================

export type Role = "admin" | "registrar" | "backend" | "user";

/** Which vault capabilities each role grants */
export const ROLE_CAPABILITIES: Record<Role, readonly Capability[]> = {
  admin: ["asset-admin", "registration", "backend"],
  registrar: ["registration"],
  backend: ["backend"],
  user: [],
};

export function hasCapability(role: Role, capability: Capability): boolean {
  return ROLE_CAPABILITIES[role].includes(capability);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 */
export interface AuthContext {
  readonly type: "api-key";
  /** The vault principal this caller acts as */
  readonly principal: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly principal: string;
}
