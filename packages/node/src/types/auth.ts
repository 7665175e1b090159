/**
 * Authentication and authorization types.
 *
 * Callers authenticate with an X-Api-Key header.
 * Role hierarchy: admin > operator > viewer
 */

import type { Role } from "../config.js";

export type { Role };

// =============================================================================
// Roles & Permissions
// =============================================================================

/**
 * read: queries. write: markers, commits, supply reports. admin: watcher control.
 */
export type Permission = "read" | "write" | "admin";

export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  viewer: ["read"],
  operator: ["read", "write"],
  admin: ["read", "write", "admin"],
};

export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

export interface AuthContext {
  /** Key fingerprint, never the key itself */
  readonly identity: string;
  readonly role: Role;
}

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
}
