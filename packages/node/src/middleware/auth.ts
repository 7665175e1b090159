/**
 * Authentication middleware.
 *
 * API key via X-Api-Key header, looked up in the configured key registry.
 * On success, sets `c.set("auth", authContext)`; otherwise returns 401.
 */

import { createHash } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ApiKeyRecord, AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";
import { createErrorEnvelope } from "../types/error.js";

export const API_KEY_HEADER = "X-Api-Key";

// =============================================================================
// Auth Middleware
// =============================================================================

export interface AuthConfig {
  /** Map of API key → record */
  readonly apiKeys: ReadonlyMap<string, ApiKeyRecord>;
}

/**
 * Short, log-safe identifier for a key.
 */
export function keyFingerprint(key: string): string {
  return createHash("sha256").update(key).digest("hex").slice(0, 12);
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

    const auth: AuthContext = { identity: keyFingerprint(record.key), role: record.role };
    c.set("auth", auth);
    return next();
  };
}

/**
 * Unsecured mode (no API_KEYS): every caller acts as admin.
 */
export function anonymousAuthMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("auth", { identity: "anonymous", role: "admin" });
    return next();
  };
}

// =============================================================================
// Permission Guard
// =============================================================================

/**
 * Must run AFTER an auth middleware. Returns 403 if the authenticated
 * role lacks the required permission.
 */
export function requirePermission(
  permission: Permission,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const auth = c.get("auth");
    if (!hasPermission(auth.role, permission)) {
      return c.json(
        createErrorEnvelope(
          "FORBIDDEN",
          `Role '${auth.role}' lacks '${permission}' permission`,
        ),
        403,
      );
    }
    return next();
  };
}
