/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around a reconciler
 * context. Separated from main.ts for testability: tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { ApiKeyRecord } from "./types/auth.js";
import { createErrorEnvelope } from "./types/error.js";
import type { ReconcilerContext } from "./services/reconciler-context.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogFn } from "./middleware/logger.js";
import { anonymousAuthMiddleware, authMiddleware } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createMarkerRoutes } from "./routes/markers.js";
import { createStatusRoutes } from "./routes/status.js";
import { createWatcherRoutes } from "./routes/watcher.js";
import { createCommitmentRoutes, createProofRoutes } from "./routes/commitments.js";
import { createSupplyRoutes } from "./routes/supply.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly context: ReconcilerContext;
  readonly logFn?: RequestLogFn;
  /** When non-empty, /api/* requires X-Api-Key */
  readonly apiKeys?: readonly ApiKeyRecord[];
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly context: ReconcilerContext;
  readonly secured: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const { context } = options;
  const apiKeys = options.apiKeys ?? [];
  const secured = apiKeys.length > 0;

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(context));

  // ─── API Routes ─────────────────────────────────────────────────
  if (secured) {
    app.use("/api/*", authMiddleware({ apiKeys: new Map(apiKeys.map((k) => [k.key, k])) }));
  } else {
    app.use("/api/*", anonymousAuthMiddleware());
  }

  app.route("/api/v1/markers", createMarkerRoutes(context));
  app.route("/api/v1/status", createStatusRoutes(context));
  app.route("/api/v1/watcher", createWatcherRoutes(context));
  app.route("/api/v1/commitments", createCommitmentRoutes(context));
  app.route("/api/v1/proofs", createProofRoutes(context));
  app.route("/api/v1/supply", createSupplyRoutes(context));

  return { app, context, secured };
}
