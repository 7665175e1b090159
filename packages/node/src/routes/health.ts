/**
 * Health check routes.
 *
 * GET /health — Liveness check (always 200 if server is running)
 * GET /ready  — Readiness check (watcher not degraded, record store readable)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { ReconcilerContext } from "../services/reconciler-context.js";

export function createHealthRoutes(ctx: ReconcilerContext): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const readiness = ctx.readiness();

    return c.json(
      {
        status: readiness.ready ? "ready" : "not_ready",
        subsystems: {
          watcher: readiness.watcher,
          store: readiness.store,
        },
        ...(readiness.detail !== undefined && { detail: readiness.detail }),
        timestamp: new Date().toISOString(),
      },
      readiness.ready ? 200 : 503,
    );
  });

  return routes;
}
