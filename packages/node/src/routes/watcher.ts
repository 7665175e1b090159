/**
 * Watcher control routes.
 *
 * POST /api/v1/watcher/start — Start the polling loop
 * POST /api/v1/watcher/stop  — Stop after the in-flight batch
 * POST /api/v1/watcher/poll  — Run one polling cycle now
 */

import { Hono } from "hono";
import type { ReconcilerContext } from "../services/reconciler-context.js";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createWatcherRoutes(ctx: ReconcilerContext): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.post("/start", (c) => {
    ctx.watcher.start();
    return c.json({ data: ctx.watcher.status() });
  });

  routes.post("/stop", async (c) => {
    await ctx.watcher.stop();
    return c.json({ data: ctx.watcher.status() });
  });

  routes.post("/poll", async (c) => {
    const batch = await ctx.watcher.pollOnce();
    return c.json({ data: batch });
  });

  return routes;
}
