/**
 * GET /api/v1/status — One snapshot of every subsystem.
 *
 * Observers get an eventually consistent view; nothing here blocks the
 * watcher.
 */

import { Hono } from "hono";
import { serializeSupplyState } from "@resonance/supply";
import type { ReconcilerContext } from "../services/reconciler-context.js";
import type { AppEnv } from "../types/api-contract.js";
import { requirePermission } from "../middleware/auth.js";

export function createStatusRoutes(ctx: ReconcilerContext): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const watcher = ctx.watcher.status();

    return c.json({
      data: {
        markers: ctx.markers.counts(),
        records: ctx.records.size(),
        watcher,
        anchor: ctx.publisher.status(),
        latestRoot: watcher.latestCommitment?.root ?? null,
        supply: serializeSupplyState(ctx.supply.state()),
      },
    });
  });

  return routes;
}
