/**
 * Supply routes.
 *
 * POST /api/v1/supply/reports — Report circulating supply, evaluate the burn
 * GET  /api/v1/supply         — Current supply bookkeeping
 *
 * Amounts are returned as decimal strings.
 */

import { Hono } from "hono";
import { serializeSupplyState } from "@resonance/supply";
import type { ReconcilerContext } from "../services/reconciler-context.js";
import type { AppEnv } from "../types/api-contract.js";
import { SupplyReportSchema } from "../types/dto.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createSupplyRoutes(ctx: ReconcilerContext): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/reports", requirePermission("write"), validateBody(SupplyReportSchema), (c) => {
    const { circulatingSupply } = c.get("validatedBody");
    const result = ctx.supply.evaluate(circulatingSupply);

    return c.json({
      data: {
        delta: result.delta.toString(),
        triggered: result.triggered,
        remaining: ctx.supply.remaining().toString(),
        state: serializeSupplyState(result.state),
      },
    });
  });

  routes.get("/", requirePermission("read"), (c) => {
    return c.json({
      data: {
        ...serializeSupplyState(ctx.supply.state()),
        remaining: ctx.supply.remaining().toString(),
      },
    });
  });

  return routes;
}
