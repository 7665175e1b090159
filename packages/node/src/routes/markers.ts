/**
 * Marker routes.
 *
 * POST /api/v1/markers             — Record a marker for a local intent
 * GET  /api/v1/markers             — List markers (?status=PENDING|CONFIRMED)
 * GET  /api/v1/markers/:id         — Get a single marker
 * POST /api/v1/markers/:id/expect  — Register the externalRef it awaits
 */

import { Hono } from "hono";
import type { ReconcilerContext } from "../services/reconciler-context.js";
import type { AppEnv } from "../types/api-contract.js";
import {
  ExpectConfirmationSchema,
  ListMarkersQuerySchema,
  RecordMarkerSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";
import { formatZodErrors, validateBody } from "../middleware/validate.js";

export function createMarkerRoutes(ctx: ReconcilerContext): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("write"), validateBody(RecordMarkerSchema), (c) => {
    const marker = ctx.markers.recordMarker(c.get("validatedBody"));
    return c.json({ data: marker }, 201);
  });

  routes.get("/", requirePermission("read"), (c) => {
    const query = ListMarkersQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(query.error),
        }),
        400,
      );
    }

    const markers = ctx.markers.list(
      query.data.status === undefined ? {} : { status: query.data.status },
    );
    return c.json({ data: markers, counts: ctx.markers.counts() });
  });

  routes.get("/:id", requirePermission("read"), (c) => {
    const id = c.req.param("id");
    const marker = ctx.markers.get(id);

    if (marker === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Marker '${id}' not found`), 404);
    }

    return c.json({
      data: marker,
      expectedRef: ctx.markers.expectedRefOf(id) ?? null,
    });
  });

  routes.post(
    "/:id/expect",
    requirePermission("write"),
    validateBody(ExpectConfirmationSchema),
    (c) => {
      const id = c.req.param("id");
      const { externalRef } = c.get("validatedBody");
      const marker = ctx.markers.expectConfirmation(id, externalRef);
      return c.json({ data: marker, expectedRef: externalRef });
    },
  );

  return routes;
}
