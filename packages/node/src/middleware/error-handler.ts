/**
 * Global error handler.
 *
 * Maps domain error codes to HTTP statuses and always responds with the
 * error envelope. Unmapped errors become a 500 without their message.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { ZodError } from "zod";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "./validate.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Record<string, ContentfulStatusCode> = {
  // Marker table
  MARKER_NOT_FOUND: 404,
  INVALID_TRANSITION: 409,
  REF_ALREADY_BOUND: 409,
  INVALID_REF: 400,

  // Merkle
  INVALID_LEAF: 400,

  // Supply
  INVALID_SUPPLY: 400,

  // Watcher
  ALREADY_RUNNING: 409,
  POLL_FAILED: 502,

  // Anchor
  SUBMIT_FAILED: 502,
  NOT_CONFIGURED: 503,
};

function errorCode(err: Error): string | undefined {
  return "code" in err && typeof err.code === "string" ? err.code : undefined;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof ZodError) {
    return c.json(
      createErrorEnvelope("VALIDATION_ERROR", "Request validation failed", {
        issues: formatZodErrors(err),
      }),
      400,
    );
  }

  const code = errorCode(err);
  const status = code === undefined ? undefined : STATUS_MAP[code];

  if (code === undefined || status === undefined) {
    return c.json(createErrorEnvelope(code ?? "INTERNAL_ERROR", "Internal server error"), 500);
  }

  return c.json(createErrorEnvelope(code, err.message), status);
}
