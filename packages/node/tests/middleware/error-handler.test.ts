/**
 * Tests for the error handler.
 *
 * Verifies domain error codes map to HTTP statuses and that every error
 * uses the envelope.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { z } from "zod";
import { MarkerError } from "@resonance/markers";
import { RecordStoreError } from "@resonance/record-store";
import { SupplyError } from "@resonance/supply";
import { WatcherError } from "@resonance/watcher";
import { handleError } from "../../src/middleware/error-handler.js";

interface Envelope {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

function appThrowing(err: Error): Hono {
  const app = new Hono();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

async function call(err: Error): Promise<{ status: number; body: Envelope }> {
  const res = await appThrowing(err).request("/boom");
  return { status: res.status, body: (await res.json()) as Envelope };
}

describe("handleError", () => {
  it("maps MARKER_NOT_FOUND to 404", async () => {
    const { status, body } = await call(new MarkerError("MARKER_NOT_FOUND", "Marker m-1 not found"));
    expect(status).toBe(404);
    expect(body).toEqual({ error: { code: "MARKER_NOT_FOUND", message: "Marker m-1 not found" } });
  });

  it("maps binding conflicts to 409", async () => {
    expect((await call(new MarkerError("REF_ALREADY_BOUND", "bound"))).status).toBe(409);
    expect((await call(new MarkerError("INVALID_TRANSITION", "confirmed"))).status).toBe(409);
    expect((await call(new WatcherError("ALREADY_RUNNING", "running"))).status).toBe(409);
  });

  it("maps bad input to 400", async () => {
    expect((await call(new SupplyError("INVALID_SUPPLY", "negative"))).status).toBe(400);
    expect((await call(new MarkerError("INVALID_REF", "empty"))).status).toBe(400);
  });

  it("maps upstream failures to 502", async () => {
    const { status, body } = await call(new WatcherError("POLL_FAILED", "Source head failed"));
    expect(status).toBe(502);
    expect(body.error.message).toBe("Source head failed");
  });

  it("hides the message of unmapped domain errors", async () => {
    const { status, body } = await call(
      new RecordStoreError("WRITE_FAILED", "Failed to write /var/data/x.blob"),
    );
    expect(status).toBe(500);
    expect(body).toEqual({ error: { code: "WRITE_FAILED", message: "Internal server error" } });
  });

  it("hides plain errors behind INTERNAL_ERROR", async () => {
    const { status, body } = await call(new Error("secret detail"));
    expect(status).toBe(500);
    expect(body).toEqual({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
  });

  it("reports zod failures as validation errors", async () => {
    const parsed = z.object({ n: z.number() }).safeParse({ n: "x" });
    if (parsed.success) throw new Error("expected a parse failure");

    const { status, body } = await call(parsed.error);
    expect(status).toBe(400);
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.details).toEqual({
      issues: [{ path: "n", message: "Expected number, received string" }],
    });
  });
});
