/**
 * Tests for marker routes.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { InstantMarker, MarkerCounts } from "@resonance/types";
import { createHarness, createTestApp, jsonRequest, BOB } from "./setup.js";
import type { TestHarness } from "./setup.js";

interface ErrorBody {
  error: { code: string; message: string };
}

describe("marker routes", () => {
  let harness: TestHarness;
  let app: ReturnType<typeof createTestApp>["app"];

  beforeEach(() => {
    harness = createHarness();
    ({ app } = createTestApp(harness));
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  async function record(payload: Record<string, unknown>): Promise<InstantMarker> {
    const res = await app.request(jsonRequest("/api/v1/markers", "POST", payload));
    expect(res.status).toBe(201);
    return ((await res.json()) as { data: InstantMarker }).data;
  }

  it("records a PENDING marker", async () => {
    const marker = await record({ amount: "10", to: BOB });

    expect(marker).toMatchObject({
      status: "PENDING",
      externalRef: null,
      payload: { amount: "10", to: BOB },
      createdAt: "2026-02-01T00:00:00.000Z",
      confirmedAt: null,
      synthesized: false,
    });
    expect(harness.context.markers.get(marker.id)?.status).toBe("PENDING");
  });

  it("rejects a payload that is not an object", async () => {
    const res = await app.request(jsonRequest("/api/v1/markers", "POST", ["amount"]));
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error.code).toBe("VALIDATION_ERROR");
  });

  it("rejects malformed JSON", async () => {
    const res = await app.request(
      new Request("http://localhost/api/v1/markers", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      }),
    );
    expect(res.status).toBe(400);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Invalid JSON in request body",
    });
  });

  it("lists markers with counts and a status filter", async () => {
    await record({ amount: "10" });
    await record({ amount: "20" });

    const all = await app.request("/api/v1/markers");
    const body = (await all.json()) as { data: InstantMarker[]; counts: MarkerCounts };
    expect(body.data.map((m) => m.payload["amount"])).toEqual(["10", "20"]);
    expect(body.counts).toEqual({ pending: 2, confirmed: 0, total: 2 });

    const confirmed = await app.request("/api/v1/markers?status=CONFIRMED");
    expect(((await confirmed.json()) as { data: InstantMarker[] }).data).toEqual([]);
  });

  it("rejects an unknown status filter", async () => {
    const res = await app.request("/api/v1/markers?status=DONE");
    expect(res.status).toBe(400);
  });

  it("returns a marker with the ref it awaits", async () => {
    const marker = await record({ amount: "10" });

    const expect1 = await app.request(
      jsonRequest(`/api/v1/markers/${marker.id}/expect`, "POST", { externalRef: "0xabc" }),
    );
    expect(expect1.status).toBe(200);

    const res = await app.request(`/api/v1/markers/${marker.id}`);
    const body = (await res.json()) as { data: InstantMarker; expectedRef: string | null };
    expect(body.data.id).toBe(marker.id);
    expect(body.expectedRef).toBe("0xabc");
  });

  it("returns 404 for an unknown marker", async () => {
    const res = await app.request("/api/v1/markers/missing");
    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "NOT_FOUND",
      message: "Marker 'missing' not found",
    });
  });

  it("maps expect on an unknown marker to MARKER_NOT_FOUND", async () => {
    const res = await app.request(
      jsonRequest("/api/v1/markers/missing/expect", "POST", { externalRef: "0xabc" }),
    );
    expect(res.status).toBe(404);
    expect(((await res.json()) as ErrorBody).error.code).toBe("MARKER_NOT_FOUND");
  });

  it("refuses to bind one ref to two markers", async () => {
    const first = await record({ amount: "10" });
    const second = await record({ amount: "10" });

    await app.request(
      jsonRequest(`/api/v1/markers/${first.id}/expect`, "POST", { externalRef: "0xabc" }),
    );
    const res = await app.request(
      jsonRequest(`/api/v1/markers/${second.id}/expect`, "POST", { externalRef: "0xabc" }),
    );

    expect(res.status).toBe(409);
    expect(((await res.json()) as ErrorBody).error).toEqual({
      code: "REF_ALREADY_BOUND",
      message: `External ref 0xabc is already bound to marker ${first.id}`,
    });
  });

  it("rejects an empty external ref", async () => {
    const marker = await record({ amount: "10" });
    const res = await app.request(
      jsonRequest(`/api/v1/markers/${marker.id}/expect`, "POST", { externalRef: "" }),
    );
    expect(res.status).toBe(400);
  });
});
