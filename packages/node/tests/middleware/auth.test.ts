/**
 * Tests for authentication middleware.
 *
 * Verifies:
 * - API key auth (valid, invalid, missing)
 * - Permission guard (allowed, denied)
 * - Health routes stay open when keys are configured
 */

import { describe, it, expect, afterEach } from "vitest";
import { Hono } from "hono";
import type { AppEnv } from "../../src/types/api-contract.js";
import type { ApiKeyRecord, AuthContext } from "../../src/types/auth.js";
import {
  authMiddleware,
  keyFingerprint,
  requirePermission,
} from "../../src/middleware/auth.js";
import { createHarness, createTestApp, jsonRequest } from "../setup.js";
import type { TestHarness } from "../setup.js";

function makeApp(apiKeys: ApiKeyRecord[] = []) {
  const app = new Hono<AppEnv>();
  app.use("*", authMiddleware({ apiKeys: new Map(apiKeys.map((k) => [k.key, k])) }));
  app.get("/test", (c) => c.json({ auth: c.get("auth") }));
  app.get("/admin-only", requirePermission("admin"), (c) => c.json({ ok: true }));
  app.get("/write-only", requirePermission("write"), (c) => c.json({ ok: true }));
  return app;
}

describe("API key auth", () => {
  it("authenticates with a valid API key", async () => {
    const app = makeApp([{ key: "key-1", role: "operator" }]);

    const res = await app.request("/test", { headers: { "X-Api-Key": "key-1" } });

    expect(res.status).toBe(200);
    const body = (await res.json()) as { auth: AuthContext };
    expect(body.auth).toEqual({ identity: keyFingerprint("key-1"), role: "operator" });
  });

  it("never exposes the key as the identity", () => {
    expect(keyFingerprint("key-1")).toHaveLength(12);
    expect(keyFingerprint("key-1")).not.toContain("key-1");
  });

  it("returns 401 for an invalid API key", async () => {
    const app = makeApp([{ key: "key-1", role: "operator" }]);
    const res = await app.request("/test", { headers: { "X-Api-Key": "invalid-key" } });

    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "UNAUTHORIZED", message: "Invalid API key" });
  });

  it("returns 401 when no key is sent", async () => {
    const app = makeApp([{ key: "key-1", role: "operator" }]);
    const res = await app.request("/test");

    expect(res.status).toBe(401);
    const body = (await res.json()) as { error: { message: string } };
    expect(body.error.message).toBe("Authentication required");
  });
});

describe("requirePermission", () => {
  it("allows a role holding the permission", async () => {
    const app = makeApp([{ key: "op", role: "operator" }]);
    const res = await app.request("/write-only", { headers: { "X-Api-Key": "op" } });
    expect(res.status).toBe(200);
  });

  it("returns 403 for a role lacking the permission", async () => {
    const app = makeApp([{ key: "op", role: "operator" }]);
    const res = await app.request("/admin-only", { headers: { "X-Api-Key": "op" } });

    expect(res.status).toBe(403);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({
      code: "FORBIDDEN",
      message: "Role 'operator' lacks 'admin' permission",
    });
  });
});

describe("secured app", () => {
  let harness: TestHarness;

  afterEach(async () => {
    await harness.cleanup();
  });

  it("guards /api/* but not health", async () => {
    harness = createHarness();
    const { app, secured } = createTestApp(harness, {
      apiKeys: [
        { key: "viewer-key", role: "viewer" },
        { key: "operator-key", role: "operator" },
      ],
    });

    expect(secured).toBe(true);
    expect((await app.request("/health")).status).toBe(200);
    expect((await app.request("/api/v1/status")).status).toBe(401);

    const read = await app.request(
      jsonRequest("/api/v1/status", "GET", undefined, { "X-Api-Key": "viewer-key" }),
    );
    expect(read.status).toBe(200);

    const denied = await app.request(
      jsonRequest("/api/v1/markers", "POST", { amount: 10 }, { "X-Api-Key": "viewer-key" }),
    );
    expect(denied.status).toBe(403);

    const allowed = await app.request(
      jsonRequest("/api/v1/markers", "POST", { amount: 10 }, { "X-Api-Key": "operator-key" }),
    );
    expect(allowed.status).toBe(201);

    const control = await app.request(
      jsonRequest("/api/v1/watcher/stop", "POST", undefined, { "X-Api-Key": "operator-key" }),
    );
    expect(control.status).toBe(403);
  });
});
