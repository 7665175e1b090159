/**
 * Tests for writeFileAtomic.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { writeFileAtomic } from "../src/atomic-write.js";

vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  return {
    ...actual,
    openSync: vi.fn(actual.openSync),
    fsyncSync: vi.fn(actual.fsyncSync),
    renameSync: vi.fn(actual.renameSync),
  };
});

describe("writeFileAtomic", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(join(tmpdir(), "atomic-write-"));
    vi.clearAllMocks();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("replaces the file content", () => {
    const target = join(dir, "state.json");
    writeFileAtomic(target, "first");
    writeFileAtomic(target, Buffer.from("second"));

    expect(fs.readFileSync(target, "utf-8")).toBe("second");
    expect(fs.readdirSync(dir)).toEqual(["state.json"]);
  });

  it("syncs the parent directory after the rename", () => {
    const target = join(dir, "state.json");
    writeFileAtomic(target, "data");

    const opened = vi.mocked(fs.openSync).mock.calls.map((call) => call[0]);
    expect(opened).toHaveLength(2);
    expect(opened[1]).toBe(dir);
    expect(vi.mocked(fs.fsyncSync)).toHaveBeenCalledTimes(2);

    const renameOrder = vi.mocked(fs.renameSync).mock.invocationCallOrder[0];
    const dirOpenOrder = vi.mocked(fs.openSync).mock.invocationCallOrder[1];
    expect(renameOrder).toBeLessThan(dirOpenOrder ?? 0);
  });

  it("removes the temp file when the rename fails", () => {
    const target = join(dir, "taken");
    fs.mkdirSync(target);

    expect(() => writeFileAtomic(target, "data")).toThrow();
    expect(fs.readdirSync(dir)).toEqual(["taken"]);
  });
});
