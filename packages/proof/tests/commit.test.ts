/**
 * Tests for the Merkle committer.
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { commit, proveInclusion } from "../src/commit.js";
import { MerkleTree } from "../src/merkle-tree.js";
import type { LeafSource } from "../src/types.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

function source(leaves: readonly string[]): LeafSource {
  return { enumerateHashes: () => leaves };
}

const NOW = () => new Date("2026-03-01T12:00:00.000Z");

describe("commit", () => {
  it("returns null for an empty source", () => {
    expect(commit(source([]), NOW)).toBeNull();
  });

  it("snapshots leaves, levels, and root", () => {
    const leaves = [sha256("a"), sha256("b"), sha256("c")];
    const tree = MerkleTree.build(leaves);

    expect(commit(source(leaves), NOW)).toEqual({
      root: tree.getRoot(),
      leaves,
      levels: tree.getLevels(),
      leafCount: 3,
      committedAt: "2026-03-01T12:00:00.000Z",
      anchoredRef: null,
    });
  });

  it("is unaffected by later changes to the source array", () => {
    const leaves = [sha256("a"), sha256("b")];
    const result = commit(source(leaves), NOW);
    leaves.push(sha256("c"));

    expect(result?.leafCount).toBe(2);
    expect(result?.leaves).toHaveLength(2);
  });

  it("produces the same root across repeated commits", () => {
    const leaves = [sha256("a"), sha256("b"), sha256("c"), sha256("d")];
    expect(commit(source(leaves))?.root).toBe(commit(source(leaves))?.root);
  });
});

describe("proveInclusion", () => {
  it("proves a committed leaf", () => {
    const leaves = [sha256("a"), sha256("b"), sha256("c")];
    const commitment = commit(source(leaves), NOW)!;
    const proof = proveInclusion(commitment, leaves[1]!);

    expect(proof?.leafIndex).toBe(1);
    expect(proof?.root).toBe(commitment.root);
    expect(proof !== null && MerkleTree.verifyProof(proof)).toBe(true);
  });

  it("returns null for a leaf outside the commitment", () => {
    const commitment = commit(source([sha256("a")]), NOW)!;
    expect(proveInclusion(commitment, sha256("b"))).toBeNull();
  });
});
