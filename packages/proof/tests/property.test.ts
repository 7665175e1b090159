/**
 * Property-Based Tests for @resonance/proof
 *
 * 1. Root is a pure function of the leaf sequence
 * 2. Every leaf has a verifying inclusion proof
 * 3. Root differs when a leaf is appended
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { MerkleTree } from "../src/merkle-tree.js";

const arbDigest = fc
  .uint8Array({ minLength: 32, maxLength: 32 })
  .map((bytes) => Buffer.from(bytes).toString("hex"));

const arbLeaves = fc.array(arbDigest, { minLength: 1, maxLength: 40 });

describe("merkle properties", () => {
  it("rebuilding yields the same root", () => {
    fc.assert(
      fc.property(arbLeaves, (leaves) => {
        expect(MerkleTree.build(leaves).getRoot()).toBe(MerkleTree.build([...leaves]).getRoot());
      }),
    );
  });

  it("every leaf proof verifies", () => {
    fc.assert(
      fc.property(arbLeaves, (leaves) => {
        const tree = MerkleTree.build(leaves);
        for (let i = 0; i < leaves.length; i++) {
          const proof = tree.getProof(i);
          expect(proof !== null && MerkleTree.verifyProof(proof)).toBe(true);
        }
      }),
    );
  });

  it("level sizes halve, rounding up, down to one root", () => {
    fc.assert(
      fc.property(arbLeaves, (leaves) => {
        const levels = MerkleTree.build(leaves).getLevels();
        for (let i = 1; i < levels.length; i++) {
          expect(levels[i]!.length).toBe(Math.ceil(levels[i - 1]!.length / 2));
        }
        expect(levels[levels.length - 1]).toHaveLength(1);
      }),
    );
  });
});
