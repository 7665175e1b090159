/**
 * @resonance/proof — Merkle Tree.
 *
 * Binary hash tree over 32-byte SHA-256 digests.
 *
 * Design:
 * - Internal nodes: SHA-256(left ‖ right) over the raw 64 bytes
 * - Odd node count at any level: the last node is paired with itself
 * - Empty tree: null root
 * - Single leaf: leaf IS the root (no internal nodes)
 * - Deterministic: same leaves in the same order → same root
 * - Immutable: build once, query many times
 *
 * The root is published externally, so the pairing rule above must not
 * change.
 */

import { createHash } from "node:crypto";
import { isHexDigest } from "@resonance/types";
import type { MerkleProof, MerkleProofStep } from "./types.js";
import { MerkleError } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

function hashPair(left: string, right: string): string {
  return createHash("sha256")
    .update(Buffer.from(left, "hex"))
    .update(Buffer.from(right, "hex"))
    .digest("hex");
}

/**
 * Compute every level bottom-up: leaves first, root level last.
 */
function buildLevels(leaves: readonly string[]): string[][] {
  if (leaves.length === 0) {
    return [];
  }

  const levels: string[][] = [[...leaves]];
  let currentLevel = levels[0]!;

  while (currentLevel.length > 1) {
    const nextLevel: string[] = [];

    for (let i = 0; i < currentLevel.length; i += 2) {
      const left = currentLevel[i]!;
      const right = i + 1 < currentLevel.length ? currentLevel[i + 1]! : left;
      nextLevel.push(hashPair(left, right));
    }

    levels.push(nextLevel);
    currentLevel = nextLevel;
  }

  return levels;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Immutable Merkle tree built from blob digests.
 *
 * ```ts
 * const tree = MerkleTree.build(store.enumerateHashes());
 * const root = tree.getRoot();          // root hash or null
 * const proof = tree.getProof(0);       // inclusion proof for leaf 0
 * MerkleTree.verifyProof(proof);        // true/false
 * ```
 */
export class MerkleTree {
  private readonly levels: readonly (readonly string[])[];

  private constructor(levels: readonly (readonly string[])[]) {
    this.levels = levels;
  }

  /**
   * Build a tree from 64-char lowercase hex digests.
   *
   * @throws MerkleError INVALID_LEAF when any leaf is not a digest
   */
  static build(leaves: readonly string[]): MerkleTree {
    leaves.forEach((leaf, index) => {
      if (!isHexDigest(leaf)) {
        throw new MerkleError(
          "INVALID_LEAF",
          `Leaf ${index} is not a 64-char lowercase hex digest`,
        );
      }
    });
    return new MerkleTree(buildLevels(leaves));
  }

  /**
   * Root hash, or null for an empty tree.
   */
  getRoot(): string | null {
    const top = this.levels[this.levels.length - 1];
    return top?.[0] ?? null;
  }

  getLeafCount(): number {
    return this.levels[0]?.length ?? 0;
  }

  getLeaves(): readonly string[] {
    return this.levels[0] ?? [];
  }

  /**
   * All levels, leaves first and the single-root level last.
   */
  getLevels(): readonly (readonly string[])[] {
    return this.levels;
  }

  /**
   * Index of the first leaf equal to `leafHash`, or -1.
   */
  indexOf(leafHash: string): number {
    return this.getLeaves().indexOf(leafHash);
  }

  /**
   * Generate an inclusion proof for the leaf at the given index.
   *
   * @returns MerkleProof or null if index is out of range or tree is empty
   */
  getProof(leafIndex: number): MerkleProof | null {
    const root = this.getRoot();
    const leaves = this.getLeaves();
    if (
      root === null ||
      !Number.isInteger(leafIndex) ||
      leafIndex < 0 ||
      leafIndex >= leaves.length
    ) {
      return null;
    }

    const siblings: MerkleProofStep[] = [];
    let currentIndex = leafIndex;

    // Every level except the root contributes one sibling
    for (const level of this.levels.slice(0, -1)) {
      const isLeft = currentIndex % 2 === 0;
      const siblingIndex = isLeft ? currentIndex + 1 : currentIndex - 1;

      // Last node of an odd level is its own sibling
      const sibling =
        siblingIndex < level.length ? level[siblingIndex]! : level[currentIndex]!;

      siblings.push({ hash: sibling, direction: isLeft ? "right" : "left" });
      currentIndex = Math.floor(currentIndex / 2);
    }

    return {
      leafHash: leaves[leafIndex]!,
      leafIndex,
      siblings,
      root,
    };
  }

  /**
   * Verify a Merkle inclusion proof.
   *
   * Needs only the proof, not the tree.
   */
  static verifyProof(proof: MerkleProof): boolean {
    if (!isHexDigest(proof.leafHash) || !isHexDigest(proof.root)) {
      return false;
    }

    let currentHash = proof.leafHash;

    for (const step of proof.siblings) {
      if (!isHexDigest(step.hash)) {
        return false;
      }
      currentHash =
        step.direction === "left"
          ? hashPair(step.hash, currentHash)
          : hashPair(currentHash, step.hash);
    }

    return currentHash === proof.root;
  }
}
