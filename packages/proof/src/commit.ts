/**
 * Merkle Committer.
 *
 * Snapshots the leaf source and builds a commitment over it. Pure apart
 * from reading the source and the clock.
 */

import type { MerkleCommitment } from "@resonance/types";
import { MerkleTree } from "./merkle-tree.js";
import type { LeafSource, MerkleProof } from "./types.js";

/**
 * Build a commitment over the current leaf set.
 *
 * @returns null when the source holds no leaves
 */
export function commit(
  source: LeafSource,
  now: () => Date = () => new Date(),
): MerkleCommitment | null {
  const tree = MerkleTree.build(source.enumerateHashes());
  const root = tree.getRoot();
  if (root === null) {
    return null;
  }

  return {
    root,
    leaves: tree.getLeaves(),
    levels: tree.getLevels(),
    leafCount: tree.getLeafCount(),
    committedAt: now().toISOString(),
    anchoredRef: null,
  };
}

/**
 * Inclusion proof for `leafHash` against a previously built commitment.
 *
 * @returns null when the leaf is not part of the commitment
 */
export function proveInclusion(
  commitment: MerkleCommitment,
  leafHash: string,
): MerkleProof | null {
  const tree = MerkleTree.build(commitment.leaves);
  const index = tree.indexOf(leafHash);
  return index === -1 ? null : tree.getProof(index);
}
