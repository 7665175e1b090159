/**
 * @resonance/proof — Merkle commitments over stored records.
 *
 * @packageDocumentation
 */

// Types
export type {
  SiblingDirection,
  MerkleProofStep,
  MerkleProof,
  LeafSource,
  MerkleErrorCode,
} from "./types.js";
export { MerkleError } from "./types.js";

// Merkle tree
export { MerkleTree } from "./merkle-tree.js";

// Committer
export { commit, proveInclusion } from "./commit.js";
