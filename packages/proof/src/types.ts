/**
 * @resonance/proof — Core types.
 *
 * Types for Merkle trees and inclusion proofs.
 * All hashes are SHA-256 hex strings (64 characters, lowercase).
 */

// =============================================================================
// Merkle Tree Types
// =============================================================================

/**
 * Direction of a sibling node in a Merkle proof path.
 * - "left": sibling is on the left, proof node is on the right
 * - "right": sibling is on the right, proof node is on the left
 */
export type SiblingDirection = "left" | "right";

/**
 * A single step in a Merkle inclusion proof path.
 */
export interface MerkleProofStep {
  readonly hash: string;
  readonly direction: SiblingDirection;
}

/**
 * A Merkle inclusion proof: shows that a specific leaf exists
 * in a Merkle tree with a given root.
 *
 * Self-contained: a verifier needs ONLY this proof to check inclusion.
 */
export interface MerkleProof {
  /** Leaf being proven (blob digest) */
  readonly leafHash: string;
  /** Index of the leaf in the original tree (0-based) */
  readonly leafIndex: number;
  /** Path from leaf to root, one sibling hash per level */
  readonly siblings: readonly MerkleProofStep[];
  /** Merkle root hash (expected) */
  readonly root: string;
}

// =============================================================================
// Commit Types
// =============================================================================

/**
 * Anything that can list the current leaf set in canonical order.
 * The record store satisfies this.
 */
export interface LeafSource {
  enumerateHashes(): readonly string[];
}

// =============================================================================
// Errors
// =============================================================================

export type MerkleErrorCode = "INVALID_LEAF";

export class MerkleError extends Error {
  public readonly code: MerkleErrorCode;
  constructor(code: MerkleErrorCode, message: string) {
    super(message);
    this.name = "MerkleError";
    this.code = code;
  }
}
