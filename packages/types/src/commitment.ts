/**
 * Commitment Types
 *
 * A Merkle commitment summarizes every stored record at one instant.
 * The root is a compatibility artifact: identical leaf sequences
 * always produce identical roots.
 */

export interface MerkleCommitment {
  /** Merkle root (64-char lowercase hex) */
  readonly root: string;

  /** Ordered leaf snapshot (blob digests sorted by resonanceId) */
  readonly leaves: readonly string[];

  /** Every tree level, leaves first, root last */
  readonly levels: readonly (readonly string[])[];

  /** Number of leaves */
  readonly leafCount: number;

  /** ISO 8601 timestamp of the commit */
  readonly committedAt: string;

  /** External registry reference (null until anchored) */
  readonly anchoredRef: string | null;
}
