/**
 * Record Types
 *
 * A confirmed record is the decrypted content of one stored blob.
 * Its identity (resonanceId) is a keyed hash of the external reference,
 * so replayed confirmations land on the same record.
 */

export interface ConfirmedRecord {
  /** Keyed hash of externalRef (hex) */
  readonly resonanceId: string;

  /** External confirmation reference */
  readonly externalRef: string;

  /** Confirmation data (counterparties, value, position) */
  readonly payload: Readonly<Record<string, unknown>>;

  /** Caller-supplied metadata (opaque) */
  readonly metadata: Readonly<Record<string, unknown>>;

  /** ISO 8601 timestamp of the write */
  readonly storedAt: string;
}

/**
 * Identity and content digest of a stored blob.
 */
export interface RecordRef {
  readonly resonanceId: string;

  /** SHA-256 of the encrypted blob bytes (hex), used as the Merkle leaf */
  readonly blobDigest: string;
}
