/**
 * @resonance/record-store — Core types.
 *
 * Content-addressed encrypted blob persistence.
 *
 * Design principles:
 * - Identity is a keyed hash of the external reference (idempotent writes)
 * - Every blob is encrypted; there is no plaintext mode
 * - Writes go to a temp file and are renamed into place (no torn blobs)
 * - Enumeration order is canonical (sorted by resonanceId), never the
 *   directory listing order
 */

import type { ConfirmedRecord, RecordRef } from "@resonance/types";

// =============================================================================
// Key Material
// =============================================================================

/**
 * Process-wide key material, loaded once at startup.
 */
export interface Keyring {
  /** AES-256-GCM key for blob encryption (32 bytes) */
  readonly encryptionKey: Buffer;

  /** HMAC-SHA256 key for resonanceId derivation (32 bytes) */
  readonly hmacKey: Buffer;
}

// =============================================================================
// Record Store Interface
// =============================================================================

/**
 * Content-addressed record store.
 *
 * Invariants:
 * - deriveId is a pure function of (hmacKey, externalRef)
 * - A given externalRef maps to exactly one blob (last write wins)
 * - enumerateHashes order depends only on the set of stored ids
 */
export interface RecordStore {
  /**
   * Derive the resonanceId for an external reference.
   */
  deriveId(externalRef: string): string;

  /**
   * Encrypt and persist a record under the id derived from externalRef.
   *
   * @throws RecordStoreError WRITE_FAILED if the durable write fails
   */
  put(
    externalRef: string,
    payload: Readonly<Record<string, unknown>>,
    metadata?: Readonly<Record<string, unknown>>,
  ): RecordRef;

  /**
   * Load and decrypt a record by id.
   *
   * @returns The record, or undefined if no blob exists for the id
   */
  get(resonanceId: string): ConfirmedRecord | undefined;

  /**
   * Load and decrypt a record by its external reference.
   */
  getByExternalRef(externalRef: string): ConfirmedRecord | undefined;

  /**
   * Check whether a blob exists for an external reference.
   */
  has(externalRef: string): boolean;

  /**
   * Id and blob digest for an external reference, without decrypting.
   */
  refOf(externalRef: string): RecordRef | undefined;

  /**
   * Every stored blob with its digest, sorted by resonanceId.
   */
  entries(): readonly RecordRef[];

  /**
   * Blob digests in canonical order: the Merkle leaf sequence.
   */
  enumerateHashes(): readonly string[];

  /**
   * Number of stored blobs.
   */
  size(): number;
}

/**
 * Options for creating a FileRecordStore.
 */
export interface FileRecordStoreOptions {
  /** Directory holding `<resonanceId>.blob` files */
  readonly directory: string;

  /** Key material (see loadKeyring) */
  readonly keyring: Keyring;
}

// =============================================================================
// Errors
// =============================================================================

export type RecordStoreErrorCode =
  | "KEY_UNAVAILABLE"
  | "INVALID_REF"
  | "WRITE_FAILED"
  | "DECRYPT_FAILED"
  | "CORRUPT_BLOB";

/**
 * Error thrown by record store operations.
 */
export class RecordStoreError extends Error {
  public readonly code: RecordStoreErrorCode;
  constructor(code: RecordStoreErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RecordStoreError";
    this.code = code;
  }
}
