/**
 * Blob encryption.
 *
 * AES-256-GCM with a random 96-bit IV per blob.
 *
 * Blob layout:
 *   version (1 byte) ‖ iv (12 bytes) ‖ auth tag (16 bytes) ‖ ciphertext
 */

import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";
import { RecordStoreError } from "./types.js";

const CIPHER_ALGORITHM = "aes-256-gcm";
const BLOB_VERSION = 1;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const HEADER_BYTES = 1 + IV_BYTES + TAG_BYTES;

export function encryptBlob(key: Buffer, plaintext: Buffer): Buffer {
  const iv = randomBytes(IV_BYTES);
  const cipher = createCipheriv(CIPHER_ALGORITHM, key, iv);
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
  const tag = cipher.getAuthTag();
  return Buffer.concat([Buffer.from([BLOB_VERSION]), iv, tag, ciphertext]);
}

/**
 * @throws RecordStoreError CORRUPT_BLOB if the header is malformed
 * @throws RecordStoreError DECRYPT_FAILED if authentication fails
 */
export function decryptBlob(key: Buffer, blob: Buffer): Buffer {
  if (blob.length < HEADER_BYTES || blob[0] !== BLOB_VERSION) {
    throw new RecordStoreError(
      "CORRUPT_BLOB",
      `Unrecognized blob header (length ${blob.length})`,
    );
  }

  const iv = blob.subarray(1, 1 + IV_BYTES);
  const tag = blob.subarray(1 + IV_BYTES, HEADER_BYTES);
  const ciphertext = blob.subarray(HEADER_BYTES);

  try {
    const decipher = createDecipheriv(CIPHER_ALGORITHM, key, iv);
    decipher.setAuthTag(tag);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (err: unknown) {
    throw new RecordStoreError(
      "DECRYPT_FAILED",
      "Blob authentication failed (wrong key or tampered content)",
      { cause: err },
    );
  }
}
