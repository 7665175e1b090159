/**
 * @resonance/record-store — Encrypted, content-addressed record persistence.
 *
 * @packageDocumentation
 */

// Types
export type {
  Keyring,
  RecordStore,
  FileRecordStoreOptions,
  RecordStoreErrorCode,
} from "./types.js";
export { RecordStoreError } from "./types.js";

// Key material
export { loadKeyring, parseKeyring, KeyFileSchema } from "./keyring.js";
export type { KeyFile } from "./keyring.js";

// Blob cipher
export { encryptBlob, decryptBlob } from "./cipher.js";

// File store
export { FileRecordStore } from "./record-store.js";

// Durable file replacement
export { writeFileAtomic } from "./atomic-write.js";
