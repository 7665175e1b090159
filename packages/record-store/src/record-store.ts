/**
 * @resonance/record-store — File-based content-addressed record store.
 *
 * Stores each confirmed record as an encrypted blob:
 *   <directory>/<resonanceId>.blob
 *
 * Crash safety:
 * - Each write goes to a unique temp file, is fsynced, then renamed over
 *   the target (rename is atomic within a directory)
 * - A failed write never touches any other blob
 * - Leftover temp files from a crash are removed on open
 *
 * All operations are synchronous, so a write is never observable half-done
 * by another caller in the same process.
 */

import { createHash, createHmac } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import { canonicalize } from "json-canonicalize";
import { isConfirmedRecord, isHexDigest } from "@resonance/types";
import type { ConfirmedRecord, RecordRef } from "@resonance/types";
import { TEMP_SUFFIX, writeFileAtomic } from "./atomic-write.js";
import { decryptBlob, encryptBlob } from "./cipher.js";
import type { FileRecordStoreOptions, Keyring, RecordStore } from "./types.js";
import { RecordStoreError } from "./types.js";

const BLOB_SUFFIX = ".blob";

function sha256Hex(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

export class FileRecordStore implements RecordStore {
  private readonly _directory: string;
  private readonly _keyring: Keyring;

  constructor(options: FileRecordStoreOptions) {
    this._directory = options.directory;
    this._keyring = options.keyring;

    mkdirSync(this._directory, { recursive: true });
    this._sweepTempFiles();
  }

  // ─── Identity ───────────────────────────────────────────────────────

  deriveId(externalRef: string): string {
    if (externalRef.length === 0) {
      throw new RecordStoreError(
        "INVALID_REF",
        "External reference must be a non-empty string",
      );
    }
    return createHmac("sha256", this._keyring.hmacKey)
      .update(externalRef, "utf-8")
      .digest("hex");
  }

  // ─── Write ──────────────────────────────────────────────────────────

  put(
    externalRef: string,
    payload: Readonly<Record<string, unknown>>,
    metadata: Readonly<Record<string, unknown>> = {},
  ): RecordRef {
    const resonanceId = this.deriveId(externalRef);

    const record: ConfirmedRecord = {
      resonanceId,
      externalRef,
      payload,
      metadata,
      storedAt: new Date().toISOString(),
    };

    const blob = encryptBlob(
      this._keyring.encryptionKey,
      Buffer.from(canonicalize(record), "utf-8"),
    );

    this._writeAtomic(this._blobPath(resonanceId), blob);

    return { resonanceId, blobDigest: sha256Hex(blob) };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  get(resonanceId: string): ConfirmedRecord | undefined {
    if (!isHexDigest(resonanceId)) {
      return undefined;
    }

    const filePath = this._blobPath(resonanceId);
    if (!existsSync(filePath)) {
      return undefined;
    }

    const plaintext = decryptBlob(this._keyring.encryptionKey, readFileSync(filePath));

    let parsed: unknown;
    try {
      parsed = JSON.parse(plaintext.toString("utf-8"));
    } catch (err: unknown) {
      throw new RecordStoreError(
        "CORRUPT_BLOB",
        `Blob ${resonanceId} does not contain JSON`,
        { cause: err },
      );
    }

    if (!isConfirmedRecord(parsed) || parsed.resonanceId !== resonanceId) {
      throw new RecordStoreError(
        "CORRUPT_BLOB",
        `Blob ${resonanceId} does not contain a matching record`,
      );
    }

    return parsed;
  }

  getByExternalRef(externalRef: string): ConfirmedRecord | undefined {
    return this.get(this.deriveId(externalRef));
  }

  has(externalRef: string): boolean {
    return existsSync(this._blobPath(this.deriveId(externalRef)));
  }

  refOf(externalRef: string): RecordRef | undefined {
    const resonanceId = this.deriveId(externalRef);
    const filePath = this._blobPath(resonanceId);
    if (!existsSync(filePath)) {
      return undefined;
    }
    return { resonanceId, blobDigest: sha256Hex(readFileSync(filePath)) };
  }

  // ─── Enumeration ────────────────────────────────────────────────────

  entries(): readonly RecordRef[] {
    return this._listIds().map((resonanceId) => ({
      resonanceId,
      blobDigest: sha256Hex(readFileSync(this._blobPath(resonanceId))),
    }));
  }

  enumerateHashes(): readonly string[] {
    return this.entries().map((entry) => entry.blobDigest);
  }

  size(): number {
    return this._listIds().length;
  }

  /**
   * Get the directory this store writes to.
   */
  get directory(): string {
    return this._directory;
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _blobPath(resonanceId: string): string {
    return join(this._directory, `${resonanceId}${BLOB_SUFFIX}`);
  }

  /**
   * Stored ids, sorted lexicographically.
   */
  private _listIds(): string[] {
    const ids: string[] = [];
    for (const entry of readdirSync(this._directory, { withFileTypes: true })) {
      if (!entry.isFile() || !entry.name.endsWith(BLOB_SUFFIX)) {
        continue;
      }
      const id = entry.name.slice(0, -BLOB_SUFFIX.length);
      if (isHexDigest(id)) {
        ids.push(id);
      }
    }
    return ids.sort();
  }

  private _writeAtomic(targetPath: string, data: Buffer): void {
    try {
      writeFileAtomic(targetPath, data);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RecordStoreError(
        "WRITE_FAILED",
        `Failed to write ${targetPath}: ${reason}`,
        { cause: err },
      );
    }
  }

  private _sweepTempFiles(): void {
    for (const entry of readdirSync(this._directory, { withFileTypes: true })) {
      if (entry.isFile() && entry.name.endsWith(TEMP_SUFFIX)) {
        rmSync(join(this._directory, entry.name), { force: true });
      }
    }
  }
}
