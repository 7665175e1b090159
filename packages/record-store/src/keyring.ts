/**
 * Key material loading.
 *
 * Keys are supplied externally as a JSON file:
 *   { "encryptionKey": "<64 hex>", "hmacKey": "<64 hex>" }
 *
 * A missing or malformed key file is fatal. There is no fallback to
 * generated keys.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import type { Keyring } from "./types.js";
import { RecordStoreError } from "./types.js";

const HexKey = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, "must be 64 hex characters (32 bytes)");

export const KeyFileSchema = z
  .object({
    encryptionKey: HexKey,
    hmacKey: HexKey,
  })
  .refine((k) => k.encryptionKey.toLowerCase() !== k.hmacKey.toLowerCase(), {
    message: "encryptionKey and hmacKey must differ",
  });

export type KeyFile = z.infer<typeof KeyFileSchema>;

/**
 * Validate raw key file content and decode it into a Keyring.
 *
 * @throws RecordStoreError KEY_UNAVAILABLE
 */
export function parseKeyring(raw: unknown): Keyring {
  const result = KeyFileSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "keyFile"}: ${issue.message}`)
      .join("; ");
    throw new RecordStoreError("KEY_UNAVAILABLE", `Invalid key material: ${detail}`);
  }

  return {
    encryptionKey: Buffer.from(result.data.encryptionKey, "hex"),
    hmacKey: Buffer.from(result.data.hmacKey, "hex"),
  };
}

/**
 * Read the key file once and return the decoded Keyring.
 *
 * @throws RecordStoreError KEY_UNAVAILABLE
 */
export function loadKeyring(filePath: string): Keyring {
  if (!existsSync(filePath)) {
    throw new RecordStoreError(
      "KEY_UNAVAILABLE",
      `Key file not found: ${filePath}`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    throw new RecordStoreError(
      "KEY_UNAVAILABLE",
      `Key file is not readable JSON: ${filePath}`,
      { cause: err },
    );
  }

  return parseKeyring(raw);
}
