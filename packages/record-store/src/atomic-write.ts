/**
 * Atomic file replacement: unique temp file, fsync, rename, then fsync
 * of the parent directory so the rename itself is durable.
 *
 * A reader sees either the previous content or the new content. On
 * failure the temp file is removed and the error rethrown.
 */

import { randomBytes } from "node:crypto";
import {
  closeSync,
  fsyncSync,
  openSync,
  renameSync,
  rmSync,
  writeSync,
} from "node:fs";
import { dirname } from "node:path";

export const TEMP_SUFFIX = ".tmp";

export function writeFileAtomic(targetPath: string, data: Buffer | string): void {
  const tempPath = `${targetPath}.${randomBytes(6).toString("hex")}${TEMP_SUFFIX}`;

  try {
    const fd = openSync(tempPath, "w");
    try {
      writeSync(fd, typeof data === "string" ? Buffer.from(data, "utf-8") : data);
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, targetPath);
  } catch (err: unknown) {
    rmSync(tempPath, { force: true });
    throw err;
  }

  syncDirectory(dirname(targetPath));
}

function syncDirectory(directory: string): void {
  const fd = openSync(directory, "r");
  try {
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}
