/**
 * Marker journals.
 *
 * JsonlMarkerJournal stores one JSON entry per line. Each append is
 * fsynced before returning. A torn final line (unclean shutdown) is
 * cut off when the journal is opened, so later appends start on a
 * fresh line.
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  truncateSync,
} from "node:fs";
import { dirname } from "node:path";
import { isInstantMarker } from "@resonance/types";
import type { MarkerJournal, MarkerJournalEntry } from "./types.js";

function isJournalEntry(value: unknown): value is MarkerJournalEntry {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;

  switch (v.type) {
    case "marker.recorded":
      return isInstantMarker(v.marker);
    case "marker.expected":
      return (
        typeof v.markerId === "string" &&
        typeof v.externalRef === "string" &&
        typeof v.at === "string"
      );
    case "marker.confirmed":
      return (
        typeof v.markerId === "string" &&
        typeof v.externalRef === "string" &&
        typeof v.confirmedAt === "string"
      );
    default:
      return false;
  }
}

/**
 * Non-durable journal for tests and ephemeral runs.
 */
export class InMemoryMarkerJournal implements MarkerJournal {
  private readonly _entries: MarkerJournalEntry[] = [];

  append(entry: MarkerJournalEntry): void {
    this._entries.push(entry);
  }

  load(): readonly MarkerJournalEntry[] {
    return [...this._entries];
  }
}

export class JsonlMarkerJournal implements MarkerJournal {
  private readonly _filePath: string;

  constructor(filePath: string) {
    this._filePath = filePath;
    mkdirSync(dirname(this._filePath), { recursive: true });
    this.dropTornTail();
  }

  private dropTornTail(): void {
    if (!existsSync(this._filePath)) return;

    const content = readFileSync(this._filePath);
    if (content.length === 0 || content[content.length - 1] === 0x0a) return;

    const keep = content.lastIndexOf(0x0a) + 1;
    truncateSync(this._filePath, keep);
  }

  append(entry: MarkerJournalEntry): void {
    const fd = openSync(this._filePath, "a");
    try {
      appendFileSync(fd, JSON.stringify(entry) + "\n", "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }

  load(): readonly MarkerJournalEntry[] {
    if (!existsSync(this._filePath)) {
      return [];
    }

    const entries: MarkerJournalEntry[] = [];

    for (const line of readFileSync(this._filePath, "utf-8").split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        // Torn trailing line from a crash
        continue;
      }

      if (isJournalEntry(parsed)) {
        entries.push(parsed);
      }
    }

    return entries;
  }

  get filePath(): string {
    return this._filePath;
  }
}
