/**
 * @resonance/markers
 *
 * Instant markers: local intent placeholders linked to external
 * confirmations.
 */

export { MarkerTable } from "./marker-table.js";
export { InMemoryMarkerJournal, JsonlMarkerJournal } from "./journal.js";
export { payloadMatchesEvent } from "./matcher.js";
export { MarkerError } from "./types.js";
export type {
  LinkResult,
  ListMarkersOptions,
  MarkerErrorCode,
  MarkerJournal,
  MarkerJournalEntry,
  MarkerResolution,
  MarkerTableOptions,
} from "./types.js";
