/**
 * Marker Table — Local intent placeholders and their confirmation.
 *
 * Producers record PENDING markers; the confirmation watcher links
 * them to external references. A confirmation that arrives before any
 * local intent synthesizes a marker already in CONFIRMED state.
 *
 * Rules:
 * - Status moves PENDING → CONFIRMED exactly once
 * - An externalRef confirms at most one marker
 * - Markers are never deleted
 * - Every transition is journaled before it becomes visible
 *
 * All mutations are synchronous, so each transition is atomic with
 * respect to other callers on the event loop.
 */

import { randomUUID } from "node:crypto";
import type {
  ConfirmationEvent,
  InstantMarker,
  MarkerCounts,
  MarkerPayload,
} from "@resonance/types";
import { InMemoryMarkerJournal } from "./journal.js";
import { payloadMatchesEvent } from "./matcher.js";
import type {
  LinkResult,
  ListMarkersOptions,
  MarkerJournal,
  MarkerJournalEntry,
  MarkerResolution,
  MarkerTableOptions,
} from "./types.js";
import { MarkerError } from "./types.js";

export class MarkerTable {
  private readonly markers: Map<string, InstantMarker> = new Map();

  /** externalRef → id of the marker it confirmed */
  private readonly confirmedRefs: Map<string, string> = new Map();

  /** externalRef → id of the PENDING marker awaiting it */
  private readonly expectedRefs: Map<string, string> = new Map();

  /** markerId → externalRef it awaits */
  private readonly expectations: Map<string, string> = new Map();

  private readonly journal: MarkerJournal;
  private readonly generateId: () => string;
  private readonly now: () => Date;

  constructor(options: MarkerTableOptions = {}) {
    this.journal = options.journal ?? new InMemoryMarkerJournal();
    this.generateId = options.generateId ?? randomUUID;
    this.now = options.now ?? (() => new Date());

    for (const entry of this.journal.load()) {
      this.apply(entry);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Producer operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a PENDING marker for a local intent.
   */
  recordMarker(payload: MarkerPayload): InstantMarker {
    const marker: InstantMarker = {
      id: this.nextId(),
      status: "PENDING",
      externalRef: null,
      payload: { ...payload },
      createdAt: this.now().toISOString(),
      confirmedAt: null,
      synthesized: false,
    };

    this.commit({ type: "marker.recorded", marker });
    return marker;
  }

  /**
   * Register the externalRef a PENDING marker expects to be confirmed by
   * (e.g. the tx hash returned when the producer submitted the transfer).
   */
  expectConfirmation(markerId: string, externalRef: string): InstantMarker {
    assertRef(externalRef);
    const marker = this.require(markerId);

    if (marker.status !== "PENDING") {
      throw new MarkerError(
        "INVALID_TRANSITION",
        `Marker ${markerId} is already ${marker.status}`,
      );
    }

    const owner = this.confirmedRefs.get(externalRef) ?? this.expectedRefs.get(externalRef);
    if (owner !== undefined && owner !== markerId) {
      throw new MarkerError(
        "REF_ALREADY_BOUND",
        `External ref ${externalRef} is already bound to marker ${owner}`,
      );
    }

    const current = this.expectations.get(markerId);
    if (current !== undefined && current !== externalRef) {
      throw new MarkerError(
        "REF_ALREADY_BOUND",
        `Marker ${markerId} already expects ${current}`,
      );
    }

    if (current === undefined) {
      this.commit({
        type: "marker.expected",
        markerId,
        externalRef,
        at: this.now().toISOString(),
      });
    }

    return marker;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Watcher operations
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Decide which marker, if any, a confirmation event belongs to.
   * Pure lookup: nothing is mutated.
   */
  resolveForConfirmation(event: ConfirmationEvent): MarkerResolution {
    const confirmedId = this.confirmedRefs.get(event.externalRef);
    if (confirmedId !== undefined) {
      return { kind: "duplicate", marker: this.require(confirmedId) };
    }

    const expectedId =
      this.expectedRefs.get(event.externalRef) ??
      (event.transactionRef === undefined ? undefined : this.expectedRefs.get(event.transactionRef));
    if (expectedId !== undefined) {
      return { kind: "expected", marker: this.require(expectedId) };
    }

    // Map iteration follows insertion order, so the first hit is the oldest
    for (const marker of this.markers.values()) {
      if (marker.status !== "PENDING") continue;
      // A marker awaiting a specific ref only confirms through that ref
      if (this.expectations.has(marker.id)) continue;
      if (payloadMatchesEvent(marker.payload, event)) {
        return { kind: "matched", marker };
      }
    }

    return { kind: "unmatched" };
  }

  /**
   * Transition a marker to CONFIRMED with the given externalRef.
   *
   * - Unknown (or null) markerId: a CONFIRMED marker is synthesized
   *   with `payload`
   * - Marker already CONFIRMED with this ref: no-op
   * - Ref already confirmed another marker: REF_ALREADY_BOUND
   *
   * `transactionRef` lets a marker that expects a transaction be
   * confirmed by one of that transaction's events.
   */
  linkConfirmation(
    markerId: string | null,
    externalRef: string,
    payload: MarkerPayload = {},
    transactionRef?: string,
  ): LinkResult {
    assertRef(externalRef);

    const existing = markerId === null ? undefined : this.markers.get(markerId);
    const boundId = this.confirmedRefs.get(externalRef);

    if (existing === undefined) {
      if (boundId !== undefined) {
        return { marker: this.require(boundId), synthesized: false, changed: false };
      }
      return { marker: this.synthesize(markerId, externalRef, payload), synthesized: true, changed: true };
    }

    if (existing.status === "CONFIRMED") {
      if (existing.externalRef === externalRef) {
        return { marker: existing, synthesized: false, changed: false };
      }
      throw new MarkerError(
        "INVALID_TRANSITION",
        `Marker ${existing.id} is already confirmed by ${String(existing.externalRef)}`,
      );
    }

    if (boundId !== undefined) {
      throw new MarkerError(
        "REF_ALREADY_BOUND",
        `External ref ${externalRef} already confirmed marker ${boundId}`,
      );
    }

    const awaited = this.expectations.get(existing.id);
    if (awaited !== undefined && awaited !== externalRef && awaited !== transactionRef) {
      throw new MarkerError(
        "REF_ALREADY_BOUND",
        `Marker ${existing.id} expects ${awaited}, not ${externalRef}`,
      );
    }

    this.commit({
      type: "marker.confirmed",
      markerId: existing.id,
      externalRef,
      confirmedAt: this.now().toISOString(),
    });

    return { marker: this.require(existing.id), synthesized: false, changed: true };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  get(markerId: string): InstantMarker | undefined {
    return this.markers.get(markerId);
  }

  findByExternalRef(externalRef: string): InstantMarker | undefined {
    const id = this.confirmedRefs.get(externalRef);
    return id === undefined ? undefined : this.markers.get(id);
  }

  /**
   * The externalRef a PENDING marker awaits, if one was registered.
   */
  expectedRefOf(markerId: string): string | undefined {
    return this.expectations.get(markerId);
  }

  list(options: ListMarkersOptions = {}): readonly InstantMarker[] {
    const all = [...this.markers.values()];
    return options.status === undefined
      ? all
      : all.filter((m) => m.status === options.status);
  }

  counts(): MarkerCounts {
    let pending = 0;
    let confirmed = 0;
    for (const marker of this.markers.values()) {
      if (marker.status === "PENDING") pending++;
      else confirmed++;
    }
    return { pending, confirmed, total: pending + confirmed };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private synthesize(
    markerId: string | null,
    externalRef: string,
    payload: MarkerPayload,
  ): InstantMarker {
    const at = this.now().toISOString();
    const marker: InstantMarker = {
      id: markerId ?? this.nextId(),
      status: "CONFIRMED",
      externalRef,
      payload: { ...payload },
      createdAt: at,
      confirmedAt: at,
      synthesized: true,
    };

    this.commit({ type: "marker.recorded", marker });
    return marker;
  }

  private nextId(): string {
    let id = this.generateId();
    while (this.markers.has(id)) {
      id = this.generateId();
    }
    return id;
  }

  private require(markerId: string): InstantMarker {
    const marker = this.markers.get(markerId);
    if (marker === undefined) {
      throw new MarkerError("MARKER_NOT_FOUND", `Marker ${markerId} not found`);
    }
    return marker;
  }

  /** Journal first; in-memory state changes only after a durable append. */
  private commit(entry: MarkerJournalEntry): void {
    this.journal.append(entry);
    this.apply(entry);
  }

  private apply(entry: MarkerJournalEntry): void {
    switch (entry.type) {
      case "marker.recorded": {
        const { marker } = entry;
        if (this.markers.has(marker.id)) return;
        this.markers.set(marker.id, marker);
        if (marker.externalRef !== null) {
          this.confirmedRefs.set(marker.externalRef, marker.id);
        }
        return;
      }

      case "marker.expected": {
        const marker = this.markers.get(entry.markerId);
        if (marker === undefined || marker.status !== "PENDING") return;
        this.expectations.set(entry.markerId, entry.externalRef);
        this.expectedRefs.set(entry.externalRef, entry.markerId);
        return;
      }

      case "marker.confirmed": {
        const marker = this.markers.get(entry.markerId);
        if (marker === undefined || marker.status !== "PENDING") return;
        this.markers.set(marker.id, {
          ...marker,
          status: "CONFIRMED",
          externalRef: entry.externalRef,
          confirmedAt: entry.confirmedAt,
        });
        this.confirmedRefs.set(entry.externalRef, marker.id);

        const awaited = this.expectations.get(marker.id);
        if (awaited !== undefined) {
          this.expectations.delete(marker.id);
          this.expectedRefs.delete(awaited);
        }
        return;
      }
    }
  }
}

function assertRef(externalRef: string): void {
  if (externalRef.length === 0) {
    throw new MarkerError("INVALID_REF", "External ref must be non-empty");
  }
}
