/**
 * Property-Based Tests for @resonance/markers
 *
 * 1. Marker status is monotonic: once CONFIRMED, never PENDING again
 * 2. An externalRef confirms at most one marker
 * 3. Replay reproduces the table exactly
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { MarkerTable } from "../src/marker-table.js";
import { InMemoryMarkerJournal } from "../src/journal.js";
import { MarkerError } from "../src/types.js";

// =============================================================================
// Arbitraries
// =============================================================================

type Op =
  | { readonly kind: "record"; readonly amount: number }
  | { readonly kind: "link"; readonly target: number; readonly ref: number }
  | { readonly kind: "expect"; readonly target: number; readonly ref: number };

const arbOp: fc.Arbitrary<Op> = fc.oneof(
  fc.record({ kind: fc.constant("record" as const), amount: fc.integer({ min: 0, max: 5 }) }),
  fc.record({
    kind: fc.constant("link" as const),
    target: fc.integer({ min: 0, max: 8 }),
    ref: fc.integer({ min: 0, max: 5 }),
  }),
  fc.record({
    kind: fc.constant("expect" as const),
    target: fc.integer({ min: 0, max: 8 }),
    ref: fc.integer({ min: 0, max: 5 }),
  }),
);

function run(table: MarkerTable, ops: readonly Op[], onStep: () => void): void {
  const ids: string[] = [];
  for (const op of ops) {
    try {
      if (op.kind === "record") {
        ids.push(table.recordMarker({ amount: op.amount }).id);
      } else {
        const id = ids[op.target] ?? `ghost-${op.target}`;
        if (op.kind === "link") table.linkConfirmation(id, `0x${op.ref}`);
        else table.expectConfirmation(id, `0x${op.ref}`);
      }
    } catch (err) {
      if (!(err instanceof MarkerError)) throw err;
    }
    onStep();
  }
}

// =============================================================================
// Properties
// =============================================================================

describe("marker table properties", () => {
  it("status never moves backwards", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const table = new MarkerTable();
        const confirmedAt = new Map<string, string | null>();

        run(table, ops, () => {
          for (const [id, ref] of confirmedAt) {
            const marker = table.get(id);
            expect(marker?.status).toBe("CONFIRMED");
            expect(marker?.externalRef).toBe(ref);
          }
          for (const marker of table.list({ status: "CONFIRMED" })) {
            confirmedAt.set(marker.id, marker.externalRef);
          }
        });
      }),
    );
  });

  it("each ref confirms at most one marker", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const table = new MarkerTable();
        run(table, ops, () => undefined);

        const refs = table.list({ status: "CONFIRMED" }).map((m) => m.externalRef);
        expect(new Set(refs).size).toBe(refs.length);
      }),
    );
  });

  it("replay reproduces the table", () => {
    fc.assert(
      fc.property(fc.array(arbOp, { maxLength: 40 }), (ops) => {
        const journal = new InMemoryMarkerJournal();
        const table = new MarkerTable({ journal });
        run(table, ops, () => undefined);

        const replayed = new MarkerTable({ journal });
        expect(replayed.list()).toEqual(table.list());
        expect(replayed.counts()).toEqual(table.counts());
      }),
    );
  });
});
