/**
 * Request schemas for the control surface.
 */

import { z } from "zod";

// =============================================================================
// Markers
// =============================================================================

/** The body of POST /markers is the opaque marker payload itself. */
export const RecordMarkerSchema = z.record(z.string(), z.unknown());

export const ExpectConfirmationSchema = z.object({
  externalRef: z.string().min(1),
});

export const ListMarkersQuerySchema = z.object({
  status: z.enum(["PENDING", "CONFIRMED"]).optional(),
});

export type RecordMarkerDto = z.infer<typeof RecordMarkerSchema>;
export type ExpectConfirmationDto = z.infer<typeof ExpectConfirmationSchema>;
export type ListMarkersQuery = z.infer<typeof ListMarkersQuerySchema>;

// =============================================================================
// Supply
// =============================================================================

/**
 * Amounts travel as decimal strings; safe integers are accepted too.
 */
export const SupplyReportSchema = z.object({
  circulatingSupply: z.union([
    z.string().regex(/^\d+$/, "Expected a non-negative integer string"),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
  ]).transform((v) => BigInt(v)),
});

export type SupplyReportDto = z.infer<typeof SupplyReportSchema>;
