/**
 * Commitment and proof routes.
 *
 * POST /api/v1/commitments              — Commit the record set now and schedule anchoring
 * GET  /api/v1/commitments/latest       — Latest commitment summary
 * GET  /api/v1/proofs/:externalRef      — Inclusion proof against the latest commitment
 * POST /api/v1/proofs/verify            — Verify a submitted inclusion proof
 */

import { Hono } from "hono";
import { z } from "zod";
import { MerkleTree } from "@resonance/proof";
import type { ReconcilerContext } from "../services/reconciler-context.js";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

const digest = z.string().regex(/^[0-9a-f]{64}$/);

const MerkleProofSchema = z.object({
  leafHash: digest,
  leafIndex: z.number().int().min(0),
  siblings: z.array(
    z.object({
      hash: digest,
      direction: z.enum(["left", "right"]),
    }),
  ),
  root: digest,
});

export function createCommitmentRoutes(ctx: ReconcilerContext): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("write"), (c) => {
    ctx.watcher.commitAndAnchor();
    return c.json({ data: ctx.watcher.status().latestCommitment });
  });

  routes.get("/latest", requirePermission("read"), (c) => {
    const latest = ctx.watcher.status().latestCommitment;
    if (latest === null) {
      return c.json(createErrorEnvelope("NOT_FOUND", "No commitment has been built yet"), 404);
    }
    return c.json({ data: latest });
  });

  return routes;
}

export function createProofRoutes(ctx: ReconcilerContext): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/verify", requirePermission("read"), validateBody(MerkleProofSchema), (c) => {
    const proof = c.get("validatedBody");
    return c.json({ data: { valid: MerkleTree.verifyProof(proof), root: proof.root } });
  });

  routes.get("/:externalRef", requirePermission("read"), (c) => {
    const externalRef = c.req.param("externalRef");
    const proof = ctx.watcher.proveRecord(externalRef);

    if (proof === null) {
      return c.json(
        createErrorEnvelope(
          "NOT_FOUND",
          `No record for '${externalRef}' in the latest commitment`,
        ),
        404,
      );
    }

    return c.json({ data: proof });
  });

  return routes;
}
