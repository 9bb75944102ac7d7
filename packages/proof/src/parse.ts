/**
 * Boundary parser for proofs received from other Zones or clients.
 */

import { z } from "zod";
import { InvalidInputError } from "@zoneledger/types";
import { DUPLICATE_MARKER, PROOF_VERSION } from "./types.js";
import type { MerkleProof } from "./types.js";

const hashSchema = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, "must be a 64-character hex string")
  .transform((s) => s.toLowerCase());

const siblingSchema = z.union([z.literal(DUPLICATE_MARKER), hashSchema]);

export const MerkleProofSchema = z
  .object({
    version: z.literal(PROOF_VERSION),
    leafHash: hashSchema,
    leafIndex: z.number().int().nonnegative(),
    leafCount: z.number().int().positive(),
    siblings: z.array(siblingSchema),
    root: hashSchema,
  })
  .refine((p) => p.leafIndex < p.leafCount, {
    message: "leafIndex must be less than leafCount",
    path: ["leafIndex"],
  });

/**
 * Parse an untrusted proof token.
 *
 * Structural checks only: a parsed proof can still fail verifyProof().
 *
 * @throws InvalidInputError describing the first problem found
 */
export function parseProof(value: unknown): MerkleProof {
  const result = MerkleProofSchema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue?.path.join(".") ?? "";
    throw new InvalidInputError(
      `Malformed proof${path !== "" ? ` at ${path}` : ""}: ${issue?.message ?? "invalid"}`,
      path !== "" ? `proof.${path}` : "proof",
    );
  }
  return result.data;
}
