/**
 * Zod schemas for records received from remote Zones.
 */

import { z } from "zod";
import { MerkleProofSchema } from "@zoneledger/proof";

const hash = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, "must be a 64-character hex string")
  .transform((s) => s.toLowerCase());

const unixSeconds = z.number().int().nonnegative();

export const AttestationSchema = z.object({
  attestationId: hash,
  zoneId: hash,
  canonId: hash,
  claimHash: hash,
  evidenceHash: hash,
  evidenceLocation: z.string().optional(),
  citations: z.array(hash),
  timestamp: unixSeconds,
  signature: z.string().min(1),
});

export const AnchorSchema = z.object({
  merkleRoot: hash,
  anchorType: z.string().min(1),
  externalTimestamp: unixSeconds,
  reference: z.string().optional(),
});

export const CitedRecordSchema = z.object({
  attestation: AttestationSchema,
  proof: MerkleProofSchema,
  anchor: AnchorSchema.optional(),
});
