/**
 * Request body schemas (Zod).
 */

import { z } from "zod";

const hash = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, "Expected a 64-character hex string");

const submitCommon = {
  canonId: hash.optional(),
  evidenceLocation: z.string().min(1).optional(),
  citations: z.array(hash).max(1024).optional(),
};

// =============================================================================
// POST /verify
// =============================================================================

/** Raw claim and evidence text; the node hashes both */
export const SubmitTextSchema = z
  .object({
    claim: z.string().min(1),
    evidence: z.string(),
    ...submitCommon,
  })
  .strict();

/** Pre-hashed claim and evidence */
export const SubmitHashedSchema = z
  .object({
    claimHash: hash,
    evidenceHash: hash,
    ...submitCommon,
  })
  .strict();

export const SubmitSchema = z.union([SubmitTextSchema, SubmitHashedSchema]);

export type SubmitDto = z.infer<typeof SubmitSchema>;

// =============================================================================
// POST /anchors
// =============================================================================

export const RecordAnchorSchema = z.object({
  merkleRoot: hash,
  anchorType: z.string().min(1),
  externalTimestamp: z.number().int().nonnegative(),
  reference: z.string().min(1).optional(),
});

export type RecordAnchorDto = z.infer<typeof RecordAnchorSchema>;

// =============================================================================
// POST /citations/verify
// =============================================================================

const endpoint = z
  .string()
  .url()
  .refine((u) => u.startsWith("http://") || u.startsWith("https://"), {
    message: "Expected an http(s) URL",
  });

export const VerifyCitationSchema = z.object({
  citingId: hash,
  citedId: hash,
  citedZoneEndpoint: endpoint,
});

export const VerifyCitationsSchema = z.object({
  citingId: hash,
  targets: z
    .array(z.object({ citedId: hash, citedZoneEndpoint: endpoint }))
    .min(1)
    .max(256),
});

export type VerifyCitationDto = z.infer<typeof VerifyCitationSchema>;
export type VerifyCitationsDto = z.infer<typeof VerifyCitationsSchema>;
