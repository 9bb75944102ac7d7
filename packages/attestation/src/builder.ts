/**
 * @zoneledger/attestation — Attestation builder.
 *
 * Produces signed, content-addressed attestations:
 *   attestationId = H(zoneId || canonId || claimHash || u64be(timestamp))
 *   preimage      = attestationId || claimHash || evidenceHash
 *                   || u64be(timestamp) || citationsHash
 *   signature     = base64(sign(preimage))
 *
 * Design:
 * - Pure: validates, hashes and signs; never touches a ledger
 * - All validation happens before any hashing or signing
 * - Citations are stored in canonical form (lowercase, deduplicated, sorted)
 */

import {
  base64ToBytes,
  bytesToBase64,
  bytesToHex,
  concatBytes,
  hexToBytes,
  isHash,
  isHex,
  normalizeHash,
  sha256,
  sha256Text,
  u64be,
} from "@zoneledger/types";
import type {
  Attestation,
  AttestationInput,
  PublicIdentity,
} from "@zoneledger/types";
import { computeZoneId, verifySignature } from "@zoneledger/identity";
import type { SigningIdentity } from "@zoneledger/identity";

// =============================================================================
// Types
// =============================================================================

export type AttestationFailureReason =
  | "malformed"
  | "zone_id_mismatch"
  | "attestation_id_mismatch"
  | "citations_not_canonical"
  | "bad_signature";

export interface AttestationVerification {
  readonly valid: boolean;
  readonly reason?: AttestationFailureReason | undefined;
}

// =============================================================================
// Hashing
// =============================================================================

/**
 * attestationId = H(zoneId || canonId || claimHash || u64be(timestamp)),
 * over the raw bytes of each field.
 *
 * @throws InvalidInputError on malformed hashes or timestamp
 */
export function computeAttestationId(
  zoneId: string,
  canonId: string,
  claimHash: string,
  timestamp: number,
): string {
  const preimage = concatBytes(
    hexToBytes(normalizeHash(zoneId, "zoneId")),
    hexToBytes(normalizeHash(canonId, "canonId")),
    hexToBytes(normalizeHash(claimHash, "claimHash")),
    u64be(timestamp),
  );
  return bytesToHex(sha256(preimage));
}

/**
 * Validate, lowercase, deduplicate and sort citation IDs.
 *
 * @throws InvalidInputError if any entry is not a 64-char hex string
 */
export function normalizeCitations(citations: readonly string[]): string[] {
  const normalized = citations.map((c, i) => normalizeHash(c, `citations[${i}]`));
  return [...new Set(normalized)].sort();
}

/**
 * H(utf8(concatenation of the normalized citation hex strings)).
 * No citations hashes to the genesis value H("").
 */
export function computeCitationsHash(citations: readonly string[]): string {
  return sha256Text(normalizeCitations(citations).join(""));
}

/**
 * Bytes the Zone signs: 32 + 32 + 32 + 8 + 32 = 136 bytes.
 */
export function buildSigningPreimage(
  attestationId: string,
  claimHash: string,
  evidenceHash: string,
  timestamp: number,
  citations: readonly string[],
): Uint8Array {
  return concatBytes(
    hexToBytes(normalizeHash(attestationId, "attestationId")),
    hexToBytes(normalizeHash(claimHash, "claimHash")),
    hexToBytes(normalizeHash(evidenceHash, "evidenceHash")),
    u64be(timestamp),
    hexToBytes(computeCitationsHash(citations)),
  );
}

// =============================================================================
// Build
// =============================================================================

/**
 * Build and sign an attestation.
 *
 * @throws InvalidInputError on malformed input (before any signing)
 * @throws IdentityError if signing fails
 */
export async function buildAttestation(
  identity: SigningIdentity,
  input: AttestationInput,
): Promise<Attestation> {
  const canonId = normalizeHash(input.canonId, "canonId");
  const claimHash = normalizeHash(input.claimHash, "claimHash");
  const evidenceHash = normalizeHash(input.evidenceHash, "evidenceHash");
  const citations = normalizeCitations(input.citations ?? []);
  // validates the timestamp up front
  u64be(input.timestamp);

  const attestationId = computeAttestationId(
    identity.zoneId,
    canonId,
    claimHash,
    input.timestamp,
  );
  const preimage = buildSigningPreimage(
    attestationId,
    claimHash,
    evidenceHash,
    input.timestamp,
    citations,
  );
  const signature = await identity.sign(preimage);

  return {
    attestationId,
    zoneId: identity.zoneId,
    canonId,
    claimHash,
    evidenceHash,
    ...(input.evidenceLocation !== undefined
      ? { evidenceLocation: input.evidenceLocation }
      : {}),
    citations,
    timestamp: input.timestamp,
    signature: bytesToBase64(signature),
  };
}

// =============================================================================
// Verify
// =============================================================================

function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

/**
 * Check an attestation against the identity that claims to have signed it.
 *
 * Never throws: malformed records report `{ valid: false, reason: "malformed" }`.
 */
export async function verifyAttestation(
  attestation: Attestation,
  identity: Pick<PublicIdentity, "algorithm" | "publicKey">,
): Promise<AttestationVerification> {
  const hashFields = [
    attestation.attestationId,
    attestation.zoneId,
    attestation.canonId,
    attestation.claimHash,
    attestation.evidenceHash,
  ];
  if (
    !hashFields.every(isHash) ||
    !attestation.citations.every(isHash) ||
    !Number.isSafeInteger(attestation.timestamp) ||
    attestation.timestamp < 0 ||
    !isHex(identity.publicKey)
  ) {
    return { valid: false, reason: "malformed" };
  }

  if (computeZoneId(identity.publicKey) !== attestation.zoneId.toLowerCase()) {
    return { valid: false, reason: "zone_id_mismatch" };
  }

  const expectedId = computeAttestationId(
    attestation.zoneId,
    attestation.canonId,
    attestation.claimHash,
    attestation.timestamp,
  );
  if (expectedId !== attestation.attestationId.toLowerCase()) {
    return { valid: false, reason: "attestation_id_mismatch" };
  }

  if (!sameList(normalizeCitations(attestation.citations), attestation.citations)) {
    return { valid: false, reason: "citations_not_canonical" };
  }

  const signature = base64ToBytes(attestation.signature);
  if (signature === null) {
    return { valid: false, reason: "bad_signature" };
  }

  const preimage = buildSigningPreimage(
    attestation.attestationId,
    attestation.claimHash,
    attestation.evidenceHash,
    attestation.timestamp,
    attestation.citations,
  );
  const ok = await verifySignature(identity, preimage, signature);
  return ok ? { valid: true } : { valid: false, reason: "bad_signature" };
}
