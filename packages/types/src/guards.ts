/**
 * Runtime Type Guards
 *
 * Narrowing functions for zoneledger domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, deserialized records, remote Zone responses).
 */

import type { Attestation } from "./attestation.js";
import type { Anchor } from "./anchor.js";
import type { KeyAlgorithm, PublicIdentity } from "./identity.js";
import { KEY_ALGORITHMS } from "./identity.js";
import { isHash } from "./hash.js";

// =============================================================================
// Primitive guards
// =============================================================================

export function isUnixTimestamp(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value) && value >= 0;
}

export function isKeyAlgorithm(value: unknown): value is KeyAlgorithm {
  return typeof value === "string" && (KEY_ALGORITHMS as readonly string[]).includes(value);
}

// =============================================================================
// Attestation guards
// =============================================================================

export function isAttestation(value: unknown): value is Attestation {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isHash(v.attestationId) &&
    isHash(v.zoneId) &&
    isHash(v.canonId) &&
    isHash(v.claimHash) &&
    isHash(v.evidenceHash) &&
    (v.evidenceLocation === undefined || typeof v.evidenceLocation === "string") &&
    Array.isArray(v.citations) &&
    v.citations.every((c) => isHash(c)) &&
    isUnixTimestamp(v.timestamp) &&
    typeof v.signature === "string" &&
    v.signature.length > 0
  );
}

// =============================================================================
// Anchor guards
// =============================================================================

export function isAnchor(value: unknown): value is Anchor {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isHash(v.merkleRoot) &&
    typeof v.anchorType === "string" &&
    v.anchorType.length > 0 &&
    isUnixTimestamp(v.externalTimestamp) &&
    (v.reference === undefined || typeof v.reference === "string")
  );
}

// =============================================================================
// Identity guards
// =============================================================================

export function isPublicIdentity(value: unknown): value is PublicIdentity {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isKeyAlgorithm(v.algorithm) &&
    typeof v.publicKey === "string" &&
    /^[0-9a-f]+$/.test(v.publicKey) &&
    isHash(v.zoneId)
  );
}
