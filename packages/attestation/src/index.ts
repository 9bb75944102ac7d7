/**
 * @zoneledger/attestation — Signed attestations and canons.
 *
 * @packageDocumentation
 */

export type { AttestationFailureReason, AttestationVerification } from "./builder.js";
export {
  buildAttestation,
  buildSigningPreimage,
  computeAttestationId,
  computeCitationsHash,
  normalizeCitations,
  verifyAttestation,
} from "./builder.js";

export type { Canon, CanonRegistry } from "./canon.js";
export {
  computeCanonId,
  createDefaultCanonRegistry,
  DEFAULT_CANON_ID,
  hashContent,
  InMemoryCanonRegistry,
} from "./canon.js";
