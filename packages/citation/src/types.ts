/**
 * @zoneledger/citation — Types.
 */

import type { Anchor, Attestation } from "@zoneledger/types";
import type { MerkleProof } from "@zoneledger/proof";
import type { AnchoredRoot } from "@zoneledger/ledger";

// =============================================================================
// Transport
// =============================================================================

/**
 * What a Zone serves for one of its attestations: the record, an
 * inclusion proof, and the anchor of the proof's root if it has one.
 */
export interface CitedRecord {
  readonly attestation: Attestation;
  readonly proof: MerkleProof;
  readonly anchor?: Anchor | undefined;
}

/**
 * Reaches another Zone.
 *
 * Implementations throw RemoteNotFoundError when the Zone answered but
 * does not know the attestation, and UnreachableCollaboratorError for
 * anything else that prevented an answer.
 */
export interface ZoneTransport {
  fetchCited(
    endpoint: string,
    attestationId: string,
    signal?: AbortSignal,
  ): Promise<CitedRecord>;
}

/**
 * Local source of the citing attestation's enclosing anchor.
 * AnchorRegistry implements it.
 */
export interface EnclosingAnchorSource {
  enclosingAnchor(attestationId: string): AnchoredRoot | undefined;
}

// =============================================================================
// Results
// =============================================================================

export type CitationStatus = "VALID" | "INVALID";

export type CitationFailureReason =
  | "unreachable"
  | "not_found"
  | "attestation_mismatch"
  | "proof_invalid"
  | "cited_root_unanchored"
  | "citing_root_unanchored"
  | "cited_not_earlier";

export interface CitationTarget {
  readonly citedId: string;
  readonly citedZoneEndpoint: string;
}

export interface CitationRequest extends CitationTarget {
  readonly citingId: string;
}

export interface CitationCheckResult {
  readonly citingId: string;
  readonly citedId: string;
  readonly status: CitationStatus;
  /** Present iff status is INVALID */
  readonly reason?: CitationFailureReason | undefined;
  /** Human-readable detail for the failure */
  readonly detail?: string | undefined;
  readonly citedRoot?: string | undefined;
  readonly citedAnchorTimestamp?: number | undefined;
  readonly citingAnchorTimestamp?: number | undefined;
}
