/**
 * @zoneledger/proof — Core types.
 *
 * Types for Merkle trees, inclusion proofs, and attestation proof packaging.
 * All hashes are SHA-256 hex strings (64 characters, lowercase).
 */

import type { Anchor, Attestation } from "@zoneledger/types";

// =============================================================================
// Merkle Proof Types
// =============================================================================

/** Current proof format version */
export const PROOF_VERSION = "1.0";

/**
 * Sibling token meaning "pair the current node with itself". Only valid
 * at level 0 for the trailing leaf of an odd bottom layer. Never collides
 * with a hash because "*" is not a hex digit.
 */
export const DUPLICATE_MARKER = "*";

/**
 * A Merkle inclusion proof: proves that a leaf exists in a tree with a
 * given root.
 *
 * Self-contained: a verifier needs ONLY this proof to check inclusion.
 * Siblings carry no direction; it is derived from leafIndex at each
 * level, and leafCount tells the verifier which levels carried the node
 * up without a sibling.
 */
export interface MerkleProof {
  readonly version: typeof PROOF_VERSION;
  /** Attestation ID being proven */
  readonly leafHash: string;
  /** Position of the leaf in the sorted leaf set (0-based) */
  readonly leafIndex: number;
  /** Number of leaves in the tree the proof was taken from */
  readonly leafCount: number;
  /** Sibling hashes from the bottom up; "*" at most once, first */
  readonly siblings: readonly string[];
  /** Merkle root the proof resolves to */
  readonly root: string;
}

// =============================================================================
// Attestation Proof Types
// =============================================================================

/**
 * A self-contained attestation proof package.
 *
 * Contains everything needed to verify that a specific attestation was
 * included under a root, and optionally when that root was anchored,
 * without access to the issuing Zone's ledger.
 */
export interface AttestationProofPackage {
  /** Version of the proof package format */
  readonly version: 1;
  /** The attestation being proven */
  readonly attestation: Attestation;
  /** Inclusion proof: proves attestationId is a leaf under merkleRoot */
  readonly inclusionProof: MerkleProof;
  /** Merkle root of the issuing ledger */
  readonly merkleRoot: string;
  /** External anchor of merkleRoot, when one was recorded */
  readonly anchor?: Anchor | undefined;
  /** When this proof package was created */
  readonly packagedAt: string;
  /** SHA-256 of canonical(entire package minus this field) for tamper evidence */
  readonly packageHash: string;
}
