/**
 * @zoneledger/proof — Attestation Proof Packaging.
 *
 * Wraps an attestation with its Merkle inclusion proof, and the anchor of
 * the proof's root when there is one, into a self-contained, independently
 * verifiable proof package.
 *
 * Design:
 * - Self-contained: third parties verify with ONLY this package
 * - packageHash covers all fields for tamper evidence
 * - SHA-256 + RFC 8785 canonical JSON
 * - All pure functions, no I/O
 */

import { canonicalize } from "json-canonicalize";
import { sha256Text } from "@zoneledger/types";
import type { Anchor, Attestation } from "@zoneledger/types";
import { verifyProof } from "./merkle-tree.js";
import type { AttestationProofPackage, MerkleProof } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Compute the package hash from all fields except packageHash itself.
 */
function computePackageHash(
  fields: Omit<AttestationProofPackage, "packageHash">,
): string {
  const data = {
    version: fields.version,
    attestation: fields.attestation,
    inclusionProof: fields.inclusionProof,
    merkleRoot: fields.merkleRoot,
    ...(fields.anchor !== undefined ? { anchor: fields.anchor } : {}),
    packagedAt: fields.packagedAt,
  };
  return sha256Text(canonicalize(data));
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Package an attestation with its inclusion proof.
 *
 * @returns the package, or null when the proof is not for this attestation
 *   or the anchor is for a different root
 */
export function packageAttestationProof(
  attestation: Attestation,
  inclusionProof: MerkleProof,
  anchor?: Anchor,
  packagedAt: string = new Date().toISOString(),
): AttestationProofPackage | null {
  if (inclusionProof.leafHash !== attestation.attestationId) {
    return null;
  }
  if (anchor !== undefined && anchor.merkleRoot !== inclusionProof.root) {
    return null;
  }

  const fields = {
    version: 1 as const,
    attestation,
    inclusionProof,
    merkleRoot: inclusionProof.root,
    ...(anchor !== undefined ? { anchor } : {}),
    packagedAt,
  };

  return { ...fields, packageHash: computePackageHash(fields) };
}

/**
 * Verify an attestation proof package.
 *
 * Checks:
 * 1. The proof's leaf is the attestation's ID
 * 2. Merkle inclusion proof resolves to merkleRoot
 * 3. The anchor, when present, anchors merkleRoot
 * 4. packageHash matches recomputed hash of all fields
 *
 * Signature checks need the Zone's public identity and are left to
 * verifyAttestation().
 */
export function verifyAttestationProof(pkg: AttestationProofPackage): boolean {
  const { attestation, inclusionProof, merkleRoot, anchor } = pkg;

  if (inclusionProof.leafHash !== attestation.attestationId) {
    return false;
  }

  if (
    inclusionProof.root !== merkleRoot ||
    !verifyProof(attestation.attestationId, inclusionProof.leafIndex, inclusionProof, merkleRoot)
  ) {
    return false;
  }

  if (anchor !== undefined && anchor.merkleRoot !== merkleRoot) {
    return false;
  }

  return computePackageHash(pkg) === pkg.packageHash;
}
