/**
 * @zoneledger/proof — Merkle trees and inclusion proofs.
 *
 * Deterministic Merkle trees over attestation ID sets, positional
 * inclusion proofs, and self-contained attestation proof packages.
 *
 * @packageDocumentation
 */

// Types
export type { MerkleProof, AttestationProofPackage } from "./types.js";
export { DUPLICATE_MARKER, PROOF_VERSION } from "./types.js";

// Merkle tree
export { MerkleTree, buildRoot, buildProof, verifyProof } from "./merkle-tree.js";

// Boundary parsing
export { MerkleProofSchema, parseProof } from "./parse.js";

// Attestation proof packaging
export {
  packageAttestationProof,
  verifyAttestationProof,
} from "./attestation-proof.js";
