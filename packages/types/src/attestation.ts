/**
 * Attestation types.
 *
 * An attestation is an immutable, signed record: "claim X was recorded by
 * Zone Y at time T". All hash fields are 64-char lowercase hex.
 */

// =============================================================================
// Attestation
// =============================================================================

export interface Attestation {
  /** H(zoneId || canonId || claimHash || u64be(timestamp)) */
  readonly attestationId: string;
  /** H(publicKeyBytes) of the signing identity */
  readonly zoneId: string;
  /** Canon (verification methodology) the claim was judged under */
  readonly canonId: string;
  readonly claimHash: string;
  readonly evidenceHash: string;
  /** URI where the evidence can be retrieved */
  readonly evidenceLocation?: string | undefined;
  /** Cited attestation IDs, deduplicated and sorted */
  readonly citations: readonly string[];
  /** Unix seconds, self-reported by the issuing Zone */
  readonly timestamp: number;
  /** Base64 signature over the signing preimage */
  readonly signature: string;
}

/**
 * Fields supplied by the caller when building an attestation.
 * zoneId and signature come from the signing identity.
 */
export interface AttestationInput {
  readonly canonId: string;
  readonly claimHash: string;
  readonly evidenceHash: string;
  readonly evidenceLocation?: string | undefined;
  readonly citations?: readonly string[] | undefined;
  readonly timestamp: number;
}
