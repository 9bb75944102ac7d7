/**
 * Public identity types.
 *
 * Identities are self-describing tagged values, not a class hierarchy:
 * the algorithm tag selects the sign/verify capability pair.
 */

export type KeyAlgorithm = "ed25519" | "secp256k1";

export const KEY_ALGORITHMS: readonly KeyAlgorithm[] = ["ed25519", "secp256k1"];

/**
 * The publishable half of a Zone identity.
 */
export interface PublicIdentity {
  readonly algorithm: KeyAlgorithm;
  /** Hex-encoded public key bytes (32 for ed25519, 33 compressed for secp256k1) */
  readonly publicKey: string;
  /** H(publicKeyBytes) */
  readonly zoneId: string;
}
