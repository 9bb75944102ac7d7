/**
 * @zoneledger/identity — Zone identities.
 *
 * A Zone identity is a signing keypair plus the derived
 * zoneId = SHA-256(publicKeyBytes). The zoneId is never assigned; it is
 * always recomputed from the public key, so a Zone cannot claim an
 * identifier it does not hold the key for.
 *
 * Design:
 * - Tagged values ({ algorithm, publicKey }) with capability dispatch
 * - Secret keys stay inside a closure; only exportSecretKey() reveals them
 * - Verification fails closed: malformed input yields false, never a throw
 */

import {
  bytesToHex,
  hexToBytes,
  isHex,
  IdentityError,
  sha256Hex,
} from "@zoneledger/types";
import type { KeyAlgorithm, PublicIdentity } from "@zoneledger/types";
import { findSuite, suiteFor } from "./algorithms.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A Zone identity able to sign. Created by generateIdentity() or
 * identityFromSecretKey(); never constructed by hand.
 */
export interface SigningIdentity extends PublicIdentity {
  /** Sign raw bytes. Resolves to the raw signature bytes. */
  sign(message: Uint8Array): Promise<Uint8Array>;
  /** The publishable half of this identity */
  toPublic(): PublicIdentity;
  /** Hex-encoded secret key, for persistence by the caller */
  exportSecretKey(): string;
}

// =============================================================================
// Zone ID
// =============================================================================

/**
 * zoneId = SHA-256(publicKeyBytes), as lowercase hex.
 */
export function computeZoneId(publicKey: Uint8Array | string): string {
  const bytes = typeof publicKey === "string" ? hexToBytes(publicKey) : publicKey;
  return sha256Hex(bytes);
}

/**
 * Reject an identity whose claimed zoneId is not derived from its key.
 *
 * @throws IdentityError on mismatch or malformed public key
 */
export function assertZoneId(claimedZoneId: string, identity: PublicIdentity): void {
  if (!isHex(identity.publicKey)) {
    throw new IdentityError("Public key is not valid hex");
  }
  const derived = computeZoneId(identity.publicKey);
  if (derived !== claimedZoneId.toLowerCase()) {
    throw new IdentityError(
      `Zone ID ${claimedZoneId} does not match SHA-256 of the ${identity.algorithm} public key (${derived})`,
    );
  }
}

// =============================================================================
// Construction
// =============================================================================

async function createSigningIdentity(
  algorithm: KeyAlgorithm,
  secretKey: Uint8Array,
): Promise<SigningIdentity> {
  const suite = suiteFor(algorithm);

  if (secretKey.length !== suite.secretKeyBytes) {
    throw new IdentityError(
      `${algorithm} secret key must be ${suite.secretKeyBytes} bytes, got ${secretKey.length}`,
    );
  }

  let publicKeyBytes: Uint8Array;
  try {
    publicKeyBytes = await suite.derivePublicKey(secretKey);
  } catch (err) {
    throw new IdentityError(
      `Invalid ${algorithm} secret key: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const publicKey = bytesToHex(publicKeyBytes);
  const zoneId = computeZoneId(publicKeyBytes);
  const secret = Uint8Array.from(secretKey);
  const publicIdentity: PublicIdentity = { algorithm, publicKey, zoneId };

  return {
    algorithm,
    publicKey,
    zoneId,
    async sign(message: Uint8Array): Promise<Uint8Array> {
      try {
        return await suite.sign(message, secret);
      } catch (err) {
        throw new IdentityError(
          `${algorithm} signing failed: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
    },
    toPublic: () => publicIdentity,
    exportSecretKey: () => bytesToHex(secret),
  };
}

/**
 * Generate a fresh identity.
 */
export async function generateIdentity(
  algorithm: KeyAlgorithm = "ed25519",
): Promise<SigningIdentity> {
  return createSigningIdentity(algorithm, suiteFor(algorithm).generateSecretKey());
}

/**
 * Restore an identity from a hex-encoded secret key.
 *
 * @throws IdentityError if the key is missing, not hex, or the wrong length
 */
export async function identityFromSecretKey(
  algorithm: KeyAlgorithm,
  secretKeyHex: string | undefined,
): Promise<SigningIdentity> {
  if (secretKeyHex === undefined || secretKeyHex.trim() === "") {
    throw new IdentityError("No secret key provided");
  }
  const trimmed = secretKeyHex.trim();
  if (!isHex(trimmed)) {
    throw new IdentityError("Secret key must be hex-encoded");
  }
  return createSigningIdentity(algorithm, hexToBytes(trimmed));
}

// =============================================================================
// Verification
// =============================================================================

/**
 * Verify a signature against a public identity.
 *
 * Fails closed: a malformed public key, a key of the wrong length or a
 * signature the algorithm rejects all return false.
 */
export async function verifySignature(
  identity: Pick<PublicIdentity, "algorithm" | "publicKey">,
  message: Uint8Array,
  signature: Uint8Array,
): Promise<boolean> {
  if (!isHex(identity.publicKey)) {
    return false;
  }

  const suite = findSuite(identity.algorithm);
  if (suite === undefined) {
    return false;
  }

  const publicKey = hexToBytes(identity.publicKey);
  if (publicKey.length !== suite.publicKeyBytes) {
    return false;
  }

  try {
    return await suite.verify(signature, message, publicKey);
  } catch {
    return false;
  }
}
