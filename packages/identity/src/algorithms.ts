/**
 * Signature algorithm capability table.
 *
 * Each supported algorithm contributes one suite of pure functions.
 * Identities carry only the algorithm tag; every sign/verify call is
 * dispatched through this table.
 *
 * Key material:
 * - Secret keys are 32 random bytes for both algorithms
 * - ed25519 public keys are 32 bytes; secp256k1 public keys are 33-byte
 *   compressed points
 * - ed25519 signs the message itself; secp256k1 signs SHA-256(message)
 *   and emits the 64-byte compact (r || s) form with low-s
 */

import { randomBytes } from "node:crypto";
import * as ed from "@noble/ed25519";
import { secp256k1 } from "@noble/curves/secp256k1";
import { isKeyAlgorithm, sha256 } from "@zoneledger/types";
import type { KeyAlgorithm } from "@zoneledger/types";

// =============================================================================
// Types
// =============================================================================

export interface AlgorithmSuite {
  readonly secretKeyBytes: number;
  readonly publicKeyBytes: number;
  generateSecretKey(): Uint8Array;
  derivePublicKey(secretKey: Uint8Array): Promise<Uint8Array>;
  sign(message: Uint8Array, secretKey: Uint8Array): Promise<Uint8Array>;
  verify(
    signature: Uint8Array,
    message: Uint8Array,
    publicKey: Uint8Array,
  ): Promise<boolean>;
}

// =============================================================================
// Suites
// =============================================================================

const ed25519Suite: AlgorithmSuite = {
  secretKeyBytes: 32,
  publicKeyBytes: 32,
  generateSecretKey: () => Uint8Array.from(randomBytes(32)),
  derivePublicKey: (secretKey) => ed.getPublicKeyAsync(secretKey),
  sign: (message, secretKey) => ed.signAsync(message, secretKey),
  verify: (signature, message, publicKey) =>
    ed.verifyAsync(signature, message, publicKey),
};

const secp256k1Suite: AlgorithmSuite = {
  secretKeyBytes: 32,
  publicKeyBytes: 33,
  generateSecretKey: () => secp256k1.utils.randomPrivateKey(),
  derivePublicKey: async (secretKey) => secp256k1.getPublicKey(secretKey, true),
  sign: async (message, secretKey) =>
    secp256k1.sign(sha256(message), secretKey).toCompactRawBytes(),
  verify: async (signature, message, publicKey) =>
    secp256k1.verify(signature, sha256(message), publicKey),
};

const SUITES: Readonly<Record<KeyAlgorithm, AlgorithmSuite>> = {
  ed25519: ed25519Suite,
  secp256k1: secp256k1Suite,
};

/**
 * Look up the capability suite for an algorithm tag.
 */
export function suiteFor(algorithm: KeyAlgorithm): AlgorithmSuite {
  return SUITES[algorithm];
}

/**
 * Like suiteFor(), for tags read from untrusted input.
 */
export function findSuite(algorithm: string): AlgorithmSuite | undefined {
  return isKeyAlgorithm(algorithm) ? SUITES[algorithm] : undefined;
}
