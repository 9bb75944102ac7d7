/**
 * @zoneledger/identity — Zone identities.
 *
 * Ed25519 (primary) and secp256k1 keypairs, zoneId derivation,
 * fail-closed signature verification, key files and rotation history.
 *
 * @packageDocumentation
 */

export type { AlgorithmSuite } from "./algorithms.js";
export { suiteFor, findSuite } from "./algorithms.js";

export type { SigningIdentity } from "./identity.js";
export {
  computeZoneId,
  assertZoneId,
  generateIdentity,
  identityFromSecretKey,
  verifySignature,
} from "./identity.js";

export {
  loadIdentityFile,
  loadIdentityHistory,
  saveIdentityFile,
  saveIdentityHistory,
} from "./key-file.js";

export type { RetiredIdentity } from "./history.js";
export { IdentityHistory } from "./history.js";
