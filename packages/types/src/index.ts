/**
 * @zoneledger/types — Shared domain types.
 *
 * Attestation, anchor and identity shapes, the hex/hash codec,
 * runtime guards and the error taxonomy used across all packages.
 *
 * @packageDocumentation
 */

export type { Attestation, AttestationInput } from "./attestation.js";
export type { Anchor, AnchorType, KnownAnchorType } from "./anchor.js";
export type { KeyAlgorithm, PublicIdentity } from "./identity.js";
export { KEY_ALGORITHMS } from "./identity.js";

export {
  HASH_BYTES,
  HASH_HEX_LENGTH,
  GENESIS_ROOT,
  isHash,
  isHex,
  normalizeHash,
  hexToBytes,
  bytesToHex,
  bytesToBase64,
  base64ToBytes,
  concatBytes,
  u64be,
  sha256,
  sha256Hex,
  sha256Text,
} from "./hash.js";

export {
  ZoneError,
  InvalidInputError,
  DuplicateAttestationError,
  IdentityError,
  UnreachableCollaboratorError,
  RemoteNotFoundError,
  isZoneError,
} from "./errors.js";
export type { ZoneErrorCode } from "./errors.js";

export {
  isUnixTimestamp,
  isKeyAlgorithm,
  isAttestation,
  isAnchor,
  isPublicIdentity,
} from "./guards.js";
