/**
 * Hex / hash codec.
 *
 * Every hash-valued field in the protocol is 32 raw bytes, rendered as
 * 64 lowercase hex characters at any boundary. Hashing always operates on
 * the decoded bytes, never on the hex text.
 */

import { createHash } from "node:crypto";
import { InvalidInputError } from "./errors.js";

// =============================================================================
// Constants
// =============================================================================

/** Length of a SHA-256 digest in bytes */
export const HASH_BYTES = 32;

/** Length of a hex-encoded SHA-256 digest */
export const HASH_HEX_LENGTH = 64;

/**
 * Genesis root: SHA-256 of the empty input.
 * Root of the empty tree and the protocol's reference root.
 */
export const GENESIS_ROOT =
  "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855";

const HASH_PATTERN = /^[0-9a-fA-F]{64}$/;
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/;

// =============================================================================
// Predicates
// =============================================================================

/** True for a 64-char hex string (either case). */
export function isHash(value: unknown): value is string {
  return typeof value === "string" && HASH_PATTERN.test(value);
}

/** True for an even-length hex string (either case, possibly empty). */
export function isHex(value: unknown): value is string {
  return typeof value === "string" && HEX_PATTERN.test(value);
}

/**
 * Validate and lowercase a hash field.
 *
 * @throws InvalidInputError if the value is not 64 hex characters
 */
export function normalizeHash(value: unknown, field: string): string {
  if (!isHash(value)) {
    const shown = typeof value === "string" ? `${value.length} chars` : typeof value;
    throw new InvalidInputError(
      `${field} must be a 64-character hex string (got ${shown})`,
      field,
    );
  }
  return value.toLowerCase();
}

// =============================================================================
// Encoding
// =============================================================================

export function hexToBytes(hex: string): Uint8Array {
  if (!isHex(hex)) {
    throw new InvalidInputError("Malformed hex string", "hex");
  }
  return Uint8Array.from(Buffer.from(hex, "hex"));
}

export function bytesToHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

export function bytesToBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

/**
 * Decode standard base64. Returns null for anything that does not
 * round-trip, so verification paths can fail closed.
 */
export function base64ToBytes(b64: string): Uint8Array | null {
  const buf = Buffer.from(b64, "base64");
  if (buf.length === 0 || buf.toString("base64") !== b64) {
    return null;
  }
  return Uint8Array.from(buf);
}

export function concatBytes(...parts: readonly Uint8Array[]): Uint8Array {
  return Uint8Array.from(Buffer.concat(parts));
}

/**
 * Encode a Unix timestamp as exactly 8 bytes, big-endian.
 *
 * @throws InvalidInputError for negative, fractional or unsafe values
 */
export function u64be(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new InvalidInputError(
      `timestamp must be a non-negative integer (got ${value})`,
      "timestamp",
    );
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt(value), false);
  return out;
}

// =============================================================================
// Hashing
// =============================================================================

export function sha256(data: Uint8Array): Uint8Array {
  return Uint8Array.from(createHash("sha256").update(data).digest());
}

export function sha256Hex(data: Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

/** SHA-256 of the UTF-8 encoding of a string, as hex. */
export function sha256Text(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}
