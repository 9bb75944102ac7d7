/**
 * Hash codec tests.
 *
 * Verifies:
 * - Genesis constant equals SHA-256 of the empty input
 * - Hash validation and lowercasing
 * - 8-byte big-endian timestamp encoding
 * - Hex and base64 codecs
 */

import { describe, it, expect } from "vitest";
import {
  GENESIS_ROOT,
  normalizeHash,
  isHash,
  hexToBytes,
  bytesToHex,
  bytesToBase64,
  base64ToBytes,
  concatBytes,
  u64be,
  sha256Hex,
  sha256Text,
} from "../src/hash.js";
import { InvalidInputError } from "../src/errors.js";

describe("GENESIS_ROOT", () => {
  it("is the SHA-256 of the empty input", () => {
    expect(sha256Hex(new Uint8Array(0))).toBe(GENESIS_ROOT);
    expect(sha256Text("")).toBe(GENESIS_ROOT);
  });
});

describe("normalizeHash", () => {
  it("lowercases a valid upper-case hash", () => {
    expect(normalizeHash("AB".repeat(32), "claimHash")).toBe("ab".repeat(32));
  });

  it("rejects a 63-character value with the field name", () => {
    try {
      normalizeHash("a".repeat(63), "claimHash");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      expect(err).toMatchObject({ field: "claimHash", code: "INVALID_INPUT" });
    }
  });

  it("rejects non-hex characters and non-strings", () => {
    expect(() => normalizeHash("g".repeat(64), "x")).toThrow(InvalidInputError);
    expect(() => normalizeHash(42, "x")).toThrow(InvalidInputError);
  });

  it("isHash never accepts the duplicate marker", () => {
    expect(isHash("*")).toBe(false);
  });
});

describe("u64be", () => {
  it("encodes 1 as seven zero bytes then 0x01", () => {
    expect(bytesToHex(u64be(1))).toBe("0000000000000001");
  });

  it("encodes a typical Unix timestamp", () => {
    // 1_700_000_000 = 0x6553F100
    expect(bytesToHex(u64be(1_700_000_000))).toBe("000000006553f100");
  });

  it("always produces exactly 8 bytes", () => {
    expect(u64be(0)).toHaveLength(8);
    expect(u64be(Number.MAX_SAFE_INTEGER)).toHaveLength(8);
  });

  it("rejects negative and fractional timestamps", () => {
    expect(() => u64be(-1)).toThrow(InvalidInputError);
    expect(() => u64be(1.25)).toThrow(InvalidInputError);
  });
});

describe("hex and base64 codecs", () => {
  it("round-trips hex", () => {
    const bytes = hexToBytes("00ff10");
    expect(Array.from(bytes)).toEqual([0, 255, 16]);
    expect(bytesToHex(bytes)).toBe("00ff10");
  });

  it("rejects odd-length hex", () => {
    expect(() => hexToBytes("abc")).toThrow(InvalidInputError);
  });

  it("decodes base64 and refuses garbage", () => {
    expect(bytesToBase64(new Uint8Array([1, 2, 3]))).toBe("AQID");
    expect(Array.from(base64ToBytes("AQID") ?? [])).toEqual([1, 2, 3]);
    expect(base64ToBytes("not base64!")).toBeNull();
    expect(base64ToBytes("")).toBeNull();
  });

  it("concatenates byte arrays in order", () => {
    const out = concatBytes(new Uint8Array([1]), new Uint8Array([2, 3]));
    expect(Array.from(out)).toEqual([1, 2, 3]);
  });
});
