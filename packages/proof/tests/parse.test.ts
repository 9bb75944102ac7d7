/**
 * Proof Parser Tests
 */

import { describe, it, expect } from "vitest";
import { createHash } from "node:crypto";
import { InvalidInputError } from "@zoneledger/types";
import { MerkleTree } from "../src/merkle-tree.js";
import { parseProof } from "../src/parse.js";

function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

const leaves = ["a", "b", "c"].map(sha256);
const tree = MerkleTree.build(leaves);
const trailing = [...leaves].sort()[2] ?? "";
const maybeProof = tree.getProof(trailing);
if (maybeProof === null) throw new Error("missing proof");
const proof = maybeProof;

describe("parseProof", () => {
  it("accepts a proof produced by the tree", () => {
    expect(parseProof(JSON.parse(JSON.stringify(proof)))).toEqual(proof);
  });

  it("lowercases hex fields", () => {
    const upper = {
      ...proof,
      leafHash: trailing.toUpperCase(),
      root: tree.getRoot().toUpperCase(),
    };
    const parsed = parseProof(upper);
    expect(parsed.leafHash).toBe(trailing);
    expect(parsed.root).toBe(tree.getRoot());
  });

  it("keeps the duplicate marker", () => {
    expect(parseProof(proof).siblings[0]).toBe("*");
  });

  it("rejects a non-object", () => {
    expect(() => parseProof("proof")).toThrow(InvalidInputError);
    expect(() => parseProof(null)).toThrow(InvalidInputError);
  });

  it("rejects an unknown version", () => {
    expect(() => parseProof({ ...proof, version: "2.0" })).toThrow(/at version/);
  });

  it("rejects malformed sibling tokens", () => {
    try {
      parseProof({ ...proof, siblings: ["#", tree.getRoot()] });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidInputError);
      if (err instanceof InvalidInputError) {
        expect(err.field).toBe("proof.siblings.0");
      }
    }
  });

  it("rejects an index past the leaf count", () => {
    expect(() => parseProof({ ...proof, leafIndex: 3 })).toThrow(
      "Malformed proof at leafIndex: leafIndex must be less than leafCount",
    );
  });

  it("rejects a negative or fractional index", () => {
    expect(() => parseProof({ ...proof, leafIndex: -1 })).toThrow(InvalidInputError);
    expect(() => parseProof({ ...proof, leafIndex: 0.5 })).toThrow(InvalidInputError);
  });
});
