/**
 * @zoneledger/proof — Merkle Tree.
 *
 * Binary hash tree over a set of attestation IDs.
 *
 * Design:
 * - The tree is a pure function of the leaf SET: IDs are lowercased,
 *   deduplicated and sorted before building
 * - Internal nodes: SHA-256(left || right) over the raw 32-byte values
 * - Odd bottom layer: the trailing leaf is paired with itself (proof token "*")
 * - Odd internal layer: the trailing node is carried up unchanged
 * - Empty tree: genesis root SHA-256("")
 * - Single leaf: leaf IS the root (no internal nodes)
 * - Immutable: insert() returns a new tree and shares every node left of
 *   the insertion point with the old one
 */

import {
  concatBytes,
  GENESIS_ROOT,
  hexToBytes,
  isHash,
  normalizeHash,
  sha256Hex,
} from "@zoneledger/types";
import { DUPLICATE_MARKER, PROOF_VERSION } from "./types.js";
import type { MerkleProof } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Hash two child hashes to produce a parent hash.
 */
function hashPair(left: string, right: string): string {
  return sha256Hex(concatBytes(hexToBytes(left), hexToBytes(right)));
}

/**
 * Validate, lowercase, deduplicate and sort leaf IDs.
 */
function canonicalLeaves(leafIds: readonly string[]): string[] {
  const normalized = leafIds.map((id, i) => normalizeHash(id, `leafIds[${i}]`));
  return [...new Set(normalized)].sort();
}

/**
 * First position in a sorted array whose value is >= id.
 */
function lowerBound(sorted: readonly string[], id: string): number {
  let lo = 0;
  let hi = sorted.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    if ((sorted[mid] ?? "") < id) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo;
}

/**
 * Build every layer bottom-up. layers[0] is the leaf layer; the last
 * layer holds the single root.
 *
 * When `previous` is given, its first `unchanged` leaves equal ours, and
 * every parent whose children all lie in that prefix is copied instead of
 * rehashed.
 */
function buildLayers(
  leaves: string[],
  previous: readonly (readonly string[])[] = [],
  unchanged = 0,
): string[][] {
  const layers: string[][] = [leaves];
  let current = leaves;
  let kept = unchanged;
  let level = 0;

  while (current.length > 1) {
    kept = Math.floor(kept / 2);
    const next = (previous[level + 1] ?? []).slice(0, kept);

    for (let i = next.length * 2; i < current.length; i += 2) {
      const left = current[i] ?? "";
      const right = current[i + 1];

      if (right !== undefined) {
        next.push(hashPair(left, right));
      } else if (level === 0) {
        next.push(hashPair(left, left));
      } else {
        next.push(left);
      }
    }

    layers.push(next);
    current = next;
    level++;
  }

  return layers;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Immutable Merkle tree built from a set of attestation IDs.
 *
 * Usage:
 * ```ts
 * const tree = MerkleTree.build(ids);
 * const root = tree.getRoot();          // genesis root when empty
 * const proof = tree.getProof(ids[0]);  // inclusion proof or null
 * MerkleTree.verifyProof(proof);        // true/false
 * ```
 */
export class MerkleTree {
  private readonly layers: readonly (readonly string[])[];

  private constructor(layers: readonly (readonly string[])[]) {
    this.layers = layers;
  }

  /**
   * Build a tree from attestation IDs (any order, duplicates allowed).
   *
   * @throws InvalidInputError if any ID is not a 64-char hex string
   */
  static build(leafIds: readonly string[]): MerkleTree {
    return new MerkleTree(buildLayers(canonicalLeaves(leafIds)));
  }

  /**
   * Tree with one more leaf. Returns this tree when the ID is already a
   * leaf. Only nodes at or right of the insertion point are rehashed.
   *
   * @throws InvalidInputError if the ID is not a 64-char hex string
   */
  insert(leafId: string): MerkleTree {
    const id = normalizeHash(leafId, "leafId");
    const leaves = this.getLeaves();
    const position = lowerBound(leaves, id);
    if (leaves[position] === id) {
      return this;
    }

    const next = leaves.slice(0, position);
    next.push(id);
    for (let i = position; i < leaves.length; i++) {
      next.push(leaves[i] ?? "");
    }
    return new MerkleTree(buildLayers(next, this.layers, position));
  }

  /**
   * Root hash of the tree; the genesis root for an empty tree.
   */
  getRoot(): string {
    const top = this.layers[this.layers.length - 1] ?? [];
    return top[0] ?? GENESIS_ROOT;
  }

  getLeafCount(): number {
    return this.layers[0]?.length ?? 0;
  }

  /** Leaves in tree order (sorted) */
  getLeaves(): readonly string[] {
    return this.layers[0] ?? [];
  }

  /**
   * Position of an ID in the sorted leaf layer, or -1.
   */
  indexOf(leafId: string): number {
    const id = leafId.toLowerCase();
    const leaves = this.getLeaves();
    const position = lowerBound(leaves, id);
    return leaves[position] === id ? position : -1;
  }

  /**
   * Generate an inclusion proof for an attestation ID.
   *
   * @returns MerkleProof or null if the ID is not a leaf
   */
  getProof(leafId: string): MerkleProof | null {
    const leafIndex = this.indexOf(leafId);
    if (leafIndex < 0) {
      return null;
    }

    const siblings: string[] = [];
    let index = leafIndex;

    for (let level = 0; level < this.layers.length - 1; level++) {
      const layer = this.layers[level] ?? [];
      const isTrailingOdd = index === layer.length - 1 && layer.length % 2 === 1;

      if (isTrailingOdd) {
        // Bottom layer pairs with itself; higher layers carry up silently
        if (level === 0) {
          siblings.push(DUPLICATE_MARKER);
        }
      } else {
        const siblingIndex = index % 2 === 0 ? index + 1 : index - 1;
        siblings.push(layer[siblingIndex] ?? "");
      }

      index = Math.floor(index / 2);
    }

    return {
      version: PROOF_VERSION,
      leafHash: this.getLeaves()[leafIndex] ?? "",
      leafIndex,
      leafCount: this.getLeafCount(),
      siblings,
      root: this.getRoot(),
    };
  }

  /**
   * Verify a self-contained proof against the root it carries.
   */
  static verifyProof(proof: MerkleProof): boolean {
    return verifyProof(proof.leafHash, proof.leafIndex, proof, proof.root);
  }
}

/**
 * Root over a set of attestation IDs.
 *
 * @throws InvalidInputError if any ID is not a 64-char hex string
 */
export function buildRoot(leafIds: readonly string[]): string {
  return MerkleTree.build(leafIds).getRoot();
}

/**
 * Inclusion proof for targetId within leafIds, or null if absent.
 */
export function buildProof(
  leafIds: readonly string[],
  targetId: string,
): MerkleProof | null {
  return MerkleTree.build(leafIds).getProof(targetId);
}

/**
 * Verify a Merkle inclusion proof by positional replay.
 *
 * Only `leafCount` and `siblings` are read from the proof; the leaf, its
 * index and the expected root come from the caller. Malformed input of
 * any kind yields false; this function never throws.
 */
export function verifyProof(
  leafHash: string,
  leafIndex: number,
  proof: Pick<MerkleProof, "leafCount" | "siblings">,
  expectedRoot: string,
): boolean {
  const { leafCount, siblings } = proof;

  if (
    !isHash(leafHash) ||
    !isHash(expectedRoot) ||
    !Number.isSafeInteger(leafCount) ||
    !Number.isSafeInteger(leafIndex) ||
    leafCount < 1 ||
    leafIndex < 0 ||
    leafIndex >= leafCount ||
    !Array.isArray(siblings)
  ) {
    return false;
  }

  let current = leafHash.toLowerCase();
  let index = leafIndex;
  let width = leafCount;
  let consumed = 0;

  for (let level = 0; width > 1; level++) {
    const isTrailingOdd = index === width - 1 && width % 2 === 1;

    if (isTrailingOdd) {
      if (level === 0) {
        if (siblings[consumed] !== DUPLICATE_MARKER) {
          return false;
        }
        consumed++;
        current = hashPair(current, current);
      }
    } else {
      const sibling = siblings[consumed];
      if (!isHash(sibling)) {
        return false;
      }
      consumed++;
      current = index % 2 === 0 ? hashPair(current, sibling) : hashPair(sibling, current);
    }

    index = Math.floor(index / 2);
    width = Math.ceil(width / 2);
  }

  return consumed === siblings.length && current === expectedRoot.toLowerCase();
}
