/**
 * Ledger Tests
 *
 * Verifies:
 * - Empty ledger state (genesis root)
 * - Append results: root, sorted index, version
 * - Duplicate rejection leaves state unchanged
 * - Serialized concurrent appends
 * - Storage failures leave state unchanged
 * - Snapshot immutability
 * - Proofs against current and past roots
 * - History: rootAt, versionOfRoot, appendedAtVersion
 * - load() from a populated store, serialized with appends
 * - History lookups after load() never rebuild a tree
 */

import { describe, it, expect, vi } from "vitest";
import {
  DuplicateAttestationError,
  GENESIS_ROOT,
  InvalidInputError,
  UnreachableCollaboratorError,
} from "@zoneledger/types";
import { buildRoot, MerkleTree, verifyProof } from "@zoneledger/proof";
import { AnchorRegistry } from "../src/anchors.js";
import { Ledger } from "../src/ledger.js";
import { InMemoryAttestationStore } from "../src/memory-store.js";
import type { AttestationStore, StoredAttestation } from "../src/types.js";
import { makeAttestation } from "./fixtures/attestations.js";

// =============================================================================
// Helpers
// =============================================================================

function failingStore(failures: number): AttestationStore {
  const inner = new InMemoryAttestationStore();
  let remaining = failures;
  return {
    has: (id) => inner.has(id),
    get: (id) => inner.get(id),
    put: vi.fn(async (entry: StoredAttestation) => {
      if (remaining > 0) {
        remaining--;
        throw new Error("disk full");
      }
      await inner.put(entry);
    }),
    entries: () => inner.entries(),
    count: () => inner.count(),
  };
}

/** A store holding attestations 1..count, written through a ledger */
async function seededStore(count: number): Promise<{ store: InMemoryAttestationStore; roots: string[] }> {
  const store = new InMemoryAttestationStore();
  const writer = new Ledger({ store });
  const roots: string[] = [];
  for (let n = 1; n <= count; n++) {
    roots.push((await writer.append(makeAttestation(n))).root);
  }
  return { store, roots };
}

// =============================================================================
// Empty ledger
// =============================================================================

describe("Ledger — empty", () => {
  it("has the genesis root at version 0", () => {
    const ledger = new Ledger();
    expect(ledger.root()).toBe(GENESIS_ROOT);
    expect(ledger.version()).toBe(0);
    expect(ledger.leafCount()).toBe(0);
    expect(ledger.rootAt(0)).toBe(GENESIS_ROOT);
  });

  it("has no proofs and no attestations", () => {
    const ledger = new Ledger();
    const id = makeAttestation(0).attestationId;
    expect(ledger.proofFor(id)).toBeNull();
    expect(ledger.get(id)).toBeUndefined();
  });
});

// =============================================================================
// Append
// =============================================================================

describe("Ledger — append", () => {
  it("first append: the root is the leaf itself", async () => {
    const ledger = new Ledger();
    const a = makeAttestation(1);

    const result = await ledger.append(a);

    expect(result).toEqual({ root: a.attestationId, index: 0, version: 1 });
    expect(ledger.get(a.attestationId)).toBe(a);
  });

  it("root equals buildRoot over all appended IDs", async () => {
    const ledger = new Ledger();
    const atts = [1, 2, 3, 4, 5].map(makeAttestation);
    for (const a of atts) {
      await ledger.append(a);
    }

    expect(ledger.root()).toBe(buildRoot(atts.map((a) => a.attestationId)));
    expect(ledger.leafCount()).toBe(5);
    expect(ledger.version()).toBe(5);
  });

  it("index is the position in the current sorted order", async () => {
    const ledger = new Ledger();
    const atts = [1, 2, 3].map(makeAttestation);
    let last = { root: "", index: -1, version: 0 };
    for (const a of atts) {
      last = await ledger.append(a);
    }

    const sorted = atts.map((a) => a.attestationId).sort();
    expect(last.index).toBe(sorted.indexOf(atts[2]?.attestationId ?? ""));
  });

  it("rejects a duplicate without adding a leaf", async () => {
    const ledger = new Ledger();
    const a = makeAttestation(1);
    await ledger.append(a);
    const rootBefore = ledger.root();

    await expect(ledger.append(a)).rejects.toBeInstanceOf(DuplicateAttestationError);
    expect(ledger.root()).toBe(rootBefore);
    expect(ledger.leafCount()).toBe(1);
    expect(ledger.version()).toBe(1);
  });

  it("rejects an ID that only the store knows", async () => {
    const store = new InMemoryAttestationStore();
    const a = makeAttestation(1);
    await store.put({ attestation: a, root: a.attestationId });

    const ledger = new Ledger({ store });
    await expect(ledger.append(a)).rejects.toBeInstanceOf(DuplicateAttestationError);
    expect(ledger.version()).toBe(0);
  });

  it("rejects a malformed record", async () => {
    const ledger = new Ledger();
    const bad = { ...makeAttestation(1), claimHash: "short" };
    await expect(ledger.append(bad)).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("serializes concurrent appends", async () => {
    const ledger = new Ledger();
    const atts = Array.from({ length: 12 }, (_, i) => makeAttestation(i));

    const results = await Promise.all(atts.map((a) => ledger.append(a)));

    expect(results.map((r) => r.version)).toEqual(atts.map((_, i) => i + 1));
    expect(results[11]?.root).toBe(buildRoot(atts.map((a) => a.attestationId)));
    expect(ledger.leafCount()).toBe(12);
  });

  it("lets exactly one of two concurrent duplicates win", async () => {
    const ledger = new Ledger();
    const a = makeAttestation(7);

    const [first, second] = await Promise.allSettled([ledger.append(a), ledger.append(a)]);

    expect(first.status).toBe("fulfilled");
    expect(second.status).toBe("rejected");
    if (second.status === "rejected") {
      expect(second.reason).toBeInstanceOf(DuplicateAttestationError);
    }
    expect(ledger.leafCount()).toBe(1);
  });

  it("keeps appending after a rejected append", async () => {
    const ledger = new Ledger();
    const a = makeAttestation(1);
    await ledger.append(a);
    await expect(ledger.append(a)).rejects.toBeInstanceOf(DuplicateAttestationError);

    const result = await ledger.append(makeAttestation(2));
    expect(result.version).toBe(2);
  });
});

// =============================================================================
// Storage failures
// =============================================================================

describe("Ledger — storage failures", () => {
  it("surfaces UnreachableCollaboratorError and leaves state untouched", async () => {
    const ledger = new Ledger({ store: failingStore(1) });

    await expect(ledger.append(makeAttestation(1))).rejects.toBeInstanceOf(
      UnreachableCollaboratorError,
    );
    expect(ledger.version()).toBe(0);
    expect(ledger.root()).toBe(GENESIS_ROOT);
    expect(ledger.get(makeAttestation(1).attestationId)).toBeUndefined();
  });

  it("accepts the same attestation once storage recovers", async () => {
    const ledger = new Ledger({ store: failingStore(1) });
    const a = makeAttestation(1);

    await expect(ledger.append(a)).rejects.toThrow("Attestation store put failed: disk full");
    const result = await ledger.append(a);

    expect(result.version).toBe(1);
    expect(ledger.root()).toBe(a.attestationId);
  });
});

// =============================================================================
// Snapshots and proofs
// =============================================================================

describe("Ledger — snapshots and proofs", () => {
  it("snapshots are not affected by later appends", async () => {
    const ledger = new Ledger();
    await ledger.append(makeAttestation(1));
    const before = ledger.snapshot();

    await ledger.append(makeAttestation(2));

    expect(before.version).toBe(1);
    expect(before.leaves).toHaveLength(1);
    expect(before.root).toBe(makeAttestation(1).attestationId);
    expect(ledger.snapshot().version).toBe(2);
  });

  it("proofs verify against the current root", async () => {
    const ledger = new Ledger();
    const atts = [1, 2, 3, 4, 5, 6, 7].map(makeAttestation);
    for (const a of atts) {
      await ledger.append(a);
    }

    for (const a of atts) {
      const proof = ledger.proofFor(a.attestationId);
      expect(proof).not.toBeNull();
      if (proof !== null) {
        expect(verifyProof(a.attestationId, proof.leafIndex, proof, ledger.root())).toBe(true);
      }
    }
  });

  it("proofs against a past version verify against that version's root", async () => {
    const ledger = new Ledger();
    const atts = [1, 2, 3, 4].map(makeAttestation);
    for (const a of atts) {
      await ledger.append(a);
    }

    const first = atts[0]?.attestationId ?? "";
    const proof = ledger.proofFor(first, 2);
    const rootAt2 = ledger.rootAt(2) ?? "";

    expect(rootAt2).toBe(buildRoot([first, atts[1]?.attestationId ?? ""]));
    expect(proof?.root).toBe(rootAt2);
    if (proof !== null) {
      expect(verifyProof(first, proof.leafIndex, proof, rootAt2)).toBe(true);
      expect(verifyProof(first, proof.leafIndex, proof, ledger.root())).toBe(false);
    }
  });

  it("has no proof for an attestation appended after the requested version", async () => {
    const ledger = new Ledger();
    await ledger.append(makeAttestation(1));
    await ledger.append(makeAttestation(2));

    expect(ledger.proofFor(makeAttestation(2).attestationId, 1)).toBeNull();
    expect(ledger.proofFor(makeAttestation(2).attestationId, 9)).toBeNull();
  });
});

// =============================================================================
// History
// =============================================================================

describe("Ledger — history", () => {
  it("records every root by version", async () => {
    const ledger = new Ledger();
    const roots: string[] = [];
    for (const n of [1, 2, 3]) {
      roots.push((await ledger.append(makeAttestation(n))).root);
    }

    expect(ledger.rootAt(1)).toBe(roots[0]);
    expect(ledger.rootAt(3)).toBe(roots[2]);
    expect(ledger.rootAt(4)).toBeUndefined();
    expect(ledger.rootAt(-1)).toBeUndefined();
    expect(ledger.versionOfRoot(roots[1] ?? "")).toBe(2);
    expect(ledger.versionOfRoot((roots[1] ?? "").toUpperCase())).toBe(2);
    expect(ledger.versionOfRoot(GENESIS_ROOT)).toBe(0);
    expect(ledger.versionOfRoot("ab".repeat(32))).toBeUndefined();
  });

  it("remembers the version each attestation was appended at", async () => {
    const ledger = new Ledger();
    await ledger.append(makeAttestation(1));
    await ledger.append(makeAttestation(2));

    expect(ledger.appendedAtVersion(makeAttestation(2).attestationId)).toBe(2);
    expect(ledger.appendedAtVersion(makeAttestation(3).attestationId)).toBeUndefined();
  });
});

// =============================================================================
// Load
// =============================================================================

describe("Ledger — load", () => {
  it("rebuilds state from a populated store", async () => {
    const { store, roots } = await seededStore(3);
    const atts = [1, 2, 3].map(makeAttestation);

    const ledger = new Ledger({ store });
    expect(await ledger.load()).toBe(3);
    expect(ledger.version()).toBe(3);
    expect(ledger.root()).toBe(buildRoot(atts.map((a) => a.attestationId)));
    expect(ledger.appendedAtVersion(atts[1]?.attestationId ?? "")).toBe(2);
    expect(ledger.rootAt(1)).toBe(atts[0]?.attestationId);
    expect(ledger.rootAt(2)).toBe(roots[1]);
  });

  it("refuses to load over existing state", async () => {
    const ledger = new Ledger();
    await ledger.append(makeAttestation(1));
    await expect(ledger.load()).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("rejects a store whose last root does not match its attestations", async () => {
    const store = new InMemoryAttestationStore();
    await store.put({ attestation: makeAttestation(1), root: makeAttestation(1).attestationId });
    await store.put({ attestation: makeAttestation(2), root: "ab".repeat(32) });

    const ledger = new Ledger({ store });
    await expect(ledger.load()).rejects.toThrow(
      "Stored root for version 2 does not match the stored attestations",
    );
    expect(ledger.version()).toBe(0);
    expect(ledger.get(makeAttestation(1).attestationId)).toBeUndefined();
  });

  it("queues an append issued while load() is still reading", async () => {
    const { store: seeded, roots } = await seededStore(3);
    let release = (): void => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const store: AttestationStore = {
      has: (id) => seeded.has(id),
      get: (id) => seeded.get(id),
      put: (entry) => seeded.put(entry),
      entries: async () => {
        await gate;
        return seeded.entries();
      },
      count: () => seeded.count(),
    };

    const ledger = new Ledger({ store });
    const loading = ledger.load();
    const appending = ledger.append(makeAttestation(4));
    release();

    expect(await loading).toBe(3);
    expect((await appending).version).toBe(4);
    expect(ledger.rootAt(3)).toBe(roots[2]);
    expect(ledger.appendedAtVersion(makeAttestation(4).attestationId)).toBe(4);
    expect(ledger.root()).toBe(buildRoot([1, 2, 3, 4].map((n) => makeAttestation(n).attestationId)));
  });
});

// =============================================================================
// Cost of history and append
// =============================================================================

describe("Ledger — history without rebuilds", () => {
  it("anchors an early root of a loaded ledger without building any tree", async () => {
    const { store, roots } = await seededStore(300);
    const ledger = new Ledger({ store });
    await ledger.load();
    const registry = new AnchorRegistry(ledger);
    const build = vi.spyOn(MerkleTree, "build");

    try {
      const anchored = registry.record({
        merkleRoot: roots[4] ?? "",
        anchorType: "witness",
        externalTimestamp: 1_700_000_500,
      });

      expect(anchored.version).toBe(5);
      expect(ledger.versionOfRoot(roots[0] ?? "")).toBe(1);
      expect(ledger.versionOfRoot(roots[299] ?? "")).toBe(300);
      expect(build).not.toHaveBeenCalled();
    } finally {
      build.mockRestore();
    }
  });

  it("appends by inserting into the current tree", async () => {
    const ledger = new Ledger();
    await ledger.append(makeAttestation(1));
    const build = vi.spyOn(MerkleTree, "build");

    try {
      for (let n = 2; n <= 20; n++) {
        await ledger.append(makeAttestation(n));
      }
      expect(build).not.toHaveBeenCalled();
    } finally {
      build.mockRestore();
    }

    const ids = Array.from({ length: 20 }, (_, i) => makeAttestation(i + 1).attestationId);
    expect(ledger.root()).toBe(buildRoot(ids));
  });
});
