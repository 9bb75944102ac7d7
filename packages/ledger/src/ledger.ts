/**
 * @zoneledger/ledger — Core Ledger class.
 *
 * Append-only attestation ledger owned by one Zone. Once an attestation
 * is appended, it is part of every later root. There is no update() or
 * delete(); corrections are new attestations.
 *
 * API surface:
 * - append() — Store an attestation and swap in a new snapshot
 * - root() / leafCount() / version() — Current state
 * - proofFor() — Inclusion proof against the current or a past root
 * - get() — Look up an appended attestation
 * - rootAt() / versionOfRoot() / appendedAtVersion() — History, for anchors
 * - load() — Rebuild state from the store at startup
 *
 * Cost:
 * - An append rehashes only the nodes right of the new leaf's position
 * - Every root is kept by version and by value, so history lookups
 *   never rebuild a tree; only proofs against a past version do
 *
 * Concurrency:
 * - Appends and load() run one at a time through a promise chain
 * - Reads see the current immutable snapshot and never wait for appends
 * - Storage is written before the snapshot swap; a failed write leaves
 *   the ledger untouched
 */

import {
  DuplicateAttestationError,
  GENESIS_ROOT,
  InvalidInputError,
  isAttestation,
  UnreachableCollaboratorError,
} from "@zoneledger/types";
import type { Attestation } from "@zoneledger/types";
import { MerkleTree } from "@zoneledger/proof";
import type { MerkleProof } from "@zoneledger/proof";
import { InMemoryAttestationStore } from "./memory-store.js";
import type { AppendResult, AttestationStore, LedgerSnapshot } from "./types.js";

export interface LedgerOptions {
  /** Durable store; in-memory when omitted */
  readonly store?: AttestationStore | undefined;
}

interface LedgerEntry {
  readonly attestation: Attestation;
  readonly version: number;
}

/** Past snapshots kept for proofs against anchored roots */
const HISTORY_CACHE_SIZE = 16;

function snapshotOf(version: number, tree: MerkleTree): LedgerSnapshot {
  return {
    version,
    root: tree.getRoot(),
    leaves: tree.getLeaves(),
    tree,
  };
}

export class Ledger {
  private readonly _store: AttestationStore;
  private readonly _entries = new Map<string, LedgerEntry>();
  /** Attestation IDs in append order; version v covers the first v */
  private readonly _order: string[] = [];
  /** roots[v] is the root right after version v; roots[0] is genesis */
  private readonly _roots: string[] = [GENESIS_ROOT];
  private readonly _versions = new Map<string, number>([[GENESIS_ROOT, 0]]);
  private readonly _history = new Map<number, LedgerSnapshot>();
  private _snapshot: LedgerSnapshot = snapshotOf(0, MerkleTree.build([]));
  private _tail: Promise<unknown> = Promise.resolve();

  constructor(options: LedgerOptions = {}) {
    this._store = options.store ?? new InMemoryAttestationStore();
  }

  // ─── Append (The Only Write Operation) ──────────────────────────────

  /**
   * Append an attestation.
   *
   * @throws InvalidInputError if the record is malformed
   * @throws DuplicateAttestationError if the ID was already appended
   * @throws UnreachableCollaboratorError if storage fails
   */
  append(attestation: Attestation): Promise<AppendResult> {
    return this._serialize(() => this._append(attestation));
  }

  /** Run fn after every write queued before it */
  private _serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = this._tail.then(fn);
    // Keep the chain alive after a rejection; the caller still receives it
    this._tail = run.catch(() => undefined);
    return run;
  }

  private async _append(attestation: Attestation): Promise<AppendResult> {
    if (!isAttestation(attestation)) {
      throw new InvalidInputError("Attestation record is malformed", "attestation");
    }
    const id = attestation.attestationId.toLowerCase();

    if (this._entries.has(id) || (await this._storage("has", () => this._store.has(id)))) {
      throw new DuplicateAttestationError(id);
    }

    const tree = this._snapshot.tree.insert(id);
    const root = tree.getRoot();
    await this._storage("put", () => this._store.put({ attestation, root }));

    const version = this._snapshot.version + 1;
    this._record(id, attestation, version, root);
    this._snapshot = snapshotOf(version, tree);

    return { root, index: tree.indexOf(id), version };
  }

  private _record(id: string, attestation: Attestation, version: number, root: string): void {
    this._entries.set(id, { attestation, version });
    this._order.push(id);
    this._roots.push(root);
    this._versions.set(root, version);
  }

  private async _storage<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new UnreachableCollaboratorError(
        "storage",
        `Attestation store ${operation} failed: ${err instanceof Error ? err.message : String(err)}`,
        err,
      );
    }
  }

  // ─── Load ───────────────────────────────────────────────────────────

  /**
   * Rebuild ledger state from the store. Must run before the first append;
   * appends issued while it runs wait for it.
   *
   * @returns number of attestations loaded
   * @throws InvalidInputError if the ledger already holds attestations, or
   *   the stored roots disagree with the stored attestations
   */
  load(): Promise<number> {
    return this._serialize(() => this._load());
  }

  private async _load(): Promise<number> {
    if (this._snapshot.version !== 0) {
      throw new InvalidInputError("Ledger already holds attestations; load() must run first");
    }

    const entries = await this._storage("entries", () => this._store.entries());
    const seen = new Set<string>();
    const loaded = entries.filter(({ attestation }) => {
      const id = attestation.attestationId.toLowerCase();
      if (seen.has(id)) {
        return false;
      }
      seen.add(id);
      return true;
    });

    const tree = MerkleTree.build([...seen]);
    const version = loaded.length;
    const last = loaded[version - 1];
    if (last !== undefined && last.root.toLowerCase() !== tree.getRoot()) {
      throw new InvalidInputError(
        `Stored root for version ${version} does not match the stored attestations`,
        "store",
      );
    }

    for (const { attestation, root } of loaded) {
      this._record(
        attestation.attestationId.toLowerCase(),
        attestation,
        this._order.length + 1,
        root.toLowerCase(),
      );
    }
    this._snapshot = snapshotOf(version, tree);
    return version;
  }

  // ─── Read ───────────────────────────────────────────────────────────

  root(): string {
    return this._snapshot.root;
  }

  leafCount(): number {
    return this._snapshot.leaves.length;
  }

  version(): number {
    return this._snapshot.version;
  }

  snapshot(): LedgerSnapshot {
    return this._snapshot;
  }

  has(attestationId: string): boolean {
    return this._entries.has(attestationId.toLowerCase());
  }

  get(attestationId: string): Attestation | undefined {
    return this._entries.get(attestationId.toLowerCase())?.attestation;
  }

  /**
   * Inclusion proof for an attestation.
   *
   * @param atVersion - Prove against the root of this version instead of
   *   the current one (for anchored roots)
   * @returns null if the attestation is not in that version
   */
  proofFor(attestationId: string, atVersion?: number): MerkleProof | null {
    if (atVersion === undefined || atVersion === this._snapshot.version) {
      return this._snapshot.tree.getProof(attestationId);
    }
    const appendedAt = this.appendedAtVersion(attestationId);
    if (appendedAt === undefined || appendedAt > atVersion) {
      return null;
    }
    return this.snapshotAt(atVersion)?.tree.getProof(attestationId) ?? null;
  }

  // ─── History ────────────────────────────────────────────────────────

  /**
   * Snapshot as of a past version, rebuilt from the append order. The
   * most recently used ones are cached.
   */
  snapshotAt(version: number): LedgerSnapshot | undefined {
    if (!this._isVersion(version)) {
      return undefined;
    }
    if (version === this._snapshot.version) {
      return this._snapshot;
    }

    const cached = this._history.get(version);
    if (cached !== undefined) {
      this._history.delete(version);
      this._history.set(version, cached);
      return cached;
    }

    const snapshot = snapshotOf(version, MerkleTree.build(this._order.slice(0, version)));
    this._history.set(version, snapshot);
    if (this._history.size > HISTORY_CACHE_SIZE) {
      const oldest = this._history.keys().next();
      if (oldest.done !== true) {
        this._history.delete(oldest.value);
      }
    }
    return snapshot;
  }

  /**
   * Root in effect right after the given version was appended.
   */
  rootAt(version: number): string | undefined {
    return this._isVersion(version) ? this._roots[version] : undefined;
  }

  /**
   * Version whose root is `root`, or undefined if the ledger never had it.
   */
  versionOfRoot(root: string): number | undefined {
    return this._versions.get(root.toLowerCase());
  }

  /**
   * Version created by the append of this attestation.
   */
  appendedAtVersion(attestationId: string): number | undefined {
    return this._entries.get(attestationId.toLowerCase())?.version;
  }

  private _isVersion(version: number): boolean {
    return Number.isSafeInteger(version) && version >= 0 && version <= this._snapshot.version;
  }
}
