/**
 * @zoneledger/ledger — Types for the attestation ledger.
 *
 * Rules:
 * - All types are readonly
 * - Snapshots are never mutated; each append swaps in a new one
 * - Storage is an external collaborator reached through AttestationStore
 */

import type { Anchor, Attestation } from "@zoneledger/types";
import type { MerkleTree } from "@zoneledger/proof";

// ─── Snapshots ───────────────────────────────────────────────────────────

/**
 * Immutable view of the ledger at one version. Readers hold a snapshot
 * and never observe a partially-updated tree.
 */
export interface LedgerSnapshot {
  /** Number of appends reflected (0 = empty ledger) */
  readonly version: number;
  readonly root: string;
  /** Attestation IDs in tree (sorted) order */
  readonly leaves: readonly string[];
  readonly tree: MerkleTree;
}

/**
 * Result of a successful append.
 */
export interface AppendResult {
  /** Root after the append */
  readonly root: string;
  /** Position of the new leaf in the current sorted order; may shift later */
  readonly index: number;
  /** Ledger version created by this append */
  readonly version: number;
}

// ─── Storage ─────────────────────────────────────────────────────────────

/**
 * One appended attestation and the ledger root its append produced.
 * Keeping the root lets load() restore the full root history without
 * rebuilding a tree per version.
 */
export interface StoredAttestation {
  readonly attestation: Attestation;
  readonly root: string;
}

/**
 * Durable home of appended attestations.
 *
 * Implementations may be remote; every method is async and may reject.
 * The ledger maps rejections to UnreachableCollaboratorError.
 */
export interface AttestationStore {
  has(attestationId: string): Promise<boolean>;
  get(attestationId: string): Promise<Attestation | undefined>;
  put(entry: StoredAttestation): Promise<void>;
  /** All stored entries in append order */
  entries(): Promise<readonly StoredAttestation[]>;
  count(): Promise<number>;
}

// ─── Anchors ─────────────────────────────────────────────────────────────

/**
 * Lookup of external anchors by Merkle root.
 */
export interface AnchorSource {
  anchorForRoot(root: string): Anchor | undefined;
}

/**
 * An anchor together with the ledger version its root belongs to.
 */
export interface AnchoredRoot {
  readonly anchor: Anchor;
  readonly version: number;
}
