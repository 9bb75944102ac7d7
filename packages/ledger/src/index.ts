/**
 * @zoneledger/ledger — Append-only attestation ledger.
 *
 * One ledger per Zone:
 * - Appends are serialized and atomic (store first, then snapshot swap)
 * - The root is a pure function of the set of appended IDs
 * - Readers work on immutable snapshots
 * - Anchors link historical roots to external timestamps
 */

// Core engine
export { Ledger } from "./ledger.js";
export type { LedgerOptions } from "./ledger.js";

// Storage
export { InMemoryAttestationStore } from "./memory-store.js";
export {
  JsonlAnchorLog,
  JsonlAttestationStore,
  JsonlFile,
} from "./jsonl-store.js";
export type { JsonlAttestationStoreOptions } from "./jsonl-store.js";

// Anchors
export { AnchorRegistry } from "./anchors.js";
export type { AnchorRegistryOptions } from "./anchors.js";

// Types
export type {
  AnchoredRoot,
  AnchorSource,
  AppendResult,
  AttestationStore,
  StoredAttestation,
  LedgerSnapshot,
} from "./types.js";
