/**
 * @zoneledger/ledger — In-memory AttestationStore.
 *
 * Suitable for:
 * - Unit and integration tests
 * - Short-lived processes and demos
 *
 * Not durable: all state is lost on process exit.
 */

import type { Attestation } from "@zoneledger/types";
import type { AttestationStore, StoredAttestation } from "./types.js";

export class InMemoryAttestationStore implements AttestationStore {
  private readonly _byId = new Map<string, Attestation>();
  private readonly _entries: StoredAttestation[] = [];

  async has(attestationId: string): Promise<boolean> {
    return this._byId.has(attestationId);
  }

  async get(attestationId: string): Promise<Attestation | undefined> {
    return this._byId.get(attestationId);
  }

  async put(entry: StoredAttestation): Promise<void> {
    const id = entry.attestation.attestationId;
    if (this._byId.has(id)) {
      return;
    }
    this._byId.set(id, entry.attestation);
    this._entries.push(entry);
  }

  async entries(): Promise<readonly StoredAttestation[]> {
    return [...this._entries];
  }

  async count(): Promise<number> {
    return this._entries.length;
  }
}
