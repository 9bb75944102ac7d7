/**
 * @zoneledger/citation — In-process transport.
 *
 * Serves Zones that live in the same process (tests, the demo, a node
 * hosting several Zones) through the ZoneTransport interface.
 */

import {
  RemoteNotFoundError,
  UnreachableCollaboratorError,
} from "@zoneledger/types";
import type { CitedRecord, ZoneTransport } from "./types.js";

/**
 * Anything that can answer "give me attestation X with its proof".
 * ZoneService implements it.
 */
export interface CitedRecordSource {
  getAttestation(attestationId: string): CitedRecord | undefined;
}

export class LocalZoneTransport implements ZoneTransport {
  private readonly zones = new Map<string, CitedRecordSource>();

  register(endpoint: string, source: CitedRecordSource): this {
    this.zones.set(endpoint, source);
    return this;
  }

  unregister(endpoint: string): void {
    this.zones.delete(endpoint);
  }

  async fetchCited(endpoint: string, attestationId: string): Promise<CitedRecord> {
    const zone = this.zones.get(endpoint);
    if (zone === undefined) {
      throw new UnreachableCollaboratorError(endpoint, `No Zone registered at ${endpoint}`);
    }
    const record = zone.getAttestation(attestationId);
    if (record === undefined) {
      throw new RemoteNotFoundError(endpoint, attestationId);
    }
    return record;
  }
}
