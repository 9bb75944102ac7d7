/**
 * Two-Zone fixture: ledgers, anchor registries and a LocalZoneTransport.
 */

import { createHash } from "node:crypto";
import type { Anchor, Attestation } from "@zoneledger/types";
import { AnchorRegistry, Ledger } from "@zoneledger/ledger";
import type { CitedRecord } from "../src/types.js";
import { LocalZoneTransport } from "../src/local-transport.js";

export function sha256(data: string): string {
  return createHash("sha256").update(data).digest("hex");
}

export function makeAttestation(label: string, timestamp = 1_700_000_000): Attestation {
  return {
    attestationId: sha256(`attestation-${label}`),
    zoneId: sha256(`zone-${label}`),
    canonId: sha256("timestamp:1.0"),
    claimHash: sha256(`claim-${label}`),
    evidenceHash: sha256(`evidence-${label}`),
    citations: [],
    timestamp,
    signature: "dGVzdC1zaWduYXR1cmU=",
  };
}

export class TestZone {
  readonly ledger = new Ledger();
  readonly anchors = new AnchorRegistry(this.ledger);

  async append(a: Attestation): Promise<string> {
    await this.ledger.append(a);
    return a.attestationId;
  }

  anchorCurrentRoot(externalTimestamp: number): Anchor {
    return this.anchors.record({
      merkleRoot: this.ledger.root(),
      anchorType: "witness",
      externalTimestamp,
    }).anchor;
  }

  /** Proof against the enclosing anchored root when there is one */
  getAttestation(attestationId: string): CitedRecord | undefined {
    const attestation = this.ledger.get(attestationId);
    if (attestation === undefined) {
      return undefined;
    }
    const enclosing = this.anchors.enclosingAnchor(attestationId);
    const proof = this.ledger.proofFor(attestationId, enclosing?.version);
    if (proof === null) {
      return undefined;
    }
    return enclosing === undefined
      ? { attestation, proof }
      : { attestation, proof, anchor: enclosing.anchor };
  }
}

export const CITED_ENDPOINT = "http://zone-a.test";

export function transportFor(zone: TestZone): LocalZoneTransport {
  return new LocalZoneTransport().register(CITED_ENDPOINT, zone);
}
