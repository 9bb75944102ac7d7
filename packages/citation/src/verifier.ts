/**
 * @zoneledger/citation — Citation verifier.
 *
 * Decides whether a citing attestation may claim to come after a cited
 * attestation held by another Zone. Ordering rests only on external
 * anchor timestamps; the attestations' own timestamp fields are never
 * consulted.
 *
 * Per-citation state machine (terminal VALID / INVALID):
 *   1. fetch cited record      → fails: INVALID (unreachable | not_found)
 *   2. check record + proof    → fails: INVALID (attestation_mismatch | proof_invalid)
 *   3. cited root anchored?    → no:    INVALID (cited_root_unanchored)
 *   4. citing root anchored?   → no:    INVALID (citing_root_unanchored)
 *   5. cited ts < citing ts    → no:    INVALID (cited_not_earlier)
 *   6. VALID
 *
 * Checks never throw once input is validated, and each check has its own
 * timeout, so a silent Zone only invalidates its own citations.
 */

import {
  normalizeHash,
  RemoteNotFoundError,
  UnreachableCollaboratorError,
} from "@zoneledger/types";
import { verifyProof } from "@zoneledger/proof";
import type {
  CitationCheckResult,
  CitationFailureReason,
  CitationRequest,
  CitationTarget,
  CitedRecord,
  EnclosingAnchorSource,
  ZoneTransport,
} from "./types.js";

export interface CitationVerifierOptions {
  readonly transport: ZoneTransport;
  /** Enclosing anchors of local (citing) attestations */
  readonly anchors: EnclosingAnchorSource;
  /** Timeout for each fetch, in ms. Default: 10000 */
  readonly timeoutMs?: number | undefined;
}

type FetchOutcome =
  | { readonly ok: true; readonly record: CitedRecord }
  | { readonly ok: false; readonly reason: CitationFailureReason; readonly detail: string };

export class CitationVerifier {
  private readonly transport: ZoneTransport;
  private readonly anchors: EnclosingAnchorSource;
  private readonly timeoutMs: number;

  constructor(options: CitationVerifierOptions) {
    this.transport = options.transport;
    this.anchors = options.anchors;
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  /**
   * Run one citation check.
   *
   * @throws InvalidInputError if either ID is not a 64-char hex string
   */
  async verifyCitation(request: CitationRequest): Promise<CitationCheckResult> {
    const citingId = normalizeHash(request.citingId, "citingId");
    const citedId = normalizeHash(request.citedId, "citedId");
    const invalid = (
      reason: CitationFailureReason,
      detail: string,
      extra: Partial<CitationCheckResult> = {},
    ): CitationCheckResult => ({ citingId, citedId, status: "INVALID", reason, detail, ...extra });

    // 1. Fetch
    const fetched = await this.fetchWithTimeout(request.citedZoneEndpoint, citedId);
    if (!fetched.ok) {
      return invalid(fetched.reason, fetched.detail);
    }
    const { attestation, proof, anchor } = fetched.record;

    // 2. Record and proof
    if (attestation.attestationId.toLowerCase() !== citedId) {
      return invalid("attestation_mismatch", "Zone returned a different attestation");
    }
    if (
      proof.leafHash.toLowerCase() !== citedId ||
      !verifyProof(citedId, proof.leafIndex, proof, proof.root)
    ) {
      return invalid("proof_invalid", "Inclusion proof does not resolve to its root");
    }
    const citedRoot = proof.root.toLowerCase();

    // 3. Cited anchor
    if (anchor === undefined || anchor.merkleRoot.toLowerCase() !== citedRoot) {
      return invalid("cited_root_unanchored", "Cited root has no anchor", { citedRoot });
    }

    // 4. Citing anchor
    const citing = this.anchors.enclosingAnchor(citingId);
    if (citing === undefined) {
      return invalid("citing_root_unanchored", "Citing attestation is not under an anchored root", {
        citedRoot,
        citedAnchorTimestamp: anchor.externalTimestamp,
      });
    }

    const timestamps = {
      citedRoot,
      citedAnchorTimestamp: anchor.externalTimestamp,
      citingAnchorTimestamp: citing.anchor.externalTimestamp,
    };

    // 5. Strict ordering; equal timestamps prove nothing
    if (!(anchor.externalTimestamp < citing.anchor.externalTimestamp)) {
      return invalid(
        "cited_not_earlier",
        `Cited anchor (${anchor.externalTimestamp}) is not earlier than citing anchor (${citing.anchor.externalTimestamp})`,
        timestamps,
      );
    }

    // 6.
    return { citingId, citedId, status: "VALID", ...timestamps };
  }

  /**
   * Check several citations of one attestation concurrently. Each result
   * is independent of the others.
   *
   * @throws InvalidInputError if any ID is malformed (before any fetch)
   */
  async verifyCitations(
    citingId: string,
    targets: readonly CitationTarget[],
  ): Promise<CitationCheckResult[]> {
    normalizeHash(citingId, "citingId");
    targets.forEach((t, i) => normalizeHash(t.citedId, `targets[${i}].citedId`));

    return Promise.all(targets.map((t) => this.verifyCitation({ ...t, citingId })));
  }

  private async fetchWithTimeout(endpoint: string, citedId: string): Promise<FetchOutcome> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new UnreachableCollaboratorError(
            endpoint,
            `Zone at ${endpoint} did not answer within ${this.timeoutMs}ms`,
          ),
        );
      }, this.timeoutMs);
    });

    try {
      const record = await Promise.race([
        this.transport.fetchCited(endpoint, citedId, controller.signal),
        timeout,
      ]);
      return { ok: true, record };
    } catch (err) {
      if (err instanceof RemoteNotFoundError) {
        return { ok: false, reason: "not_found", detail: err.message };
      }
      return {
        ok: false,
        reason: "unreachable",
        detail: err instanceof Error ? err.message : String(err),
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
