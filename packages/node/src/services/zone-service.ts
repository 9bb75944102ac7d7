/**
 * ZoneService — Composition root for one Zone.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Owns the Zone's signing identity (with the identities
 * it replaced), its ledger, its anchor registry and the citation verifier.
 */

import type { Logger } from "pino";
import {
  buildAttestation,
  createDefaultCanonRegistry,
  DEFAULT_CANON_ID,
  verifyAttestation,
} from "@zoneledger/attestation";
import type { Canon, CanonRegistry } from "@zoneledger/attestation";
import { CitationVerifier, HttpZoneTransport } from "@zoneledger/citation";
import type {
  CitationCheckResult,
  CitationTarget,
  CitedRecord,
  CitedRecordSource,
  ZoneTransport,
} from "@zoneledger/citation";
import { IdentityHistory } from "@zoneledger/identity";
import type { RetiredIdentity, SigningIdentity } from "@zoneledger/identity";
import { AnchorRegistry, Ledger } from "@zoneledger/ledger";
import type { AnchoredRoot, AttestationStore, JsonlAnchorLog } from "@zoneledger/ledger";
import { GENESIS_ROOT, IdentityError, normalizeHash } from "@zoneledger/types";
import type { Anchor, Attestation, KeyAlgorithm, PublicIdentity } from "@zoneledger/types";

// =============================================================================
// Configuration
// =============================================================================

export interface ZoneServiceConfig {
  readonly identity: SigningIdentity;
  /** Identities this Zone signed with before its last rotation */
  readonly retiredIdentities?: readonly RetiredIdentity[] | undefined;
  /** Called after every rotation, e.g. to rewrite the key file */
  readonly onIdentityRotated?: ((history: IdentityHistory) => void) | undefined;
  readonly name: string;
  readonly description?: string | undefined;
  /** Default: in-memory */
  readonly store?: AttestationStore | undefined;
  /** Persist anchors; replayed by open() */
  readonly anchorLog?: JsonlAnchorLog | undefined;
  /** Default: the "timestamp:1.0" canon only */
  readonly canons?: CanonRegistry | undefined;
  /** Transport to remote Zones. Default: HTTP */
  readonly transport?: ZoneTransport | undefined;
  readonly citationTimeoutMs?: number | undefined;
  /** Unix seconds. Default: wall clock */
  readonly clock?: (() => number) | undefined;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Request / Response Shapes
// =============================================================================

export interface SubmitRequest {
  readonly canonId?: string | undefined;
  readonly claimHash: string;
  readonly evidenceHash: string;
  readonly evidenceLocation?: string | undefined;
  readonly citations?: readonly string[] | undefined;
}

export interface RootInfo {
  readonly root: string;
  readonly leafCount: number;
  readonly lastAnchor?: Anchor | undefined;
}

export interface ZoneInfo {
  readonly zoneId: string;
  readonly name: string;
  readonly description: string;
  readonly publicKey: string;
  readonly algorithm: KeyAlgorithm;
  readonly supportedCanons: readonly Canon[];
  readonly genesisRoot: string;
  readonly attestationCount: number;
  readonly latestAnchor?: Anchor | undefined;
  /** Earlier identities; their attestations stay verifiable */
  readonly retiredIdentities: readonly RetiredIdentity[];
  readonly endpoints: Readonly<Record<string, string>>;
}

const ENDPOINTS = {
  attestation: "/attestation/{id}",
  merkleRoot: "/merkle/root",
  submit: "/verify",
  anchors: "/anchors",
  citations: "/citations/verify",
} as const;

// =============================================================================
// Service
// =============================================================================

export class ZoneService implements CitedRecordSource {
  readonly ledger: Ledger;
  readonly anchors: AnchorRegistry;
  readonly canons: CanonRegistry;
  readonly verifier: CitationVerifier;

  private readonly history: IdentityHistory;
  private readonly onIdentityRotated: ((history: IdentityHistory) => void) | undefined;
  private readonly name: string;
  private readonly description: string;
  private readonly clock: () => number;
  private readonly logger: Logger | undefined;
  private _ready = false;

  constructor(config: ZoneServiceConfig) {
    this.history = new IdentityHistory(config.identity, config.retiredIdentities);
    this.onIdentityRotated = config.onIdentityRotated;
    this.name = config.name;
    this.description = config.description ?? "";
    this.ledger = new Ledger({ store: config.store });
    this.anchors = new AnchorRegistry(this.ledger, { log: config.anchorLog });
    this.canons = config.canons ?? createDefaultCanonRegistry();
    this.verifier = new CitationVerifier({
      transport: config.transport ?? new HttpZoneTransport(),
      anchors: this.anchors,
      timeoutMs: config.citationTimeoutMs,
    });
    this.clock = config.clock ?? (() => Math.floor(Date.now() / 1000));
    this.logger = config.logger;
  }

  /**
   * Load persisted attestations and anchors. Must run before the first
   * submit() when the store is persistent.
   */
  async open(): Promise<void> {
    const attestations = await this.ledger.load();
    const anchors = this.anchors.restore();
    this._ready = true;
    this.logger?.info(
      { zoneId: this.identity.zoneId, attestations, anchors, root: this.ledger.root() },
      "Zone ledger loaded",
    );
  }

  isReady(): boolean {
    return this._ready;
  }

  /** Identity that signs new attestations */
  get identity(): SigningIdentity {
    return this.history.current;
  }

  // ─── Identity Rotation ─────────────────────────────────────────────

  /**
   * Retire the signing key and continue with `next` (generated when
   * omitted). Attestations already in the ledger keep their zoneId and
   * stay verifiable through lookupIdentity().
   *
   * @throws IdentityError if `next` is the current or a retired identity
   */
  async rotateIdentity(next?: SigningIdentity): Promise<SigningIdentity> {
    const previous = this.history.current;
    const current = await this.history.rotate(next, this.clock());
    this.logger?.info(
      { previousZoneId: previous.zoneId, zoneId: current.zoneId },
      "Zone identity rotated",
    );
    this.onIdentityRotated?.(this.history);
    return current;
  }

  /**
   * The current or a retired identity of this Zone.
   */
  lookupIdentity(zoneId: string): PublicIdentity | undefined {
    return this.history.lookup(zoneId);
  }

  // ─── Attestations ──────────────────────────────────────────────────

  /**
   * Sign, self-check and append a new attestation, timestamped now.
   *
   * @throws InvalidInputError on malformed hashes or citations
   * @throws DuplicateAttestationError if the same claim was attested this second
   * @throws UnreachableCollaboratorError if storage fails
   */
  async submit(request: SubmitRequest): Promise<Attestation> {
    // a rotation mid-submit must not split signing from the self-check
    const identity = this.identity;
    const attestation = await buildAttestation(identity, {
      canonId: request.canonId ?? DEFAULT_CANON_ID,
      claimHash: request.claimHash,
      evidenceHash: request.evidenceHash,
      evidenceLocation: request.evidenceLocation,
      citations: request.citations,
      timestamp: this.clock(),
    });

    const check = await verifyAttestation(attestation, identity);
    if (!check.valid) {
      throw new IdentityError(`Signed attestation failed self-verification (${check.reason ?? "unknown"})`);
    }

    const { root, index } = await this.ledger.append(attestation);
    this.logger?.info(
      { attestationId: attestation.attestationId, index, root },
      "Attestation appended",
    );
    return attestation;
  }

  /**
   * An attestation with its inclusion proof. The proof is taken against
   * the root of the enclosing anchor when there is one, so the served
   * anchor always covers the served proof.
   *
   * @throws InvalidInputError if the ID is not a 64-char hex string
   */
  getAttestation(attestationId: string): CitedRecord | undefined {
    const id = normalizeHash(attestationId, "attestationId");
    const attestation = this.ledger.get(id);
    if (attestation === undefined) {
      return undefined;
    }

    const enclosing = this.anchors.enclosingAnchor(id);
    const proof = this.ledger.proofFor(id, enclosing?.version);
    if (proof === null) {
      return undefined;
    }
    return enclosing === undefined
      ? { attestation, proof }
      : { attestation, proof, anchor: enclosing.anchor };
  }

  currentRoot(): RootInfo {
    const lastAnchor = this.anchors.latest();
    const info = { root: this.ledger.root(), leafCount: this.ledger.leafCount() };
    return lastAnchor === undefined ? info : { ...info, lastAnchor };
  }

  // ─── Anchors ───────────────────────────────────────────────────────

  /**
   * @throws InvalidInputError if the anchor is malformed or names a root
   *   this Zone never had
   */
  recordAnchor(anchor: Anchor): AnchoredRoot {
    const anchored = this.anchors.record(anchor);
    this.logger?.info(
      {
        root: anchored.anchor.merkleRoot,
        anchorType: anchored.anchor.anchorType,
        externalTimestamp: anchored.anchor.externalTimestamp,
        version: anchored.version,
      },
      "Anchor recorded",
    );
    return anchored;
  }

  // ─── Citations ─────────────────────────────────────────────────────

  async verifyCitation(
    citingId: string,
    citedId: string,
    citedZoneEndpoint: string,
  ): Promise<boolean> {
    const result = await this.checkCitation(citingId, citedId, citedZoneEndpoint);
    return result.status === "VALID";
  }

  /**
   * Like verifyCitation(), returning the full check result.
   *
   * @throws InvalidInputError if either ID is malformed
   */
  async checkCitation(
    citingId: string,
    citedId: string,
    citedZoneEndpoint: string,
  ): Promise<CitationCheckResult> {
    const result = await this.verifier.verifyCitation({ citingId, citedId, citedZoneEndpoint });
    if (result.status === "INVALID") {
      this.logger?.warn(
        { citingId: result.citingId, citedId: result.citedId, reason: result.reason, detail: result.detail },
        "Citation check failed",
      );
    }
    return result;
  }

  /**
   * Check several citations of one attestation concurrently.
   */
  checkCitations(
    citingId: string,
    targets: readonly CitationTarget[],
  ): Promise<CitationCheckResult[]> {
    return this.verifier.verifyCitations(citingId, targets);
  }

  // ─── Zone Metadata ─────────────────────────────────────────────────

  zoneInfo(): ZoneInfo {
    const latestAnchor = this.anchors.latest();
    const info: ZoneInfo = {
      zoneId: this.identity.zoneId,
      name: this.name,
      description: this.description,
      publicKey: this.identity.publicKey,
      algorithm: this.identity.algorithm,
      supportedCanons: this.canons.list(),
      genesisRoot: GENESIS_ROOT,
      attestationCount: this.ledger.leafCount(),
      retiredIdentities: this.history.retired(),
      endpoints: ENDPOINTS,
    };
    return latestAnchor === undefined ? info : { ...info, latestAnchor };
  }
}
