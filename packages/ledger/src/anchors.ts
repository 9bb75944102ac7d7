/**
 * @zoneledger/ledger — Anchor registry.
 *
 * Binds Merkle roots of one ledger to external timestamps. An attestation
 * is enclosed by every root from the version it was appended at onward;
 * its enclosing anchor is the earliest such anchor by external timestamp.
 *
 * Rules:
 * - Only roots the ledger actually had can be anchored
 * - A root may carry several anchors (different mechanisms)
 * - Anchors are never removed
 */

import { InvalidInputError, isAnchor } from "@zoneledger/types";
import type { Anchor } from "@zoneledger/types";
import type { Ledger } from "./ledger.js";
import type { JsonlAnchorLog } from "./jsonl-store.js";
import type { AnchorSource, AnchoredRoot } from "./types.js";

export interface AnchorRegistryOptions {
  /** Persist recorded anchors and replay them on construction */
  readonly log?: JsonlAnchorLog | undefined;
}

function earliest(a: AnchoredRoot, b: AnchoredRoot): AnchoredRoot {
  return b.anchor.externalTimestamp < a.anchor.externalTimestamp ? b : a;
}

export class AnchorRegistry implements AnchorSource {
  private readonly _ledger: Ledger;
  private readonly _log: JsonlAnchorLog | undefined;
  private readonly _anchored: AnchoredRoot[] = [];

  constructor(ledger: Ledger, options: AnchorRegistryOptions = {}) {
    this._ledger = ledger;
    this._log = options.log;
  }

  /**
   * Replay persisted anchors. Call after the ledger has been loaded.
   * An anchor is restored only if the ledger's root at its recorded
   * version is still the anchored root.
   *
   * @returns number of anchors restored
   */
  restore(): number {
    if (this._log === undefined) {
      return 0;
    }
    let restored = 0;
    for (const { anchor, version } of this._log.load()) {
      const merkleRoot = anchor.merkleRoot.toLowerCase();
      if (this._ledger.rootAt(version) === merkleRoot) {
        this._anchored.push({ anchor: { ...anchor, merkleRoot }, version });
        restored++;
      }
    }
    return restored;
  }

  /**
   * Record an anchor for a root of this ledger.
   *
   * @throws InvalidInputError if the anchor is malformed or its root was
   *   never a root of the ledger
   */
  record(anchor: Anchor): AnchoredRoot {
    if (!isAnchor(anchor)) {
      throw new InvalidInputError(
        "Anchor needs a 64-char hex merkleRoot, a non-empty anchorType and a non-negative integer externalTimestamp",
        "anchor",
      );
    }

    const merkleRoot = anchor.merkleRoot.toLowerCase();
    const version = this._ledger.versionOfRoot(merkleRoot);
    if (version === undefined) {
      throw new InvalidInputError(
        `Root ${merkleRoot} is not a root of this ledger`,
        "merkleRoot",
      );
    }

    const anchored: AnchoredRoot = { anchor: { ...anchor, merkleRoot }, version };
    this._log?.append(anchored);
    this._anchored.push(anchored);
    return anchored;
  }

  /**
   * Earliest anchor of a root, or undefined if the root is unanchored.
   */
  anchorForRoot(root: string): Anchor | undefined {
    const wanted = root.toLowerCase();
    const matches = this._anchored.filter((a) => a.anchor.merkleRoot === wanted);
    const first = matches[0];
    return first === undefined ? undefined : matches.reduce(earliest, first).anchor;
  }

  /**
   * Anchor with the latest external timestamp.
   */
  latest(): Anchor | undefined {
    const first = this._anchored[0];
    if (first === undefined) {
      return undefined;
    }
    return this._anchored.reduce(
      (a, b) => (b.anchor.externalTimestamp > a.anchor.externalTimestamp ? b : a),
      first,
    ).anchor;
  }

  /**
   * Earliest anchor (by external timestamp) over a root that includes the
   * attestation, or undefined if none has been anchored since its append.
   */
  enclosingAnchor(attestationId: string): AnchoredRoot | undefined {
    const appendedAt = this._ledger.appendedAtVersion(attestationId);
    if (appendedAt === undefined) {
      return undefined;
    }
    const enclosing = this._anchored.filter((a) => a.version >= appendedAt);
    const first = enclosing[0];
    return first === undefined ? undefined : enclosing.reduce(earliest, first);
  }

  list(): readonly AnchoredRoot[] {
    return [...this._anchored];
  }
}
