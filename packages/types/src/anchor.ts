/**
 * Anchor types.
 *
 * An anchor binds a Merkle root to an externally verifiable point in time
 * (a blockchain transaction, a newspaper print, a beacon pulse, a set of
 * human witnesses). The ledger core only consumes the root linkage and
 * the external timestamp.
 */

/**
 * Well-known anchor mechanisms. Any other string is accepted as-is.
 */
export type KnownAnchorType =
  | "bitcoin"
  | "ots"
  | "ipfs"
  | "nist-beacon"
  | "newspaper"
  | "witness";

export type AnchorType = KnownAnchorType | (string & {});

export interface Anchor {
  /** Merkle root that was anchored */
  readonly merkleRoot: string;
  /** Mechanism that produced the anchor */
  readonly anchorType: AnchorType;
  /** Unix seconds, as attested by the external mechanism */
  readonly externalTimestamp: number;
  /** Mechanism-specific reference (txid, URL, beacon pulse ID, ...) */
  readonly reference?: string | undefined;
}
