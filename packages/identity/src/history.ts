/**
 * Identity rotation history.
 *
 * After a key compromise the Zone rotates to a new identity. Attestations
 * signed by the old key stay verifiable, so retired public identities are
 * kept and can be looked up by zoneId. Only the current identity signs.
 */

import { IdentityError } from "@zoneledger/types";
import type { KeyAlgorithm, PublicIdentity } from "@zoneledger/types";
import { generateIdentity } from "./identity.js";
import type { SigningIdentity } from "./identity.js";

export interface RetiredIdentity extends PublicIdentity {
  /** Unix seconds when the identity stopped signing */
  readonly retiredAt: number;
}

export class IdentityHistory {
  private _current: SigningIdentity;
  private readonly _retired = new Map<string, RetiredIdentity>();

  constructor(current: SigningIdentity, retired: readonly RetiredIdentity[] = []) {
    this._current = current;
    for (const r of retired) {
      this._retired.set(r.zoneId, r);
    }
  }

  /** Identity that signs new attestations */
  get current(): SigningIdentity {
    return this._current;
  }

  /**
   * Replace the current identity. The old one is retired, not forgotten.
   *
   * @param next - Identity to switch to (generated when omitted)
   * @param now - Retirement time in Unix seconds
   */
  async rotate(
    next?: SigningIdentity,
    now: number = Math.floor(Date.now() / 1000),
    algorithm: KeyAlgorithm = this._current.algorithm,
  ): Promise<SigningIdentity> {
    const replacement = next ?? (await generateIdentity(algorithm));
    if (replacement.zoneId === this._current.zoneId) {
      throw new IdentityError("Rotation requires a different key");
    }
    if (this._retired.has(replacement.zoneId)) {
      throw new IdentityError(`Identity ${replacement.zoneId} was already retired`);
    }

    this._retired.set(this._current.zoneId, {
      ...this._current.toPublic(),
      retiredAt: now,
    });
    this._current = replacement;
    return replacement;
  }

  /**
   * Find any identity (current or retired) by zoneId.
   */
  lookup(zoneId: string): PublicIdentity | undefined {
    const id = zoneId.toLowerCase();
    if (id === this._current.zoneId) {
      return this._current.toPublic();
    }
    return this._retired.get(id);
  }

  isRetired(zoneId: string): boolean {
    return this._retired.has(zoneId.toLowerCase());
  }

  retired(): readonly RetiredIdentity[] {
    return [...this._retired.values()];
  }
}
