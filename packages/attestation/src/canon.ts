/**
 * Canons.
 *
 * A canon is the rule set a Zone applies when it attests. Its ID is
 * SHA-256 of "name:version". Core logic never assumes a canon is known;
 * the registry is a lookup the node can publish.
 */

import { sha256Text } from "@zoneledger/types";

export interface Canon {
  readonly canonId: string;
  readonly name: string;
  readonly version: string;
  readonly description?: string | undefined;
}

/**
 * canonId = SHA-256(utf8(name + ":" + version))
 */
export function computeCanonId(name: string, version: string): string {
  return sha256Text(`${name}:${version}`);
}

/** Canon ID of the built-in "timestamp:1.0" canon */
export const DEFAULT_CANON_ID = computeCanonId("timestamp", "1.0");

/**
 * SHA-256 of a claim or evidence body submitted as text.
 */
export function hashContent(text: string): string {
  return sha256Text(text);
}

// =============================================================================
// Registry
// =============================================================================

export interface CanonRegistry {
  resolve(canonId: string): Canon | undefined;
  list(): readonly Canon[];
}

export class InMemoryCanonRegistry implements CanonRegistry {
  private readonly canons = new Map<string, Canon>();

  constructor(initial: readonly Pick<Canon, "name" | "version" | "description">[] = []) {
    for (const c of initial) {
      this.register(c.name, c.version, c.description);
    }
  }

  register(name: string, version: string, description?: string): Canon {
    const canon: Canon = {
      canonId: computeCanonId(name, version),
      name,
      version,
      description,
    };
    this.canons.set(canon.canonId, canon);
    return canon;
  }

  resolve(canonId: string): Canon | undefined {
    return this.canons.get(canonId.toLowerCase());
  }

  list(): readonly Canon[] {
    return [...this.canons.values()];
  }
}

/**
 * Registry holding only the default "timestamp:1.0" canon.
 */
export function createDefaultCanonRegistry(): InMemoryCanonRegistry {
  return new InMemoryCanonRegistry([
    {
      name: "timestamp",
      version: "1.0",
      description: "Attests that the claim and evidence existed at the given time",
    },
  ]);
}
