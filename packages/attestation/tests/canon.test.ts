/**
 * Canon Tests
 */

import { describe, it, expect } from "vitest";
import {
  computeCanonId,
  createDefaultCanonRegistry,
  DEFAULT_CANON_ID,
  hashContent,
  InMemoryCanonRegistry,
} from "../src/canon.js";

describe("computeCanonId", () => {
  it("hashes name:version", () => {
    expect(computeCanonId("timestamp", "1.0")).toBe(
      "e166d25637877d6f74dd0ce6e1c4b8a2da693834eb7576c7a9633123d77896b1",
    );
  });

  it("defines the default canon as timestamp:1.0", () => {
    expect(DEFAULT_CANON_ID).toBe(computeCanonId("timestamp", "1.0"));
  });

  it("distinguishes versions", () => {
    expect(computeCanonId("timestamp", "1.1")).not.toBe(DEFAULT_CANON_ID);
  });
});

describe("hashContent", () => {
  it("hashes UTF-8 text", () => {
    expect(hashContent("hello")).toBe(
      "2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824",
    );
  });
});

describe("InMemoryCanonRegistry", () => {
  it("resolves registered canons by ID", () => {
    const registry = new InMemoryCanonRegistry();
    const canon = registry.register("peer-review", "2.0", "Two reviewers");

    expect(canon.canonId).toBe(computeCanonId("peer-review", "2.0"));
    expect(registry.resolve(canon.canonId)).toEqual(canon);
    expect(registry.resolve(canon.canonId.toUpperCase())).toEqual(canon);
  });

  it("knows nothing in advance", () => {
    const registry = new InMemoryCanonRegistry();
    expect(registry.list()).toEqual([]);
    expect(registry.resolve(DEFAULT_CANON_ID)).toBeUndefined();
  });

  it("default registry holds only the timestamp canon", () => {
    const registry = createDefaultCanonRegistry();
    expect(registry.list().map((c) => c.canonId)).toEqual([DEFAULT_CANON_ID]);
    expect(registry.resolve(DEFAULT_CANON_ID)?.name).toBe("timestamp");
  });
});
