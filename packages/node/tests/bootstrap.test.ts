/**
 * Tests for building a ZoneService from configuration.
 */

import { existsSync, mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { LocalZoneTransport } from "@zoneledger/citation";
import { identityFromSecretKey } from "@zoneledger/identity";
import { loadConfig } from "../src/config.js";
import { createZoneService, resolveIdentity } from "../src/services/bootstrap.js";
import { SECRET_A } from "./setup.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "zone-bootstrap-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("resolveIdentity", () => {
  it("uses ZONE_PRIVATE_KEY", async () => {
    const history = await resolveIdentity(loadConfig({ ZONE_PRIVATE_KEY: SECRET_A }));
    const expected = await identityFromSecretKey("ed25519", SECRET_A);

    expect(history.current.zoneId).toBe(expected.zoneId);
    expect(history.retired()).toEqual([]);
  });

  it("generates a key file once and reloads it afterwards", async () => {
    const keyFile = join(dir, "keys", "zone.json");
    const config = loadConfig({ ZONE_KEY_FILE: keyFile, ZONE_KEY_ALGORITHM: "secp256k1" });

    const first = await resolveIdentity(config);
    expect(existsSync(keyFile)).toBe(true);
    const second = await resolveIdentity(config);

    expect(first.current.algorithm).toBe("secp256k1");
    expect(second.current.zoneId).toBe(first.current.zoneId);
  });

  it("prefers the key file over ZONE_PRIVATE_KEY", async () => {
    const keyFile = join(dir, "zone.json");
    const generated = await resolveIdentity(loadConfig({ ZONE_KEY_FILE: keyFile }));

    const history = await resolveIdentity(
      loadConfig({ ZONE_KEY_FILE: keyFile, ZONE_PRIVATE_KEY: SECRET_A }),
    );
    expect(history.current.zoneId).toBe(generated.current.zoneId);
  });

  it("falls back to an ephemeral key", async () => {
    const a = await resolveIdentity(loadConfig({}));
    const b = await resolveIdentity(loadConfig({}));

    expect(a.current.zoneId).not.toBe(b.current.zoneId);
  });
});

describe("createZoneService", () => {
  it("opens a JSONL-backed Zone and reloads it", async () => {
    const config = loadConfig({
      STORAGE: "jsonl",
      DATA_DIR: dir,
      ZONE_PRIVATE_KEY: SECRET_A,
      ZONE_NAME: "Durable",
    });
    const transport = new LocalZoneTransport();

    const first = await createZoneService(config, { transport });
    await first.submit({ claimHash: "11".repeat(32), evidenceHash: "22".repeat(32) });
    expect(existsSync(join(dir, "attestations.jsonl"))).toBe(true);

    const second = await createZoneService(config, { transport });
    expect(second.isReady()).toBe(true);
    expect(second.ledger.leafCount()).toBe(1);
    expect(second.ledger.root()).toBe(first.ledger.root());
    expect(second.zoneInfo().name).toBe("Durable");
  });

  it("writes a rotation to the key file and signs with the new key after a restart", async () => {
    const keyFile = join(dir, "zone.json");
    const config = loadConfig({ ZONE_KEY_FILE: keyFile, STORAGE: "jsonl", DATA_DIR: dir });
    const transport = new LocalZoneTransport();

    const first = await createZoneService(config, { transport });
    const original = first.identity.zoneId;
    const old = await first.submit({ claimHash: "11".repeat(32), evidenceHash: "22".repeat(32) });
    const rotated = await first.rotateIdentity();

    const second = await createZoneService(config, { transport });
    expect(second.identity.zoneId).toBe(rotated.zoneId);
    expect(second.zoneInfo().retiredIdentities.map((r) => r.zoneId)).toEqual([original]);
    expect(old.zoneId).toBe(original);
    expect(second.lookupIdentity(old.zoneId)?.publicKey).toBe(
      first.zoneInfo().retiredIdentities[0]?.publicKey,
    );

    const fresh = await second.submit({ claimHash: "33".repeat(32), evidenceHash: "22".repeat(32) });
    expect(fresh.zoneId).toBe(rotated.zoneId);
  });

  it("keeps nothing on disk with memory storage", async () => {
    const config = loadConfig({ DATA_DIR: dir, ZONE_PRIVATE_KEY: SECRET_A });

    const zone = await createZoneService(config);
    await zone.submit({ claimHash: "11".repeat(32), evidenceHash: "22".repeat(32) });

    expect(existsSync(join(dir, "attestations.jsonl"))).toBe(false);
  });
});
