/**
 * Builds a ZoneService from validated configuration.
 *
 * Identity resolution order:
 * 1. ZONE_KEY_FILE: loaded when present, generated and saved otherwise
 * 2. ZONE_PRIVATE_KEY: hex secret key
 * 3. Neither: an ephemeral key (logged as a warning)
 *
 * Only a key file keeps retired identities; a rotation rewrites it.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";
import type { Logger } from "pino";
import { HttpZoneTransport } from "@zoneledger/citation";
import type { ZoneTransport } from "@zoneledger/citation";
import {
  generateIdentity,
  IdentityHistory,
  identityFromSecretKey,
  loadIdentityHistory,
  saveIdentityFile,
  saveIdentityHistory,
} from "@zoneledger/identity";
import { JsonlAnchorLog, JsonlAttestationStore } from "@zoneledger/ledger";
import type { AppConfig } from "../config.js";
import { ZoneService } from "./zone-service.js";

export const ATTESTATIONS_FILE = "attestations.jsonl";
export const ANCHORS_FILE = "anchors.jsonl";

export interface BootstrapOptions {
  readonly logger?: Logger | undefined;
  /** Overrides the HTTP transport built from config */
  readonly transport?: ZoneTransport | undefined;
}

export async function resolveIdentity(
  config: AppConfig,
  logger?: Logger,
): Promise<IdentityHistory> {
  if (config.ZONE_KEY_FILE !== undefined) {
    if (existsSync(config.ZONE_KEY_FILE)) {
      return loadIdentityHistory(config.ZONE_KEY_FILE);
    }
    const identity = await generateIdentity(config.ZONE_KEY_ALGORITHM);
    saveIdentityFile(config.ZONE_KEY_FILE, identity);
    logger?.info(
      { keyFile: config.ZONE_KEY_FILE, zoneId: identity.zoneId },
      "Generated new Zone key",
    );
    return new IdentityHistory(identity);
  }

  if (config.ZONE_PRIVATE_KEY !== undefined) {
    return new IdentityHistory(
      await identityFromSecretKey(config.ZONE_KEY_ALGORITHM, config.ZONE_PRIVATE_KEY),
    );
  }

  const identity = await generateIdentity(config.ZONE_KEY_ALGORITHM);
  logger?.warn(
    { zoneId: identity.zoneId },
    "No ZONE_KEY_FILE or ZONE_PRIVATE_KEY configured; using an ephemeral key",
  );
  return new IdentityHistory(identity);
}

/**
 * Create and open a ZoneService.
 */
export async function createZoneService(
  config: AppConfig,
  options: BootstrapOptions = {},
): Promise<ZoneService> {
  const history = await resolveIdentity(config, options.logger);
  const persistent = config.STORAGE === "jsonl";
  const keyFile = config.ZONE_KEY_FILE;

  const service = new ZoneService({
    identity: history.current,
    retiredIdentities: history.retired(),
    onIdentityRotated:
      keyFile === undefined ? undefined : (rotated) => saveIdentityHistory(keyFile, rotated),
    name: config.ZONE_NAME,
    description: config.ZONE_DESCRIPTION,
    store: persistent
      ? new JsonlAttestationStore({ filePath: join(config.DATA_DIR, ATTESTATIONS_FILE) })
      : undefined,
    anchorLog: persistent ? new JsonlAnchorLog(join(config.DATA_DIR, ANCHORS_FILE)) : undefined,
    transport:
      options.transport ??
      new HttpZoneTransport({
        // every attempt has to fit inside the per-check timeout
        timeoutMs: Math.max(1, Math.floor(config.CITATION_TIMEOUT_MS / config.CITATION_RETRIES)),
        retry: { attempts: config.CITATION_RETRIES },
      }),
    citationTimeoutMs: config.CITATION_TIMEOUT_MS,
    logger: options.logger,
  });

  await service.open();
  return service;
}
