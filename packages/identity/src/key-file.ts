/**
 * Identity key files.
 *
 * A key file is a small JSON document:
 *   {"algorithm":"ed25519","secretKey":"<hex>","zoneId":"<hex>",
 *    "retired":[{"algorithm":"ed25519","publicKey":"<hex>","zoneId":"<hex>","retiredAt":1700000000}]}
 *
 * zoneId is informational; on load it is recomputed from the key and a
 * mismatch is rejected. "retired" is present once the Zone has rotated.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { IdentityError, isKeyAlgorithm } from "@zoneledger/types";
import { assertZoneId, identityFromSecretKey } from "./identity.js";
import type { SigningIdentity } from "./identity.js";
import { IdentityHistory } from "./history.js";
import type { RetiredIdentity } from "./history.js";

const hex = z.string().regex(/^(?:[0-9a-fA-F]{2})+$/, "must be an even-length hex string");

const RetiredIdentitySchema = z.object({
  algorithm: z.enum(["ed25519", "secp256k1"]),
  publicKey: hex.transform((s) => s.toLowerCase()),
  zoneId: z
    .string()
    .regex(/^[0-9a-fA-F]{64}$/, "must be a 64-character hex string")
    .transform((s) => s.toLowerCase()),
  retiredAt: z.number().int().nonnegative(),
});

const KeyFileSchema = z.object({
  // Checked after parsing so an unknown algorithm gets its own message
  algorithm: z.string(),
  secretKey: hex,
  zoneId: z.string().optional(),
  retired: z.array(RetiredIdentitySchema).optional(),
});

type KeyFileRecord = z.infer<typeof KeyFileSchema>;

function parseKeyFile(content: string, path: string): KeyFileRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new IdentityError(
      `Key file ${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const result = KeyFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const at = issue?.path.join(".") ?? "";
    throw new IdentityError(
      `Key file ${path} is malformed${at !== "" ? ` at ${at}` : ""}: ${issue?.message ?? "invalid"}`,
    );
  }
  return result.data;
}

function readKeyFile(path: string): KeyFileRecord {
  if (!existsSync(path)) {
    throw new IdentityError(`Key file ${path} does not exist`);
  }
  return parseKeyFile(readFileSync(path, "utf-8"), path);
}

async function currentIdentity(record: KeyFileRecord, path: string): Promise<SigningIdentity> {
  if (!isKeyAlgorithm(record.algorithm)) {
    throw new IdentityError(`Key file ${path} names unsupported algorithm "${record.algorithm}"`);
  }

  const identity = await identityFromSecretKey(record.algorithm, record.secretKey);
  if (record.zoneId !== undefined && record.zoneId.toLowerCase() !== identity.zoneId) {
    throw new IdentityError(
      `Key file ${path} records zone ${record.zoneId} but the key derives ${identity.zoneId}`,
    );
  }
  return identity;
}

/**
 * Load a signing identity from a key file.
 *
 * @throws IdentityError if the file is missing, malformed, or its zoneId
 *   does not match the key
 */
export async function loadIdentityFile(path: string): Promise<SigningIdentity> {
  return currentIdentity(readKeyFile(path), path);
}

/**
 * Load the current identity together with the identities it replaced.
 *
 * @throws IdentityError as loadIdentityFile, or if a retired zoneId is not
 *   derived from its public key
 */
export async function loadIdentityHistory(path: string): Promise<IdentityHistory> {
  const record = readKeyFile(path);
  const current = await currentIdentity(record, path);
  const retired: RetiredIdentity[] = record.retired ?? [];
  for (const r of retired) {
    assertZoneId(r.zoneId, r);
  }
  return new IdentityHistory(current, retired);
}

/**
 * Write a signing identity to a key file (owner read/write only).
 */
export function saveIdentityFile(
  path: string,
  identity: SigningIdentity,
  retired: readonly RetiredIdentity[] = [],
): void {
  mkdirSync(dirname(path), { recursive: true });
  const record: KeyFileRecord = {
    algorithm: identity.algorithm,
    secretKey: identity.exportSecretKey(),
    zoneId: identity.zoneId,
    ...(retired.length > 0 ? { retired: [...retired] } : {}),
  };
  writeFileSync(path, JSON.stringify(record, null, 2) + "\n", {
    encoding: "utf-8",
    mode: 0o600,
  });
}

export function saveIdentityHistory(path: string, history: IdentityHistory): void {
  saveIdentityFile(path, history.current, history.retired());
}
