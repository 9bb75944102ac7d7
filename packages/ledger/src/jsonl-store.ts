/**
 * @zoneledger/ledger — File-based JSONL stores.
 *
 * One JSON object per line in a `.jsonl` file.
 *
 * Crash safety:
 * - Each append flushes to disk via fsync before returning
 * - Partial writes (torn lines) are detected and skipped on load
 * - The file is the source of truth; in-memory state is derived
 *
 * File formats:
 *   attestations.jsonl  {"attestation":{...},"root":"...","appendedAt":"..."}
 *   anchors.jsonl       {"anchor":{"merkleRoot":"...",...},"version":N}
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
} from "node:fs";
import { dirname } from "node:path";
import { isAnchor, isAttestation, isHash } from "@zoneledger/types";
import type { Attestation } from "@zoneledger/types";
import type { AnchoredRoot, AttestationStore, StoredAttestation } from "./types.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

// ─── JSONL file ─────────────────────────────────────────────────────────

/**
 * Append-only JSONL file with fsync'd writes.
 */
export class JsonlFile {
  constructor(readonly filePath: string) {
    mkdirSync(dirname(filePath), { recursive: true });
  }

  /**
   * Parse every well-formed line. Corrupt or partial lines are skipped.
   */
  readRecords(): unknown[] {
    if (!existsSync(this.filePath)) {
      return [];
    }

    const records: unknown[] = [];
    for (const line of readFileSync(this.filePath, "utf-8").split("\n")) {
      const trimmed = line.trim();
      if (trimmed.length === 0) {
        continue;
      }
      try {
        records.push(JSON.parse(trimmed));
      } catch {
        // Torn line from an unclean shutdown
        continue;
      }
    }
    return records;
  }

  /**
   * Append one record and fsync.
   */
  append(record: unknown): void {
    const fd = openSync(this.filePath, "a");
    try {
      appendFileSync(fd, JSON.stringify(record) + "\n", "utf-8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
  }
}

// ─── Attestation store ──────────────────────────────────────────────────

export interface JsonlAttestationStoreOptions {
  /** Path to the JSONL file */
  readonly filePath: string;
}

/**
 * File-based attestation store. The index is rebuilt from the file on
 * construction; the file is created on first append.
 */
export class JsonlAttestationStore implements AttestationStore {
  private readonly _file: JsonlFile;
  private readonly _byId = new Map<string, Attestation>();
  private readonly _entries: StoredAttestation[] = [];

  constructor(options: JsonlAttestationStoreOptions) {
    this._file = new JsonlFile(options.filePath);

    for (const record of this._file.readRecords()) {
      if (!isObject(record)) {
        continue;
      }
      const { attestation, root } = record;
      if (!isAttestation(attestation) || !isHash(root) || this._byId.has(attestation.attestationId)) {
        continue;
      }
      this._byId.set(attestation.attestationId, attestation);
      this._entries.push({ attestation, root: root.toLowerCase() });
    }
  }

  get filePath(): string {
    return this._file.filePath;
  }

  async has(attestationId: string): Promise<boolean> {
    return this._byId.has(attestationId);
  }

  async get(attestationId: string): Promise<Attestation | undefined> {
    return this._byId.get(attestationId);
  }

  async put(entry: StoredAttestation): Promise<void> {
    const { attestation, root } = entry;
    if (this._byId.has(attestation.attestationId)) {
      return;
    }
    // Write first; in-memory index only after a successful fsync
    this._file.append({ attestation, root, appendedAt: new Date().toISOString() });
    this._byId.set(attestation.attestationId, attestation);
    this._entries.push(entry);
  }

  async entries(): Promise<readonly StoredAttestation[]> {
    return [...this._entries];
  }

  async count(): Promise<number> {
    return this._entries.length;
  }
}

// ─── Anchor log ─────────────────────────────────────────────────────────

/**
 * Durable log of recorded anchors, replayed into an AnchorRegistry at
 * startup. Each line keeps the ledger version of the anchored root.
 */
export class JsonlAnchorLog {
  private readonly _file: JsonlFile;

  constructor(filePath: string) {
    this._file = new JsonlFile(filePath);
  }

  load(): AnchoredRoot[] {
    const anchored: AnchoredRoot[] = [];
    for (const record of this._file.readRecords()) {
      if (!isObject(record)) {
        continue;
      }
      const { anchor, version } = record;
      if (isAnchor(anchor) && typeof version === "number" && Number.isSafeInteger(version) && version >= 0) {
        anchored.push({ anchor, version });
      }
    }
    return anchored;
  }

  append(anchored: AnchoredRoot): void {
    this._file.append({ anchor: anchored.anchor, version: anchored.version });
  }
}
