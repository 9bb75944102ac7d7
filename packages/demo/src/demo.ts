/**
 * @zoneledger/demo — Cross-Zone walkthrough.
 *
 * Runs two Zones in one process and walks through the whole protocol:
 * identities -> attest -> prove -> anchor -> cite -> verify the citation
 * -> package a self-contained proof -> reject a tampered record
 *
 * Uses real domain packages directly (no HTTP server). Zone B reaches
 * Zone A through an in-process transport.
 */

import chalk from "chalk";
import { hashContent, verifyAttestation } from "@zoneledger/attestation";
import { LocalZoneTransport } from "@zoneledger/citation";
import type { CitationCheckResult } from "@zoneledger/citation";
import { generateIdentity } from "@zoneledger/identity";
import { ZoneService } from "@zoneledger/node";
import { packageAttestationProof, verifyAttestationProof } from "@zoneledger/proof";

// =============================================================================
// Options
// =============================================================================

export interface DemoOptions {
  /** Pause between steps, in ms. Default: 600 */
  readonly delayMs?: number | undefined;
  /** Line sink. Default: console.log */
  readonly print?: ((line: string) => void) | undefined;
}

export interface DemoSummary {
  readonly citedId: string;
  readonly citingId: string;
  readonly beforeAnchor: CitationCheckResult;
  readonly afterAnchor: CitationCheckResult;
  readonly proofPackageValid: boolean;
  readonly tamperedRejected: boolean;
}

const ZONE_A_ENDPOINT = "https://zone-a.example";
const TOTAL_STEPS = 8;

// Anchor times are handed in, as an operator would after an external
// anchoring service confirms a root.
const ANCHOR_A_TIME = 1_700_000_100;
const ANCHOR_B_TIME = 1_700_000_200;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function short(hash: string): string {
  return hash.length > 16 ? `${hash.slice(0, 16)}...${hash.slice(-8)}` : hash;
}

// =============================================================================
// Demo
// =============================================================================

export async function runDemo(options: DemoOptions = {}): Promise<DemoSummary> {
  const delayMs = options.delayMs ?? 600;
  // eslint-disable-next-line no-console
  const print = options.print ?? ((line: string) => console.log(line));

  const pause = (): Promise<void> => (delayMs > 0 ? sleep(delayMs) : Promise.resolve());
  const ok = (msg: string): void => print(chalk.green("    ✓ ") + chalk.white(msg));
  const fail = (msg: string): void => print(chalk.red("    ✗ ") + chalk.white(msg));
  const info = (label: string, value: string): void =>
    print(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.white(value));
  const hashLine = (label: string, hash: string): void =>
    print(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.yellow(short(hash)));
  const stepHeader = (step: number, title: string): void => {
    const prefix = chalk.cyan.bold(`  Step ${step}/${TOTAL_STEPS}`);
    const line = chalk.gray("─".repeat(Math.max(2, 50 - title.length)));
    print(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
  };
  const citationLine = (result: CitationCheckResult): void => {
    if (result.status === "VALID") {
      ok(`Citation VALID (anchor ${result.citedAnchorTimestamp ?? "?"} < ${result.citingAnchorTimestamp ?? "?"})`);
    } else {
      fail(`Citation INVALID: ${result.reason ?? "unknown"}`);
    }
  };

  print("");
  print(chalk.cyan.bold("  ZONE LEDGER DEMO"));
  print(chalk.gray("  Two sovereign Zones, one cross-Zone citation.\n"));
  await pause();

  // ─── Step 1: Identities ─────────────────────────────────────────────

  stepHeader(1, "Identities");

  const transport = new LocalZoneTransport();
  const zoneA = new ZoneService({
    identity: await generateIdentity("ed25519"),
    name: "Registry A",
    transport,
  });
  const zoneB = new ZoneService({
    identity: await generateIdentity("secp256k1"),
    name: "Registry B",
    transport,
  });
  await zoneA.open();
  await zoneB.open();
  transport.register(ZONE_A_ENDPOINT, zoneA);

  hashLine("Zone A (ed25519)", zoneA.identity.zoneId);
  hashLine("Zone B (secp256k1)", zoneB.identity.zoneId);
  ok("zoneId = SHA-256(public key) for both");
  await pause();

  // ─── Step 2: Attest ─────────────────────────────────────────────────

  stepHeader(2, "Zone A attests");

  const cited = await zoneA.submit({
    claimHash: hashContent("Sample 42 passed inspection"),
    evidenceHash: hashContent("inspection-report-v1"),
  });
  for (const filler of ["batch-7 sealed", "batch-8 sealed"]) {
    await zoneA.submit({ claimHash: hashContent(filler), evidenceHash: hashContent(filler) });
  }
  hashLine("attestation", cited.attestationId);
  hashLine("merkle root", zoneA.ledger.root());
  info("leaves", String(zoneA.ledger.leafCount()));
  ok("Signed and appended");
  await pause();

  // ─── Step 3: Prove ──────────────────────────────────────────────────

  stepHeader(3, "Inclusion proof");

  const initial = zoneA.getAttestation(cited.attestationId);
  if (initial === undefined) {
    throw new Error("Zone A lost its own attestation");
  }
  info("leaf index", `${initial.proof.leafIndex} of ${initial.proof.leafCount}`);
  info("siblings", initial.proof.siblings.map((s) => (s === "*" ? "*" : s.slice(0, 8))).join(" "));
  ok("Proof resolves to the current root");
  await pause();

  // ─── Step 4: Anchor Zone A ──────────────────────────────────────────

  stepHeader(4, "Anchor Zone A");

  zoneA.recordAnchor({
    merkleRoot: zoneA.ledger.root(),
    anchorType: "witness",
    externalTimestamp: ANCHOR_A_TIME,
    reference: "demo-witness#a",
  });
  info("external time", String(ANCHOR_A_TIME));
  ok("Root bound to an external timestamp");
  await pause();

  // ─── Step 5: Cite ───────────────────────────────────────────────────

  stepHeader(5, "Zone B cites Zone A");

  const citing = await zoneB.submit({
    claimHash: hashContent("Shipment 9 contains sample 42"),
    evidenceHash: hashContent("manifest-9"),
    citations: [cited.attestationId],
  });
  hashLine("citing", citing.attestationId);

  const beforeAnchor = await zoneB.checkCitation(
    citing.attestationId,
    cited.attestationId,
    ZONE_A_ENDPOINT,
  );
  citationLine(beforeAnchor);
  info("why", "Zone B's root has no anchor yet");
  await pause();

  // ─── Step 6: Anchor Zone B ──────────────────────────────────────────

  stepHeader(6, "Anchor Zone B, check again");

  zoneB.recordAnchor({
    merkleRoot: zoneB.ledger.root(),
    anchorType: "witness",
    externalTimestamp: ANCHOR_B_TIME,
    reference: "demo-witness#b",
  });
  const afterAnchor = await zoneB.checkCitation(
    citing.attestationId,
    cited.attestationId,
    ZONE_A_ENDPOINT,
  );
  citationLine(afterAnchor);
  await pause();

  // ─── Step 7: Proof package ──────────────────────────────────────────

  stepHeader(7, "Self-contained proof package");

  const record = zoneA.getAttestation(cited.attestationId);
  const pkg =
    record === undefined
      ? null
      : packageAttestationProof(record.attestation, record.proof, record.anchor);
  const proofPackageValid = pkg !== null && verifyAttestationProof(pkg);
  if (pkg !== null) {
    hashLine("package hash", pkg.packageHash);
    hashLine("anchored root", pkg.merkleRoot);
  }
  if (proofPackageValid) {
    ok("Verifiable with the package alone");
  } else {
    fail("Proof package did not verify");
  }
  await pause();

  // ─── Step 8: Tamper ─────────────────────────────────────────────────

  stepHeader(8, "Tampered record");

  const tampered = { ...cited, claimHash: hashContent("Sample 42 FAILED inspection") };
  const check = await verifyAttestation(tampered, zoneA.identity);
  const tamperedRejected = !check.valid;
  if (tamperedRejected) {
    ok(`Rejected: ${check.reason ?? "invalid"}`);
  } else {
    fail("Tampered record was accepted");
  }

  print("");
  print(chalk.white("    Citation:        ") + (afterAnchor.status === "VALID"
    ? chalk.green.bold("VALID")
    : chalk.red.bold("INVALID")));
  print(chalk.white("    Proof package:   ") + (proofPackageValid
    ? chalk.green.bold("VALID")
    : chalk.red.bold("INVALID")));
  print("");
  print(chalk.gray("    Ordering comes from external anchors, never from a Zone's own clock."));
  print("");

  return {
    citedId: cited.attestationId,
    citingId: citing.attestationId,
    beforeAnchor,
    afterAnchor,
    proofPackageValid,
    tamperedRejected,
  };
}
