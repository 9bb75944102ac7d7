/**
 * Attestation routes.
 *
 * GET  /attestation/:id — Attestation with inclusion proof (and anchor)
 * POST /verify          — Sign and append a new attestation
 */

import { Hono } from "hono";
import { hashContent } from "@zoneledger/attestation";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";
import { SubmitSchema } from "../types/dto.js";
import type { SubmitDto } from "../types/dto.js";
import type { SubmitRequest } from "../services/zone-service.js";
import { validateBody } from "../middleware/validate.js";

function toSubmitRequest(body: SubmitDto): SubmitRequest {
  const common = {
    canonId: body.canonId,
    evidenceLocation: body.evidenceLocation,
    citations: body.citations,
  };
  if ("claim" in body) {
    return {
      ...common,
      claimHash: hashContent(body.claim),
      evidenceHash: hashContent(body.evidence),
    };
  }
  return { ...common, claimHash: body.claimHash, evidenceHash: body.evidenceHash };
}

export function createAttestationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /attestation/:id
  routes.get("/attestation/:id", (c) => {
    const id = c.req.param("id");
    // Throws InvalidInputError (400) for a malformed ID
    const record = c.get("service").getAttestation(id);
    if (record === undefined) {
      return c.json(createErrorEnvelope("NOT_FOUND", `Attestation ${id} not found`), 404);
    }
    return c.json({ data: record });
  });

  // POST /verify
  routes.post("/verify", validateBody(SubmitSchema), async (c) => {
    const service = c.get("service");
    const attestation = await service.submit(toSubmitRequest(c.get("validatedBody")));
    const record = service.getAttestation(attestation.attestationId);
    return c.json({ data: record }, 201);
  });

  return routes;
}
