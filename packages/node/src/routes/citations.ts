/**
 * Citation routes.
 *
 * POST /citations/verify       — Check one citation
 * POST /citations/verify/batch — Check several citations of one attestation
 *
 * An INVALID citation is a normal 200 response; only malformed requests
 * fail.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { VerifyCitationSchema, VerifyCitationsSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createCitationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/citations/verify", validateBody(VerifyCitationSchema), async (c) => {
    const { citingId, citedId, citedZoneEndpoint } = c.get("validatedBody");
    const result = await c
      .get("service")
      .checkCitation(citingId, citedId, citedZoneEndpoint);
    return c.json({ data: { valid: result.status === "VALID", result } });
  });

  routes.post("/citations/verify/batch", validateBody(VerifyCitationsSchema), async (c) => {
    const { citingId, targets } = c.get("validatedBody");
    const results = await c.get("service").checkCitations(citingId, targets);
    return c.json({ data: results });
  });

  return routes;
}
