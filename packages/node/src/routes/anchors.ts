/**
 * Anchor routes.
 *
 * GET  /anchors — Every recorded anchor with the ledger version it covers
 * POST /anchors — Record an external anchor for a root of this Zone
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { RecordAnchorSchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAnchorRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/anchors", (c) => c.json({ data: c.get("service").anchors.list() }));

  // An unknown root is an InvalidInputError (400)
  routes.post("/anchors", validateBody(RecordAnchorSchema), (c) => {
    const anchored = c.get("service").recordAnchor(c.get("validatedBody"));
    return c.json({ data: anchored }, 201);
  });

  return routes;
}
