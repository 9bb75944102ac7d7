/**
 * Health check routes.
 *
 * GET /health — Liveness check with the Zone's current state
 * GET /ready  — Readiness check (ledger loaded from storage)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    const service = c.get("service");
    return c.json({
      status: "ok",
      zoneId: service.identity.zoneId,
      attestationCount: service.ledger.leafCount(),
      merkleRoot: service.ledger.root(),
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const ready = c.get("service").isReady();
    return c.json(
      { status: ready ? "ready" : "not_ready", timestamp: new Date().toISOString() },
      ready ? 200 : 503,
    );
  });

  return routes;
}
