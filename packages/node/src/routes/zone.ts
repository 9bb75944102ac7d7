/**
 * Zone metadata routes.
 *
 * GET /zone/info   — Identity, canons, genesis root, latest anchor
 * GET /merkle/root — Current root, leaf count, latest anchor
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export function createZoneRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/zone/info", (c) => c.json({ data: c.get("service").zoneInfo() }));

  routes.get("/merkle/root", (c) => c.json({ data: c.get("service").currentRoot() }));

  return routes;
}
