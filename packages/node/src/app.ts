/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes around one
 * ZoneService. main.ts serves it; tests call app.request() directly.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import type { ZoneService } from "./services/zone-service.js";
import { handleError, handleNotFound } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { createHealthRoutes } from "./routes/health.js";
import { createZoneRoutes } from "./routes/zone.js";
import { createAttestationRoutes } from "./routes/attestations.js";
import { createAnchorRoutes } from "./routes/anchors.js";
import { createCitationRoutes } from "./routes/citations.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly service: ZoneService;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: ZoneService;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const { service } = options;
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(handleError);
  app.notFound(handleNotFound);

  // ─── Routes ─────────────────────────────────────────────────────
  app.route("/", createHealthRoutes());
  app.route("/", createZoneRoutes());
  app.route("/", createAttestationRoutes());
  app.route("/", createAnchorRoutes());
  app.route("/", createCitationRoutes());

  return { app, service };
}
