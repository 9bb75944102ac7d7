/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps zoneledger error codes to HTTP status codes. Anything else is a
 * 500 whose message is never sent to the client.
 */

import type { Context } from "hono";
import { isZoneError } from "@zoneledger/types";
import type { ZoneErrorCode } from "@zoneledger/types";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

type ErrorStatus = 400 | 404 | 409 | 500 | 503;

const STATUS_MAP: Readonly<Record<ZoneErrorCode, ErrorStatus>> = {
  INVALID_INPUT: 400,
  DUPLICATE_ATTESTATION: 409,
  // Key problems are the operator's, not the client's
  IDENTITY_ERROR: 500,
  UNREACHABLE_COLLABORATOR: 503,
  REMOTE_NOT_FOUND: 404,
};

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (!isZoneError(err)) {
    return c.json(createErrorEnvelope("INTERNAL_ERROR", "Internal server error"), 500);
  }

  const status = STATUS_MAP[err.code];
  // Don't leak internal details
  const message = status === 500 ? "Internal server error" : err.message;
  return c.json(createErrorEnvelope(err.code, message), status);
}

/**
 * JSON 404 for unknown routes.
 */
export function handleNotFound(c: Context): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}
