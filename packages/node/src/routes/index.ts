/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createZoneRoutes } from "./zone.js";
export { createAttestationRoutes } from "./attestations.js";
export { createAnchorRoutes } from "./anchors.js";
export { createCitationRoutes } from "./citations.js";
