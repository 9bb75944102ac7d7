/**
 * @zoneledger/node — Zone node.
 *
 * @packageDocumentation
 */

export { ZoneService } from "./services/zone-service.js";
export type {
  RootInfo,
  SubmitRequest,
  ZoneInfo,
  ZoneServiceConfig,
} from "./services/zone-service.js";
export {
  ANCHORS_FILE,
  ATTESTATIONS_FILE,
  createZoneService,
  resolveIdentity,
} from "./services/bootstrap.js";
export type { BootstrapOptions } from "./services/bootstrap.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
