/**
 * @zoneledger/citation — Cross-Zone citation verification.
 *
 * @packageDocumentation
 */

export { CitationVerifier } from "./verifier.js";
export type { CitationVerifierOptions } from "./verifier.js";

export { HttpZoneTransport } from "./http-transport.js";
export type { HttpZoneTransportOptions } from "./http-transport.js";
export { LocalZoneTransport } from "./local-transport.js";
export type { CitedRecordSource } from "./local-transport.js";

export {
  AttemptsExhaustedError,
  DEFAULT_RETRY_POLICY,
  FetchCancelledError,
  pause,
  retryDelay,
  retryTransient,
} from "./retry.js";
export type { Pause, RetryOptions, RetryPolicy } from "./retry.js";

export { AnchorSchema, AttestationSchema, CitedRecordSchema } from "./schemas.js";

export type {
  CitationCheckResult,
  CitationFailureReason,
  CitationRequest,
  CitationStatus,
  CitationTarget,
  CitedRecord,
  EnclosingAnchorSource,
  ZoneTransport,
} from "./types.js";
