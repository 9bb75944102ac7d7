/**
 * Type barrel — re-exports all public types from @zoneledger/node.
 */

// DTOs
export {
  RecordAnchorSchema,
  SubmitHashedSchema,
  SubmitSchema,
  SubmitTextSchema,
  VerifyCitationSchema,
  VerifyCitationsSchema,
} from "./dto.js";
export type {
  RecordAnchorDto,
  SubmitDto,
  VerifyCitationDto,
  VerifyCitationsDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
