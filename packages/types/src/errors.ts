/**
 * Error taxonomy shared by every zoneledger package.
 *
 * Verification failures are NOT errors: proof, signature and citation
 * checks report a boolean or a result object. Errors are reserved for
 * rejected input, append conflicts, key problems and unavailable
 * collaborators.
 */

/**
 * Error codes for zoneledger operations.
 */
export type ZoneErrorCode =
  | "INVALID_INPUT"
  | "DUPLICATE_ATTESTATION"
  | "IDENTITY_ERROR"
  | "UNREACHABLE_COLLABORATOR"
  | "REMOTE_NOT_FOUND";

/**
 * Base class. `code` is stable and safe to match on across packages.
 */
export class ZoneError extends Error {
  constructor(
    public readonly code: ZoneErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "ZoneError";
  }
}

/**
 * Malformed hash length, negative timestamp, malformed proof token.
 * Raised before any hashing or signing takes place.
 */
export class InvalidInputError extends ZoneError {
  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/**
 * The attestation ID is already in the ledger. Non-fatal: the caller can
 * treat the attestation as already recorded.
 */
export class DuplicateAttestationError extends ZoneError {
  constructor(public readonly attestationId: string) {
    super(
      "DUPLICATE_ATTESTATION",
      `Attestation ${attestationId} has already been appended`,
    );
    this.name = "DuplicateAttestationError";
  }
}

/**
 * Missing or invalid signing key, or a zone ID that does not derive from
 * the attached public key.
 */
export class IdentityError extends ZoneError {
  constructor(message: string) {
    super("IDENTITY_ERROR", message);
    this.name = "IdentityError";
  }
}

/**
 * Storage or a remote Zone could not be reached. Retryable; never leaves
 * local ledger state modified.
 */
export class UnreachableCollaboratorError extends ZoneError {
  constructor(
    public readonly collaborator: string,
    message: string,
    cause?: unknown,
  ) {
    super("UNREACHABLE_COLLABORATOR", message, { cause });
    this.name = "UnreachableCollaboratorError";
  }
}

/**
 * The remote Zone answered, but does not know the requested attestation.
 * Distinct from a verification failure and from an unreachable Zone.
 */
export class RemoteNotFoundError extends ZoneError {
  constructor(
    public readonly endpoint: string,
    public readonly attestationId: string,
  ) {
    super(
      "REMOTE_NOT_FOUND",
      `Attestation ${attestationId} not found at ${endpoint}`,
    );
    this.name = "RemoteNotFoundError";
  }
}

export function isZoneError(err: unknown): err is ZoneError {
  return err instanceof ZoneError;
}
