import {
  ErrorCode,
  ErrorExitCodes,
  type ErrorExitCode,
  type ReferenceErrorCode,
  type NamingErrorCode,
  type VersionControlErrorCode,
  type LinkErrorCode,
} from './codes.js';

/**
 * Additional context for errors
 */
export interface ErrorDetails {
  /** The raw input that was rejected */
  input?: string;
  /** The exact offending substring or character */
  offending?: string;
  /** Index of the offending character within the input */
  index?: number;
  /** Expected format or value */
  expected?: unknown;
  /** Filesystem path involved */
  path?: string;
  /** Git operation that was attempted, as an argv */
  operation?: readonly string[];
  /** Additional arbitrary context */
  [key: string]: unknown;
}

/**
 * Base error class for all sprout errors.
 * Provides structured error information with code, message, and details.
 */
export class SproutError extends Error {
  /** Machine-readable error code */
  readonly code: ErrorCode;
  /** Additional context about the error */
  readonly details: ErrorDetails;
  /** Process exit code when this error ends a run */
  readonly exitCode: ErrorExitCode;

  constructor(
    message: string,
    code: ErrorCode,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message);
    this.name = 'SproutError';
    this.code = code;
    this.details = details;
    this.exitCode = ErrorExitCodes[code];
    this.cause = cause;

    // Maintains proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SproutError);
    }
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): {
    name: string;
    message: string;
    code: ErrorCode;
    details: ErrorDetails;
    exitCode: number;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      exitCode: this.exitCode,
    };
  }
}

/**
 * Error for issue references that cannot be parsed or resolved
 */
export class ReferenceParseError extends SproutError {
  constructor(
    message: string,
    code: ReferenceErrorCode = ErrorCode.UNRECOGNIZED_REFERENCE,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'ReferenceParseError';
  }
}

/**
 * Error for rejected branch names and worktree locations
 */
export class BranchNameError extends SproutError {
  constructor(
    message: string,
    code: NamingErrorCode = ErrorCode.INVALID_BRANCH_NAME,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'BranchNameError';
  }
}

/**
 * Error wrapping a failed git operation
 */
export class VersionControlError extends SproutError {
  constructor(
    message: string,
    code: VersionControlErrorCode = ErrorCode.VERSION_CONTROL_FAILURE,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'VersionControlError';
  }
}

/**
 * Error for a target path that is occupied by something unexpected
 */
export class WorktreeConflictError extends VersionControlError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, ErrorCode.WORKTREE_CONFLICT, details);
    this.name = 'WorktreeConflictError';
  }
}

/**
 * Error for a single private link entry or the declaration file
 */
export class LinkError extends SproutError {
  constructor(
    message: string,
    code: LinkErrorCode = ErrorCode.LINK_FAILED,
    details: ErrorDetails = {},
    cause?: Error
  ) {
    super(message, code, details, cause);
    this.name = 'LinkError';
  }
}

/**
 * Error for rejected configuration values
 */
export class ConfigError extends SproutError {
  constructor(message: string, details: ErrorDetails = {}, cause?: Error) {
    super(message, ErrorCode.INVALID_CONFIG, details, cause);
    this.name = 'ConfigError';
  }
}

/**
 * Soft error: a metadata lookup failed or timed out.
 * Callers log it and continue with empty metadata.
 */
export class MetadataLookupError extends SproutError {
  constructor(message: string, details: ErrorDetails = {}, cause?: Error) {
    super(message, ErrorCode.METADATA_LOOKUP_DEGRADED, details, cause);
    this.name = 'MetadataLookupError';
  }
}

/**
 * Type guard to check if an error is a SproutError
 */
export function isSproutError(error: unknown): error is SproutError {
  return error instanceof SproutError;
}

/**
 * Type guard to check if an error is a ReferenceParseError
 */
export function isReferenceParseError(error: unknown): error is ReferenceParseError {
  return error instanceof ReferenceParseError;
}

/**
 * Type guard to check if an error is a BranchNameError
 */
export function isBranchNameError(error: unknown): error is BranchNameError {
  return error instanceof BranchNameError;
}

/**
 * Type guard to check if an error is a VersionControlError
 */
export function isVersionControlError(error: unknown): error is VersionControlError {
  return error instanceof VersionControlError;
}

/**
 * Type guard to check if an error is a LinkError
 */
export function isLinkError(error: unknown): error is LinkError {
  return error instanceof LinkError;
}

/**
 * Type guard to check if an error has a specific error code
 */
export function hasErrorCode(
  error: unknown,
  code: ErrorCode
): error is SproutError {
  return isSproutError(error) && error.code === code;
}
