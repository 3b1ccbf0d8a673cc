/**
 * Error codes for sprout.
 * Categorized by the pipeline stage that raises them, so every category
 * maps onto its own range of process exit codes.
 */

/**
 * Reference error codes - Raw issue input could not be turned into a reference
 */
export const ReferenceErrorCode = {
  /** Input matches none of the recognized reference shapes */
  UNRECOGNIZED_REFERENCE: 'UNRECOGNIZED_REFERENCE',
  /** Bare issue number but no usable remote to take owner/repo from */
  REPO_INFERENCE_FAILED: 'REPO_INFERENCE_FAILED',
} as const;

export type ReferenceErrorCode = typeof ReferenceErrorCode[keyof typeof ReferenceErrorCode];

/**
 * Naming error codes - Branch name or worktree path rejected
 */
export const NamingErrorCode = {
  /** Branch name is non-ASCII, empty, or not a valid git ref */
  INVALID_BRANCH_NAME: 'INVALID_BRANCH_NAME',
  /** Worktree location is unusable (e.g. inside the repository) */
  INVALID_WORKTREE_PATH: 'INVALID_WORKTREE_PATH',
} as const;

export type NamingErrorCode = typeof NamingErrorCode[keyof typeof NamingErrorCode];

/**
 * Version control error codes - Failures reported by or about the git engine
 */
export const VersionControlErrorCode = {
  /** A git operation failed */
  VERSION_CONTROL_FAILURE: 'VERSION_CONTROL_FAILURE',
  /** Target path is occupied by something other than the expected worktree */
  WORKTREE_CONFLICT: 'WORKTREE_CONFLICT',
  /** The working directory is not inside a git repository */
  NOT_A_REPOSITORY: 'NOT_A_REPOSITORY',
} as const;

export type VersionControlErrorCode = typeof VersionControlErrorCode[keyof typeof VersionControlErrorCode];

/**
 * Link error codes - Private file link declaration and application
 */
export const LinkErrorCode = {
  /** Destination is absolute or escapes the worktree */
  LINK_PATH_ERROR: 'LINK_PATH_ERROR',
  /** Declaration file is not valid JSON or not an array */
  INVALID_LINK_FILE: 'INVALID_LINK_FILE',
  /** Entry could not be applied (refused directory, fs error, malformed entry) */
  LINK_FAILED: 'LINK_FAILED',
} as const;

export type LinkErrorCode = typeof LinkErrorCode[keyof typeof LinkErrorCode];

/**
 * Soft and configuration error codes
 */
export const GeneralErrorCode = {
  /** Metadata lookup failed or timed out; execution continues without it */
  METADATA_LOOKUP_DEGRADED: 'METADATA_LOOKUP_DEGRADED',
  /** Configuration value rejected */
  INVALID_CONFIG: 'INVALID_CONFIG',
  /** Command-line input rejected */
  INVALID_INPUT: 'INVALID_INPUT',
} as const;

export type GeneralErrorCode = typeof GeneralErrorCode[keyof typeof GeneralErrorCode];

/**
 * All error codes combined
 */
export const ErrorCode = {
  ...ReferenceErrorCode,
  ...NamingErrorCode,
  ...VersionControlErrorCode,
  ...LinkErrorCode,
  ...GeneralErrorCode,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * CLI exit codes. Each failure category owns a decade.
 */
export const ErrorExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENTS: 2,

  UNRECOGNIZED_REFERENCE: 10,
  REPO_INFERENCE_FAILED: 11,

  INVALID_BRANCH_NAME: 20,
  INVALID_WORKTREE_PATH: 21,

  VERSION_CONTROL_FAILURE: 30,
  WORKTREE_CONFLICT: 31,
  NOT_A_REPOSITORY: 32,

  LINK_PATH_ERROR: 40,
  INVALID_LINK_FILE: 41,
  LINK_FAILED: 42,
} as const;

export type ErrorExitCode = typeof ErrorExitCode[keyof typeof ErrorExitCode];

/**
 * Maps error codes to CLI exit codes
 */
export const ErrorExitCodes: Record<ErrorCode, ErrorExitCode> = {
  [ErrorCode.UNRECOGNIZED_REFERENCE]: ErrorExitCode.UNRECOGNIZED_REFERENCE,
  [ErrorCode.REPO_INFERENCE_FAILED]: ErrorExitCode.REPO_INFERENCE_FAILED,

  [ErrorCode.INVALID_BRANCH_NAME]: ErrorExitCode.INVALID_BRANCH_NAME,
  [ErrorCode.INVALID_WORKTREE_PATH]: ErrorExitCode.INVALID_WORKTREE_PATH,

  [ErrorCode.VERSION_CONTROL_FAILURE]: ErrorExitCode.VERSION_CONTROL_FAILURE,
  [ErrorCode.WORKTREE_CONFLICT]: ErrorExitCode.WORKTREE_CONFLICT,
  [ErrorCode.NOT_A_REPOSITORY]: ErrorExitCode.NOT_A_REPOSITORY,

  [ErrorCode.LINK_PATH_ERROR]: ErrorExitCode.LINK_PATH_ERROR,
  [ErrorCode.INVALID_LINK_FILE]: ErrorExitCode.INVALID_LINK_FILE,
  [ErrorCode.LINK_FAILED]: ErrorExitCode.LINK_FAILED,

  // Soft: never the reason a run fails
  [ErrorCode.METADATA_LOOKUP_DEGRADED]: ErrorExitCode.SUCCESS,
  [ErrorCode.INVALID_CONFIG]: ErrorExitCode.INVALID_ARGUMENTS,
  [ErrorCode.INVALID_INPUT]: ErrorExitCode.INVALID_ARGUMENTS,
};

/**
 * Maps an error code to its CLI exit code
 */
export function getExitCode(code: ErrorCode): ErrorExitCode {
  return ErrorExitCodes[code];
}
