import { ErrorCode } from './codes.js';
import {
  ReferenceParseError,
  BranchNameError,
  VersionControlError,
  WorktreeConflictError,
  LinkError,
  ConfigError,
  MetadataLookupError,
  SproutError,
  type ErrorDetails,
} from './error.js';

// =============================================================================
// Reference Factories
// =============================================================================

/**
 * Creates a ReferenceParseError for input matching no known reference shape
 */
export function unrecognizedReference(
  input: string,
  details: ErrorDetails = {}
): ReferenceParseError {
  const shown = input.trim() === '' ? '(empty)' : input;
  return new ReferenceParseError(
    `Unrecognized issue reference: ${shown}`,
    ErrorCode.UNRECOGNIZED_REFERENCE,
    {
      input,
      expected: [
        'https://github.com/<owner>/<repo>/issues/<n>',
        'https://linear.app/<workspace>/issue/<KEY-n>',
        '<owner>/<repo>#<n>',
        '<KEY>-<n>',
        '#<n>',
        '<n>',
      ],
      ...details,
    }
  );
}

/**
 * Creates a ReferenceParseError for a bare issue number whose repository
 * cannot be taken from the local remote
 */
export function repoInferenceFailed(
  input: string,
  reason: string,
  details: ErrorDetails = {}
): ReferenceParseError {
  return new ReferenceParseError(
    `Cannot infer repository for ${input}: ${reason}. Use <owner>/<repo>#<n> instead`,
    ErrorCode.REPO_INFERENCE_FAILED,
    { input, reason, ...details }
  );
}

// =============================================================================
// Naming Factories
// =============================================================================

/**
 * Creates a BranchNameError for a branch name (or prefix) that git or the
 * ASCII policy rejects
 */
export function invalidBranchName(
  name: string,
  reason: string,
  details: ErrorDetails = {}
): BranchNameError {
  return new BranchNameError(
    `Invalid branch name "${name}": ${reason}`,
    ErrorCode.INVALID_BRANCH_NAME,
    { input: name, reason, ...details }
  );
}

/**
 * Creates a BranchNameError for the first non-ASCII character of a name
 */
export function nonAsciiBranchName(
  name: string,
  offending: string,
  index: number,
  field = 'branch name'
): BranchNameError {
  const codePoint = offending.codePointAt(0) ?? 0;
  const hex = codePoint.toString(16).toUpperCase().padStart(4, '0');
  return new BranchNameError(
    `Invalid ${field} "${name}": non-ASCII character '${offending}' (U+${hex}) at index ${index}`,
    ErrorCode.INVALID_BRANCH_NAME,
    { input: name, offending, index, field }
  );
}

/**
 * Creates a BranchNameError for an unusable worktree location
 */
export function invalidWorktreePath(
  path: string,
  reason: string,
  details: ErrorDetails = {}
): BranchNameError {
  return new BranchNameError(
    `Invalid worktree path ${path}: ${reason}`,
    ErrorCode.INVALID_WORKTREE_PATH,
    { path, reason, ...details }
  );
}

// =============================================================================
// Version Control Factories
// =============================================================================

/**
 * Creates a VersionControlError for a failed git operation.
 * The engine's message is kept verbatim.
 */
export function versionControlFailure(
  operation: readonly string[],
  engineMessage: string,
  cause?: Error
): VersionControlError {
  return new VersionControlError(
    `${operation.join(' ')} failed: ${engineMessage}`,
    ErrorCode.VERSION_CONTROL_FAILURE,
    { operation, engineMessage },
    cause
  );
}

/**
 * Creates a WorktreeConflictError for an occupied target path
 */
export function worktreeConflict(
  path: string,
  reason: string,
  details: ErrorDetails = {}
): WorktreeConflictError {
  return new WorktreeConflictError(`Worktree conflict at ${path}: ${reason}`, {
    path,
    reason,
    ...details,
  });
}

/**
 * Creates a VersionControlError for a directory outside any repository
 */
export function notARepository(path: string, cause?: Error): VersionControlError {
  return new VersionControlError(
    `Not a git repository: ${path}`,
    ErrorCode.NOT_A_REPOSITORY,
    { path },
    cause
  );
}

// =============================================================================
// Link Factories
// =============================================================================

/**
 * Creates a LinkError for a destination outside the worktree
 */
export function linkPathError(
  dest: string,
  reason: string,
  details: ErrorDetails = {}
): LinkError {
  return new LinkError(
    `Link destination ${dest} rejected: ${reason}`,
    ErrorCode.LINK_PATH_ERROR,
    { path: dest, reason, ...details }
  );
}

/**
 * Creates a LinkError for an unreadable declaration file
 */
export function invalidLinkFile(
  path: string,
  reason: string,
  cause?: Error
): LinkError {
  return new LinkError(
    `Invalid link file ${path}: ${reason}`,
    ErrorCode.INVALID_LINK_FILE,
    { path, reason },
    cause
  );
}

/**
 * Creates a LinkError for an entry that could not be applied
 */
export function linkFailed(
  dest: string,
  reason: string,
  cause?: Error
): LinkError {
  return new LinkError(
    `Link ${dest} failed: ${reason}`,
    ErrorCode.LINK_FAILED,
    { path: dest, reason },
    cause
  );
}

// =============================================================================
// Configuration / Soft Factories
// =============================================================================

/**
 * Creates a ConfigError for a rejected configuration value
 */
export function invalidConfig(
  key: string,
  value: unknown,
  expected: string
): ConfigError {
  return new ConfigError(`Invalid configuration ${key}: ${truncateValue(value)}. Expected ${expected}`, {
    key,
    value,
    expected,
  });
}

/**
 * Creates a SproutError for rejected command-line input
 */
export function invalidInput(message: string, details: ErrorDetails = {}): SproutError {
  return new SproutError(message, ErrorCode.INVALID_INPUT, details);
}

/**
 * Creates a MetadataLookupError wrapping a lookup failure
 */
export function metadataLookupDegraded(
  issue: string,
  reason: string,
  cause?: Error
): MetadataLookupError {
  return new MetadataLookupError(
    `Metadata lookup for ${issue} failed: ${reason}`,
    { issue, reason },
    cause
  );
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Truncates a value for display in error messages
 */
function truncateValue(value: unknown, maxLength = 50): string {
  let str: string;
  if (value === undefined) {
    str = 'undefined';
  } else if (value === null) {
    str = 'null';
  } else if (typeof value === 'string') {
    str = `"${value}"`;
  } else {
    str = JSON.stringify(value) ?? String(value);
  }

  if (str.length > maxLength) {
    return str.substring(0, maxLength - 3) + '...';
  }
  return str;
}
