/**
 * Error handling module for sprout
 *
 * Structured errors with codes, details and the exit code each failure
 * category maps to.
 */

// Error codes
export {
  ErrorCode,
  ReferenceErrorCode,
  NamingErrorCode,
  VersionControlErrorCode,
  LinkErrorCode,
  GeneralErrorCode,
  ErrorExitCode,
  ErrorExitCodes,
  getExitCode,
} from './codes.js';

// Error classes
export {
  SproutError,
  ReferenceParseError,
  BranchNameError,
  VersionControlError,
  WorktreeConflictError,
  LinkError,
  ConfigError,
  MetadataLookupError,
  isSproutError,
  isReferenceParseError,
  isBranchNameError,
  isVersionControlError,
  isLinkError,
  hasErrorCode,
  type ErrorDetails,
} from './error.js';

// Factory functions
export {
  // Reference
  unrecognizedReference,
  repoInferenceFailed,
  // Naming
  invalidBranchName,
  nonAsciiBranchName,
  invalidWorktreePath,
  // Version control
  versionControlFailure,
  worktreeConflict,
  notARepository,
  // Links
  linkPathError,
  invalidLinkFile,
  linkFailed,
  // Configuration / soft
  invalidConfig,
  invalidInput,
  metadataLookupDegraded,
} from './factories.js';
