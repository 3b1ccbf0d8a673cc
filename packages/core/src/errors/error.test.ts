import { describe, it, expect } from 'vitest';
import {
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
} from './error.js';
import { ErrorCode, getExitCode } from './codes.js';

describe('SproutError', () => {
  it('should carry code, details and the mapped exit code', () => {
    const error = new SproutError('bad input', ErrorCode.INVALID_INPUT, { input: '--x' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('SproutError');
    expect(error.message).toBe('bad input');
    expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(error.details).toEqual({ input: '--x' });
    expect(error.exitCode).toBe(2);
  });

  it('should keep the cause', () => {
    const cause = new Error('EACCES');
    const error = new LinkError('Link .env failed', ErrorCode.LINK_FAILED, {}, cause);

    expect(error.cause).toBe(cause);
  });

  it('should serialize to JSON without the stack', () => {
    const error = new ConfigError('Invalid configuration remote', { key: 'remote' });

    expect(JSON.parse(JSON.stringify(error))).toEqual({
      name: 'ConfigError',
      message: 'Invalid configuration remote',
      code: 'INVALID_CONFIG',
      details: { key: 'remote' },
      exitCode: 2,
    });
  });
});

describe('Error subclasses', () => {
  it('should default their codes', () => {
    expect(new ReferenceParseError('x').code).toBe(ErrorCode.UNRECOGNIZED_REFERENCE);
    expect(new BranchNameError('x').code).toBe(ErrorCode.INVALID_BRANCH_NAME);
    expect(new VersionControlError('x').code).toBe(ErrorCode.VERSION_CONTROL_FAILURE);
    expect(new LinkError('x').code).toBe(ErrorCode.LINK_FAILED);
    expect(new MetadataLookupError('x').code).toBe(ErrorCode.METADATA_LOOKUP_DEGRADED);
  });

  it('should set their names', () => {
    expect(new WorktreeConflictError('x').name).toBe('WorktreeConflictError');
    expect(new MetadataLookupError('x').name).toBe('MetadataLookupError');
  });
});

describe('Type guards', () => {
  const conflict = new WorktreeConflictError('taken');

  it('should follow the class hierarchy', () => {
    expect(isSproutError(conflict)).toBe(true);
    expect(isVersionControlError(conflict)).toBe(true);
    expect(isLinkError(conflict)).toBe(false);
    expect(isReferenceParseError(new ReferenceParseError('x'))).toBe(true);
    expect(isBranchNameError(new Error('plain'))).toBe(false);
  });

  it('should match error codes', () => {
    expect(hasErrorCode(conflict, ErrorCode.WORKTREE_CONFLICT)).toBe(true);
    expect(hasErrorCode(conflict, ErrorCode.VERSION_CONTROL_FAILURE)).toBe(false);
    expect(hasErrorCode('WORKTREE_CONFLICT', ErrorCode.WORKTREE_CONFLICT)).toBe(false);
  });
});

describe('getExitCode', () => {
  it('should give each failure family its own decade', () => {
    expect(getExitCode(ErrorCode.UNRECOGNIZED_REFERENCE)).toBe(10);
    expect(getExitCode(ErrorCode.INVALID_WORKTREE_PATH)).toBe(21);
    expect(getExitCode(ErrorCode.NOT_A_REPOSITORY)).toBe(32);
    expect(getExitCode(ErrorCode.LINK_FAILED)).toBe(42);
    expect(getExitCode(ErrorCode.METADATA_LOOKUP_DEGRADED)).toBe(0);
  });
});
