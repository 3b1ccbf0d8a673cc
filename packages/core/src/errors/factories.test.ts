import { describe, it, expect } from 'vitest';
import {
  // Reference factories
  unrecognizedReference,
  repoInferenceFailed,
  // Naming factories
  invalidBranchName,
  nonAsciiBranchName,
  invalidWorktreePath,
  // Version control factories
  versionControlFailure,
  worktreeConflict,
  notARepository,
  // Link factories
  linkPathError,
  invalidLinkFile,
  linkFailed,
  // Configuration and soft factories
  invalidConfig,
  invalidInput,
  metadataLookupDegraded,
} from './factories.js';
import {
  ReferenceParseError,
  BranchNameError,
  VersionControlError,
  WorktreeConflictError,
  LinkError,
  ConfigError,
  MetadataLookupError,
  SproutError,
} from './error.js';
import { ErrorCode } from './codes.js';

describe('Reference Factories', () => {
  describe('unrecognizedReference', () => {
    it('should create ReferenceParseError listing accepted forms', () => {
      const error = unrecognizedReference('not an issue');

      expect(error).toBeInstanceOf(ReferenceParseError);
      expect(error.code).toBe(ErrorCode.UNRECOGNIZED_REFERENCE);
      expect(error.exitCode).toBe(10);
      expect(error.message).toBe('Unrecognized issue reference: not an issue');
      expect(error.details.input).toBe('not an issue');
      expect(error.details.expected).toContain('<owner>/<repo>#<n>');
    });

    it('should show empty input as (empty)', () => {
      expect(unrecognizedReference('  ').message).toBe('Unrecognized issue reference: (empty)');
    });
  });

  describe('repoInferenceFailed', () => {
    it('should suggest the qualified form', () => {
      const error = repoInferenceFailed('42', 'no remote named origin');

      expect(error.code).toBe(ErrorCode.REPO_INFERENCE_FAILED);
      expect(error.exitCode).toBe(11);
      expect(error.message).toBe(
        'Cannot infer repository for 42: no remote named origin. Use <owner>/<repo>#<n> instead'
      );
    });
  });
});

describe('Naming Factories', () => {
  describe('invalidBranchName', () => {
    it('should create BranchNameError with the reason', () => {
      const error = invalidBranchName('feature..x', "contains '..'");

      expect(error).toBeInstanceOf(BranchNameError);
      expect(error.code).toBe(ErrorCode.INVALID_BRANCH_NAME);
      expect(error.message).toBe(`Invalid branch name "feature..x": contains '..'`);
      expect(error.details.input).toBe('feature..x');
    });
  });

  describe('nonAsciiBranchName', () => {
    it('should name the offending character, its code point and index', () => {
      const error = nonAsciiBranchName('issue/é', 'é', 6);

      expect(error.exitCode).toBe(20);
      expect(error.message).toBe(`Invalid branch name "issue/é": non-ASCII character 'é' (U+00E9) at index 6`);
      expect(error.details.offending).toBe('é');
      expect(error.details.index).toBe(6);
    });

    it('should use the given field name', () => {
      const error = nonAsciiBranchName('tâche', 'â', 1, 'branch prefix');
      expect(error.message).toBe(`Invalid branch prefix "tâche": non-ASCII character 'â' (U+00E2) at index 1`);
    });
  });

  describe('invalidWorktreePath', () => {
    it('should create BranchNameError with INVALID_WORKTREE_PATH', () => {
      const error = invalidWorktreePath('/src/app/wt', 'inside the repository');

      expect(error).toBeInstanceOf(BranchNameError);
      expect(error.code).toBe(ErrorCode.INVALID_WORKTREE_PATH);
      expect(error.exitCode).toBe(21);
      expect(error.details.path).toBe('/src/app/wt');
    });
  });
});

describe('Version Control Factories', () => {
  describe('versionControlFailure', () => {
    it('should keep the git message verbatim', () => {
      const cause = new Error('exit 128');
      const error = versionControlFailure(['git', 'fetch', 'origin', 'main'], "fatal: couldn't find remote ref main", cause);

      expect(error).toBeInstanceOf(VersionControlError);
      expect(error.exitCode).toBe(30);
      expect(error.message).toBe("git fetch origin main failed: fatal: couldn't find remote ref main");
      expect(error.details.operation).toEqual(['git', 'fetch', 'origin', 'main']);
      expect(error.cause).toBe(cause);
    });
  });

  describe('worktreeConflict', () => {
    it('should create WorktreeConflictError', () => {
      const error = worktreeConflict('/wt/issue/gh-1', 'directory exists and is not a worktree');

      expect(error).toBeInstanceOf(WorktreeConflictError);
      expect(error).toBeInstanceOf(VersionControlError);
      expect(error.code).toBe(ErrorCode.WORKTREE_CONFLICT);
      expect(error.exitCode).toBe(31);
      expect(error.message).toBe('Worktree conflict at /wt/issue/gh-1: directory exists and is not a worktree');
    });
  });

  describe('notARepository', () => {
    it('should create VersionControlError with NOT_A_REPOSITORY', () => {
      const error = notARepository('/tmp/plain');

      expect(error.code).toBe(ErrorCode.NOT_A_REPOSITORY);
      expect(error.exitCode).toBe(32);
      expect(error.message).toBe('Not a git repository: /tmp/plain');
    });
  });
});

describe('Link Factories', () => {
  it('linkPathError should carry the destination', () => {
    const error = linkPathError('../.env', 'escapes the worktree');

    expect(error).toBeInstanceOf(LinkError);
    expect(error.code).toBe(ErrorCode.LINK_PATH_ERROR);
    expect(error.exitCode).toBe(40);
    expect(error.message).toBe('Link destination ../.env rejected: escapes the worktree');
    expect(error.details.path).toBe('../.env');
  });

  it('invalidLinkFile should exit 41', () => {
    const error = invalidLinkFile('/repo/.worktree-links.local.json', 'expected a JSON array');

    expect(error.code).toBe(ErrorCode.INVALID_LINK_FILE);
    expect(error.exitCode).toBe(41);
    expect(error.message).toBe('Invalid link file /repo/.worktree-links.local.json: expected a JSON array');
  });

  it('linkFailed should exit 42', () => {
    const error = linkFailed('.env', 'EACCES');

    expect(error.code).toBe(ErrorCode.LINK_FAILED);
    expect(error.exitCode).toBe(42);
    expect(error.message).toBe('Link .env failed: EACCES');
  });
});

describe('Configuration Factories', () => {
  describe('invalidConfig', () => {
    it('should create ConfigError with key and expectation', () => {
      const error = invalidConfig('remote', '', 'a non-empty remote name');

      expect(error).toBeInstanceOf(ConfigError);
      expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
      expect(error.exitCode).toBe(2);
      expect(error.message).toBe('Invalid configuration remote: "". Expected a non-empty remote name');
      expect(error.details.key).toBe('remote');
      expect(error.details.expected).toBe('a non-empty remote name');
    });

    it('should truncate long values', () => {
      const error = invalidConfig('branch_prefix', 'a'.repeat(100), 'ASCII characters only');

      expect(error.message).toBe(
        `Invalid configuration branch_prefix: "${'a'.repeat(46)}.... Expected ASCII characters only`
      );
    });

    it('should render non-string values as JSON', () => {
      const error = invalidConfig('github.hosts', [1, 2], 'a list of strings');

      expect(error.message).toBe('Invalid configuration github.hosts: [1,2]. Expected a list of strings');
      expect(error.details.value).toEqual([1, 2]);
    });
  });

  it('invalidInput should be a plain SproutError with exit 2', () => {
    const error = invalidInput('Unknown option: --bogus', { input: '--bogus' });

    expect(error).toBeInstanceOf(SproutError);
    expect(error.code).toBe(ErrorCode.INVALID_INPUT);
    expect(error.exitCode).toBe(2);
    expect(error.details.input).toBe('--bogus');
  });

  it('metadataLookupDegraded should never fail a run', () => {
    const error = metadataLookupDegraded('ENG-7', 'timed out after 500ms');

    expect(error).toBeInstanceOf(MetadataLookupError);
    expect(error.exitCode).toBe(0);
    expect(error.message).toBe('Metadata lookup for ENG-7 failed: timed out after 500ms');
  });
});
