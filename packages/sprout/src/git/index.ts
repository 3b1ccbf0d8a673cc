export {
  createGitEngine,
  GitEngineImpl,
  execGitRunner,
  parseWorktreeList,
  engineMessage,
  GIT_OPERATION_TIMEOUT_MS,
  type GitEngine,
  type GitEngineConfig,
  type GitRunner,
  type GitRunOptions,
  type GitRunResult,
} from './git-engine.js';
export {
  createWorktreeManager,
  WorktreeManagerImpl,
  samePath,
  DEFAULT_REMOTE,
  type WorktreeManager,
  type EnsureWorktreeOptions,
} from './worktree-manager.js';
