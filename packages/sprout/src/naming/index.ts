export { createSlug, DEFAULT_SLUG_MAX_LENGTH } from './slug.js';
export {
  generateNames,
  generateBranch,
  generateWorktreePath,
  validateBranchName,
  refFormatViolation,
  extractIssueId,
  DEFAULT_WORKTREES_DIR,
  type NamingOptions,
} from './branch-name.js';
