/**
 * @sprout/core
 *
 * Domain types and the error taxonomy shared by the sprout packages.
 */

// Types - references, metadata, branch specs, worktrees, links
export * from './types/index.js';

// Errors - structured error handling and exit codes
export * from './errors/index.js';
