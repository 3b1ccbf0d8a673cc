/**
 * Type definitions for sprout
 */

export * from './reference.js';
export * from './metadata.js';
export * from './branch.js';
export * from './worktree.js';
export * from './link.js';
