/**
 * Git Hooks Service Module
 *
 * Installs the commit-msg hook that lints messages against the commit
 * template's contract, with Husky support.
 *
 * @module services/hooks
 */

export * from './hooks-service.js';
