/**
 * Git Context Module
 *
 * @module services/git
 */

export * from './git-context-service.js';
