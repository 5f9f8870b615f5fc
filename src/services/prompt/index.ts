/**
 * Prompt Service Module
 *
 * Asks for missing slot values on a TTY.
 *
 * @module services/prompt
 */

export * from './prompt-service.js';
