/**
 * Pipeline Module
 *
 * @module services/pipeline
 */

export * from './pipeline-service.js';
