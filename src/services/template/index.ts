/**
 * Template Module
 *
 * Template file parsing, slot validation and rendering, and the template
 * registry.
 *
 * @module services/template
 */

export * from './template-parser.js';
export * from './renderer.js';
export * from './template-service.js';
