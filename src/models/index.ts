// Export all domain models

export * from './types.js';
export * from './template.js';
export * from './validation.js';
export * from './audit.js';
export * from './commit.js';
