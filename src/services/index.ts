// Export all services

export * from './template/index.js';
export * from './validation/index.js';
export * from './config/config-service.js';
export * from './pipeline/index.js';

// Developer workflow
export * from './prompt/index.js';
export * from './git/index.js';
export * from './hooks/index.js';
