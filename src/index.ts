// Library entry point for prompt-contracts

export * from './models/index.js';
export * from './services/index.js';
export * from './core/errors.js';
export { Logger, LogLevel, logger, parseLogLevel } from './core/logger.js';
export { validateTemplateId, validateSlotName, validateSlotValueLength, parseSlotAssignment } from './core/validation.js';
export {
  ConfigSchema,
  InputSlotSchema,
  OutputContractSchema,
  TemplateFrontmatterSchema,
  formatZodIssues,
  safeValidateConfig,
  safeValidateFrontmatter,
  validateConfig,
  validateFrontmatter
} from './core/schemas.js';
