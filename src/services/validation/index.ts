// Output validation exports

export { AuditReportValidator, sortFindingsBySeverity } from './audit-validator.js';
export {
  CommitMessageValidator,
  cleanCommitMessage,
  isGeneratedCommitMessage,
  nonImperativeReason,
  parseHeader,
  splitMessages
} from './commit-validator.js';
export type { CommitValidationOptions } from './commit-validator.js';
export { applyLimits, commitOptionsFromValues, isLanguage, validateOutput } from './output-validator.js';
export type { OutputValidationOptions, OutputValidationResult, ValidationLimits } from './output-validator.js';
export { normalizeLabel, matchesLabel } from './markdown.js';
