// Domain-specific error types for prompt-contracts

import type { ValidationIssue, ValidationResult } from '../models/validation.js';

/**
 * Base error class for all prompt-contracts errors
 */
export abstract class PromptKitError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Validation errors for invalid input
 */
export class ValidationError extends PromptKitError {
  readonly code: string = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Slot values rejected before a template is rendered
 */
export class SlotValidationError extends ValidationError {
  readonly code = 'SLOT_VALIDATION_ERROR';

  constructor(public readonly templateId: string, public readonly issues: ValidationIssue[]) {
    super(
      `Invalid input for template "${templateId}": ${issues.map(i => `${i.field}: ${i.message}`).join('; ')}`,
      issues[0]?.field,
      { templateId, issues }
    );
  }
}

/**
 * Security errors for path traversal in template ids and file names
 */
export class SecurityError extends PromptKitError {
  readonly code = 'SECURITY_ERROR';
  readonly statusCode = 403;
}

/**
 * Not found errors
 */
export class NotFoundError extends PromptKitError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(resourceType: string, id: string, available?: string[]) {
    const hint = available && available.length > 0 ? `. Available: ${available.join(', ')}` : '';
    super(`${resourceType} not found: ${id}${hint}`, { resourceType, id });
  }
}

/**
 * Malformed template definition or body
 */
export class TemplateError extends PromptKitError {
  readonly code = 'TEMPLATE_ERROR';
  readonly statusCode = 422;

  constructor(message: string, public readonly templateId?: string, context?: Record<string, unknown>) {
    super(templateId ? `Template "${templateId}": ${message}` : message, { ...context, templateId });
  }
}

/**
 * Frontmatter parsing errors
 */
export class ParseError extends PromptKitError {
  readonly code = 'PARSE_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly line: number, public readonly column?: number) {
    super(`${message} at line ${line}${column !== undefined ? `, column ${column}` : ''}`, { line, column });
  }
}

/**
 * Generated output that does not satisfy its template's output contract
 */
export class ContractViolationError extends PromptKitError {
  readonly code = 'CONTRACT_VIOLATION';
  readonly statusCode = 422;

  constructor(public readonly templateId: string, public readonly result: ValidationResult) {
    super(
      `Output for template "${templateId}" violates its contract (${result.errors.length} error(s))`,
      { templateId, errors: result.errors }
    );
  }
}
