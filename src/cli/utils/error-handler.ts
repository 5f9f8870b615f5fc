// CLI error handling utilities

import {
  PromptKitError,
  ValidationError,
  SlotValidationError,
  SecurityError,
  NotFoundError,
  ContractViolationError,
  ParseError,
  TemplateError
} from '../../core/errors.js';
import type { ValidationIssue } from '../../models/validation.js';
import { InteractiveError } from '../../services/prompt/prompt-service.js';
import { HookError } from '../../services/hooks/hooks-service.js';

/**
 * Format a list of issues, one per line
 */
export function formatIssues(issues: ValidationIssue[], indent: string = '  '): string {
  return issues
    .map(issue => `${indent}- ${issue.line !== undefined ? `line ${issue.line}: ` : ''}${issue.field}: ${issue.message}`)
    .join('\n');
}

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof SlotValidationError) {
    return `Invalid input for template "${error.templateId}":\n${formatIssues(error.issues)}`;
  }

  if (error instanceof ContractViolationError) {
    return `Output violates the contract of "${error.templateId}":\n${formatIssues(error.result.errors)}`;
  }

  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof SecurityError) {
    return `Security Error: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof ParseError || error instanceof TemplateError) {
    return `Template Error: ${error.message}`;
  }

  if (error instanceof PromptKitError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof HookError) {
    return error.details ? `Hook Error: ${error.message}\n  ${error.details}` : `Hook Error: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error: 2 validation, 3 security, 4 not found, 1 otherwise
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ValidationError || error instanceof ContractViolationError || error instanceof InteractiveError) {
    return 2;
  }
  if (error instanceof SecurityError) {
    return 3;
  }
  if (error instanceof NotFoundError) {
    return 4;
  }
  return 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  const message = formatError(error);
  console.error(`\n❌ ${message}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}

/**
 * Print info message
 */
export function info(message: string): void {
  console.log(`ℹ ${message}`);
}

/**
 * Print warning message
 */
export function warn(message: string): void {
  console.warn(`⚠ ${message}`);
}
