// Tests for error types

import { describe, it, expect } from 'vitest';
import {
  ContractViolationError,
  NotFoundError,
  ParseError,
  PromptKitError,
  SlotValidationError,
  TemplateError,
  ValidationError
} from './errors.js';

describe('errors', () => {
  it('should list every slot issue in a SlotValidationError', () => {
    const error = new SlotValidationError('python-code-audit', [
      { field: 'code', message: 'Required slot is missing or empty' },
      { field: 'extra', message: 'Unknown slot' }
    ]);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toBeInstanceOf(PromptKitError);
    expect(error.code).toBe('SLOT_VALIDATION_ERROR');
    expect(error.field).toBe('code');
    expect(error.message).toBe(
      'Invalid input for template "python-code-audit": code: Required slot is missing or empty; extra: Unknown slot'
    );
  });

  it('should name the available ids in a NotFoundError', () => {
    expect(new NotFoundError('Template', 'x', ['a', 'b']).message).toBe('Template not found: x. Available: a, b');
    expect(new NotFoundError('Template', 'x').message).toBe('Template not found: x');
  });

  it('should prefix TemplateError messages with the template id', () => {
    expect(new TemplateError('bad marker', 'greeting').message).toBe('Template "greeting": bad marker');
    expect(new TemplateError('bad marker').message).toBe('bad marker');
  });

  it('should place ParseError at a line and column', () => {
    expect(new ParseError('Unexpected token', 3, 7).message).toBe('Unexpected token at line 3, column 7');
    expect(new ParseError('Unexpected token', 3).message).toBe('Unexpected token at line 3');
  });

  it('should count errors in a ContractViolationError', () => {
    const error = new ContractViolationError('commit-assistant', {
      valid: false,
      errors: [{ field: 'messages', message: 'Expected 2 message(s), found 1' }],
      warnings: []
    });

    expect(error.message).toBe('Output for template "commit-assistant" violates its contract (1 error(s))');
    expect(error.toJSON()).toEqual({
      name: 'ContractViolationError',
      code: 'CONTRACT_VIOLATION',
      message: error.message,
      context: { templateId: 'commit-assistant', errors: error.result.errors }
    });
  });
});
