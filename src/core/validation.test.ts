// Tests for input validation and sanitization

import { describe, it, expect } from 'vitest';
import {
  validateTemplateId,
  validateSlotName,
  parseSlotAssignment,
  MAX_LENGTHS
} from './validation.js';
import { ValidationError, SecurityError } from './errors.js';

describe('validateTemplateId', () => {
  it('should accept valid template ids', () => {
    expect(validateTemplateId('commit-assistant')).toBe('commit-assistant');
    expect(validateTemplateId('python-code-audit')).toBe('python-code-audit');
    expect(validateTemplateId('v2')).toBe('v2');
  });

  it('should trim and lowercase ids', () => {
    expect(validateTemplateId('  Commit-Assistant ')).toBe('commit-assistant');
  });

  it('should reject invalid id formats', () => {
    expect(() => validateTemplateId('')).toThrow(ValidationError);
    expect(() => validateTemplateId('bad_id')).toThrow(ValidationError);
    expect(() => validateTemplateId('-leading')).toThrow(ValidationError);
    expect(() => validateTemplateId('has space')).toThrow(ValidationError);
  });

  it('should reject ids exceeding max length', () => {
    expect(() => validateTemplateId('a'.repeat(MAX_LENGTHS.templateId + 1))).toThrow(ValidationError);
    expect(validateTemplateId('a'.repeat(MAX_LENGTHS.templateId))).toBe('a'.repeat(MAX_LENGTHS.templateId));
  });

  it('should reject path traversal attempts', () => {
    expect(() => validateTemplateId('../commit-assistant')).toThrow(SecurityError);
    expect(() => validateTemplateId('templates/commit-assistant')).toThrow(SecurityError);
    expect(() => validateTemplateId('/etc/passwd')).toThrow(SecurityError);
    expect(() => validateTemplateId('C:\\Windows')).toThrow(SecurityError);
  });

  it('should reject null bytes', () => {
    expect(() => validateTemplateId('commit\x00')).toThrow(SecurityError);
  });
});

describe('validateSlotName', () => {
  it('should accept valid slot names', () => {
    expect(validateSlotName('code')).toBe('code');
    expect(validateSlotName(' variantCount ')).toBe('variantCount');
  });

  it('should reject empty names', () => {
    expect(() => validateSlotName('')).toThrow(ValidationError);
    expect(() => validateSlotName('   ')).toThrow(ValidationError);
  });

  it('should reject names that cannot appear in a marker', () => {
    expect(() => validateSlotName('1code')).toThrow(ValidationError);
    expect(() => validateSlotName('change-summary')).toThrow(ValidationError);
    expect(() => validateSlotName('a'.repeat(MAX_LENGTHS.slotName + 1))).toThrow(ValidationError);
  });
});

describe('parseSlotAssignment', () => {
  it('should split at the first equals sign', () => {
    expect(parseSlotAssignment('code=x = 1')).toEqual(['code', 'x = 1']);
  });

  it('should keep the value verbatim', () => {
    expect(parseSlotAssignment('objective=  keep spaces  ')).toEqual(['objective', '  keep spaces  ']);
    expect(parseSlotAssignment('diff=')).toEqual(['diff', '']);
  });

  it('should reject assignments without a name', () => {
    expect(() => parseSlotAssignment('code')).toThrow(ValidationError);
    expect(() => parseSlotAssignment('=value')).toThrow(ValidationError);
  });

  it('should reject invalid slot names', () => {
    expect(() => parseSlotAssignment('bad-name=value')).toThrow(ValidationError);
  });

  it('should reject values over the length limit', () => {
    expect(() => parseSlotAssignment(`code=${'x'.repeat(MAX_LENGTHS.slotValue + 1)}`)).toThrow(ValidationError);
  });
});
