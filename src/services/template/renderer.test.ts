/**
 * Tests for slot validation and rendering
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { SlotValidationError, TemplateError } from '../../core/errors.js';
import type { InputSlot, PromptTemplate } from '../../models/template.js';
import { findMarkers, renderBody, renderTemplate, validateSlots, validateSlotValue } from './renderer.js';

const slots: InputSlot[] = [
  { name: 'code', type: 'text', required: true, description: 'Code to audit' },
  { name: 'context', type: 'text', required: false, description: 'Context', placeholder: '(none)' },
  { name: 'language', type: 'enum', required: false, description: 'Language', values: ['pt-br', 'en'], default: 'pt-br' },
  { name: 'count', type: 'integer', required: false, description: 'Count', min: 1, max: 3, default: 1 }
];

const template: PromptTemplate = {
  id: 'sample',
  name: 'Sample',
  version: 1,
  inputSlots: slots,
  outputContract: {
    kind: 'commit-messages',
    headerMaxLength: 72,
    bodyWrapColumn: 72,
    types: ['feat', 'fix'],
    footerTokens: [],
    minVariants: 1,
    maxVariants: 3,
    variantCountSlot: 'count',
    languageSlot: 'language'
  },
  body: 'Code:\n{{code}}\nContext: {{context}}\nLanguage: {{language}} x{{count}}\nLiteral: \\{{code}}',
  source: 'bundled'
};

describe('findMarkers', () => {
  it('should list markers in order with their offsets', () => {
    expect(findMarkers('a {{x}} b {{y1}}')).toEqual([
      { name: 'x', index: 2, wellFormed: true },
      { name: 'y1', index: 10, wellFormed: true }
    ]);
  });

  it('should skip escaped braces and flag malformed markers', () => {
    expect(findMarkers('\\{{x}} {{ y }}')).toEqual([{ name: ' y ', index: 7, wellFormed: false }]);
  });
});

describe('validateSlotValue', () => {
  const [, , language, count] = slots;

  it('should match enum values case-insensitively and return the declared spelling', () => {
    expect(validateSlotValue(language, ' EN ')).toEqual({ ok: true, value: 'en' });
  });

  it('should reject values outside the enum', () => {
    expect(validateSlotValue(language, 'fr')).toEqual({ ok: false, message: 'must be one of: pt-br, en (got "fr")' });
  });

  it('should accept integers within bounds given as strings or numbers', () => {
    expect(validateSlotValue(count, '2')).toEqual({ ok: true, value: '2' });
    expect(validateSlotValue(count, 3)).toEqual({ ok: true, value: '3' });
  });

  it('should reject non-integers and out-of-range integers', () => {
    expect(validateSlotValue(count, '2.5')).toEqual({ ok: false, message: 'must be an integer' });
    expect(validateSlotValue(count, '4')).toEqual({ ok: false, message: 'must be at most 3' });
    expect(validateSlotValue(count, '0')).toEqual({ ok: false, message: 'must be at least 1' });
  });
});

describe('validateSlots', () => {
  it('should apply placeholders and defaults to omitted optional slots', () => {
    const { values, issues } = validateSlots(template, { code: 'print(1)' });
    expect(issues).toEqual([]);
    expect(values).toEqual({ code: 'print(1)', context: '(none)', language: 'pt-br', count: '1' });
  });

  it('should prefer configured defaults over template defaults', () => {
    const { values } = validateSlots(template, { code: 'x' }, { defaults: { language: 'en', count: 2 } });
    expect(values.language).toBe('en');
    expect(values.count).toBe('2');
  });

  it('should collect every problem at once', () => {
    const { issues } = validateSlots(template, { code: '   ', language: 'fr', count: '9', extra: 'y' });
    expect(issues.map(i => i.field)).toEqual(['extra', 'code', 'language', 'count']);
  });

  it('should not take inherited object members as slot values', () => {
    const inherited: InputSlot[] = [
      { name: 'toString', type: 'text', required: false, description: 'x', placeholder: '(none)' },
      { name: 'constructor', type: 'text', required: true, description: 'Owner' }
    ];
    const { values, issues } = validateSlots({ inputSlots: inherited }, {}, { defaults: {} });
    expect(values).toEqual({ toString: '(none)' });
    expect(issues).toEqual([{ field: 'constructor', message: 'Required slot is missing or empty (Owner)' }]);
  });

  it('should report rejected configured defaults', () => {
    const { issues } = validateSlots(template, { code: 'x' }, { defaults: { count: 7 } });
    expect(issues).toEqual([{ field: 'count', message: 'Default value rejected: must be at most 3' }]);
  });
});

describe('renderBody', () => {
  it('should throw TemplateError for a marker without a value', () => {
    expect(() => renderBody('{{missing}}', {}, 'sample')).toThrow(TemplateError);
  });
});

describe('renderTemplate', () => {
  it('should substitute values and unescape literal braces', () => {
    const rendered = renderTemplate(template, { code: 'def f():\n    return 1', count: '2' });
    expect(rendered.prompt).toBe(
      'Code:\ndef f():\n    return 1\nContext: (none)\nLanguage: pt-br x2\nLiteral: {{code}}'
    );
    expect(rendered.templateId).toBe('sample');
    expect(rendered.values.count).toBe('2');
  });

  it('should refuse to render when the required code slot is empty', () => {
    expect(() => renderTemplate(template, { code: '' })).toThrow(SlotValidationError);
  });

  it('should list every issue on the thrown error', () => {
    try {
      renderTemplate(template, { language: 'fr' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(SlotValidationError);
      if (error instanceof SlotValidationError) {
        expect(error.templateId).toBe('sample');
        expect(error.issues.map(i => i.field)).toEqual(['code', 'language']);
      }
    }
  });

  it('should never expand markers that appear inside values', () => {
    fc.assert(
      fc.property(fc.string(), fc.string(), (prefix, suffix) => {
        const code = `${prefix}{{context}}${suffix}`;
        const rendered = renderTemplate(template, { code: `x${code}` });
        expect(rendered.prompt.startsWith(`Code:\nx${code}\nContext: (none)`)).toBe(true);
      }),
      { numRuns: 100 }
    );
  });

  it('should be deterministic for the same input', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1 }).filter(s => s.trim().length > 0), fc.constantFrom('pt-br', 'en'), (code, language) => {
        const first = renderTemplate(template, { code, language });
        const second = renderTemplate(template, { code, language });
        expect(first).toEqual(second);
      }),
      { numRuns: 100 }
    );
  });
});
