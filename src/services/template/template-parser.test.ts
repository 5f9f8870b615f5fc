// Tests for the template file parser

import { describe, it, expect } from 'vitest';
import { ParseError, TemplateError } from '../../core/errors.js';
import { parseTemplateFile, splitFrontmatter, stringifyTemplateFile } from './template-parser.js';

const FRONTMATTER = `---
id: greeting
name: Greeting
version: 1
inputSlots:
  - name: who
    type: text
    required: true
    description: Who to greet
  - name: tone
    type: enum
    description: Tone
    values: [warm, dry]
    default: warm
outputContract:
  kind: commit-messages
  variantCountSlot: tone
  languageSlot: tone
---`;

function templateWith(body: string, frontmatter = FRONTMATTER): string {
  return `${frontmatter}\n${body}`;
}

describe('splitFrontmatter', () => {
  it('should split frontmatter and body', () => {
    const { data, body, bodyStartLine } = splitFrontmatter('---\nid: x\n---\nHello\n');
    expect(data).toEqual({ id: 'x' });
    expect(body).toBe('Hello\n');
    expect(bodyStartLine).toBe(4);
  });

  it('should normalize CRLF line endings', () => {
    const { body } = splitFrontmatter('---\r\nid: x\r\n---\r\nline one\r\nline two');
    expect(body).toBe('line one\nline two');
  });

  it('should throw ParseError without an opening delimiter', () => {
    expect(() => splitFrontmatter('id: x\n---\n')).toThrow(ParseError);
  });

  it('should throw ParseError without a closing delimiter', () => {
    expect(() => splitFrontmatter('---\nid: x\n')).toThrow('Missing closing frontmatter delimiter (---)');
  });

  it('should report YAML errors with a file line number', () => {
    try {
      splitFrontmatter('---\nid: x\nname: [unclosed\n---\n');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ParseError);
      if (error instanceof ParseError) {
        expect(error.line).toBeGreaterThan(1);
      }
    }
  });
});

describe('parseTemplateFile', () => {
  it('should parse a valid template', () => {
    const parsed = parseTemplateFile(templateWith('Hello {{who}}, {{tone}}.'), 'greeting');
    expect(parsed.metadata.id).toBe('greeting');
    expect(parsed.metadata.inputSlots.map(s => s.name)).toEqual(['who', 'tone']);
    expect(parsed.metadata.inputSlots[1].required).toBe(false);
    expect(parsed.body).toBe('Hello {{who}}, {{tone}}.');
    expect(parsed.bodyStartLine).toBe(20);
  });

  it('should reject a frontmatter id that does not match the file name', () => {
    expect(() => parseTemplateFile(templateWith('{{who}} {{tone}}'), 'other'))
      .toThrow('frontmatter id "greeting" does not match file name');
  });

  it('should reject markers without a declared slot', () => {
    expect(() => parseTemplateFile(templateWith('{{who}} {{tone}} {{mood}}')))
      .toThrow('marker {{mood}} at line 20 has no declared slot');
  });

  it('should reject malformed markers', () => {
    expect(() => parseTemplateFile(templateWith('{{who}} {{tone}}\n{{ who }}')))
      .toThrow('malformed marker {{ who }} at line 21');
  });

  it('should reject declared slots the body never uses', () => {
    expect(() => parseTemplateFile(templateWith('Hello {{who}}')))
      .toThrow('declared slots never used in the body: tone');
  });

  it('should ignore escaped markers', () => {
    const parsed = parseTemplateFile(templateWith('\\{{mood}} {{who}} {{tone}}'));
    expect(parsed.body).toContain('\\{{mood}}');
  });

  it('should reject invalid defaults', () => {
    const frontmatter = FRONTMATTER.replace('default: warm', 'default: hot');
    expect(() => parseTemplateFile(templateWith('{{who}} {{tone}}', frontmatter)))
      .toThrow(TemplateError);
  });

  it('should reject frontmatter that fails the schema', () => {
    const frontmatter = FRONTMATTER.replace('version: 1', 'version: one');
    expect(() => parseTemplateFile(templateWith('{{who}} {{tone}}', frontmatter)))
      .toThrow(/invalid frontmatter: version/);
  });

  it('should reject frontmatter that is not a mapping', () => {
    expect(() => parseTemplateFile('---\n- a\n- b\n---\nbody')).toThrow('Frontmatter must be a YAML mapping');
  });
});

describe('stringifyTemplateFile', () => {
  it('should produce a file that parses back to the same template', () => {
    const original = parseTemplateFile(templateWith('Hello {{who}}, {{tone}}.'));
    const text = stringifyTemplateFile(original.metadata, original.body);
    const reparsed = parseTemplateFile(text);
    expect(reparsed.metadata).toEqual(original.metadata);
    expect(reparsed.body).toBe(original.body);
  });
});
