// YAML frontmatter parser for template files

import * as yaml from 'yaml';
import { ParseError, TemplateError } from '../../core/errors.js';
import { formatZodIssues, safeValidateFrontmatter } from '../../core/schemas.js';
import type { InputSlot, TemplateMetadata } from '../../models/template.js';
import { findMarkers, validateSlotValue } from './renderer.js';

/**
 * Result of parsing a template file
 */
export interface ParsedTemplateFile {
  metadata: TemplateMetadata;
  /** Everything after the closing delimiter, unchanged */
  body: string;
  /** Line number where the body starts (1-indexed) */
  bodyStartLine: number;
}

/**
 * Splits a template file into its YAML frontmatter and body.
 *
 * Frontmatter must be delimited by `---` lines at the very start of the file.
 * CRLF line endings are normalized to LF.
 *
 * @throws ParseError if delimiters are missing or the YAML is malformed
 */
export function splitFrontmatter(input: string): { data: unknown; body: string; bodyStartLine: number } {
  const lines = input.replace(/\r\n/g, '\n').split('\n');

  if (lines.length === 0 || lines[0].trim() !== '---') {
    throw new ParseError('Missing opening frontmatter delimiter (---)', 1);
  }

  let closingIndex = -1;
  for (let i = 1; i < lines.length; i++) {
    if (lines[i].trim() === '---') {
      closingIndex = i;
      break;
    }
  }

  if (closingIndex === -1) {
    throw new ParseError('Missing closing frontmatter delimiter (---)', lines.length);
  }

  const yamlContent = lines.slice(1, closingIndex).join('\n');

  let data: unknown;
  try {
    data = yaml.parse(yamlContent);
  } catch (err) {
    if (err instanceof yaml.YAMLParseError) {
      // Offset by the opening delimiter line
      const line = (err.linePos?.[0]?.line ?? 1) + 1;
      throw new ParseError(`YAML parse error: ${err.message}`, line);
    }
    throw new ParseError(`YAML parse error: ${String(err)}`, 2);
  }

  return {
    data,
    body: lines.slice(closingIndex + 1).join('\n'),
    bodyStartLine: closingIndex + 2
  };
}

/**
 * Converts an offset in the body to a 1-indexed file line
 */
function lineAt(body: string, index: number, bodyStartLine: number): number {
  return body.slice(0, index).split('\n').length + bodyStartLine - 1;
}

/**
 * Checks that markers and declared slots agree and that defaults are valid
 */
function checkIntegrity(id: string, slots: InputSlot[], body: string, bodyStartLine: number): void {
  const declared = new Set(slots.map(s => s.name));
  const used = new Set<string>();

  for (const marker of findMarkers(body)) {
    const line = lineAt(body, marker.index, bodyStartLine);
    if (!marker.wellFormed) {
      throw new TemplateError(`malformed marker {{${marker.name}}} at line ${line}`, id, { line });
    }
    if (!declared.has(marker.name)) {
      throw new TemplateError(`marker {{${marker.name}}} at line ${line} has no declared slot`, id, { line });
    }
    used.add(marker.name);
  }

  const unused = slots.filter(s => !used.has(s.name)).map(s => s.name);
  if (unused.length > 0) {
    throw new TemplateError(`declared slots never used in the body: ${unused.join(', ')}`, id);
  }

  for (const slot of slots) {
    if (slot.default === undefined) continue;
    const checked = validateSlotValue(slot, slot.default);
    if (!checked.ok) {
      throw new TemplateError(`default for slot "${slot.name}" is invalid: ${checked.message}`, id);
    }
  }
}

/**
 * Parses and validates a template file.
 *
 * @param input - Full file text (frontmatter + body)
 * @param expectedId - Id implied by the file name; must match the frontmatter id
 * @throws ParseError for malformed frontmatter, TemplateError for invalid definitions
 */
export function parseTemplateFile(input: string, expectedId?: string): ParsedTemplateFile {
  const { data, body, bodyStartLine } = splitFrontmatter(input);

  if (!data || typeof data !== 'object' || Array.isArray(data)) {
    throw new ParseError('Frontmatter must be a YAML mapping', 2);
  }

  const result = safeValidateFrontmatter(data);
  if (!result.success) {
    throw new TemplateError(
      `invalid frontmatter: ${formatZodIssues(result.error).join('; ')}`,
      expectedId
    );
  }

  const metadata: TemplateMetadata = result.data;

  if (expectedId !== undefined && metadata.id !== expectedId) {
    throw new TemplateError(`frontmatter id "${metadata.id}" does not match file name`, expectedId);
  }

  checkIntegrity(metadata.id, metadata.inputSlots, body, bodyStartLine);

  return { metadata, body, bodyStartLine };
}

/**
 * Serializes a template back to its file format
 */
export function stringifyTemplateFile(metadata: TemplateMetadata, body: string): string {
  const frontmatter = yaml.stringify(metadata, { lineWidth: 0 }).trimEnd();
  return `---\n${frontmatter}\n---\n${body}`;
}
