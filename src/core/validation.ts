// Input validation utilities for ids, slot names and CLI assignments

import { ValidationError, SecurityError } from './errors.js';
import { TEMPLATE_ID_PATTERN, SLOT_NAME_PATTERN } from './schemas.js';

/**
 * Path traversal patterns
 */
const PATH_TRAVERSAL_PATTERNS = [
  /\.\./,           // Parent directory
  /^[/\\]/,         // Absolute path
  /^[a-zA-Z]:/,     // Windows drive letter
  /\0/,             // Null byte
];

/**
 * Template ids are single path components
 */
const PATH_SEPARATOR = /[/\\]/;

/**
 * Maximum lengths for various fields
 */
export const MAX_LENGTHS = {
  templateId: 64,
  slotName: 64,
  slotValue: 500_000
};

/**
 * Validates a template id and returns it trimmed and lowercased
 */
export function validateTemplateId(id: string): string {
  if (!id || typeof id !== 'string') {
    throw new ValidationError('Template id is required', 'id');
  }

  const trimmed = id.trim().toLowerCase();

  for (const pattern of [...PATH_TRAVERSAL_PATTERNS, PATH_SEPARATOR]) {
    if (pattern.test(trimmed)) {
      throw new SecurityError('Invalid template id: potential path traversal detected', { id });
    }
  }

  if (trimmed.length > MAX_LENGTHS.templateId) {
    throw new ValidationError(`Template id exceeds maximum length of ${MAX_LENGTHS.templateId}`, 'id');
  }

  if (!TEMPLATE_ID_PATTERN.test(trimmed)) {
    throw new ValidationError(
      'Invalid template id. Use lowercase letters, digits and hyphens (e.g. commit-assistant)',
      'id'
    );
  }

  return trimmed;
}

/**
 * Validates a slot name given on the command line
 */
export function validateSlotName(name: string): string {
  const trimmed = (name ?? '').trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Slot name cannot be empty', 'slot');
  }

  if (trimmed.length > MAX_LENGTHS.slotName) {
    throw new ValidationError(`Slot name exceeds maximum length of ${MAX_LENGTHS.slotName}`, 'slot');
  }

  if (!SLOT_NAME_PATTERN.test(trimmed)) {
    throw new ValidationError(`Invalid slot name: ${trimmed}`, 'slot');
  }

  return trimmed;
}

/**
 * Rejects slot values longer than MAX_LENGTHS.slotValue
 */
export function validateSlotValueLength(name: string, value: string): string {
  if (value.length > MAX_LENGTHS.slotValue) {
    throw new ValidationError(`Value for ${name} exceeds maximum length of ${MAX_LENGTHS.slotValue}`, name);
  }
  return value;
}

/**
 * Splits a `name=value` assignment. The value is kept verbatim, including
 * any further `=` characters and surrounding whitespace.
 */
export function parseSlotAssignment(assignment: string): [string, string] {
  const index = assignment.indexOf('=');
  if (index <= 0) {
    throw new ValidationError(`Expected name=value, got: ${assignment}`, 'slot');
  }

  const name = validateSlotName(assignment.slice(0, index));
  return [name, validateSlotValueLength(name, assignment.slice(index + 1))];
}
