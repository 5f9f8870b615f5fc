/**
 * Slot validation and substitution.
 *
 * Rules:
 * - `{{slotName}}` in a body is replaced with the slot's value, verbatim.
 * - `\{{` is a literal `{{` and never starts a marker.
 * - Substitution is a single pass: marker-like text inside a value is
 *   copied as is and never expanded.
 * - Every problem with the supplied values is collected, and rendering is
 *   refused with a SlotValidationError when there is at least one.
 */

import { z } from 'zod';
import { SlotValidationError, TemplateError } from '../../core/errors.js';
import type { InputSlot, PromptTemplate, RenderedPrompt } from '../../models/template.js';
import type { ValidationIssue } from '../../models/validation.js';

/**
 * Values a caller may pass for a slot; numbers are accepted for integer slots
 */
export type SlotInput = Record<string, string | number | undefined>;

/**
 * Reads a slot's own value; names like `toString` never resolve to
 * inherited members
 */
export function slotValue(input: SlotInput | undefined, name: string): string | number | undefined {
  return input !== undefined && Object.hasOwn(input, name) ? input[name] : undefined;
}

export interface RenderOptions {
  /** Defaults that apply before the template's own (e.g. from config.yaml) */
  defaults?: SlotInput;
}

export interface SlotValidationOutcome {
  values: Record<string, string>;
  issues: ValidationIssue[];
}

/**
 * A `\{{` escape, or a `{{...}}` marker capturing its inner text
 */
const MARKER_RE = /\\\{\{|\{\{([^{}\n]*)\}\}/g;

const SLOT_NAME_RE = /^[a-zA-Z][a-zA-Z0-9]*$/;

/**
 * A marker occurrence in a template body
 */
export interface MarkerOccurrence {
  name: string;
  /** Offset of the opening braces in the body */
  index: number;
  /** False for markers whose inner text is not a valid slot name, e.g. `{{ code }}` */
  wellFormed: boolean;
}

/**
 * Lists the slot markers in a body, skipping escaped braces
 */
export function findMarkers(body: string): MarkerOccurrence[] {
  const markers: MarkerOccurrence[] = [];
  for (const match of body.matchAll(MARKER_RE)) {
    const inner = match[1];
    if (inner === undefined) continue;
    markers.push({
      name: inner,
      index: match.index ?? 0,
      wellFormed: SLOT_NAME_RE.test(inner)
    });
  }
  return markers;
}

/**
 * Builds the zod schema that checks one slot's value and normalizes it to
 * the string that gets substituted
 */
function slotSchema(slot: InputSlot): z.ZodType<string, z.ZodTypeDef, string> {
  switch (slot.type) {
    case 'text':
      return z.string();
    case 'enum': {
      const allowed = slot.values ?? [];
      return z.string().trim().transform((value, ctx) => {
        const match = allowed.find(v => v.toLowerCase() === value.toLowerCase());
        if (match === undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `must be one of: ${allowed.join(', ')} (got "${value}")`
          });
          return z.NEVER;
        }
        return match;
      });
    }
    case 'integer': {
      let bounded = z.number().int();
      if (slot.min !== undefined) bounded = bounded.min(slot.min, `must be at least ${slot.min}`);
      if (slot.max !== undefined) bounded = bounded.max(slot.max, `must be at most ${slot.max}`);
      return z.string()
        .trim()
        .regex(/^[+-]?\d+$/, 'must be an integer')
        .transform(Number)
        .pipe(bounded)
        .transform(String);
    }
  }
}

function isBlank(value: string | number): boolean {
  return typeof value === 'string' && value.trim().length === 0;
}

/**
 * Checks a single slot value. Returns the normalized value or a message.
 */
export function validateSlotValue(
  slot: InputSlot,
  raw: string | number
): { ok: true; value: string } | { ok: false; message: string } {
  const result = slotSchema(slot).safeParse(String(raw));
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, message: result.error.issues.map(i => i.message).join('; ') };
}

/**
 * Validates caller values against a template's slots and resolves
 * omitted optional slots to their defaults or placeholders
 */
export function validateSlots(
  template: Pick<PromptTemplate, 'inputSlots'>,
  input: SlotInput,
  options: RenderOptions = {}
): SlotValidationOutcome {
  const issues: ValidationIssue[] = [];
  const values: Record<string, string> = {};
  const declared = new Set(template.inputSlots.map(s => s.name));

  for (const name of Object.keys(input)) {
    if (input[name] !== undefined && !declared.has(name)) {
      issues.push({ field: name, message: `Unknown slot. Declared slots: ${[...declared].join(', ')}` });
    }
  }

  for (const slot of template.inputSlots) {
    const provided = slotValue(input, slot.name);

    if (provided !== undefined && !isBlank(provided)) {
      const checked = validateSlotValue(slot, provided);
      if (checked.ok) {
        values[slot.name] = checked.value;
      } else {
        issues.push({ field: slot.name, message: checked.message });
      }
      continue;
    }

    if (slot.required) {
      issues.push({ field: slot.name, message: `Required slot is missing or empty (${slot.description})` });
      continue;
    }

    const configured = slotValue(options.defaults, slot.name);
    const fallback = configured !== undefined && !isBlank(configured) ? configured : slot.default;
    if (fallback === undefined) {
      values[slot.name] = slot.placeholder ?? '';
      continue;
    }

    const checked = validateSlotValue(slot, fallback);
    if (checked.ok) {
      values[slot.name] = checked.value;
    } else {
      issues.push({ field: slot.name, message: `Default value rejected: ${checked.message}` });
    }
  }

  return { values, issues };
}

/**
 * Substitutes resolved values into a body. Every marker must have a value.
 */
export function renderBody(body: string, values: Record<string, string>, templateId: string): string {
  return body.replace(MARKER_RE, (match: string, inner: string | undefined) => {
    if (inner === undefined) {
      return '{{';
    }
    if (!Object.hasOwn(values, inner)) {
      throw new TemplateError(`unresolved marker ${match}`, templateId);
    }
    return values[inner];
  });
}

/**
 * Validates the values and renders the template.
 *
 * @throws SlotValidationError listing every slot problem, before anything is rendered
 */
export function renderTemplate(
  template: PromptTemplate,
  input: SlotInput,
  options: RenderOptions = {}
): RenderedPrompt {
  const { values, issues } = validateSlots(template, input, options);
  if (issues.length > 0) {
    throw new SlotValidationError(template.id, issues);
  }

  return {
    templateId: template.id,
    prompt: renderBody(template.body, values, template.id),
    values
  };
}
