// Zod schemas for template frontmatter and configuration

import { z } from 'zod';
import { COMMIT_TYPES } from '../models/types.js';

/**
 * Template ids double as file names under the templates directory
 */
export const TEMPLATE_ID_PATTERN = /^[a-z0-9][a-z0-9-]*$/;

/**
 * Slot names are used verbatim inside {{...}} markers
 */
export const SLOT_NAME_PATTERN = /^[a-zA-Z][a-zA-Z0-9]*$/;

/**
 * Section ids the audit validator reads directly
 */
export const AUDIT_REQUIRED_SECTION_IDS = ['executiveSummary', 'scores', 'findings', 'backlog'] as const;

export const SlotTypeSchema = z.enum(['text', 'enum', 'integer']);

export const LanguageSchema = z.enum(['pt-br', 'en']);

export const FormalitySchema = z.enum(['concise', 'detailed']);

/**
 * Input slot schema
 */
export const InputSlotSchema = z.object({
  name: z.string().regex(SLOT_NAME_PATTERN, 'Slot name must start with a letter and contain only letters and digits'),
  type: SlotTypeSchema,
  required: z.boolean().default(false),
  description: z.string().min(1, 'Slot description is required'),
  values: z.array(z.string().min(1)).min(1, 'Enum slots need at least one value').optional(),
  min: z.number().int().optional(),
  max: z.number().int().optional(),
  default: z.union([z.string(), z.number()]).optional(),
  placeholder: z.string().optional()
}).superRefine((slot, ctx) => {
  if (slot.type === 'enum' && !slot.values) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['values'], message: 'Enum slots must declare values' });
  }
  if (slot.type !== 'enum' && slot.values) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['values'], message: 'Only enum slots may declare values' });
  }
  if (slot.type !== 'integer' && (slot.min !== undefined || slot.max !== undefined)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['min'], message: 'Only integer slots may declare min/max' });
  }
  if (slot.min !== undefined && slot.max !== undefined && slot.min > slot.max) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['min'], message: 'min must not exceed max' });
  }
});

export const LabeledEntrySchema = z.object({
  id: z.string().min(1),
  labels: z.array(z.string().min(1)).min(1)
});

export const RankedEntrySchema = LabeledEntrySchema.extend({
  rank: z.number().int().positive()
});

export const ContractSectionSchema = z.object({
  id: z.string().min(1),
  headings: z.array(z.string().min(1)).min(1),
  required: z.boolean().default(true)
});

/**
 * Audit report contract schema
 */
export const AuditReportContractSchema = z.object({
  kind: z.literal('audit-report'),
  summaryMaxLines: z.number().int().positive().default(10),
  scoreMax: z.number().int().positive().default(100),
  sections: z.array(ContractSectionSchema).min(1),
  scoreCategories: z.array(LabeledEntrySchema).min(1),
  overallScore: LabeledEntrySchema,
  severities: z.array(RankedEntrySchema).min(1),
  findingsColumns: z.array(LabeledEntrySchema).min(1),
  horizons: z.array(LabeledEntrySchema).min(1),
  backlogItemFields: z.array(LabeledEntrySchema).default([])
});

/**
 * Commit messages contract schema
 */
export const CommitMessagesContractSchema = z.object({
  kind: z.literal('commit-messages'),
  headerMaxLength: z.number().int().positive().default(72),
  bodyWrapColumn: z.number().int().positive().default(72),
  types: z.array(z.string().regex(/^[a-z]+$/)).min(1).default([...COMMIT_TYPES]),
  footerTokens: z.array(z.string().min(1)).default([]),
  minVariants: z.number().int().positive().default(1),
  maxVariants: z.number().int().positive().default(3),
  variantCountSlot: z.string().default('variantCount'),
  languageSlot: z.string().default('language')
});

export const OutputContractSchema = z.discriminatedUnion('kind', [
  AuditReportContractSchema,
  CommitMessagesContractSchema
]);

/**
 * Template frontmatter schema
 */
export const TemplateFrontmatterSchema = z.object({
  id: z.string().regex(TEMPLATE_ID_PATTERN, 'Template id must be lowercase letters, digits and hyphens'),
  name: z.string().min(1, 'Name is required').max(200, 'Name too long'),
  version: z.number().int().positive(),
  description: z.string().optional(),
  inputSlots: z.array(InputSlotSchema),
  outputContract: OutputContractSchema
}).superRefine((fm, ctx) => {
  const seen = new Set<string>();
  fm.inputSlots.forEach((slot, index) => {
    if (seen.has(slot.name)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['inputSlots', index, 'name'], message: `Duplicate slot: ${slot.name}` });
    }
    seen.add(slot.name);
  });

  const contract = fm.outputContract;
  if (contract.kind === 'audit-report') {
    const sectionIds = new Set(contract.sections.map(s => s.id));
    for (const id of AUDIT_REQUIRED_SECTION_IDS) {
      if (!sectionIds.has(id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['outputContract', 'sections'], message: `Missing section: ${id}` });
      }
    }
    if (!contract.findingsColumns.some(c => c.id === 'severity')) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['outputContract', 'findingsColumns'], message: 'Findings columns must include severity' });
    }
  } else {
    if (contract.minVariants > contract.maxVariants) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['outputContract', 'minVariants'], message: 'minVariants must not exceed maxVariants' });
    }
    for (const key of ['variantCountSlot', 'languageSlot'] as const) {
      if (!seen.has(contract[key])) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['outputContract', key], message: `Unknown slot: ${contract[key]}` });
      }
    }
  }
});

/**
 * .prompts/config.yaml schema
 */
export const ConfigSchema = z.object({
  defaults: z.object({
    language: LanguageSchema.optional(),
    formality: FormalitySchema.optional(),
    variantCount: z.number().int().min(1).max(3).optional(),
    slots: z.record(z.string(), z.record(z.string(), z.union([z.string(), z.number()]))).optional()
  }).optional(),
  validation: z.object({
    headerMaxLength: z.number().int().positive().optional(),
    bodyWrapColumn: z.number().int().positive().optional(),
    summaryMaxLines: z.number().int().positive().optional(),
    strict: z.boolean().optional()
  }).optional(),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    timestamps: z.boolean().optional()
  }).optional()
});

/**
 * Type exports
 */
export type ValidatedFrontmatter = z.infer<typeof TemplateFrontmatterSchema>;
export type ValidatedConfig = z.infer<typeof ConfigSchema>;

/**
 * Validation helper functions
 */
export function validateFrontmatter(data: unknown): ValidatedFrontmatter {
  return TemplateFrontmatterSchema.parse(data);
}

export function validateConfig(data: unknown): ValidatedConfig {
  return ConfigSchema.parse(data);
}

/**
 * Safe validation (returns result instead of throwing)
 */
export function safeValidateFrontmatter(data: unknown) {
  return TemplateFrontmatterSchema.safeParse(data);
}

export function safeValidateConfig(data: unknown) {
  return ConfigSchema.safeParse(data);
}

/**
 * Formats zod issues as "path: message" strings
 */
export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
