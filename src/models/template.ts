// Template model for prompt templates

import type { SlotType, TemplateSource } from './types.js';

/**
 * A named placeholder substituted into the template body
 */
export interface InputSlot {
  /** Marker name, used as {{name}} in the body */
  name: string;
  type: SlotType;
  /** Whether the caller must supply a non-blank value */
  required: boolean;
  /** Label shown when prompting for the value */
  description: string;
  /** Allowed values (enum slots only) */
  values?: string[];
  /** Inclusive lower bound (integer slots only) */
  min?: number;
  /** Inclusive upper bound (integer slots only) */
  max?: number;
  /** Value used when the caller omits the slot */
  default?: string | number;
  /** Text substituted for an omitted optional slot that has no default */
  placeholder?: string;
}

/**
 * An identifier plus the labels it may appear under in generated text
 */
export interface LabeledEntry {
  id: string;
  labels: string[];
}

/**
 * Severity level with its ordinal rank (higher is more severe)
 */
export interface RankedEntry extends LabeledEntry {
  rank: number;
}

/**
 * A heading the generated output must (or may) contain
 */
export interface ContractSection {
  id: string;
  headings: string[];
  required: boolean;
}

/**
 * Output shape of the code-audit template
 */
export interface AuditReportContract {
  kind: 'audit-report';
  summaryMaxLines: number;
  scoreMax: number;
  sections: ContractSection[];
  scoreCategories: LabeledEntry[];
  overallScore: LabeledEntry;
  severities: RankedEntry[];
  findingsColumns: LabeledEntry[];
  horizons: LabeledEntry[];
  backlogItemFields: LabeledEntry[];
}

/**
 * Output shape of the commit-message template
 */
export interface CommitMessagesContract {
  kind: 'commit-messages';
  headerMaxLength: number;
  bodyWrapColumn: number;
  types: string[];
  footerTokens: string[];
  minVariants: number;
  maxVariants: number;
  /** Slot holding the number of messages requested */
  variantCountSlot: string;
  /** Slot holding the output language */
  languageSlot: string;
}

export type OutputContract = AuditReportContract | CommitMessagesContract;

/**
 * Everything declared in a template file's frontmatter
 */
export interface TemplateMetadata {
  id: string;
  name: string;
  version: number;
  description?: string;
  inputSlots: InputSlot[];
  outputContract: OutputContract;
}

/**
 * A loaded template: metadata plus the body with its slot markers
 */
export interface PromptTemplate extends TemplateMetadata {
  body: string;
  source: TemplateSource;
  filePath?: string;
}

/**
 * Template text after slot substitution, ready for a generation agent
 */
export interface RenderedPrompt {
  templateId: string;
  prompt: string;
  /** Final value of every slot, after defaults were applied */
  values: Record<string, string>;
}
