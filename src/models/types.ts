// Core type definitions for prompt-contracts

// Slot Types
export type SlotType = 'text' | 'enum' | 'integer';

// Output contract kinds
export type ContractKind = 'audit-report' | 'commit-messages';

// Where a template was loaded from
export type TemplateSource = 'bundled' | 'custom';

// Commit template enumerations
export type Language = 'pt-br' | 'en';
export type Formality = 'concise' | 'detailed';

export const LANGUAGES: readonly Language[] = ['pt-br', 'en'];
export const FORMALITIES: readonly Formality[] = ['concise', 'detailed'];

// Conventional Commits types accepted in a header
export const COMMIT_TYPES = [
  'feat',
  'fix',
  'docs',
  'style',
  'refactor',
  'perf',
  'test',
  'build',
  'ci',
  'chore',
  'revert'
] as const;

export type CommitType = typeof COMMIT_TYPES[number];

// Audit severity scale, highest first
export const SEVERITY_LEVELS = ['critical', 'high', 'medium', 'low'] as const;

export type SeverityLevel = typeof SEVERITY_LEVELS[number];
