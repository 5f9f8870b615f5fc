// Dispatches generated output to the validator for its template's contract

import type { AuditValidationResult } from '../../models/audit.js';
import type { CommitValidationResult } from '../../models/commit.js';
import type { OutputContract, PromptTemplate } from '../../models/template.js';
import { LANGUAGES, type Language } from '../../models/types.js';
import { AuditReportValidator } from './audit-validator.js';
import { CommitMessageValidator } from './commit-validator.js';

/**
 * Limits that override the constants declared in a contract
 */
export interface ValidationLimits {
  headerMaxLength?: number;
  bodyWrapColumn?: number;
  summaryMaxLines?: number;
}

export interface OutputValidationOptions {
  /** Number of commit messages requested */
  variantCount?: number;
  /** Language of the commit messages */
  language?: Language;
  limits?: ValidationLimits;
}

export type OutputValidationResult = AuditValidationResult | CommitValidationResult;

export function isLanguage(value: string | undefined): value is Language {
  return LANGUAGES.some(l => l === value);
}

/**
 * Returns the contract with any configured limits applied
 */
export function applyLimits(contract: OutputContract, limits: ValidationLimits = {}): OutputContract {
  if (contract.kind === 'audit-report') {
    return { ...contract, summaryMaxLines: limits.summaryMaxLines ?? contract.summaryMaxLines };
  }
  return {
    ...contract,
    headerMaxLength: limits.headerMaxLength ?? contract.headerMaxLength,
    bodyWrapColumn: limits.bodyWrapColumn ?? contract.bodyWrapColumn
  };
}

/**
 * Reads the requested message count and language from the values a
 * commit template was rendered with
 */
export function commitOptionsFromValues(
  contract: OutputContract,
  values: Record<string, string>
): Pick<OutputValidationOptions, 'variantCount' | 'language'> {
  if (contract.kind !== 'commit-messages') return {};

  const count = values[contract.variantCountSlot];
  const language = values[contract.languageSlot];
  return {
    variantCount: count !== undefined && /^\d+$/.test(count) ? Number(count) : undefined,
    language: isLanguage(language) ? language : undefined
  };
}

/**
 * Validates output against the contract of the template that produced it
 */
export function validateOutput(
  template: Pick<PromptTemplate, 'outputContract'>,
  output: string,
  options: OutputValidationOptions = {}
): OutputValidationResult {
  const contract = applyLimits(template.outputContract, options.limits);

  if (contract.kind === 'audit-report') {
    return new AuditReportValidator(contract).validate(output);
  }
  return new CommitMessageValidator(contract).validate(output, {
    expectedCount: options.variantCount,
    language: options.language
  });
}
