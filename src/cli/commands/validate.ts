// Validate command - check generated output against a template's contract

import { Command, InvalidArgumentError } from 'commander';
import * as fs from 'fs/promises';
import type { AuditValidationResult } from '../../models/audit.js';
import type { CommitValidationResult } from '../../models/commit.js';
import { sortFindingsBySeverity } from '../../services/validation/audit-validator.js';
import { isLanguage, validateOutput, type OutputValidationResult } from '../../services/validation/output-validator.js';
import type { Language } from '../../models/types.js';
import { createContext } from '../utils/context.js';
import { formatIssues, handleError } from '../utils/error-handler.js';

function parseVariantCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return count;
}

function parseLanguage(value: string): Language {
  const language = value.trim().toLowerCase();
  if (!isLanguage(language)) {
    throw new InvalidArgumentError('Use pt-br or en.');
  }
  return language;
}

function isAuditResult(result: OutputValidationResult): result is AuditValidationResult {
  return 'report' in result;
}

function printAuditReport(result: AuditValidationResult): void {
  const { report } = result;
  if (report.scores.length > 0 || report.overall) {
    console.log('Scores:');
    for (const score of report.scores) {
      console.log(`  ${score.label}: ${score.value}`);
    }
    if (report.overall) {
      console.log(`  ${report.overall.label}: ${report.overall.value}`);
    }
  }
  if (report.findings.length > 0) {
    console.log(`Findings (${report.findings.length}, most severe first):`);
    for (const finding of sortFindingsBySeverity(report.findings)) {
      console.log(`  [${finding.severityLabel}] ${finding.category}: ${finding.impact}`);
    }
  }
}

function printCommitMessages(result: CommitValidationResult): void {
  for (const message of result.messages) {
    console.log(`  ${message.index}. ${message.header}`);
  }
}

export const validateCommand = new Command('validate')
  .description('Validate generated output against a template\'s output contract')
  .argument('<templateId>', 'Template that produced the output')
  .argument('<outputFile>', 'File holding the generated output')
  .option('-n, --variant-count <count>', 'Number of commit messages requested', parseVariantCount)
  .option('-l, --language <language>', 'Language of the commit messages (pt-br or en)', parseLanguage)
  .option('--json', 'Print the validation result as JSON')
  .option('-p, --path <path>', 'Base path', process.cwd())
  .action(async (
    templateId: string,
    outputFile: string,
    options: { variantCount?: number; language?: Language; json?: boolean; path: string }
  ) => {
    try {
      const { configService, templateService } = await createContext(options.path);
      const template = await templateService.getTemplate(templateId);
      const output = await fs.readFile(outputFile, 'utf-8');
      const limits = await configService.getValidationConfig();
      const defaults = await configService.getDefaults();

      const result = validateOutput(template, output, {
        variantCount: options.variantCount,
        language: options.language ?? defaults.language,
        limits
      });

      if (options.json) {
        console.log(JSON.stringify(result, null, 2));
      } else {
        if (isAuditResult(result)) {
          printAuditReport(result);
        } else {
          printCommitMessages(result);
        }
        if (result.warnings.length > 0) {
          console.log(`\nWarnings:\n${formatIssues(result.warnings)}`);
        }
        if (result.errors.length > 0) {
          console.error(`\nErrors:\n${formatIssues(result.errors)}`);
        }
        console.log(result.valid ? `\n✓ Output satisfies ${template.id}` : `\n✗ Output violates ${template.id}`);
      }

      if (!result.valid) {
        process.exitCode = 2;
      }
    } catch (error) {
      handleError(error);
    }
  });
