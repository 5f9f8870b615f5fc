// Template commands for the promptc CLI

import { Command } from 'commander';
import * as fs from 'fs/promises';
import type { PromptTemplate } from '../../models/template.js';
import { createContext } from '../utils/context.js';
import { handleError, success } from '../utils/error-handler.js';

function describeSlot(slot: PromptTemplate['inputSlots'][number]): string {
  const details: string[] = [slot.type];
  if (slot.values) details.push(`one of ${slot.values.join('|')}`);
  if (slot.min !== undefined || slot.max !== undefined) details.push(`${slot.min ?? '-∞'}..${slot.max ?? '∞'}`);
  if (slot.default !== undefined) details.push(`default ${slot.default}`);
  return `${slot.required ? '*' : ' '} ${slot.name} (${details.join(', ')}): ${slot.description}`;
}

function describeContract(template: PromptTemplate): string[] {
  const contract = template.outputContract;
  if (contract.kind === 'audit-report') {
    return [
      `Output: audit report`,
      `  Sections: ${contract.sections.map(s => `${s.headings[0]}${s.required ? '' : ' (optional)'}`).join(', ')}`,
      `  Scores: ${contract.scoreCategories.map(c => c.labels[0]).join(', ')} + ${contract.overallScore.labels[0]} (0-${contract.scoreMax})`,
      `  Severities: ${[...contract.severities].sort((a, b) => b.rank - a.rank).map(s => s.labels[0]).join(' > ')}`,
      `  Horizons: ${contract.horizons.map(h => h.labels[0]).join(', ')}`
    ];
  }
  return [
    `Output: ${contract.minVariants}-${contract.maxVariants} commit message(s)`,
    `  Types: ${contract.types.join(', ')}`,
    `  Header: at most ${contract.headerMaxLength} characters; body wrapped at ${contract.bodyWrapColumn}`
  ];
}

export function registerTemplateCommands(program: Command): void {
  const template = program
    .command('template')
    .description('Manage prompt templates');

  // List templates
  template
    .command('list')
    .description('List all available templates')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(async (options: { path: string }) => {
      try {
        const { templateService } = await createContext(options.path);
        const templates = await templateService.listTemplates();

        console.log(`Available templates:\n`);
        for (const t of templates) {
          console.log(`  ${t.id} (${t.source})`);
          console.log(`    Name: ${t.name}`);
          console.log(`    Version: ${t.version}`);
          console.log(`    Output: ${t.kind}`);
          console.log(`    Slots: ${t.requiredSlots.length} required, ${t.optionalSlots.length} optional`);
          console.log();
        }
      } catch (error) {
        handleError(error);
      }
    });

  // Show one template
  template
    .command('show <templateId>')
    .description('Show a template\'s slots and output contract')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(async (templateId: string, options: { path: string }) => {
      try {
        const { templateService } = await createContext(options.path);
        const t = await templateService.getTemplate(templateId);

        console.log(`${t.id}: ${t.name} (v${t.version}, ${t.source})`);
        if (t.description) console.log(t.description);
        console.log('\nSlots (* required):');
        for (const slot of t.inputSlots) {
          console.log(`  ${describeSlot(slot)}`);
        }
        console.log();
        for (const line of describeContract(t)) {
          console.log(line);
        }
      } catch (error) {
        handleError(error);
      }
    });

  // Export template
  template
    .command('export <templateId>')
    .description('Export a template file')
    .option('-o, --output <file>', 'Output file path')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(async (templateId: string, options: { output?: string; path: string }) => {
      try {
        const { templateService } = await createContext(options.path);
        const content = await templateService.exportTemplate(templateId);

        if (options.output) {
          await fs.writeFile(options.output, content, 'utf-8');
          success(`Exported template to: ${options.output}`);
        } else {
          process.stdout.write(content);
        }
      } catch (error) {
        handleError(error);
      }
    });

  // Import template
  template
    .command('import <file>')
    .description('Validate a template file and add it to .prompts/templates')
    .option('--overwrite', 'Replace an existing custom template with the same id')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(async (file: string, options: { overwrite?: boolean; path: string }) => {
      try {
        const { templateService } = await createContext(options.path);
        const content = await fs.readFile(file, 'utf-8');
        const imported = await templateService.importTemplate(content, { overwrite: options.overwrite });

        success(`Imported template: ${imported.id}`);
        console.log(`  Name: ${imported.name}`);
        console.log(`  Output: ${imported.outputContract.kind}`);
        console.log(`  Slots: ${imported.inputSlots.length}`);
      } catch (error) {
        handleError(error);
      }
    });

  // Delete a custom template
  template
    .command('delete <templateId>')
    .description('Delete a custom template')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(async (templateId: string, options: { path: string }) => {
      try {
        const { templateService } = await createContext(options.path);
        const deleted = await templateService.deleteTemplate(templateId);

        if (deleted) {
          success(`Deleted template: ${templateId}`);
        } else {
          console.log(`No custom template named ${templateId}`);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
