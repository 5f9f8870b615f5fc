// Render command - fill a template's slots and print the prompt

import { Command } from 'commander';
import * as fs from 'fs/promises';
import { ValidationError } from '../../core/errors.js';
import { parseSlotAssignment, validateSlotValueLength } from '../../core/validation.js';
import { GitContextService } from '../../services/git/git-context-service.js';
import { PipelineService } from '../../services/pipeline/pipeline-service.js';
import { PromptService } from '../../services/prompt/prompt-service.js';
import { slotValue, type SlotInput } from '../../services/template/renderer.js';
import { createContext } from '../utils/context.js';
import { handleError, success } from '../utils/error-handler.js';

interface RenderOptions {
  set: string[];
  slotFile: string[];
  interactive?: boolean;
  git?: boolean;
  output?: string;
  path: string;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function assign(values: SlotInput, name: string, value: string): void {
  if (slotValue(values, name) !== undefined) {
    throw new ValidationError(`Slot ${name} is given more than once`, name);
  }
  values[name] = value;
}

/**
 * Builds slot values from --set and --slot-file assignments
 */
export async function collectSlotValues(sets: string[], slotFiles: string[]): Promise<SlotInput> {
  const values: SlotInput = {};

  for (const assignment of sets) {
    const [name, value] = parseSlotAssignment(assignment);
    assign(values, name, value);
  }

  for (const assignment of slotFiles) {
    const [name, file] = parseSlotAssignment(assignment);
    assign(values, name, validateSlotValueLength(name, await fs.readFile(file, 'utf-8')));
  }

  return values;
}

export function registerRenderCommand(program: Command): void {
  program
    .command('render <templateId>')
    .description('Validate slot values and print the rendered prompt')
    .option('-s, --set <name=value>', 'Slot value (repeatable)', collect, [])
    .option('-f, --slot-file <name=path>', 'Read a slot value from a file (repeatable)', collect, [])
    .option('-i, --interactive', 'Ask for every slot not given on the command line')
    .option('-g, --git', 'Fill diff and repository context from the staged changes')
    .option('-o, --output <file>', 'Write the prompt to a file instead of stdout')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(async (templateId: string, options: RenderOptions) => {
      try {
        const { basePath, configService, templateService } = await createContext(options.path);
        const template = await templateService.getTemplate(templateId);
        let values = await collectSlotValues(options.set, options.slotFile);

        if (options.git) {
          values = await new GitContextService(basePath).fillCommitSlots(template, values);
        }

        const promptService = new PromptService();
        const defaults = await configService.getSlotDefaults(template.id);
        if (options.interactive) {
          values = await promptService.promptForMissingSlots(template, values, { all: true, defaults });
        } else if (promptService.isInteractive() && promptService.getMissingSlots(template, values).length > 0) {
          values = await promptService.promptForMissingSlots(template, values, { defaults });
        }

        const pipeline = new PipelineService({ templateService, configService });
        const rendered = await pipeline.render(template.id, values);

        if (options.output) {
          await fs.writeFile(options.output, rendered.prompt, 'utf-8');
          success(`Rendered ${rendered.templateId} to: ${options.output}`);
        } else {
          process.stdout.write(rendered.prompt);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
