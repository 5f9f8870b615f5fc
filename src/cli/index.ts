#!/usr/bin/env node
// promptc - prompt template CLI

import { Command } from 'commander';
import { LogLevel, logger } from '../core/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerTemplateCommands } from './commands/template.js';
import { registerRenderCommand } from './commands/render.js';
import { registerHooksCommand } from './commands/hooks.js';
import { validateCommand } from './commands/validate.js';
import { lintCommitCommand } from './commands/lint-commit.js';
import { setLogLevelOverride } from './utils/context.js';

const program = new Command();

program
  .name('promptc')
  .description('Prompt templates with checked inputs and machine-validated output contracts')
  .version('0.1.0')
  .option('--verbose', 'Log debug output')
  .option('--quiet', 'Only log errors');

program.hook('preAction', () => {
  const { verbose, quiet } = program.opts<{ verbose?: boolean; quiet?: boolean }>();
  setLogLevelOverride(verbose ? LogLevel.DEBUG : quiet ? LogLevel.ERROR : undefined);
});

// Register all commands
registerInitCommand(program);
registerTemplateCommands(program);
registerRenderCommand(program);
registerHooksCommand(program);
program.addCommand(validateCommand);
program.addCommand(lintCommitCommand);

program.parseAsync().catch((error: unknown) => {
  logger.exception(error instanceof Error ? error : new Error(String(error)));
  process.exit(1);
});
