// Init command for the promptc CLI

import { Command } from 'commander';
import * as fs from 'fs/promises';
import { DEFAULT_CONFIG_FILE } from '../../services/config/config-service.js';
import { createContext } from '../utils/context.js';
import { handleError, info, success } from '../utils/error-handler.js';

export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Initialize the .prompts directory with a config file and a custom templates folder')
    .option('-p, --path <path>', 'Base path for initialization', process.cwd())
    .option('-f, --force', 'Overwrite an existing config.yaml')
    .action(async (options: { path: string; force?: boolean }) => {
      try {
        const { configService, templateService } = await createContext(options.path);

        if (await configService.exists() && !options.force) {
          info(`Config already exists: ${configService.getConfigPath()} (use --force to overwrite)`);
        } else {
          await configService.saveConfig(DEFAULT_CONFIG_FILE);
          success(`Wrote ${configService.getConfigPath()}`);
        }

        await fs.mkdir(templateService.getTemplatesDir(), { recursive: true });
        console.log('✓ Initialized .prompts directory structure');
        console.log('  Created directories:');
        console.log('    - .prompts/templates/');
      } catch (error) {
        handleError(error);
      }
    });
}
