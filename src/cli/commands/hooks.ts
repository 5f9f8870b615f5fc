// Hooks commands for the promptc CLI

import { Command } from 'commander';
import * as fs from 'fs/promises';
import * as path from 'path';
import { GitHooksService, HookExistsError, type CIPlatform } from '../../services/hooks/hooks-service.js';
import { PromptService } from '../../services/prompt/prompt-service.js';
import { createContext } from '../utils/context.js';
import { handleError, success } from '../utils/error-handler.js';

interface InstallOptions {
  husky?: boolean;
  force?: boolean;
  ci?: string | boolean;
  path: string;
}

function isCIPlatform(value: string): value is CIPlatform {
  return value === 'github' || value === 'gitlab';
}

/**
 * Registers the hooks command and subcommands
 *
 * Supports:
 * - promptc hooks install [--husky] [--force] [--ci [platform]]
 * - promptc hooks uninstall
 */
export function registerHooksCommand(program: Command): void {
  const hooksCommand = program
    .command('hooks')
    .description('Manage the git hook that lints commit messages');

  // Install subcommand
  hooksCommand
    .command('install')
    .description('Install a commit-msg hook that runs promptc lint-commit')
    .option('--husky', 'Write the hook to .husky/ instead of .git/hooks')
    .option('--force', 'Replace an existing commit-msg hook')
    .option('--ci [platform]', 'Also generate a CI workflow (github or gitlab)', false)
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(async (options: InstallOptions) => {
      try {
        const { basePath, configService, templateService } = await createContext(options.path);
        const hooksService = new GitHooksService({ baseDir: basePath, configService, templateService });

        const platform = typeof options.ci === 'string' ? options.ci : 'github';
        if (options.ci && !isCIPlatform(platform)) {
          console.error(`Error: Unsupported CI platform '${platform}'`);
          console.error('Supported platforms: github, gitlab');
          process.exit(1);
        }

        console.log('Installing git hooks...');

        let hookPath: string;
        try {
          hookPath = await hooksService.install({ husky: options.husky, force: options.force });
        } catch (error) {
          const prompt = new PromptService();
          if (!(error instanceof HookExistsError) || !await prompt.promptForConfirmation(`${error.message}. Replace it?`)) {
            throw error;
          }
          hookPath = await hooksService.install({ husky: options.husky, force: true });
        }
        success(`Installed commit-msg hook at ${hookPath}`);

        // Generate CI script if requested
        if (options.ci && isCIPlatform(platform)) {
          const ciScript = hooksService.generateCIScript(platform);

          let outputPath: string;
          let outputDir: string;

          if (platform === 'github') {
            outputDir = path.join(basePath, '.github', 'workflows');
            outputPath = path.join(outputDir, 'commit-lint.yml');
          } else {
            outputDir = basePath;
            outputPath = path.join(basePath, '.gitlab-ci-commit-lint.yml');
          }

          await fs.mkdir(outputDir, { recursive: true });
          await fs.writeFile(outputPath, ciScript, 'utf-8');

          success(`Generated ${platform === 'github' ? 'GitHub Actions' : 'GitLab CI'} workflow at ${outputPath}`);
        }

        console.log('\nCommit messages will be linted against the commit-assistant contract.');
      } catch (error) {
        handleError(error);
      }
    });

  // Uninstall subcommand
  hooksCommand
    .command('uninstall')
    .description('Remove the commit-msg hook installed by promptc')
    .option('-p, --path <path>', 'Base path', process.cwd())
    .action(async (options: { path: string }) => {
      try {
        const { basePath, configService, templateService } = await createContext(options.path);
        const hooksService = new GitHooksService({ baseDir: basePath, configService, templateService });

        const removed = await hooksService.uninstall();
        if (removed.length === 0) {
          console.log('No promptc hooks found.');
          return;
        }
        for (const hookPath of removed) {
          success(`Removed ${hookPath}`);
        }
      } catch (error) {
        handleError(error);
      }
    });
}
