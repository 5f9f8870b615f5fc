// Lint-commit command - run by the commit-msg hook

import { Command } from 'commander';
import { isLanguage } from '../../services/validation/output-validator.js';
import { GitHooksService } from '../../services/hooks/hooks-service.js';
import { ValidationError } from '../../core/errors.js';
import { createContext } from '../utils/context.js';
import { formatIssues, handleError, warn } from '../utils/error-handler.js';

export const lintCommitCommand = new Command('lint-commit')
  .description('Lint a commit message file (e.g. .git/COMMIT_EDITMSG) against the commit-assistant contract')
  .argument('<file>', 'Commit message file')
  .option('-l, --language <language>', 'Language of the message (pt-br or en)')
  .option('-p, --path <path>', 'Base path', process.cwd())
  .action(async (file: string, options: { language?: string; path: string }) => {
    try {
      if (options.language !== undefined && !isLanguage(options.language)) {
        throw new ValidationError(`Unsupported language: ${options.language}. Use pt-br or en.`, 'language');
      }

      const { basePath, configService, templateService } = await createContext(options.path);
      const hooksService = new GitHooksService({ baseDir: basePath, configService, templateService });
      const result = await hooksService.lintMessageFile(file, {
        language: isLanguage(options.language) ? options.language : undefined
      });

      if (result.skipped) {
        return;
      }

      if (result.warnings.length > 0) {
        warn(`Commit message warnings:\n${formatIssues(result.warnings)}`);
      }

      if (!result.valid) {
        console.error(`✗ Commit message rejected:\n${formatIssues(result.errors)}`);
        process.exitCode = 2;
      }
    } catch (error) {
      handleError(error);
    }
  });
