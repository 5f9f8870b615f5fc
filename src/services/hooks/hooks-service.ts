/**
 * Git Hooks Service
 *
 * Installs a commit-msg hook that lints every commit message against the
 * commit template's contract, lints message files, and generates CI
 * scripts that do the same for a range of commits.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { simpleGit, SimpleGit } from 'simple-git';
import { TemplateError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { CommitValidationResult } from '../../models/commit.js';
import type { Language } from '../../models/types.js';
import { ConfigService } from '../config/config-service.js';
import { TemplateService } from '../template/template-service.js';
import { CommitMessageValidator, cleanCommitMessage, isGeneratedCommitMessage } from '../validation/commit-validator.js';
import { applyLimits, isLanguage } from '../validation/output-validator.js';

/**
 * Template whose contract commit messages are linted against
 */
export const COMMIT_TEMPLATE_ID = 'commit-assistant';

/**
 * Marks hook files this service owns
 */
const HOOK_MARKER = '# prompt-contracts commit-msg hook';

export type CIPlatform = 'github' | 'gitlab';

/**
 * Options for hook installation
 */
export interface HooksInstallOptions {
  husky?: boolean;
  /** Replace a commit-msg hook that was not installed by this tool */
  force?: boolean;
}

export interface LintOptions {
  /** Language heuristics to apply; defaults to the configured language */
  language?: Language;
}

/**
 * Result of linting a commit message file
 */
export interface CommitLintResult extends CommitValidationResult {
  /** Merge, fixup! and squash! messages are not linted */
  skipped: boolean;
}

/**
 * Git Hooks Service Interface
 */
export interface IGitHooksService {
  install(options?: HooksInstallOptions): Promise<string>;
  uninstall(): Promise<string[]>;
  lintMessage(message: string, options?: LintOptions): Promise<CommitLintResult>;
  lintMessageFile(file: string, options?: LintOptions): Promise<CommitLintResult>;
  generateCIScript(platform?: CIPlatform): string;
}

/**
 * commit-msg hook script content
 */
const COMMIT_MSG_HOOK_SCRIPT = `#!/bin/sh
${HOOK_MARKER}
# Lints the commit message against the commit-assistant contract

npx --no-install promptc lint-commit "$1"
`;

/**
 * Husky commit-msg hook content
 */
const HUSKY_COMMIT_MSG_SCRIPT = `${HOOK_MARKER}
npx --no-install promptc lint-commit "$1"
`;

/**
 * GitHub Actions CI script
 */
const GITHUB_ACTIONS_SCRIPT = `name: Commit Message Lint

on:
  pull_request:

jobs:
  lint-commits:
    runs-on: ubuntu-latest
    steps:
      - uses: actions/checkout@v4
        with:
          fetch-depth: 0

      - name: Setup Node.js
        uses: actions/setup-node@v4
        with:
          node-version: '20'

      - name: Install dependencies
        run: npm ci

      - name: Lint commit messages
        run: |
          for sha in $(git rev-list origin/\${{ github.base_ref }}..HEAD); do
            git log -1 --format=%B "$sha" > "$RUNNER_TEMP/COMMIT_MSG"
            npx promptc lint-commit "$RUNNER_TEMP/COMMIT_MSG" || exit 1
          done
`;

/**
 * GitLab CI script
 */
const GITLAB_CI_SCRIPT = `# Commit Message Lint Pipeline

stages:
  - lint

lint-commits:
  stage: lint
  image: node:20
  rules:
    - if: $CI_PIPELINE_SOURCE == "merge_request_event"
  script:
    - npm ci
    - git fetch origin "$CI_MERGE_REQUEST_TARGET_BRANCH_NAME"
    - |
      for sha in $(git rev-list "origin/$CI_MERGE_REQUEST_TARGET_BRANCH_NAME..HEAD"); do
        git log -1 --format=%B "$sha" > /tmp/COMMIT_MSG
        npx promptc lint-commit /tmp/COMMIT_MSG || exit 1
      done
`;

/**
 * Hook error for git-related issues
 */
export class HookError extends Error {
  constructor(message: string, public readonly details?: string) {
    super(message);
    this.name = 'HookError';
  }
}

/**
 * A commit-msg hook that this tool did not write is in the way
 */
export class HookExistsError extends HookError {
  constructor(public readonly hookPath: string) {
    super(`A commit-msg hook already exists at ${hookPath}`, 'Use --force to replace it');
    this.name = 'HookExistsError';
  }
}

/**
 * Git Hooks Service Implementation
 */
export class GitHooksService implements IGitHooksService {
  private git: SimpleGit;
  private baseDir: string;
  private templateService: TemplateService;
  private configService: ConfigService;

  constructor(options: {
    baseDir?: string;
    templateService?: TemplateService;
    configService?: ConfigService;
  } = {}) {
    this.baseDir = options.baseDir ?? '.';
    this.git = simpleGit(this.baseDir);
    this.templateService = options.templateService ?? new TemplateService();
    this.configService = options.configService ?? new ConfigService();
  }

  /**
   * Detects if the current directory is a git repository
   */
  private async isGitRepository(): Promise<boolean> {
    try {
      await this.git.revparse(['--git-dir']);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Gets the path to the .git/hooks directory
   */
  private async getGitHooksDir(): Promise<string> {
    const gitDir = (await this.git.revparse(['--git-dir'])).trim();
    return path.join(path.isAbsolute(gitDir) ? gitDir : path.join(this.baseDir, gitDir), 'hooks');
  }

  /**
   * Detects if Husky is installed
   */
  private async isHuskyInstalled(): Promise<boolean> {
    try {
      const stat = await fs.stat(path.join(this.baseDir, '.husky'));
      return stat.isDirectory();
    } catch {
      return false;
    }
  }

  /**
   * Installs the commit-msg hook
   *
   * @returns Path of the written hook
   * @throws HookError if not a git repository, a foreign hook exists or permission denied
   */
  async install(options: HooksInstallOptions = {}): Promise<string> {
    if (!await this.isGitRepository()) {
      throw new HookError('Not a git repository', 'Initialize git with "git init" first');
    }

    let hookPath: string;
    let script: string;

    if (options.husky) {
      if (!await this.isHuskyInstalled()) {
        throw new HookError(
          'Husky is not installed',
          'Install Husky first with "npx husky init" or "npm install husky --save-dev"'
        );
      }
      hookPath = path.join(this.baseDir, '.husky', 'commit-msg');
      script = HUSKY_COMMIT_MSG_SCRIPT;
    } else {
      const hooksDir = await this.getGitHooksDir();
      await fs.mkdir(hooksDir, { recursive: true });
      hookPath = path.join(hooksDir, 'commit-msg');
      script = COMMIT_MSG_HOOK_SCRIPT;
    }

    const existing = await this.readHook(hookPath);
    if (existing !== undefined && !existing.includes(HOOK_MARKER) && !options.force) {
      throw new HookExistsError(hookPath);
    }

    try {
      await fs.writeFile(hookPath, script, { mode: 0o755 });
      await fs.chmod(hookPath, 0o755);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'EACCES') {
        throw new HookError(`Permission denied writing to ${hookPath}`, 'Check file permissions');
      }
      throw error;
    }

    logger.debug(`Installed commit-msg hook at ${hookPath}`);
    return hookPath;
  }

  private async readHook(hookPath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(hookPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return undefined;
      throw error;
    }
  }

  /**
   * Removes the commit-msg hooks this service installed
   *
   * @returns Paths of the removed hooks
   */
  async uninstall(): Promise<string[]> {
    if (!await this.isGitRepository()) {
      throw new HookError('Not a git repository');
    }

    const candidates = [
      path.join(await this.getGitHooksDir(), 'commit-msg'),
      path.join(this.baseDir, '.husky', 'commit-msg')
    ];
    const removed: string[] = [];

    for (const hookPath of candidates) {
      const content = await this.readHook(hookPath);
      // Only remove if it's our hook
      if (content !== undefined && content.includes(HOOK_MARKER)) {
        await fs.unlink(hookPath);
        removed.push(hookPath);
      }
    }

    return removed;
  }

  /**
   * Lints one commit message against the commit template's contract
   */
  async lintMessage(message: string, options: LintOptions = {}): Promise<CommitLintResult> {
    if (isGeneratedCommitMessage(cleanCommitMessage(message))) {
      return { valid: true, errors: [], warnings: [], messages: [], skipped: true };
    }

    const template = await this.templateService.getTemplate(COMMIT_TEMPLATE_ID);
    const limits = await this.configService.getValidationConfig();
    const contract = applyLimits(template.outputContract, limits);
    if (contract.kind !== 'commit-messages') {
      throw new TemplateError('output contract is not commit-messages', template.id);
    }

    const defaults = await this.configService.getDefaults();
    const language = options.language ?? (isLanguage(defaults.language) ? defaults.language : undefined);

    const result = new CommitMessageValidator(contract).lintMessage(message, language);
    return { ...result, skipped: false };
  }

  /**
   * Lints a commit message file such as .git/COMMIT_EDITMSG
   */
  async lintMessageFile(file: string, options: LintOptions = {}): Promise<CommitLintResult> {
    const content = await fs.readFile(file, 'utf-8');
    return this.lintMessage(content, options);
  }

  /**
   * Generates a CI script that lints the commit messages of a change
   *
   * @param platform - Target CI platform (github or gitlab)
   * @returns CI configuration script content
   */
  generateCIScript(platform: CIPlatform = 'github'): string {
    switch (platform) {
      case 'github':
        return GITHUB_ACTIONS_SCRIPT;
      case 'gitlab':
        return GITLAB_CI_SCRIPT;
      default:
        return GITHUB_ACTIONS_SCRIPT;
    }
  }
}
