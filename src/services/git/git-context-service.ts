/**
 * Git Context Service
 *
 * Reads the staged diff, branch and recent history of the working
 * repository to prefill the commit template.
 */

import { simpleGit, SimpleGit } from 'simple-git';
import { logger } from '../../core/logger.js';
import type { PromptTemplate } from '../../models/template.js';
import type { SlotInput } from '../template/renderer.js';

/**
 * Staged diffs longer than this are cut
 */
export const MAX_DIFF_LENGTH = 50_000;

/**
 * What the repository says about the change being committed
 */
export interface GitContext {
  branch?: string;
  stagedFiles: string[];
  stagedDiff: string;
  recentCommits: string[];
}

/**
 * Git Context Service Interface
 */
export interface IGitContextService {
  isRepository(): Promise<boolean>;
  getContext(recentCount?: number): Promise<GitContext>;
  fillCommitSlots(template: Pick<PromptTemplate, 'inputSlots' | 'outputContract'>, values: SlotInput): Promise<SlotInput>;
}

/**
 * Cuts a diff to MAX_DIFF_LENGTH characters at a line boundary
 */
export function truncateDiff(diff: string, maxLength: number = MAX_DIFF_LENGTH): string {
  if (diff.length <= maxLength) return diff;
  const cut = diff.slice(0, maxLength);
  const lastNewline = cut.lastIndexOf('\n');
  const kept = lastNewline > 0 ? cut.slice(0, lastNewline) : cut;
  return `${kept}\n[... diff truncated: ${diff.length - kept.length} more characters]`;
}

/**
 * Renders branch and history as the commit template's repository context
 */
export function formatRepoContext(context: GitContext): string {
  const lines: string[] = [];
  if (context.branch) {
    lines.push(`Branch: ${context.branch}`);
  }
  if (context.recentCommits.length > 0) {
    lines.push('Recent commits:');
    lines.push(...context.recentCommits.map(subject => `- ${subject}`));
  }
  return lines.join('\n');
}

/**
 * Git Context Service Implementation
 */
export class GitContextService implements IGitContextService {
  private git: SimpleGit;

  constructor(baseDir: string = '.') {
    this.git = simpleGit(baseDir);
  }

  async isRepository(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  async getStagedDiff(): Promise<string> {
    const diff = await this.git.diff(['--cached']);
    return truncateDiff(diff);
  }

  async getStagedFiles(): Promise<string[]> {
    const names = await this.git.diff(['--cached', '--name-only']);
    return names.split('\n').map(name => name.trim()).filter(name => name.length > 0);
  }

  /**
   * Current branch, or undefined on a detached HEAD
   */
  async getBranch(): Promise<string | undefined> {
    const branch = (await this.git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    return branch === 'HEAD' || branch === '' ? undefined : branch;
  }

  /**
   * Subjects of the last commits, newest first
   */
  async getRecentCommits(count: number = 5): Promise<string[]> {
    try {
      const log = await this.git.log({ maxCount: count });
      return log.all.map(commit => commit.message);
    } catch (error) {
      // A repository without commits has no log
      logger.debug('No commit history available', { error: (error as Error).message });
      return [];
    }
  }

  async getContext(recentCount: number = 5): Promise<GitContext> {
    const [stagedDiff, stagedFiles, recentCommits] = await Promise.all([
      this.getStagedDiff(),
      this.getStagedFiles(),
      this.getRecentCommits(recentCount)
    ]);

    let branch: string | undefined;
    try {
      branch = await this.getBranch();
    } catch (error) {
      logger.debug('Could not resolve branch', { error: (error as Error).message });
    }

    return { branch, stagedFiles, stagedDiff, recentCommits };
  }

  /**
   * Fills the `diff` and `repoContext` slots of a commit template from the
   * repository when the caller left them out
   */
  async fillCommitSlots(
    template: Pick<PromptTemplate, 'inputSlots' | 'outputContract'>,
    values: SlotInput
  ): Promise<SlotInput> {
    if (template.outputContract.kind !== 'commit-messages') {
      return { ...values };
    }

    if (!await this.isRepository()) {
      logger.warn('Not a git repository; --git ignored');
      return { ...values };
    }

    const declared = new Set(template.inputSlots.map(slot => slot.name));
    const context = await this.getContext();
    const filled: SlotInput = { ...values };

    if (declared.has('diff') && filled.diff === undefined && context.stagedDiff.trim() !== '') {
      filled.diff = context.stagedDiff;
    }

    const repoContext = formatRepoContext(context);
    if (declared.has('repoContext') && filled.repoContext === undefined && repoContext !== '') {
      filled.repoContext = repoContext;
    }

    logger.debug('Filled commit slots from git', { stagedFiles: context.stagedFiles.length, branch: context.branch });
    return filled;
  }
}
