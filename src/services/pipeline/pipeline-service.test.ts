/**
 * Tests for the render, generate and validate pipeline
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { ContractViolationError, SlotValidationError } from '../../core/errors.js';
import { ConfigService } from '../config/config-service.js';
import { TemplateService } from '../template/template-service.js';
import { PipelineService, type GenerationAgent } from './pipeline-service.js';

let testCounter = 0;
function getTestDir(): string {
  return `.prompts-test-pipeline-${process.pid}-${++testCounter}`;
}

function fakeAgent(output: string) {
  return { generate: vi.fn<GenerationAgent['generate']>(async () => output) };
}

describe('PipelineService', () => {
  let testDir: string;
  let configService: ConfigService;
  let pipeline: PipelineService;

  beforeEach(async () => {
    testDir = getTestDir();
    await fs.mkdir(testDir, { recursive: true });
    configService = new ConfigService({ baseDir: testDir });
    pipeline = new PipelineService({ configService, templateService: new TemplateService({ baseDir: testDir }) });
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('render', () => {
    it('should substitute values and placeholders into the commit template', async () => {
      const rendered = await pipeline.render('commit-assistant', { changeSummary: 'adiciona MFA no login' });

      expect(rendered.prompt).toContain('- Resumo da mudança: adiciona MFA no login\n');
      expect(rendered.prompt).toContain('- Issue relacionada: (nenhuma)\n');
      expect(rendered.prompt).not.toContain('{{');
      expect(rendered.values).toMatchObject({ language: 'pt-br', formality: 'concise', variantCount: '1' });
    });

    it('should apply configured defaults', async () => {
      await configService.saveConfig({ defaults: { language: 'en', variantCount: 2 } });

      const rendered = await pipeline.render('commit-assistant', { changeSummary: 'adds MFA' });
      expect(rendered.values).toMatchObject({ language: 'en', variantCount: '2' });
    });

    it('should keep code holding backtick fences inside its own block', async () => {
      const code = 'def usage():\n    """Example:\n\n    ```\n    usage()\n    ```\n    """';

      const rendered = await pipeline.render('python-code-audit', { code });
      expect(rendered.prompt).toContain(`~~~~~python\n${code}\n~~~~~\n`);
    });

    it('should reject the audit template without code', async () => {
      await expect(pipeline.render('python-code-audit', { code: '' })).rejects.toBeInstanceOf(SlotValidationError);
    });
  });

  describe('run', () => {
    it('should dispatch the rendered prompt and validate the output', async () => {
      const agent = fakeAgent('feat(auth): adiciona MFA no login');

      const result = await pipeline.run('commit-assistant', { changeSummary: 'adiciona MFA no login' }, agent);

      expect(agent.generate).toHaveBeenCalledWith({ templateId: 'commit-assistant', prompt: result.rendered.prompt });
      expect(result.output).toBe('feat(auth): adiciona MFA no login');
      expect(result.validation.valid).toBe(true);
    });

    it('should not call the agent when slot values are rejected', async () => {
      const agent = fakeAgent('unused');

      await expect(pipeline.run('commit-assistant', { changeSummary: 'x', variantCount: '5' }, agent))
        .rejects.toBeInstanceOf(SlotValidationError);
      expect(agent.generate).not.toHaveBeenCalled();
    });

    it('should throw ContractViolationError in strict mode', async () => {
      const agent = fakeAgent('```\nfeat: adiciona MFA\n```');

      const run = pipeline.run('commit-assistant', { changeSummary: 'adiciona MFA', variantCount: 2 }, agent);
      await expect(run).rejects.toBeInstanceOf(ContractViolationError);
      await expect(
        pipeline.run('commit-assistant', { changeSummary: 'adiciona MFA', variantCount: 2 }, agent)
      ).rejects.toThrow('Output for template "commit-assistant" violates its contract (1 error(s))');
    });

    it('should return the violations when strict mode is off', async () => {
      const agent = fakeAgent('feat: Adiciona MFA.');

      const result = await pipeline.run('commit-assistant', { changeSummary: 'adiciona MFA' }, agent, { strict: false });
      expect(result.validation.valid).toBe(false);
      expect(result.validation.errors.map(e => e.message)).toEqual([
        'Summary must not end with a period',
        'Summary must start with a lowercase letter'
      ]);
    });

    it('should read strict mode from config', async () => {
      await configService.saveConfig({ validation: { strict: false } });
      const agent = fakeAgent('not a commit message');

      const result = await pipeline.run('commit-assistant', { changeSummary: 'adiciona MFA' }, agent);
      expect(result.validation.valid).toBe(false);
    });

    it('should validate audit output against the audit contract', async () => {
      const agent = fakeAgent('### Resumo executivo\nNada a declarar.\n');

      const result = await pipeline.run('python-code-audit', { code: 'print("hi")' }, agent, { strict: false });
      expect(result.validation.valid).toBe(false);
      expect(result.validation.errors.map(e => e.field)).toContain('sections.findings');
      expect(agent.generate.mock.calls[0][0].prompt).toContain('print("hi")');
    });
  });

  describe('validate', () => {
    it('should use the language the prompt was rendered with', async () => {
      const rendered = await pipeline.render('commit-assistant', { changeSummary: 'adds MFA', language: 'en' });

      const result = await pipeline.validate(rendered, 'feat: added MFA');
      expect(result.valid).toBe(true);
      expect(result.warnings.map(w => w.message)).toEqual([
        'Summary should be imperative: "added" does not look imperative (use "add", not "added", "adding" or "adds")'
      ]);
    });
  });
});
