/**
 * Pipeline Service
 *
 * Renders a template, hands the prompt to a generation agent and checks
 * the agent's output against the template's contract. Slot problems stop
 * the run before the agent is called.
 */

import { ContractViolationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import type { RenderedPrompt } from '../../models/template.js';
import { ConfigService } from '../config/config-service.js';
import { renderTemplate, type SlotInput } from '../template/renderer.js';
import { TemplateService } from '../template/template-service.js';
import { commitOptionsFromValues, validateOutput, type OutputValidationResult } from '../validation/output-validator.js';

/**
 * What a generation agent receives
 */
export interface GenerationRequest {
  templateId: string;
  prompt: string;
}

/**
 * The external model or tool that turns a prompt into output
 */
export interface GenerationAgent {
  generate(request: GenerationRequest): Promise<string>;
}

export interface PipelineOptions {
  /** Throw on contract violations; defaults to validation.strict in config.yaml */
  strict?: boolean;
}

export interface PipelineResult {
  rendered: RenderedPrompt;
  output: string;
  validation: OutputValidationResult;
}

/**
 * Pipeline Service Implementation
 */
export class PipelineService {
  private templateService: TemplateService;
  private configService: ConfigService;

  constructor(options: { templateService?: TemplateService; configService?: ConfigService } = {}) {
    this.templateService = options.templateService ?? new TemplateService();
    this.configService = options.configService ?? new ConfigService();
  }

  /**
   * Renders a template with configured defaults applied
   *
   * @throws SlotValidationError before anything is dispatched
   */
  async render(templateId: string, values: SlotInput): Promise<RenderedPrompt> {
    const template = await this.templateService.getTemplate(templateId);
    const defaults = await this.configService.getSlotDefaults(template.id);
    return renderTemplate(template, values, { defaults });
  }

  /**
   * Validates output produced from a rendered prompt
   */
  async validate(rendered: RenderedPrompt, output: string): Promise<OutputValidationResult> {
    const template = await this.templateService.getTemplate(rendered.templateId);
    const limits = await this.configService.getValidationConfig();

    return validateOutput(template, output, {
      ...commitOptionsFromValues(template.outputContract, rendered.values),
      limits
    });
  }

  /**
   * Runs render, generation and validation
   *
   * @throws SlotValidationError if the values are rejected (the agent is not called)
   * @throws ContractViolationError in strict mode when the output fails validation
   */
  async run(templateId: string, values: SlotInput, agent: GenerationAgent, options: PipelineOptions = {}): Promise<PipelineResult> {
    const rendered = await this.render(templateId, values);

    logger.debug('Dispatching prompt', { templateId: rendered.templateId, length: rendered.prompt.length });
    const output = await agent.generate({ templateId: rendered.templateId, prompt: rendered.prompt });

    const validation = await this.validate(rendered, output);
    const strict = options.strict ?? (await this.configService.getValidationConfig()).strict;

    if (!validation.valid) {
      if (strict) {
        throw new ContractViolationError(rendered.templateId, validation);
      }
      logger.warn(`Output for ${rendered.templateId} violates its contract`, { errors: validation.errors.length });
    }

    return { rendered, output, validation };
  }
}
