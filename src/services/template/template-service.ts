// Template registry: bundled templates plus a project's custom templates

import * as fs from 'fs/promises';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { NotFoundError, ValidationError } from '../../core/errors.js';
import { logger } from '../../core/logger.js';
import { validateTemplateId } from '../../core/validation.js';
import type { PromptTemplate, TemplateMetadata } from '../../models/template.js';
import type { TemplateSource } from '../../models/types.js';
import { parseTemplateFile } from './template-parser.js';

/**
 * Directory holding the templates shipped with the package
 */
export const BUNDLED_TEMPLATES_DIR = fileURLToPath(new URL('../../../templates/', import.meta.url));

const TEMPLATE_EXTENSION = '.md';

/**
 * Configuration for the template service
 */
export interface TemplateServiceConfig {
  /** Project directory for configuration and custom templates (default: .prompts) */
  baseDir: string;
  /** Directory of bundled templates */
  bundledDir: string;
}

const DEFAULT_CONFIG: TemplateServiceConfig = {
  baseDir: '.prompts',
  bundledDir: BUNDLED_TEMPLATES_DIR
};

/**
 * Summary row for template listings
 */
export interface TemplateSummary {
  id: string;
  name: string;
  version: number;
  source: TemplateSource;
  kind: TemplateMetadata['outputContract']['kind'];
  requiredSlots: string[];
  optionalSlots: string[];
}

export interface ImportOptions {
  /** Replace an existing custom template with the same id */
  overwrite?: boolean;
}

/**
 * Template management service.
 * Loads, looks up, exports, imports and deletes templates.
 */
export class TemplateService {
  private config: TemplateServiceConfig;
  private templates: Map<string, PromptTemplate> = new Map();
  private rawText: Map<string, string> = new Map();
  private loaded = false;

  constructor(config: Partial<TemplateServiceConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Gets the custom templates directory path
   */
  getTemplatesDir(): string {
    return path.join(this.config.baseDir, 'templates');
  }

  private getTemplatePath(id: string): string {
    return path.join(this.getTemplatesDir(), `${id}${TEMPLATE_EXTENSION}`);
  }

  /**
   * Loads bundled and custom templates once. Custom templates replace
   * bundled ones that share their id.
   */
  async load(): Promise<void> {
    if (this.loaded) return;

    await this.loadDirectory(this.config.bundledDir, 'bundled');
    await this.loadDirectory(this.getTemplatesDir(), 'custom');
    this.loaded = true;

    logger.debug('Templates loaded', { count: this.templates.size });
  }

  /**
   * Drops everything loaded so the next call reads the disk again
   */
  reset(): void {
    this.templates.clear();
    this.rawText.clear();
    this.loaded = false;
  }

  private async loadDirectory(dir: string, source: TemplateSource): Promise<void> {
    let files: string[];
    try {
      files = await fs.readdir(dir);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        logger.debug('Template directory not found', { dir });
        return;
      }
      throw error;
    }

    for (const file of files.sort()) {
      if (!file.endsWith(TEMPLATE_EXTENSION)) continue;

      const filePath = path.join(dir, file);
      const expectedId = path.basename(file, TEMPLATE_EXTENSION);
      const content = await fs.readFile(filePath, 'utf-8');

      try {
        this.register(content, source, filePath, expectedId);
      } catch (error) {
        // A broken bundled template is a packaging bug; a broken custom one is skipped
        if (source === 'bundled') throw error;
        logger.warn(`Skipping invalid template ${filePath}: ${(error as Error).message}`);
      }
    }
  }

  private register(content: string, source: TemplateSource, filePath: string | undefined, expectedId?: string): PromptTemplate {
    const { metadata, body } = parseTemplateFile(content, expectedId);
    const template: PromptTemplate = { ...metadata, body, source, filePath };

    const existing = this.templates.get(template.id);
    if (existing && existing.source === 'bundled' && source === 'custom') {
      logger.debug(`Custom template overrides bundled template ${template.id}`);
    }

    this.templates.set(template.id, template);
    this.rawText.set(template.id, content);
    return template;
  }

  /**
   * Gets a template by id
   * @throws NotFoundError when no template has that id
   */
  async getTemplate(id: string): Promise<PromptTemplate> {
    const templateId = validateTemplateId(id);
    await this.load();

    const template = this.templates.get(templateId);
    if (!template) {
      throw new NotFoundError('Template', templateId, [...this.templates.keys()].sort());
    }
    return template;
  }

  /**
   * Lists all available templates, sorted by id
   */
  async listTemplates(): Promise<TemplateSummary[]> {
    await this.load();

    return [...this.templates.values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .map(t => ({
        id: t.id,
        name: t.name,
        version: t.version,
        source: t.source,
        kind: t.outputContract.kind,
        requiredSlots: t.inputSlots.filter(s => s.required).map(s => s.name),
        optionalSlots: t.inputSlots.filter(s => !s.required).map(s => s.name)
      }));
  }

  /**
   * Returns the template file exactly as it was loaded
   */
  async exportTemplate(id: string): Promise<string> {
    const template = await this.getTemplate(id);
    const raw = this.rawText.get(template.id);
    if (raw === undefined) {
      throw new NotFoundError('Template source', template.id);
    }
    return raw;
  }

  /**
   * Validates a template file and saves it as a custom template
   *
   * @returns The registered template
   * @throws ParseError or TemplateError for invalid content, ValidationError if the id is taken
   */
  async importTemplate(content: string, options: ImportOptions = {}): Promise<PromptTemplate> {
    await this.load();

    const { metadata } = parseTemplateFile(content);
    const existing = this.templates.get(metadata.id);
    if (existing?.source === 'custom' && !options.overwrite) {
      throw new ValidationError(`Custom template already exists: ${metadata.id}. Use overwrite to replace it.`, 'id');
    }

    const filePath = this.getTemplatePath(metadata.id);
    await fs.mkdir(this.getTemplatesDir(), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');

    logger.info(`Imported template ${metadata.id}`, { filePath });
    return this.register(content, 'custom', filePath, metadata.id);
  }

  /**
   * Deletes a custom template. Bundled templates cannot be deleted.
   *
   * @returns true if a file was removed
   */
  async deleteTemplate(id: string): Promise<boolean> {
    const templateId = validateTemplateId(id);
    await this.load();

    const template = this.templates.get(templateId);
    if (!template) return false;
    if (template.source === 'bundled') {
      throw new ValidationError(`Bundled template cannot be deleted: ${templateId}`, 'id');
    }

    try {
      await fs.unlink(this.getTemplatePath(templateId));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }

    // A bundled template with the same id becomes visible again
    this.reset();
    return true;
  }
}
