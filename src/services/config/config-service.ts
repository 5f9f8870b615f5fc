/**
 * Configuration Service
 *
 * Loads and provides access to configuration from .prompts/config.yaml:
 * default slot values, validation limits and logging.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as yaml from 'yaml';
import { ValidationError } from '../../core/errors.js';
import { LogLevel, parseLogLevel } from '../../core/logger.js';
import { formatZodIssues, safeValidateConfig, type ValidatedConfig } from '../../core/schemas.js';
import type { Formality, Language } from '../../models/types.js';

/**
 * Full configuration schema
 */
export type PromptsConfig = ValidatedConfig;

/**
 * Defaults applied to slots the caller omits
 */
export interface ConfigDefaults {
  language?: Language;
  formality?: Formality;
  variantCount?: number;
  slots?: Record<string, Record<string, string | number>>;
}

/**
 * Output validation settings
 */
export interface ValidationConfig {
  headerMaxLength?: number;
  bodyWrapColumn?: number;
  summaryMaxLines?: number;
  /** Throw when generated output violates its contract */
  strict: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  timestamps: boolean;
}

/**
 * Default validation configuration
 */
const DEFAULT_VALIDATION_CONFIG: ValidationConfig = {
  strict: true
};

/**
 * Default logging configuration
 */
const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  level: LogLevel.INFO,
  timestamps: false
};

/**
 * Written by `promptc init`
 */
export const DEFAULT_CONFIG_FILE: PromptsConfig = {
  defaults: {
    language: 'pt-br',
    formality: 'concise',
    variantCount: 1
  },
  validation: {
    headerMaxLength: 72,
    bodyWrapColumn: 72,
    summaryMaxLines: 10,
    strict: true
  },
  logging: {
    level: 'info'
  }
};

/**
 * Configuration Service
 *
 * Provides access to configuration values from .prompts/config.yaml
 * with defaults when configuration is not present.
 */
export class ConfigService {
  private baseDir: string;
  private configPath: string;
  private cachedConfig: PromptsConfig | null = null;

  constructor(options: { baseDir?: string } = {}) {
    this.baseDir = options.baseDir || '.prompts';
    this.configPath = path.join(this.baseDir, 'config.yaml');
  }

  getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, with caching. A missing file yields an
   * empty configuration; an invalid one is an error.
   */
  async loadConfig(): Promise<PromptsConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.cachedConfig = {};
        return this.cachedConfig;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = yaml.parse(content);
    } catch (error) {
      throw new ValidationError(`Invalid YAML in ${this.configPath}: ${(error as Error).message}`, 'config');
    }

    const result = safeValidateConfig(parsed ?? {});
    if (!result.success) {
      throw new ValidationError(
        `Invalid configuration in ${this.configPath}: ${formatZodIssues(result.error).join('; ')}`,
        'config'
      );
    }

    this.cachedConfig = result.data;
    return result.data;
  }

  /**
   * Clear the cached configuration (useful for testing or after config changes)
   */
  clearCache(): void {
    this.cachedConfig = null;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.configPath);
      return true;
    } catch {
      return false;
    }
  }

  async getDefaults(): Promise<ConfigDefaults> {
    const config = await this.loadConfig();
    return config.defaults || {};
  }

  /**
   * Default slot values for a template. Per-template entries under
   * `defaults.slots` win over the shared language/formality/variantCount.
   */
  async getSlotDefaults(templateId: string): Promise<Record<string, string | number>> {
    const defaults = await this.getDefaults();
    const shared: Record<string, string | number> = {};

    if (defaults.language !== undefined) shared.language = defaults.language;
    if (defaults.formality !== undefined) shared.formality = defaults.formality;
    if (defaults.variantCount !== undefined) shared.variantCount = defaults.variantCount;

    const perTemplate = defaults.slots !== undefined && Object.hasOwn(defaults.slots, templateId)
      ? defaults.slots[templateId]
      : {};
    return { ...shared, ...perTemplate };
  }

  async getValidationConfig(): Promise<ValidationConfig> {
    const config = await this.loadConfig();
    const validation = config.validation || {};

    return {
      headerMaxLength: validation.headerMaxLength,
      bodyWrapColumn: validation.bodyWrapColumn,
      summaryMaxLines: validation.summaryMaxLines,
      strict: validation.strict ?? DEFAULT_VALIDATION_CONFIG.strict
    };
  }

  async getLoggingConfig(): Promise<LoggingConfig> {
    const config = await this.loadConfig();

    return {
      level: parseLogLevel(config.logging?.level, DEFAULT_LOGGING_CONFIG.level),
      timestamps: config.logging?.timestamps ?? DEFAULT_LOGGING_CONFIG.timestamps
    };
  }

  /**
   * Save configuration to file
   */
  async saveConfig(config: PromptsConfig): Promise<void> {
    const result = safeValidateConfig(config);
    if (!result.success) {
      throw new ValidationError(`Invalid configuration: ${formatZodIssues(result.error).join('; ')}`, 'config');
    }

    await fs.mkdir(this.baseDir, { recursive: true });
    await fs.writeFile(this.configPath, yaml.stringify(result.data), 'utf-8');
    this.cachedConfig = result.data;
  }

  /**
   * Update specific configuration values
   */
  async updateConfig(updates: Partial<PromptsConfig>): Promise<void> {
    const currentConfig = await this.loadConfig();
    await this.saveConfig({ ...currentConfig, ...updates });
  }
}
