// Services shared by the CLI commands of one invocation

import * as path from 'path';
import { Logger, type LogLevel } from '../../core/logger.js';
import { ConfigService } from '../../services/config/config-service.js';
import { TemplateService } from '../../services/template/template-service.js';

/**
 * Project directory holding config.yaml and custom templates
 */
export const PROJECT_DIR = '.prompts';

export interface CliContext {
  basePath: string;
  configService: ConfigService;
  templateService: TemplateService;
}

let levelOverride: LogLevel | undefined;

/**
 * Log level from --verbose/--quiet, which wins over config.yaml
 */
export function setLogLevelOverride(level: LogLevel | undefined): void {
  levelOverride = level;
  if (level !== undefined) {
    Logger.configure({ level });
  }
}

/**
 * Creates the services for a base path and applies its logging settings
 */
export async function createContext(basePath: string): Promise<CliContext> {
  const baseDir = path.join(basePath, PROJECT_DIR);
  const configService = new ConfigService({ baseDir });
  const templateService = new TemplateService({ baseDir });

  const logging = await configService.getLoggingConfig();
  Logger.configure({ level: levelOverride ?? logging.level, timestamps: logging.timestamps });

  return { basePath, configService, templateService };
}
