// Leveled console logger shared by the services and the promptc CLI

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export interface LoggerConfig {
  level: LogLevel;
  /** Written before the level tag; an empty string leaves it out */
  prefix?: string;
  /** Prepend an ISO timestamp to every line */
  timestamps?: boolean;
}

type LogContext = Record<string, unknown>;

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Console method per level, looked up on every write so replaced console
 * methods are honoured
 */
const SINKS: Record<Exclude<LogLevel, LogLevel.SILENT>, (line: string) => void> = {
  [LogLevel.DEBUG]: line => console.debug(line),
  [LogLevel.INFO]: line => console.info(line),
  [LogLevel.WARN]: line => console.warn(line),
  [LogLevel.ERROR]: line => console.error(line)
};

/**
 * Maps a config or flag value such as "warn" to a LogLevel
 */
export function parseLogLevel(name: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  if (!name) return fallback;
  return LEVEL_NAMES[name.trim().toLowerCase()] ?? fallback;
}

export class Logger {
  private static shared: Logger | undefined;
  private settings: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.settings = { level: LogLevel.INFO, prefix: '[promptc]', timestamps: false, ...config };
  }

  static getInstance(): Logger {
    if (!Logger.shared) {
      Logger.shared = new Logger();
    }
    return Logger.shared;
  }

  /**
   * Updates the shared logger in place; modules that imported `logger`
   * keep the same object
   */
  static configure(config: Partial<LoggerConfig>): void {
    const shared = Logger.getInstance();
    shared.settings = { ...shared.settings, ...config };
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write(LogLevel.ERROR, message, context);
  }

  /**
   * Error-level line carrying the error's name and stack
   */
  exception(error: Error, context?: LogContext): void {
    this.write(LogLevel.ERROR, error.message, { ...context, name: error.name, stack: error.stack });
  }

  private write(level: Exclude<LogLevel, LogLevel.SILENT>, message: string, context?: LogContext): void {
    if (level < this.settings.level) return;

    const { timestamps, prefix } = this.settings;
    const line = [
      timestamps ? `[${new Date().toISOString()}]` : '',
      prefix ?? '',
      `[${LogLevel[level]}]`,
      message,
      context && Object.keys(context).length > 0 ? JSON.stringify(context) : ''
    ].filter(part => part !== '').join(' ');

    SINKS[level](line);
  }
}

export const logger = Logger.getInstance();
