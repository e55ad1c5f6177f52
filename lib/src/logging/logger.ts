/**
 * Logger Implementation
 *
 * Structured logger shared by every service. Loggers are created once at
 * startup and handed to services through their dependencies; `child()` tags
 * entries with the component that produced them.
 *
 * @example
 * ```typescript
 * const root = createLogger('museum-guide', { level: LogLevel.DEBUG, format: 'pretty' });
 * const log = root.child('retriever');
 * log.info('Search completed', { results: 3 });
 * // [2024-01-01T00:00:00.000Z] INFO  [museum-guide:retriever] Search completed {"results":3}
 * ```
 */

import {
  type LogEntry,
  type LoggerConfig,
  type LogLevel,
  LogLevelName,
  LogLevelColors,
  LogColors,
  createDefaultLoggerConfig,
  shouldLog,
  formatError,
  parseLogLevel,
  LogLevel as LogLevelEnum,
  LogFormat,
} from './types.js';

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly config: LoggerConfig;
  private level: LogLevel;

  constructor(config?: Partial<LoggerConfig>) {
    this.config = createDefaultLoggerConfig(config);
    this.level = this.config.level;
  }

  /**
   * Create a child logger whose source is nested under this one
   */
  child(source: string): Logger {
    return new Logger({
      ...this.config,
      level: this.level,
      source: this.config.source ? `${this.config.source}:${source}` : source,
    });
  }

  error(message: string, context?: Record<string, unknown>): void;
  error(message: string, error: unknown, context?: Record<string, unknown>): void;
  error(
    message: string,
    errorOrContext?: unknown,
    context?: Record<string, unknown>
  ): void {
    if (errorOrContext instanceof Error || context !== undefined) {
      this.log(LogLevelEnum.ERROR, message, context, errorOrContext);
      return;
    }

    this.log(LogLevelEnum.ERROR, message, toContext(errorOrContext));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.WARN, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.INFO, message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.DEBUG, message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevelEnum.TRACE, message, context);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (!this.config.enabled || !shouldLog(level, this.level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date(),
      context,
      source: this.config.source,
      error: error === undefined ? undefined : formatError(error),
    };

    this.output(this.format(entry), level);
  }

  private format(entry: LogEntry): string {
    switch (this.config.format) {
      case LogFormat.JSON:
        return this.formatJson(entry);
      case LogFormat.COMPACT:
        return this.formatCompact(entry);
      case LogFormat.PRETTY:
        return this.config.colors ? this.formatPretty(entry) : this.formatText(entry);
      case LogFormat.TEXT:
      default:
        return this.formatText(entry);
    }
  }

  private formatText(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp.toISOString()}]`);
    }
    parts.push(LogLevelName[entry.level].padEnd(5));
    if (entry.source) {
      parts.push(`[${entry.source}]`);
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(JSON.stringify(entry.context));
    }
    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: LogLevelName[entry.level],
      message: entry.message,
      source: entry.source,
      context: entry.context,
      error: entry.error,
    });
  }

  /**
   * `HH:MM:SS L message`
   */
  private formatCompact(entry: LogEntry): string {
    const levelLetter = LogLevelName[entry.level].charAt(0);
    const time = entry.timestamp.toISOString().slice(11, 19);
    return `${time} ${levelLetter} ${entry.message}`;
  }

  private formatPretty(entry: LogEntry): string {
    const parts: string[] = [];
    const levelColor = LogLevelColors[entry.level];

    if (this.config.timestamps) {
      parts.push(`${LogColors.gray}[${entry.timestamp.toISOString()}]${LogColors.reset}`);
    }
    parts.push(`${levelColor}${LogLevelName[entry.level].padEnd(5)}${LogColors.reset}`);
    if (entry.source) {
      parts.push(`${LogColors.cyan}[${entry.source}]${LogColors.reset}`);
    }
    parts.push(entry.message);
    if (entry.context && Object.keys(entry.context).length > 0) {
      parts.push(`${LogColors.dim}${JSON.stringify(entry.context)}${LogColors.reset}`);
    }
    if (entry.error) {
      parts.push(
        `\n  ${LogColors.red}Error: ${entry.error.name}: ${entry.error.message}${LogColors.reset}`
      );
      if (entry.error.stack && this.level >= LogLevelEnum.DEBUG) {
        parts.push(
          `\n  ${LogColors.gray}${entry.error.stack.replace(/\n/g, '\n  ')}${LogColors.reset}`
        );
      }
    }

    return parts.join(' ');
  }

  private output(formatted: string, level: LogLevel): void {
    if (this.config.output) {
      this.config.output(formatted, level);
      return;
    }

    if (level === LogLevelEnum.ERROR) {
      console.error(formatted);
    } else if (level === LogLevelEnum.WARN) {
      console.warn(formatted);
    } else {
      console.log(formatted);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  getConfig(): Readonly<LoggerConfig> {
    return { ...this.config, level: this.level };
  }
}

function toContext(value: unknown): Record<string, unknown> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return { value };
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Create a logger with a specific source
 */
export function createLogger(
  source: string,
  config?: Partial<LoggerConfig>
): Logger {
  return new Logger({
    ...config,
    source,
  });
}

/**
 * Build the process-wide root logger from `LOG_LEVEL` / `LOG_FORMAT` style
 * settings. Unrecognised level names fall back to INFO.
 */
export function createRootLogger(options: {
  level: string;
  format?: LoggerConfig['format'];
  source?: string;
}): Logger {
  return createLogger(options.source ?? 'museum-guide', {
    level: parseLogLevel(options.level),
    format: options.format ?? LogFormat.PRETTY,
  });
}

/**
 * A logger that drops everything. Default for services constructed without one.
 */
export function createSilentLogger(): Logger {
  return new Logger({ enabled: false });
}
