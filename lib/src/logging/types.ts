/**
 * Logging Types and Schemas
 *
 * Levels, formats and logger settings for the museum guide services.
 */

import { z } from 'zod';

// =============================================================================
// Levels
// =============================================================================

/**
 * Severity, lower is more urgent. A logger at level N writes entries <= N.
 */
export const LogLevel = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
  TRACE: 4,
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_NAMES = ['ERROR', 'WARN', 'INFO', 'DEBUG', 'TRACE'] as const;

export type LogLevelName = (typeof LEVEL_NAMES)[number];

export const LogLevelName: Record<LogLevel, LogLevelName> = {
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.TRACE]: 'TRACE',
};

export const LogLevelSchema = z.union([
  z.literal(LogLevel.ERROR),
  z.literal(LogLevel.WARN),
  z.literal(LogLevel.INFO),
  z.literal(LogLevel.DEBUG),
  z.literal(LogLevel.TRACE),
]);

/**
 * `LOG_LEVEL` values: case-insensitive, surrounding blanks ignored
 */
export const LogLevelNameSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.enum(LEVEL_NAMES));

/**
 * Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  const parsed = LogLevelNameSchema.safeParse(level);
  return parsed.success ? LogLevel[parsed.data] : LogLevel.INFO;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return level <= minLevel;
}

// =============================================================================
// Configuration
// =============================================================================

export const LogFormat = {
  TEXT: 'text',
  JSON: 'json',
  /** `HH:MM:SS L message` */
  COMPACT: 'compact',
  /** ANSI-coloured text for terminals */
  PRETTY: 'pretty',
} as const;

export type LogFormat = (typeof LogFormat)[keyof typeof LogFormat];

export const LogFormatSchema = z.enum(['text', 'json', 'compact', 'pretty']);

export const LoggerConfigSchema = z.object({
  level: LogLevelSchema.default(LogLevel.INFO),
  format: LogFormatSchema.default('text'),
  timestamps: z.boolean().default(true),
  /** Only read by the pretty format */
  colors: z.boolean().default(true),
  /** Component tag, nested with `:` by `child()` */
  source: z.string().optional(),
  /** False for the silent logger services fall back to */
  enabled: z.boolean().default(true),
  /** Replaces console output; receives each formatted line */
  output: z.function().args(z.string(), LogLevelSchema).returns(z.void()).optional(),
});

export type LoggerConfig = z.infer<typeof LoggerConfigSchema>;

export function createDefaultLoggerConfig(overrides?: Partial<LoggerConfig>): LoggerConfig {
  return LoggerConfigSchema.parse(overrides ?? {});
}

// =============================================================================
// Entries
// =============================================================================

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: Date;
  context?: Record<string, unknown> | undefined;
  source?: string | undefined;
  error?: { name: string; message: string; stack?: string | undefined } | undefined;
}

export function formatError(error: unknown): NonNullable<LogEntry['error']> {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return { name: 'UnknownError', message: String(error) };
}

// =============================================================================
// Colours
// =============================================================================

export const LogColors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

export const LogLevelColors: Record<LogLevel, string> = {
  [LogLevel.ERROR]: LogColors.red,
  [LogLevel.WARN]: LogColors.yellow,
  [LogLevel.INFO]: LogColors.blue,
  [LogLevel.DEBUG]: LogColors.cyan,
  [LogLevel.TRACE]: LogColors.gray,
};
