/**
 * Logger that records JSON entries instead of printing them
 */

import { createLogger, LogLevel, type Logger } from '../../lib/src/logging/index.js';

export interface CapturedEntry {
  level: string;
  message: string;
  context?: Record<string, unknown>;
  error?: { name: string; message: string };
}

export function captureLogger(source = 'test'): { logger: Logger; entries: CapturedEntry[] } {
  const entries: CapturedEntry[] = [];
  const logger = createLogger(source, {
    level: LogLevel.TRACE,
    format: 'json',
    output: (line: string) => {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

export function messagesAt(entries: CapturedEntry[], level: string): string[] {
  return entries.filter((entry) => entry.level === level).map((entry) => entry.message);
}
