/**
 * Log primitives
 *
 * Levels, severities, entries and formatting shared by the runner logger
 * and the CLI.
 *
 * @module logging
 */

import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
  FATAL = 'fatal',
}

/**
 * Numeric severity per level, used for threshold comparison
 */
export const LogLevelSeverity: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  [LogLevel.FATAL]: 4,
};

/**
 * Output format for a log entry
 */
export type LogFormat = 'text' | 'pretty' | 'json';

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  source?: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

export interface LogFormatOptions {
  format: LogFormat;
  colors: boolean;
  timestamp: boolean;
  includeSource: boolean;
}

const LEVEL_LABELS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.FATAL]: 'FATAL',
};

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.INFO]: chalk.blue,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.FATAL]: chalk.red.bold,
};

/**
 * Check whether `level` passes the `minLevel` threshold
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LogLevelSeverity[level] >= LogLevelSeverity[minLevel];
}

/**
 * Build a log entry stamped with the current time
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  options: { source?: string; context?: Record<string, unknown>; error?: Error } = {}
): LogEntry {
  const entry: LogEntry = {
    timestamp: new Date(),
    level,
    message,
  };

  if (options.source) {
    entry.source = options.source;
  }
  if (options.context && Object.keys(options.context).length > 0) {
    entry.context = options.context;
  }
  if (options.error) {
    entry.error = {
      name: options.error.name,
      message: options.error.message,
      stack: options.error.stack,
    };
  }

  return entry;
}

/**
 * Render a log entry as a single string
 *
 * `text` is one line with the context appended as JSON; `pretty` puts the
 * context and error on indented lines below the message; `json` ignores the
 * color and timestamp options and always includes every field.
 */
export function formatLog(entry: LogEntry, options: LogFormatOptions): string {
  if (options.format === 'json') {
    return JSON.stringify({
      ...entry,
      timestamp: entry.timestamp.toISOString(),
    });
  }

  const paint = (fn: (text: string) => string, text: string): string =>
    options.colors ? fn(text) : text;

  const parts: string[] = [];
  if (options.timestamp) {
    parts.push(paint(chalk.dim, entry.timestamp.toISOString()));
  }
  parts.push(paint(LEVEL_COLORS[entry.level], LEVEL_LABELS[entry.level]));
  if (options.includeSource && entry.source) {
    parts.push(paint(chalk.cyan, `[${entry.source}]`));
  }
  parts.push(entry.message);

  if (options.format === 'text') {
    if (entry.context) {
      parts.push(paint(chalk.dim, JSON.stringify(entry.context)));
    }
    if (entry.error) {
      parts.push(paint(chalk.red, `(${entry.error.name}: ${entry.error.message})`));
    }
    return parts.join(' ');
  }

  const lines = [parts.join(' ')];
  if (entry.context) {
    for (const [key, value] of Object.entries(entry.context)) {
      const rendered = typeof value === 'string' ? value : JSON.stringify(value);
      lines.push(paint(chalk.dim, `    ${key}: ${rendered}`));
    }
  }
  if (entry.error) {
    lines.push(paint(chalk.red, `    ${entry.error.name}: ${entry.error.message}`));
  }
  return lines.join('\n');
}
