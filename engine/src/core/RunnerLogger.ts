/**
 * Runner Logger
 *
 * Leveled diagnostics for the task runner. Lines go to stderr unless another
 * sink is given, so stdout stays reserved for status lines and formatter
 * output.
 *
 * @module core
 */

import {
  LogLevel,
  createLogEntry,
  formatLog,
  shouldLog,
  type LogFormat,
  type LogFormatOptions,
} from '../logging/LogLevel.js';
import type { LogLevelName } from './RunnerConfig.js';

/**
 * Receives each rendered log line
 */
export type LogSink = (line: string) => void;

export interface RunnerLoggerConfig {
  /** Entries below this level are dropped */
  level: LogLevel;
  /** @default 'text' */
  format?: LogFormat;
  /** @default true */
  colors?: boolean;
  /** @default false */
  timestamp?: boolean;
  /** Tag printed after the level; @default 'workrun' */
  source?: string;
  /** @default stderr */
  sink?: LogSink;
}

const writeToStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class RunnerLogger {
  private level: LogLevel;
  private readonly source: string;
  private readonly sink: LogSink;
  private readonly rendering: LogFormatOptions;

  constructor(config: RunnerLoggerConfig) {
    this.level = config.level;
    this.source = config.source ?? 'workrun';
    this.sink = config.sink ?? writeToStderr;
    this.rendering = {
      format: config.format ?? 'text',
      colors: config.colors ?? true,
      timestamp: config.timestamp ?? false,
      includeSource: true,
    };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, message, context, error);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  willLog(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  getFormat(): LogFormat {
    return this.rendering.format;
  }

  private write(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.willLog(level)) {
      return;
    }
    const entry = createLogEntry(level, message, { source: this.source, context, error });
    this.sink(formatLog(entry, this.rendering));
  }
}

const LEVELS: Record<Exclude<LogLevelName, 'silent'>, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Build the logger for a configured level name
 *
 * `verbose` forces debug level with the multi-line `pretty` layout;
 * `silent` drops everything.
 */
export function createRunnerLogger(
  logLevel: LogLevelName,
  options: { verbose?: boolean; colors?: boolean; sink?: LogSink } = {}
): RunnerLogger {
  if (logLevel === 'silent') {
    return new RunnerLogger({ level: LogLevel.FATAL, sink: () => undefined });
  }

  return new RunnerLogger({
    level: options.verbose ? LogLevel.DEBUG : LEVELS[logLevel],
    format: options.verbose ? 'pretty' : 'text',
    colors: options.colors,
    sink: options.sink,
  });
}
