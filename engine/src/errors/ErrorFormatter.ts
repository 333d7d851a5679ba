/**
 * Error Formatter
 *
 * Renders runner errors for terminal display.
 *
 * ```typescript
 * console.error(formatError(error));
 * console.error(formatError(error, false, true));
 * ```
 *
 * @module errors
 */

import chalk from 'chalk';
import { RunnerError } from './RunnerError.js';
import { ErrorSeverity } from './ErrorCodes.js';

function getSeverityIcon(severity: ErrorSeverity): string {
  switch (severity) {
    case ErrorSeverity.ERROR:
      return '✖';
    case ErrorSeverity.WARNING:
      return '⚠';
    case ErrorSeverity.INFO:
      return 'ℹ';
  }
}

function getSeverityColor(severity: ErrorSeverity): (text: string) => string {
  switch (severity) {
    case ErrorSeverity.ERROR:
      return chalk.red.bold;
    case ErrorSeverity.WARNING:
      return chalk.yellow.bold;
    case ErrorSeverity.INFO:
      return chalk.blue.bold;
  }
}

/**
 * Format an error for CLI display
 *
 * Plain `Error`s get a single line; runner errors add their code, hint and,
 * when `verbose`, their context.
 */
export function formatError(
  error: Error,
  useColors: boolean = true,
  verbose: boolean = false
): string {
  const paint = (fn: (text: string) => string, text: string): string =>
    useColors ? fn(text) : text;

  if (!(error instanceof RunnerError)) {
    const lines = [`${paint(chalk.red.bold, '✖ Error:')} ${error.message}`];
    if (verbose && error.stack) {
      lines.push(paint(chalk.gray, error.stack));
    }
    return lines.join('\n');
  }

  const lines: string[] = [];
  const header = `${getSeverityIcon(error.severity)} ${error.name}`;
  lines.push(`${paint(getSeverityColor(error.severity), header)} ${paint(chalk.gray, `[${error.code}]`)}`);
  lines.push(`  ${error.message}`);

  if (error.hint) {
    lines.push(`  ${paint(chalk.yellow, 'Hint:')} ${error.hint}`);
  }

  if (verbose) {
    for (const [key, value] of Object.entries(error.context)) {
      if (value === undefined) continue;
      const rendered = typeof value === 'string' ? value : JSON.stringify(value);
      lines.push(paint(chalk.dim, `  ${key}: ${rendered}`));
    }
    if (error.stack) {
      lines.push(paint(chalk.gray, error.stack));
    }
  }

  return lines.join('\n');
}
