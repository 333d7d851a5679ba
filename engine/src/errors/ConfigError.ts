/**
 * Configuration Error
 *
 * Raised when runner options, flags or environment overrides fail validation.
 *
 * @module errors
 */

import { RunnerError } from './RunnerError.js';
import { RunnerErrorCode, ErrorSeverity } from './ErrorCodes.js';

/**
 * One failed check, addressed by its config key
 */
export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends RunnerError {
  public readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[], hint?: string) {
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    super({
      code: RunnerErrorCode.CONFIG_INVALID,
      message: `Invalid configuration: ${summary}`,
      severity: ErrorSeverity.ERROR,
      path: issues[0]?.path,
      hint,
      context: { issues },
    });
    this.issues = issues;
  }

  static single(path: string, message: string, hint?: string): ConfigError {
    return new ConfigError([{ path, message }], hint);
  }
}
