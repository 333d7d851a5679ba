/**
 * Base Runner Error
 *
 * Every error the runner raises or records carries a structured code, a
 * severity, a hint and optional debugging context.
 *
 * @module errors
 */

import {
  RunnerErrorCode,
  ErrorSeverity,
  ExitCodes,
  getErrorCategory,
  getErrorDescription,
  getExitCodeForError,
  getSuggestedAction,
} from './ErrorCodes.js';

export interface RunnerErrorDiagnostic {
  /** e.g. WR-D-001 */
  code: RunnerErrorCode;
  message: string;
  severity: ErrorSeverity;

  /** Derived from the code when omitted */
  exitCode?: ExitCodes;

  /** Directory, task id or config key the error is about */
  path?: string;

  /** Derived from the code when omitted */
  hint?: string;

  context?: Record<string, unknown>;
}

/**
 * @example
 * ```ts
 * throw new RunnerError({
 *   code: RunnerErrorCode.RUNTIME_INTERNAL_ERROR,
 *   message: 'Launcher returned no outcome',
 *   severity: ErrorSeverity.ERROR,
 * });
 * ```
 */
export class RunnerError extends Error {
  readonly code: RunnerErrorCode;
  readonly severity: ErrorSeverity;
  readonly exitCode: ExitCodes;
  readonly path: string | undefined;
  readonly hint: string;
  readonly context: Record<string, unknown>;
  readonly timestamp: Date;

  constructor(diagnostic: RunnerErrorDiagnostic, options?: { cause?: unknown }) {
    super(diagnostic.message, options);
    this.name = getErrorCategory(diagnostic.code);
    this.code = diagnostic.code;
    this.severity = diagnostic.severity;
    this.exitCode = diagnostic.exitCode ?? getExitCodeForError(diagnostic.code);
    this.path = diagnostic.path;
    this.hint = diagnostic.hint ?? getSuggestedAction(diagnostic.code);
    this.context = diagnostic.context ?? {};
    this.timestamp = new Date();

    Error.captureStackTrace?.(this, new.target);
  }

  get description(): string {
    return getErrorDescription(this.code);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      description: this.description,
      severity: this.severity,
      exitCode: this.exitCode,
      path: this.path,
      hint: this.hint,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * Wrap any thrown value as an internal RunnerError; RunnerErrors pass through
 */
export function toRunnerError(error: unknown): RunnerError {
  if (error instanceof RunnerError) {
    return error;
  }
  return new RunnerError(
    {
      code: RunnerErrorCode.RUNTIME_INTERNAL_ERROR,
      message: error instanceof Error ? error.message : String(error),
      severity: ErrorSeverity.ERROR,
    },
    { cause: error }
  );
}
