/**
 * Dispatch Error
 *
 * Records why a single worker invocation did not succeed. The runner stores
 * these on the task's result and carries on with the batch.
 *
 * @module errors
 */

import { RunnerError } from './RunnerError.js';
import { RunnerErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class DispatchError extends RunnerError {
  public readonly taskId: string;

  constructor(params: {
    code: RunnerErrorCode;
    message: string;
    taskId: string;
    context?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(
      {
        code: params.code,
        message: params.message,
        severity: ErrorSeverity.ERROR,
        path: params.taskId,
        context: {
          taskId: params.taskId,
          ...params.context,
        },
      },
      { cause: params.cause }
    );
    this.taskId = params.taskId;
  }

  static spawnFailed(taskId: string, command: string, cause: unknown): DispatchError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new DispatchError({
      code: RunnerErrorCode.DISPATCH_SPAWN_FAILED,
      message: `Failed to start worker '${command}' for task ${taskId}: ${reason}`,
      taskId,
      context: { command },
      cause,
    });
  }

  static nonZeroExit(taskId: string, exitCode: number): DispatchError {
    return new DispatchError({
      code: RunnerErrorCode.DISPATCH_NONZERO_EXIT,
      message: `Worker for task ${taskId} exited with code ${exitCode}`,
      taskId,
      context: { exitCode },
    });
  }

  static signalled(taskId: string, signal: string): DispatchError {
    return new DispatchError({
      code: RunnerErrorCode.DISPATCH_SIGNALLED,
      message: `Worker for task ${taskId} was terminated by ${signal}`,
      taskId,
      context: { signal },
    });
  }

  static timedOut(taskId: string, timeoutMs: number): DispatchError {
    return new DispatchError({
      code: RunnerErrorCode.DISPATCH_TIMEOUT,
      message: `Worker for task ${taskId} timed out after ${timeoutMs}ms`,
      taskId,
      context: { timeoutMs },
    });
  }
}
