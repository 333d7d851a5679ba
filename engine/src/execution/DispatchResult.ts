/**
 * Dispatch Result
 *
 * The per-task record the runner keeps. Results are recorded, never acted on,
 * unless stop-on-failure is enabled.
 *
 * @module execution
 */

import type { DispatchError } from '../errors/DispatchError.js';
import type { WorkerInvocation } from './WorkerLauncher.js';

export type DispatchStatus = 'success' | 'failure' | 'skipped';

/**
 * Why a task was not run
 */
export type SkipReason = 'dry-run' | 'halted';

export interface DispatchResult {
  taskId: string;
  status: DispatchStatus;

  /** Null when the worker never exited normally */
  exitCode: number | null;
  signal: string | null;

  durationMs: number;
  invocation: WorkerInvocation;

  /** Present on failure */
  error?: DispatchError;

  /** Present when skipped */
  skipReason?: SkipReason;
}

/**
 * Builder for dispatch results
 *
 * @example
 * ```ts
 * const result = new DispatchResultBuilder('matmul', invocation)
 *   .exited(0, null)
 *   .duration(1200)
 *   .build();
 * ```
 */
export class DispatchResultBuilder {
  private result: DispatchResult;

  constructor(taskId: string, invocation: WorkerInvocation) {
    this.result = {
      taskId,
      status: 'success',
      exitCode: null,
      signal: null,
      durationMs: 0,
      invocation,
    };
  }

  /**
   * Record how the process exited; a zero exit code is success
   */
  exited(exitCode: number | null, signal: string | null): this {
    this.result.exitCode = exitCode;
    this.result.signal = signal;
    this.result.status = exitCode === 0 ? 'success' : 'failure';
    return this;
  }

  failure(error: DispatchError): this {
    this.result.status = 'failure';
    this.result.error = error;
    return this;
  }

  skipped(reason: SkipReason): this {
    this.result.status = 'skipped';
    this.result.skipReason = reason;
    return this;
  }

  duration(ms: number): this {
    this.result.durationMs = ms;
    return this;
  }

  build(): DispatchResult {
    return { ...this.result };
  }
}
