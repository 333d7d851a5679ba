/**
 * Mock Launcher
 *
 * In-process stand-in for the worker. Records every invocation and answers
 * with configured outcomes, so runs can be tested without spawning anything.
 *
 * @module testing
 */

import type {
  LaunchOptions,
  LaunchOutcome,
  WorkerInvocation,
  WorkerLauncher,
} from '../execution/WorkerLauncher.js';
import { TASK_FLAG } from '../execution/WorkerLauncher.js';

export interface MockLaunchCall {
  invocation: WorkerInvocation;
  options: LaunchOptions;
  /** Value following --task, if present */
  taskId: string | undefined;
}

export interface MockLauncherConfig {
  /** Outcome for tasks without a specific entry; defaults to exit code 0 */
  defaultOutcome?: Partial<LaunchOutcome>;

  /** Outcome per task identifier */
  outcomes?: Record<string, Partial<LaunchOutcome>>;

  /** Reject launches of these tasks as if the program could not be started */
  spawnErrors?: Record<string, Error>;

  /** Called on every launch, before the outcome is returned */
  onLaunch?: (call: MockLaunchCall) => void | Promise<void>;
}

export class MockLauncher implements WorkerLauncher {
  readonly name = 'mock';
  private readonly config: MockLauncherConfig;
  private readonly calls: MockLaunchCall[] = [];

  constructor(config: MockLauncherConfig = {}) {
    this.config = config;
  }

  async launch(invocation: WorkerInvocation, options: LaunchOptions): Promise<LaunchOutcome> {
    const flagIndex = invocation.args.indexOf(TASK_FLAG);
    const taskId = flagIndex === -1 ? undefined : invocation.args[flagIndex + 1];
    const call: MockLaunchCall = { invocation, options, taskId };
    this.calls.push(call);

    if (this.config.onLaunch) {
      await this.config.onLaunch(call);
    }

    const spawnError = taskId === undefined ? undefined : this.config.spawnErrors?.[taskId];
    if (spawnError) {
      throw spawnError;
    }

    const outcome = {
      ...this.config.defaultOutcome,
      ...(taskId === undefined ? undefined : this.config.outcomes?.[taskId]),
    };

    return {
      exitCode: outcome.exitCode === undefined ? 0 : outcome.exitCode,
      signal: outcome.signal ?? null,
      timedOut: outcome.timedOut ?? false,
      error: outcome.error,
    };
  }

  getCalls(): readonly MockLaunchCall[] {
    return this.calls;
  }

  getCallCount(): number {
    return this.calls.length;
  }

  /** Task identifiers in launch order */
  getTaskIds(): Array<string | undefined> {
    return this.calls.map((call) => call.taskId);
  }
}
