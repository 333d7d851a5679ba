/**
 * Worker Launcher
 *
 * The boundary between the runner and the external worker. The runner
 * decides WHAT to run (a dispatch request); a launcher decides HOW a
 * process is started and awaited.
 *
 * @module execution
 */

import type { WorkloadDefinition } from '../discovery/WorkloadDiscovery.js';

/** Flag that carries the task identifier to the worker */
export const TASK_FLAG = '--task';

/** Flag that carries the device selector to the worker */
export const DEVICE_FLAG = '--hardware_type';

/**
 * Worker entrypoint: the program and its leading arguments
 */
export interface WorkerCommand {
  command: string;
  args: string[];
}

/**
 * One unit of work handed to the worker
 */
export interface DispatchRequest {
  taskId: string;
  deviceSelector: string;
  workload: WorkloadDefinition;

  /** Zero-based position in the batch */
  index: number;
}

/**
 * Fully resolved command line for a single dispatch
 */
export interface WorkerInvocation {
  command: string;
  args: string[];
}

/**
 * Where the worker's stdout goes
 *
 * - inherit: the runner's stdout
 * - stderr: the runner's stderr (keeps stdout machine-readable)
 * - ignore: discarded
 */
export type WorkerOutputMode = 'inherit' | 'stderr' | 'ignore';

export interface LaunchOptions {
  cwd: string;
  env: Record<string, string>;

  /** Kill the worker after this many milliseconds */
  timeoutMs?: number;

  output: WorkerOutputMode;
}

/**
 * How a launched process ended
 */
export interface LaunchOutcome {
  /** Exit code, or null when the process was killed by a signal */
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;

  /** Raised by the running process, e.g. a kill() that failed */
  error?: Error;
}

export interface WorkerLauncher {
  /** Launcher name, for logs */
  readonly name: string;

  /**
   * Start the worker and resolve once it has exited
   *
   * Rejects only when the process cannot be started at all; once started,
   * it resolves only after the process has exited.
   */
  launch(invocation: WorkerInvocation, options: LaunchOptions): Promise<LaunchOutcome>;
}

/**
 * Split a worker command line (`['python3', 'launch.py']`) into program and args
 */
export function toWorkerCommand(worker: readonly string[]): WorkerCommand {
  const [command, ...args] = worker;
  if (command === undefined || command.length === 0) {
    throw new Error('Worker command must not be empty');
  }
  return { command, args };
}

/**
 * Build the command line for one dispatch
 *
 * Only the task identifier and the device selector are appended.
 *
 * @example
 * ```ts
 * buildWorkerInvocation({ command: 'python3', args: ['launch.py'] }, request);
 * // { command: 'python3', args: ['launch.py', '--task', 'matmul', '--hardware_type', 'GPU'] }
 * ```
 */
export function buildWorkerInvocation(
  worker: WorkerCommand,
  request: Pick<DispatchRequest, 'taskId' | 'deviceSelector'>
): WorkerInvocation {
  return {
    command: worker.command,
    args: [...worker.args, TASK_FLAG, request.taskId, DEVICE_FLAG, request.deviceSelector],
  };
}

/**
 * Render an invocation as a single display string
 */
export function formatInvocation(invocation: WorkerInvocation): string {
  return [invocation.command, ...invocation.args].join(' ');
}
