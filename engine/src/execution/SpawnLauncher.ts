/**
 * Spawn Launcher
 *
 * Starts the worker with `child_process.spawn` (no shell) and waits for it
 * to exit. stdin and stderr are always inherited; stdout follows the
 * configured output mode.
 *
 * @module execution
 */

import { spawn, type SpawnOptions, type StdioOptions } from 'node:child_process';
import type {
  LaunchOptions,
  LaunchOutcome,
  WorkerInvocation,
  WorkerLauncher,
  WorkerOutputMode,
} from './WorkerLauncher.js';

/** Grace period between SIGTERM and SIGKILL once a worker times out */
export const KILL_GRACE_MS = 5000;

function stdioFor(output: WorkerOutputMode): StdioOptions {
  switch (output) {
    case 'inherit':
      return 'inherit';
    case 'stderr':
      // fd 2 of the parent
      return ['inherit', 2, 'inherit'];
    case 'ignore':
      return ['inherit', 'ignore', 'inherit'];
  }
}

/**
 * The part of a ChildProcess the launcher relies on
 */
export interface WorkerProcess {
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  on(event: 'spawn', listener: () => void): this;
}

export type SpawnFunction = (
  command: string,
  args: string[],
  options: SpawnOptions
) => WorkerProcess;

export class SpawnLauncher implements WorkerLauncher {
  readonly name = 'spawn';
  private readonly spawnProcess: SpawnFunction;

  constructor(spawnProcess: SpawnFunction = spawn) {
    this.spawnProcess = spawnProcess;
  }

  launch(invocation: WorkerInvocation, options: LaunchOptions): Promise<LaunchOutcome> {
    return new Promise((resolve, reject) => {
      let settled = false;
      let spawned = false;
      let timedOut = false;
      let processError: Error | undefined;

      const child = this.spawnProcess(invocation.command, invocation.args, {
        cwd: options.cwd,
        env: options.env,
        stdio: stdioFor(options.output),
        windowsHide: true,
      });

      let timeoutHandle: NodeJS.Timeout | undefined;
      let killHandle: NodeJS.Timeout | undefined;
      if (options.timeoutMs !== undefined) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');

          killHandle = setTimeout(() => {
            if (child.exitCode === null && child.signalCode === null) {
              child.kill('SIGKILL');
            }
          }, KILL_GRACE_MS);
        }, options.timeoutMs);
      }

      const clearTimers = (): void => {
        if (timeoutHandle) clearTimeout(timeoutHandle);
        if (killHandle) clearTimeout(killHandle);
      };

      child.on('exit', (code, signal) => {
        if (settled) return;
        settled = true;
        clearTimers();
        resolve({ exitCode: code, signal, timedOut, error: processError });
      });

      child.on('spawn', () => {
        spawned = true;
      });

      // once running, only 'exit' ends the launch
      child.on('error', (error) => {
        if (settled) return;
        if (spawned) {
          processError = error;
          return;
        }
        settled = true;
        clearTimers();
        reject(error);
      });
    });
  }
}
