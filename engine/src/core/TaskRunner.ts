/**
 * Task Runner
 *
 * Discovers workload definitions and dispatches each one, strictly in
 * sequence, to the external worker. A worker's outcome is recorded on the
 * batch result but never stops the batch unless stopOnFailure is set.
 *
 * @example
 * ```ts
 * const runner = new TaskRunner({ workloadDir: 'workloads', deviceSelector: 'GPU' });
 *
 * runner.getEventBus().on(RunnerEventType.TASK_STARTED, (event) => {
 *   if (event.type === RunnerEventType.TASK_STARTED) {
 *     console.log(`running task: ${event.payload.taskId}`);
 *   }
 * });
 *
 * const result = await runner.run();
 * ```
 *
 * @module core
 */

import { randomUUID } from 'node:crypto';
import { discoverWorkloads, type DiscoveryResult } from '../discovery/WorkloadDiscovery.js';
import { DispatchError } from '../errors/DispatchError.js';
import { EventBus } from '../events/EventBus.js';
import { RunnerEventType } from '../events/RunnerEvents.js';
import { DispatchResultBuilder, type DispatchResult } from '../execution/DispatchResult.js';
import { SpawnLauncher } from '../execution/SpawnLauncher.js';
import {
  buildWorkerInvocation,
  formatInvocation,
  toWorkerCommand,
  type DispatchRequest,
  type LaunchOptions,
  type WorkerCommand,
  type WorkerLauncher,
} from '../execution/WorkerLauncher.js';
import { summarize, type BatchResult, type BatchStatus } from './BatchResult.js';
import {
  applyConfigDefaults,
  validateConfig,
  type ResolvedRunnerConfig,
  type RunnerConfig,
} from './RunnerConfig.js';
import { createRunnerLogger, type RunnerLogger } from './RunnerLogger.js';

/**
 * Collaborators a runner can be given instead of the defaults
 */
export interface TaskRunnerDependencies {
  /** @default SpawnLauncher */
  launcher?: WorkerLauncher;

  /** @default a stderr logger at the configured level */
  logger?: RunnerLogger;

  /** @default a fresh EventBus */
  eventBus?: EventBus;
}

export class TaskRunner {
  private readonly config: ResolvedRunnerConfig;
  private readonly worker: WorkerCommand;
  private readonly launcher: WorkerLauncher;
  private readonly logger: RunnerLogger;
  private readonly eventBus: EventBus;

  /**
   * @throws {ConfigError} when the configuration is invalid
   */
  constructor(config: RunnerConfig = {}, deps: TaskRunnerDependencies = {}) {
    this.config = applyConfigDefaults(validateConfig(config));
    this.worker = toWorkerCommand(this.config.worker);
    this.launcher = deps.launcher ?? new SpawnLauncher();
    this.logger = deps.logger ?? createRunnerLogger(this.config.logLevel);
    this.eventBus =
      deps.eventBus ??
      new EventBus({
        onHandlerError: (eventType, error) => {
          this.logger.error(
            `Event handler failed for ${eventType}`,
            error instanceof Error ? error : new Error(String(error))
          );
        },
      });
  }

  getEventBus(): EventBus {
    return this.eventBus;
  }

  getConfig(): Readonly<ResolvedRunnerConfig> {
    return this.config;
  }

  /**
   * List the workloads a run would dispatch, without dispatching
   */
  async discover(): Promise<DiscoveryResult> {
    const discovery = await discoverWorkloads({
      directory: this.config.workloadDir,
      extension: this.config.extension,
      sort: this.config.sort,
    });

    if (discovery.error) {
      this.logger.warn(discovery.error.message, { code: discovery.error.code });
    } else {
      this.logger.debug('Discovered workloads', {
        directory: discovery.directory,
        count: discovery.workloads.length,
        ignored: discovery.ignored.length,
      });
    }

    return discovery;
  }

  /**
   * Run every discovered workload once, in order
   *
   * Resolves with the batch result; worker failures do not reject.
   */
  async run(): Promise<BatchResult> {
    const runId = randomUUID();
    const startTime = Date.now();
    const stamp = () => ({ timestamp: Date.now(), runId });

    const discovery = await this.discover();
    if (discovery.error) {
      await this.eventBus.emit({
        ...stamp(),
        type: RunnerEventType.DISCOVERY_WARNING,
        payload: { directory: discovery.directory, error: discovery.error },
      });
    }

    const requests: DispatchRequest[] = discovery.workloads.map((workload, index) => ({
      taskId: workload.taskId,
      deviceSelector: this.config.deviceSelector,
      workload,
      index,
    }));

    await this.eventBus.emit({
      ...stamp(),
      type: RunnerEventType.BATCH_STARTED,
      payload: {
        directory: discovery.directory,
        totalTasks: requests.length,
        dryRun: this.config.dryRun,
      },
    });

    const results: DispatchResult[] = [];
    let status: BatchStatus = 'completed';

    for (const request of requests) {
      const invocation = buildWorkerInvocation(this.worker, request);

      if (status === 'halted' || this.config.dryRun) {
        const reason = status === 'halted' ? 'halted' : 'dry-run';
        results.push(new DispatchResultBuilder(request.taskId, invocation).skipped(reason).build());
        await this.eventBus.emit({
          ...stamp(),
          type: RunnerEventType.TASK_SKIPPED,
          payload: { taskId: request.taskId, index: request.index, reason, invocation },
        });
        continue;
      }

      await this.eventBus.emit({
        ...stamp(),
        type: RunnerEventType.TASK_STARTED,
        payload: {
          taskId: request.taskId,
          index: request.index,
          total: requests.length,
          invocation,
        },
      });

      const result = await this.dispatch(request);
      results.push(result);

      if (result.error) {
        await this.eventBus.emit({
          ...stamp(),
          type: RunnerEventType.TASK_FAILED,
          payload: { taskId: request.taskId, index: request.index, result, error: result.error },
        });

        if (this.config.stopOnFailure) {
          status = 'halted';
          const remaining = requests.length - request.index - 1;
          this.logger.warn(`Stopping batch after failed task ${request.taskId}`, { remaining });
          await this.eventBus.emit({
            ...stamp(),
            type: RunnerEventType.BATCH_HALTED,
            payload: { failedTaskId: request.taskId, remaining },
          });
        }
      } else {
        await this.eventBus.emit({
          ...stamp(),
          type: RunnerEventType.TASK_COMPLETED,
          payload: { taskId: request.taskId, index: request.index, result },
        });
      }
    }

    const summary = summarize(results);
    const durationMs = Date.now() - startTime;

    await this.eventBus.emit({
      ...stamp(),
      type: RunnerEventType.BATCH_COMPLETED,
      payload: { status, summary, durationMs },
    });

    return {
      runId,
      status,
      directory: discovery.directory,
      dryRun: this.config.dryRun,
      results,
      discoveryError: discovery.error,
      durationMs,
      summary,
    };
  }

  /**
   * Launch the worker for one request and record how it ended
   */
  async dispatch(request: DispatchRequest): Promise<DispatchResult> {
    const invocation = buildWorkerInvocation(this.worker, request);
    const builder = new DispatchResultBuilder(request.taskId, invocation);
    const options: LaunchOptions = {
      cwd: this.config.workingDirectory,
      env: this.workerEnv(),
      timeoutMs: this.config.timeoutMs,
      output: this.config.workerOutput,
    };

    this.logger.debug(`Dispatching ${request.taskId}`, {
      launcher: this.launcher.name,
      command: formatInvocation(invocation),
    });

    const startTime = Date.now();
    try {
      const outcome = await this.launcher.launch(invocation, options);
      builder.exited(outcome.exitCode, outcome.signal);

      if (outcome.error) {
        this.logger.warn(`Worker for task ${request.taskId} reported an error`, {
          error: outcome.error.message,
        });
      }

      if (outcome.timedOut && this.config.timeoutMs !== undefined) {
        builder.failure(DispatchError.timedOut(request.taskId, this.config.timeoutMs));
      } else if (outcome.signal !== null) {
        builder.failure(DispatchError.signalled(request.taskId, outcome.signal));
      } else if (outcome.exitCode !== 0) {
        builder.failure(DispatchError.nonZeroExit(request.taskId, outcome.exitCode ?? -1));
      }
    } catch (error) {
      builder.failure(DispatchError.spawnFailed(request.taskId, invocation.command, error));
    }

    const result = builder.duration(Date.now() - startTime).build();

    if (result.error) {
      this.logger.warn(result.error.message, { code: result.error.code });
    } else {
      this.logger.debug(`Task ${request.taskId} completed`, { durationMs: result.durationMs });
    }

    return result;
  }

  private workerEnv(): Record<string, string> {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(process.env)) {
      if (value !== undefined) {
        env[key] = value;
      }
    }
    return { ...env, ...this.config.env };
  }
}
