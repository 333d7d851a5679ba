/**
 * workrun engine - workload discovery and sequential worker dispatch
 *
 * @example
 * ```ts
 * import { TaskRunner } from './engine/src/index.js';
 *
 * const runner = new TaskRunner({ workloadDir: 'workloads' });
 * const result = await runner.run();
 * ```
 */

export { TaskRunner } from './core/TaskRunner.js';
export type { TaskRunnerDependencies } from './core/TaskRunner.js';

export * from './core/RunnerConfig.js';
export * from './core/BatchResult.js';
export * from './core/RunnerLogger.js';

export * from './discovery/index.js';
export * from './execution/index.js';
export * from './events/index.js';
export * from './errors/index.js';
export * from './logging/LogLevel.js';
export * from './testing/index.js';
