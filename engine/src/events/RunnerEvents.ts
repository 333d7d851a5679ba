/**
 * Runner Events
 *
 * Lifecycle events emitted while a batch runs. The CLI formatters are built
 * entirely on these; nothing in the engine writes to stdout.
 *
 * Order within one batch:
 *   discovery.warning?  batch.started  (task.started  task.completed|task.failed | task.skipped)*  batch.halted?  batch.completed
 */

import type { BatchStatus, BatchSummary } from '../core/BatchResult.js';
import type { DiscoveryError } from '../errors/DiscoveryError.js';
import type { DispatchError } from '../errors/DispatchError.js';
import type { DispatchResult, SkipReason } from '../execution/DispatchResult.js';
import type { WorkerInvocation } from '../execution/WorkerLauncher.js';

export enum RunnerEventType {
  BATCH_STARTED = 'batch.started',
  BATCH_COMPLETED = 'batch.completed',
  BATCH_HALTED = 'batch.halted',
  DISCOVERY_WARNING = 'discovery.warning',
  TASK_STARTED = 'task.started',
  TASK_COMPLETED = 'task.completed',
  TASK_FAILED = 'task.failed',
  TASK_SKIPPED = 'task.skipped',
}

/**
 * Fields shared by every event
 */
export interface BaseRunnerEvent {
  type: RunnerEventType;

  /** Unix timestamp in milliseconds */
  timestamp: number;

  /** Identifies the batch run */
  runId: string;
}

export interface BatchStartedEvent extends BaseRunnerEvent {
  type: RunnerEventType.BATCH_STARTED;
  payload: {
    directory: string;
    totalTasks: number;
    dryRun: boolean;
  };
}

export interface BatchCompletedEvent extends BaseRunnerEvent {
  type: RunnerEventType.BATCH_COMPLETED;
  payload: {
    status: BatchStatus;
    summary: BatchSummary;
    durationMs: number;
  };
}

export interface BatchHaltedEvent extends BaseRunnerEvent {
  type: RunnerEventType.BATCH_HALTED;
  payload: {
    failedTaskId: string;
    /** Tasks that will not run */
    remaining: number;
  };
}

export interface DiscoveryWarningEvent extends BaseRunnerEvent {
  type: RunnerEventType.DISCOVERY_WARNING;
  payload: {
    directory: string;
    error: DiscoveryError;
  };
}

export interface TaskStartedEvent extends BaseRunnerEvent {
  type: RunnerEventType.TASK_STARTED;
  payload: {
    taskId: string;
    index: number;
    total: number;
    invocation: WorkerInvocation;
  };
}

export interface TaskCompletedEvent extends BaseRunnerEvent {
  type: RunnerEventType.TASK_COMPLETED;
  payload: {
    taskId: string;
    index: number;
    result: DispatchResult;
  };
}

export interface TaskFailedEvent extends BaseRunnerEvent {
  type: RunnerEventType.TASK_FAILED;
  payload: {
    taskId: string;
    index: number;
    result: DispatchResult;
    error: DispatchError;
  };
}

export interface TaskSkippedEvent extends BaseRunnerEvent {
  type: RunnerEventType.TASK_SKIPPED;
  payload: {
    taskId: string;
    index: number;
    reason: SkipReason;
    invocation: WorkerInvocation;
  };
}

export type RunnerEvent =
  | BatchStartedEvent
  | BatchCompletedEvent
  | BatchHaltedEvent
  | DiscoveryWarningEvent
  | TaskStartedEvent
  | TaskCompletedEvent
  | TaskFailedEvent
  | TaskSkippedEvent;
