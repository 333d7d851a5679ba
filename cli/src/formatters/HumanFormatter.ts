/**
 * Human-Readable Formatter
 *
 * Default output: one `running task: <id>` line per dispatched task, nothing
 * else on success. --verbose adds the worker command line, per-task outcome
 * and a closing summary.
 *
 * Symbols:
 * - ✔ Success
 * - ✖ Failure
 * - ⊘ Skipped
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';
import {
  RunnerEventType,
  formatError,
  formatInvocation,
  type BatchResult,
  type DiscoveryResult,
  type RunnerEvent,
  type TaskCompletedEvent,
  type TaskFailedEvent,
  type TaskSkippedEvent,
  type TaskStartedEvent,
} from '../../../engine/src/index.js';
import type { Formatter, FormatterOptions } from './Formatter.js';
import { divider, formatDuration, plural } from '../utils/format.js';

export const STATUS_PREFIX = 'running task: ';

export class HumanFormatter implements Formatter {
  private options: FormatterOptions;
  private c: ChalkInstance;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
    this.c = options.noColor ? new Chalk({ level: 0 }) : chalk;
  }

  onEvent(event: RunnerEvent): void {
    if (this.options.silent) {
      return;
    }

    switch (event.type) {
      case RunnerEventType.TASK_STARTED:
        this.onTaskStarted(event);
        break;
      case RunnerEventType.TASK_COMPLETED:
        this.onTaskCompleted(event);
        break;
      case RunnerEventType.TASK_FAILED:
        this.onTaskFailed(event);
        break;
      case RunnerEventType.TASK_SKIPPED:
        this.onTaskSkipped(event);
        break;
      // discovery warnings and halts are reported by the runner's logger
      default:
        break;
    }
  }

  showResult(result: BatchResult): void {
    if (this.options.silent || !this.options.verbose) {
      return;
    }

    const { summary } = result;
    console.log();
    console.log(this.c.cyan(divider(60, '═')));
    if (result.dryRun) {
      console.log(this.c.bold(`Dry run: ${plural(summary.total, 'task')} planned`));
    } else if (result.status === 'halted') {
      console.log(this.c.yellow.bold('⚠ Batch stopped after a failed task'));
    } else {
      console.log(this.c.bold(`Batch finished: ${plural(summary.total, 'task')}`));
    }
    console.log(this.c.cyan(divider(60, '═')));
    console.log(`  Succeeded: ${this.c.green(String(summary.succeeded))}`);
    console.log(`  Failed:    ${this.c.red(String(summary.failed))}`);
    console.log(`  Skipped:   ${this.c.dim(String(summary.skipped))}`);
    console.log(`  Duration:  ${formatDuration(result.durationMs)}`);
  }

  showWorkloads(discovery: DiscoveryResult): void {
    for (const workload of discovery.workloads) {
      if (this.options.verbose) {
        console.log(`${workload.taskId}  ${this.c.dim(workload.fileName)}`);
      } else {
        console.log(workload.taskId);
      }
    }

    if (this.options.verbose && !this.options.silent) {
      console.log(
        this.c.dim(`${plural(discovery.workloads.length, 'workload')} in ${discovery.directory}`)
      );
      if (discovery.ignored.length > 0) {
        console.log(this.c.dim(`ignored: ${discovery.ignored.join(', ')}`));
      }
    }
  }

  showError(error: Error): void {
    console.error(formatError(error, !this.options.noColor, this.options.verbose));
  }

  // ==================== Event Handlers ====================

  private onTaskStarted(event: TaskStartedEvent): void {
    console.log(`${STATUS_PREFIX}${event.payload.taskId}`);

    if (this.options.verbose) {
      console.log(this.c.dim(`  $ ${formatInvocation(event.payload.invocation)}`));
    }
  }

  private onTaskCompleted(event: TaskCompletedEvent): void {
    if (!this.options.verbose) {
      return;
    }
    const duration = formatDuration(event.payload.result.durationMs);
    console.log(this.c.green('  ✔'), this.c.dim(`completed in ${duration}`));
  }

  private onTaskFailed(event: TaskFailedEvent): void {
    if (!this.options.verbose) {
      return;
    }
    const { error, result } = event.payload;
    console.log(this.c.red('  ✖'), this.c.red(`failed in ${formatDuration(result.durationMs)}`));
    console.log(this.c.red('    Error:'), error.message, this.c.gray(`[${error.code}]`));
  }

  private onTaskSkipped(event: TaskSkippedEvent): void {
    const { reason, taskId, invocation } = event.payload;
    if (reason === 'dry-run') {
      console.log(`[dry-run] ${formatInvocation(invocation)}`);
      return;
    }
    if (this.options.verbose) {
      console.log(this.c.gray(`  ⊘ skipped ${taskId}`));
    }
  }
}
