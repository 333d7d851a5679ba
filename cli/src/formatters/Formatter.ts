/**
 * Base Formatter Interface
 *
 * Formatters are the only place the CLI writes to the console.
 *
 * - Formatter: decides WHAT to display and WHEN (observer of runner events)
 * - RunnerLogger: diagnostics, on stderr
 * - Console: where output goes
 *
 * Flow:
 * 1. TaskRunner emits events while the batch runs
 * 2. the run command forwards each event to formatter.onEvent()
 * 3. the formatter renders it to stdout/stderr
 */

import type { BatchResult, DiscoveryResult, RunnerEvent } from '../../../engine/src/index.js';

export interface FormatterOptions {
  /** Per-task detail and a final summary */
  verbose?: boolean;

  /** Disable colors (for CI or terminals without color support) */
  noColor?: boolean;

  /** Suppress everything except errors */
  silent?: boolean;
}

export interface Formatter {
  /**
   * Handle a runner lifecycle event
   */
  onEvent(event: RunnerEvent): void;

  /**
   * Display the batch result, once, after the last task
   */
  showResult(result: BatchResult): void;

  /**
   * Display the outcome of discovery (the `list` command)
   */
  showWorkloads(discovery: DiscoveryResult): void;

  /**
   * Display a CLI-level error: invalid flags, bad environment, internal failure
   */
  showError(error: Error): void;
}
