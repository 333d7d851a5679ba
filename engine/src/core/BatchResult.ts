/**
 * Batch Result
 *
 * @module core
 */

import type { DiscoveryError } from '../errors/DiscoveryError.js';
import type { DispatchResult } from '../execution/DispatchResult.js';

/**
 * `halted` only occurs with stop-on-failure enabled
 */
export type BatchStatus = 'completed' | 'halted';

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  skipped: number;
}

export interface BatchResult {
  runId: string;
  status: BatchStatus;
  directory: string;
  dryRun: boolean;

  /** One entry per discovered workload, in dispatch order */
  results: DispatchResult[];

  /** Set when the workload directory could not be listed */
  discoveryError?: DiscoveryError;

  durationMs: number;
  summary: BatchSummary;
}

export function summarize(results: readonly DispatchResult[]): BatchSummary {
  const summary: BatchSummary = { total: results.length, succeeded: 0, failed: 0, skipped: 0 };
  for (const result of results) {
    switch (result.status) {
      case 'success':
        summary.succeeded++;
        break;
      case 'failure':
        summary.failed++;
        break;
      case 'skipped':
        summary.skipped++;
        break;
    }
  }
  return summary;
}
