/**
 * JSON Formatter
 *
 * One JSON object per line (NDJSON) for every runner event, then a
 * `batch.result` document. Errors serialize through RunnerError.toJSON().
 */

import {
  RunnerError,
  type BatchResult,
  type DiscoveryResult,
  type RunnerEvent,
} from '../../../engine/src/index.js';
import type { Formatter, FormatterOptions } from './Formatter.js';

export class JsonFormatter implements Formatter {
  private options: FormatterOptions;

  constructor(options: FormatterOptions = {}) {
    this.options = options;
  }

  onEvent(event: RunnerEvent): void {
    if (this.options.silent) {
      return;
    }

    console.log(
      JSON.stringify({
        type: event.type,
        timestamp: new Date(event.timestamp).toISOString(),
        runId: event.runId,
        ...event.payload,
      })
    );
  }

  showResult(result: BatchResult): void {
    const jsonResult = {
      type: 'batch.result',
      timestamp: new Date().toISOString(),
      ...result,
    };

    console.log(JSON.stringify(jsonResult, null, this.options.verbose ? 2 : undefined));
  }

  showWorkloads(discovery: DiscoveryResult): void {
    const jsonWorkloads = {
      type: 'workloads',
      directory: discovery.directory,
      workloads: discovery.workloads,
      ignored: discovery.ignored,
      error: discovery.error,
    };

    console.log(JSON.stringify(jsonWorkloads, null, this.options.verbose ? 2 : undefined));
  }

  showError(error: Error): void {
    const jsonError = {
      type: 'error',
      timestamp: new Date().toISOString(),
      error:
        error instanceof RunnerError
          ? error.toJSON()
          : { name: error.name, message: error.message },
    };

    console.error(JSON.stringify(jsonError));
  }
}
