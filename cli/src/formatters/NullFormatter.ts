/**
 * Null Formatter
 *
 * Writes nothing; the exit code is the only output. Selected with
 * `--format null` for scripts that only branch on success.
 */

import type { BatchResult, DiscoveryResult, RunnerEvent } from '../../../engine/src/index.js';
import type { Formatter, FormatterOptions } from './Formatter.js';

export class NullFormatter implements Formatter {
  constructor(_options: FormatterOptions = {}) {}

  onEvent(_event: RunnerEvent): void {}

  showResult(_result: BatchResult): void {}

  showWorkloads(_discovery: DiscoveryResult): void {}

  showError(_error: Error): void {}
}
