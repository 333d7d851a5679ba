/**
 * Builds runner configuration from command-line options and the environment.
 *
 * Precedence: flag > WORKRUN_* variable > default.
 */

import {
  configFromEnv,
  mergeConfig,
  parseWorkerCommand,
  type RunnerConfig,
} from '../../../engine/src/index.js';
import type { FormatterType } from '../formatters/createFormatter.js';
import { parseKeyValuePairs, type CliRunOptions } from '../types/CliRunOptions.js';

export function resolveRunnerConfig(
  options: CliRunOptions,
  format: FormatterType,
  env: NodeJS.ProcessEnv = process.env
): RunnerConfig {
  const fromFlags: RunnerConfig = {
    workloadDir: options.dir,
    worker: options.worker === undefined ? undefined : parseWorkerCommand(options.worker),
    deviceSelector: options.hardwareType,
    extension: options.ext,
    sort: options.sort,
    stopOnFailure: options.stopOnFailure,
    dryRun: options.dryRun,
    timeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000,
    env: options.env ? parseKeyValuePairs(options.env) : undefined,
    // keep stdout parseable for machine output
    workerOutput: format === 'json' ? 'stderr' : undefined,
    logLevel: options.verbose ? 'debug' : options.silent ? 'error' : undefined,
  };

  return mergeConfig(configFromEnv(env), fromFlags);
}
