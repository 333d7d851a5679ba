/**
 * Run Command
 *
 * Discovers the workload definitions and dispatches each one to the worker,
 * one at a time. This is the default command.
 *
 * Usage:
 *   workrun
 *   workrun run --dir bench/workloads --hardware-type NPU
 *   workrun run --worker "python3 -u launch.py" --timeout 600
 *   workrun run --dry-run
 *   workrun run --format json
 *
 * Exit codes:
 *   0 - batch ran (individual worker failures do not count)
 *   1 - invalid flags or environment
 *   2 - batch stopped by --stop-on-failure
 *   4 - internal error
 */

import { InvalidArgumentError, type Command } from 'commander';
import {
  ConfigError,
  ExitCodes,
  TaskRunner,
  createRunnerLogger,
  toRunnerError,
  DEFAULT_LOG_LEVEL,
  MAX_TIMEOUT_MS,
  type BatchResult,
  type WorkerLauncher,
} from '../../../engine/src/index.js';
import {
  createFormatter,
  isFormatterType,
  FORMATTER_TYPES,
  type FormatterType,
} from '../formatters/createFormatter.js';
import type { Formatter } from '../formatters/Formatter.js';
import type { CliRunOptions } from '../types/CliRunOptions.js';
import { resolveRunnerConfig } from '../utils/config.js';

/**
 * Collaborators the commands can be given, mainly by tests
 */
export interface CommandDependencies {
  launcher?: WorkerLauncher;
  env?: NodeJS.ProcessEnv;
  /** Working directory the workload directory is resolved against */
  cwd?: string;
}

export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMEOUT_MS / 1000);

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive whole number.');
  }
  return parsed;
}

export function parseTimeoutSeconds(value: string): number {
  const seconds = parsePositiveInt(value);
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new InvalidArgumentError(`Must not exceed ${MAX_TIMEOUT_SECONDS} seconds.`);
  }
  return seconds;
}

export function registerRunCommand(program: Command, deps: CommandDependencies = {}): void {
  program
    .command('run', { isDefault: true })
    .description('Dispatch every workload definition to the worker, in order')
    .option('-d, --dir <path>', 'Workload directory (default: "workloads")')
    .option('-w, --worker <command>', 'Worker command line (default: "python3 launch.py")')
    .option('--hardware-type <type>', 'Device selector passed to the worker (default: "GPU")')
    .option('--ext <extension>', 'Workload file extension (default: ".json")')
    .option('--no-sort', 'Keep directory-listing order instead of sorting by name')
    .option('--stop-on-failure', 'Skip remaining tasks after the first failure')
    .option('-t, --timeout <seconds>', 'Per-task timeout in seconds', parseTimeoutSeconds)
    .option('-e, --env <key=value...>', 'Extra environment variables for the worker')
    .option('--dry-run', 'Show what would run without starting workers')
    .option('-f, --format <format>', `Output format (${FORMATTER_TYPES.join('|')})`, 'human')
    .option('--verbose', 'Show worker command lines, outcomes and a summary')
    .option('--silent', 'Minimal output')
    .option('--no-color', 'Disable colored output')
    .action(async (options: CliRunOptions) => {
      process.exitCode = await executeRun(options, deps);
    });
}

/**
 * Run one batch and return the process exit code
 */
export async function executeRun(
  options: CliRunOptions,
  deps: CommandDependencies = {}
): Promise<number> {
  const format: FormatterType = isFormatterType(options.format) ? options.format : 'human';
  const formatter = createFormatter(format, {
    verbose: options.verbose,
    silent: options.silent,
    noColor: options.color === false,
  });

  try {
    if (options.format !== undefined && !isFormatterType(options.format)) {
      throw ConfigError.single(
        'format',
        `unknown format "${options.format}"`,
        `Use one of: ${FORMATTER_TYPES.join(', ')}`
      );
    }

    const config = resolveRunnerConfig(options, format, deps.env);
    if (deps.cwd !== undefined) {
      config.workingDirectory = deps.cwd;
    }

    const logger = createRunnerLogger(config.logLevel ?? DEFAULT_LOG_LEVEL, {
      verbose: options.verbose,
      colors: options.color !== false,
    });
    const runner = new TaskRunner(config, { launcher: deps.launcher, logger });

    wireRunnerEvents(runner, formatter);

    const result = await runner.run();
    formatter.showResult(result);

    return determineExitCode(result);
  } catch (error) {
    const runnerError = toRunnerError(error);
    formatter.showError(runnerError);
    return runnerError.exitCode;
  }
}

/**
 * Forward every runner event to the formatter
 */
export function wireRunnerEvents(runner: TaskRunner, formatter: Formatter): void {
  runner.getEventBus().on('*', (event) => {
    formatter.onEvent(event);
  });
}

/**
 * Worker failures never change the exit code; only an opt-in halt does
 */
export function determineExitCode(result: BatchResult): number {
  return result.status === 'halted' ? ExitCodes.BATCH_HALTED : ExitCodes.SUCCESS;
}
