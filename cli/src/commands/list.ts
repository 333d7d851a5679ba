/**
 * List Command
 *
 * Shows the task identifiers a run would dispatch, in dispatch order,
 * without starting any worker.
 *
 * Usage:
 *   workrun list
 *   workrun list --dir bench/workloads --verbose
 *   workrun list --format json
 *
 * Exit codes:
 *   0 - listed (a missing directory lists nothing)
 *   1 - invalid flags or environment
 */

import type { Command } from 'commander';
import {
  ConfigError,
  ExitCodes,
  TaskRunner,
  createRunnerLogger,
  toRunnerError,
  DEFAULT_LOG_LEVEL,
} from '../../../engine/src/index.js';
import {
  createFormatter,
  isFormatterType,
  FORMATTER_TYPES,
  type FormatterType,
} from '../formatters/createFormatter.js';
import type { CliListOptions } from '../types/CliRunOptions.js';
import { resolveRunnerConfig } from '../utils/config.js';
import type { CommandDependencies } from './run.js';

export function registerListCommand(program: Command, deps: CommandDependencies = {}): void {
  program
    .command('list')
    .description('List the tasks a run would dispatch')
    .option('-d, --dir <path>', 'Workload directory (default: "workloads")')
    .option('--ext <extension>', 'Workload file extension (default: ".json")')
    .option('--no-sort', 'Keep directory-listing order instead of sorting by name')
    .option('-f, --format <format>', `Output format (${FORMATTER_TYPES.join('|')})`, 'human')
    .option('--verbose', 'Show file names and ignored entries')
    .option('--no-color', 'Disable colored output')
    .action(async (options: CliListOptions) => {
      process.exitCode = await executeList(options, deps);
    });
}

export async function executeList(
  options: CliListOptions,
  deps: CommandDependencies = {}
): Promise<number> {
  const format: FormatterType = isFormatterType(options.format) ? options.format : 'human';
  const formatter = createFormatter(format, {
    verbose: options.verbose,
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

    formatter.showWorkloads(await runner.discover());
    return ExitCodes.SUCCESS;
  } catch (error) {
    const runnerError = toRunnerError(error);
    formatter.showError(runnerError);
    return runnerError.exitCode;
  }
}
