/**
 * CLI Run Command Options
 *
 * Command-line options for `workrun run`, as commander hands them over.
 */

import { ConfigError } from '../../../engine/src/index.js';

export interface CliRunOptions {
  /** Workload directory */
  dir?: string;

  /** Worker command line, split on whitespace (e.g. "python3 launch.py") */
  worker?: string;

  /** Device selector passed as --hardware_type */
  hardwareType?: string;

  /** Workload file extension */
  ext?: string;

  /** False with --no-sort */
  sort?: boolean;

  /** Skip remaining tasks after the first failure */
  stopOnFailure?: boolean;

  /** Per-task timeout in seconds */
  timeout?: number;

  /**
   * Extra worker environment variables (key=value format)
   * Example: ['CUDA_VISIBLE_DEVICES=0']
   */
  env?: string[];

  /** Show what would run without starting workers */
  dryRun?: boolean;

  /** Output format */
  format?: string;

  verbose?: boolean;

  /** Minimal output */
  silent?: boolean;

  /** False with --no-color */
  color?: boolean;
}

/**
 * Options accepted by `workrun list`
 */
export type CliListOptions = Pick<CliRunOptions, 'dir' | 'ext' | 'sort' | 'format' | 'verbose' | 'color'>;

/**
 * Parse key=value pairs into an object
 *
 * @throws {ConfigError} for a pair without '=' or with an empty key
 */
export function parseKeyValuePairs(pairs: string[]): Record<string, string> {
  const result: Record<string, string> = {};

  for (const pair of pairs) {
    const index = pair.indexOf('=');
    if (index === -1) {
      throw ConfigError.single('env', `invalid key=value format: ${pair}`);
    }

    const key = pair.slice(0, index).trim();
    const value = pair.slice(index + 1).trim();

    if (!key) {
      throw ConfigError.single('env', `empty key in: ${pair}`);
    }

    result[key] = value;
  }

  return result;
}
