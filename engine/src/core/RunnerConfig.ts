/**
 * Runner Configuration
 *
 * User-facing options for TaskRunner, their defaults, validation and
 * environment overrides.
 *
 * @module core
 */

import { isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError, type ConfigIssue } from '../errors/ConfigError.js';
import type { WorkerOutputMode } from '../execution/WorkerLauncher.js';

/**
 * Logging level for runner diagnostics
 */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const DEFAULT_WORKLOAD_DIR = 'workloads';
export const DEFAULT_EXTENSION = '.json';
export const DEFAULT_WORKER: readonly string[] = ['python3', 'launch.py'];
export const DEFAULT_DEVICE_SELECTOR = 'GPU';
export const DEFAULT_LOG_LEVEL: LogLevelName = 'warn';

/** Largest delay a Node.js timer accepts; longer delays fire immediately */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * Environment variables read by configFromEnv()
 */
export const ENV_VARS = {
  workloadDir: 'WORKRUN_WORKLOAD_DIR',
  worker: 'WORKRUN_WORKER',
  deviceSelector: 'WORKRUN_HARDWARE_TYPE',
  logLevel: 'WORKRUN_LOG_LEVEL',
} as const;

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
const OUTPUT_MODES = ['inherit', 'stderr', 'ignore'] as const;

export const RunnerConfigSchema = z
  .object({
    workloadDir: z.string().min(1, 'must not be empty'),
    extension: z
      .string()
      .regex(/^\.[^/\\]+$/, 'must start with "." and contain no path separator'),
    worker: z.array(z.string().min(1, 'must not be empty')).min(1, 'must name a command'),
    deviceSelector: z.string().min(1, 'must not be empty'),
    sort: z.boolean(),
    stopOnFailure: z.boolean(),
    dryRun: z.boolean(),
    timeoutMs: z
      .number()
      .int('must be a whole number')
      .positive('must be positive')
      .max(MAX_TIMEOUT_MS, `must not exceed ${MAX_TIMEOUT_MS}`),
    workingDirectory: z.string().min(1, 'must not be empty'),
    workerOutput: z.enum(OUTPUT_MODES),
    env: z.record(z.string()),
    logLevel: z.enum(LOG_LEVELS),
  })
  .partial()
  .strict();

/**
 * Runner configuration options; every field is optional
 *
 * @example
 * ```ts
 * const config: RunnerConfig = {
 *   workloadDir: 'bench/workloads',
 *   worker: ['python3', 'launch.py'],
 *   deviceSelector: 'GPU',
 *   stopOnFailure: true,
 * };
 * ```
 */
export interface RunnerConfig {
  /**
   * Directory holding the workload definitions, relative to workingDirectory
   * @default 'workloads'
   */
  workloadDir?: string;

  /**
   * File extension that marks a workload definition, case-sensitive
   * @default '.json'
   */
  extension?: string;

  /**
   * Worker program followed by its leading arguments
   * @default ['python3', 'launch.py']
   */
  worker?: string[];

  /**
   * Value passed to the worker's --hardware_type flag
   * @default 'GPU'
   */
  deviceSelector?: string;

  /**
   * Dispatch in name order rather than directory-listing order
   * @default true
   */
  sort?: boolean;

  /**
   * Skip the remaining tasks after the first failed dispatch
   * @default false
   */
  stopOnFailure?: boolean;

  /**
   * Report what would run without starting any worker
   * @default false
   */
  dryRun?: boolean;

  /** Per-dispatch timeout in milliseconds; no timeout when unset */
  timeoutMs?: number;

  /**
   * Directory the worker runs in and workloadDir is resolved against
   * @default process.cwd()
   */
  workingDirectory?: string;

  /**
   * Where worker stdout goes
   * @default 'inherit'
   */
  workerOutput?: WorkerOutputMode;

  /** Extra environment variables for the worker, merged over process.env */
  env?: Record<string, string>;

  /** @default 'warn' */
  logLevel?: LogLevelName;
}

/**
 * Configuration with defaults applied and paths resolved
 */
export interface ResolvedRunnerConfig {
  workloadDir: string;
  extension: string;
  worker: string[];
  deviceSelector: string;
  sort: boolean;
  stopOnFailure: boolean;
  dryRun: boolean;
  timeoutMs: number | undefined;
  workingDirectory: string;
  workerOutput: WorkerOutputMode;
  env: Record<string, string>;
  logLevel: LogLevelName;
}

/**
 * Validate untrusted configuration input
 *
 * @throws {ConfigError} listing every failed field
 */
export function validateConfig(input: unknown): RunnerConfig {
  const parsed = RunnerConfigSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const issues: ConfigIssue[] = parsed.error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : 'config',
    message: issue.message,
  }));
  throw new ConfigError(issues);
}

/**
 * Apply default values and resolve the workload directory
 */
export function applyConfigDefaults(config: RunnerConfig = {}): ResolvedRunnerConfig {
  const workingDirectory = resolve(config.workingDirectory ?? process.cwd());
  const workloadDir = config.workloadDir ?? DEFAULT_WORKLOAD_DIR;

  return {
    workloadDir: isAbsolute(workloadDir) ? workloadDir : resolve(workingDirectory, workloadDir),
    extension: config.extension ?? DEFAULT_EXTENSION,
    worker: config.worker ? [...config.worker] : [...DEFAULT_WORKER],
    deviceSelector: config.deviceSelector ?? DEFAULT_DEVICE_SELECTOR,
    sort: config.sort ?? true,
    stopOnFailure: config.stopOnFailure ?? false,
    dryRun: config.dryRun ?? false,
    timeoutMs: config.timeoutMs,
    workingDirectory,
    workerOutput: config.workerOutput ?? 'inherit',
    env: { ...config.env },
    logLevel: config.logLevel ?? DEFAULT_LOG_LEVEL,
  };
}

/**
 * Read overrides from WORKRUN_* environment variables
 *
 * Empty values are treated as unset. WORKRUN_WORKER is split on whitespace.
 *
 * @throws {ConfigError} for an unknown WORKRUN_LOG_LEVEL
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const config: RunnerConfig = {};

  const workloadDir = env[ENV_VARS.workloadDir]?.trim();
  if (workloadDir) {
    config.workloadDir = workloadDir;
  }

  const worker = env[ENV_VARS.worker]?.trim();
  if (worker) {
    config.worker = parseWorkerCommand(worker);
  }

  const deviceSelector = env[ENV_VARS.deviceSelector]?.trim();
  if (deviceSelector) {
    config.deviceSelector = deviceSelector;
  }

  const logLevel = env[ENV_VARS.logLevel]?.trim().toLowerCase();
  if (logLevel) {
    const level = LOG_LEVELS.find((candidate) => candidate === logLevel);
    if (!level) {
      throw ConfigError.single(
        ENV_VARS.logLevel,
        `unknown log level "${logLevel}"`,
        `Use one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    config.logLevel = level;
  }

  return config;
}

/**
 * Split a worker command line on whitespace
 *
 * No quoting is recognised; `"python3 -u launch.py"` gives
 * `['python3', '-u', 'launch.py']`.
 */
export function parseWorkerCommand(commandLine: string): string[] {
  return commandLine.trim().split(/\s+/).filter((part) => part.length > 0);
}

/**
 * Layer configuration sources; later sources win, undefined fields are skipped
 */
export function mergeConfig(...sources: RunnerConfig[]): RunnerConfig {
  const merged: RunnerConfig = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}
