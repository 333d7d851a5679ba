/**
 * Workload Discovery
 *
 * Lists the workload directory and turns every matching file into a
 * workload definition. File contents are never read here; they belong to
 * the worker.
 *
 * Rules:
 * - a name matches when it ends with the extension (case-sensitive) and
 *   something remains before it
 * - hidden entries and directories are skipped
 * - everything else that does not match is reported as ignored
 * - listing failures never throw; they come back on the result
 *
 * @module discovery
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { DiscoveryError } from '../errors/DiscoveryError.js';

export interface WorkloadDefinition {
  /** File name with the extension removed */
  taskId: string;

  /** Entry name as listed */
  fileName: string;

  /** Absolute or directory-relative path to the file */
  path: string;
}

export interface DiscoveryOptions {
  directory: string;

  /** Extension including the leading dot, e.g. `.json` */
  extension: string;

  /** Sort entries by name; when false the listing order is kept */
  sort: boolean;
}

export interface DiscoveryResult {
  directory: string;
  workloads: WorkloadDefinition[];

  /** Non-hidden files that did not match the extension */
  ignored: string[];

  /** Set when the directory could not be listed */
  error?: DiscoveryError;
}

/**
 * Strip `extension` from `fileName` exactly once
 *
 * @returns the task identifier, or `undefined` when the name does not match
 *
 * @example
 * ```ts
 * deriveTaskId('matmul.json', '.json');   // 'matmul'
 * deriveTaskId('a.json.json', '.json');   // 'a.json'
 * deriveTaskId('conv.JSON', '.json');     // undefined
 * ```
 */
export function deriveTaskId(fileName: string, extension: string): string | undefined {
  if (!fileName.endsWith(extension)) {
    return undefined;
  }
  const taskId = fileName.slice(0, fileName.length - extension.length);
  return taskId.length > 0 ? taskId : undefined;
}

/**
 * Code-unit order, independent of locale
 */
function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export async function discoverWorkloads(options: DiscoveryOptions): Promise<DiscoveryResult> {
  const { directory, extension } = options;

  let entries;
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (error) {
    return {
      directory,
      workloads: [],
      ignored: [],
      error: DiscoveryError.fromFsError(directory, error),
    };
  }

  const names = entries
    .filter((entry) => !entry.isDirectory() && !entry.name.startsWith('.'))
    .map((entry) => entry.name);

  if (options.sort) {
    names.sort(compareNames);
  }

  const workloads: WorkloadDefinition[] = [];
  const ignored: string[] = [];

  for (const fileName of names) {
    const taskId = deriveTaskId(fileName, extension);
    if (taskId === undefined) {
      ignored.push(fileName);
      continue;
    }
    workloads.push({
      taskId,
      fileName,
      path: join(directory, fileName),
    });
  }

  return { directory, workloads, ignored };
}
