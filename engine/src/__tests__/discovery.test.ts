import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { deriveTaskId, discoverWorkloads } from '../discovery/WorkloadDiscovery.js';
import { RunnerErrorCode } from '../errors/ErrorCodes.js';

describe('deriveTaskId', () => {
  it('strips the extension once', () => {
    expect(deriveTaskId('matmul.json', '.json')).toBe('matmul');
    expect(deriveTaskId('a.json.json', '.json')).toBe('a.json');
    expect(deriveTaskId('resnet.v2.json', '.json')).toBe('resnet.v2');
  });

  it('is case-sensitive', () => {
    expect(deriveTaskId('conv.JSON', '.json')).toBeUndefined();
    expect(deriveTaskId('conv.Json', '.json')).toBeUndefined();
  });

  it('rejects names with nothing before the extension', () => {
    expect(deriveTaskId('.json', '.json')).toBeUndefined();
  });

  it('rejects other extensions', () => {
    expect(deriveTaskId('readme.txt', '.json')).toBeUndefined();
    expect(deriveTaskId('matmul.jsonl', '.json')).toBeUndefined();
  });

  it('supports a custom extension', () => {
    expect(deriveTaskId('matmul.yaml', '.yaml')).toBe('matmul');
  });
});

describe('discoverWorkloads', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'workrun-discovery-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function touch(...names: string[]): Promise<void> {
    for (const name of names) {
      await writeFile(join(dir, name), '{}');
    }
  }

  it('finds every matching file and ignores the rest', async () => {
    await touch('matmul.json', 'conv2d.json', 'readme.txt');

    const result = await discoverWorkloads({ directory: dir, extension: '.json', sort: true });

    expect(result.error).toBeUndefined();
    expect(result.workloads.map((w) => w.taskId)).toEqual(['conv2d', 'matmul']);
    expect(result.ignored).toEqual(['readme.txt']);
  });

  it('records file name and path for each workload', async () => {
    await touch('matmul.json');

    const result = await discoverWorkloads({ directory: dir, extension: '.json', sort: true });

    expect(result.workloads).toEqual([
      { taskId: 'matmul', fileName: 'matmul.json', path: join(dir, 'matmul.json') },
    ]);
  });

  it('sorts by code unit, uppercase before lowercase', async () => {
    await touch('b.json', 'a.json', 'Z.json', 'a10.json', 'a2.json');

    const result = await discoverWorkloads({ directory: dir, extension: '.json', sort: true });

    expect(result.workloads.map((w) => w.taskId)).toEqual(['Z', 'a', 'a10', 'a2', 'b']);
  });

  it('keeps every workload when sorting is off', async () => {
    await touch('b.json', 'a.json', 'c.json');

    const result = await discoverWorkloads({ directory: dir, extension: '.json', sort: false });

    expect(result.workloads.map((w) => w.taskId).sort()).toEqual(['a', 'b', 'c']);
  });

  it('does not match an uppercase extension', async () => {
    await touch('conv.JSON', 'matmul.json');

    const result = await discoverWorkloads({ directory: dir, extension: '.json', sort: true });

    expect(result.workloads.map((w) => w.taskId)).toEqual(['matmul']);
    expect(result.ignored).toEqual(['conv.JSON']);
  });

  it('skips hidden files and subdirectories', async () => {
    await touch('.hidden.json', 'matmul.json');
    await mkdir(join(dir, 'nested.json'));

    const result = await discoverWorkloads({ directory: dir, extension: '.json', sort: true });

    expect(result.workloads.map((w) => w.taskId)).toEqual(['matmul']);
    expect(result.ignored).toEqual([]);
  });

  it('returns nothing for an empty directory', async () => {
    const result = await discoverWorkloads({ directory: dir, extension: '.json', sort: true });

    expect(result).toEqual({ directory: dir, workloads: [], ignored: [] });
  });

  it('reports a missing directory without throwing', async () => {
    const missing = join(dir, 'does-not-exist');

    const result = await discoverWorkloads({ directory: missing, extension: '.json', sort: true });

    expect(result.workloads).toEqual([]);
    expect(result.error?.code).toBe(RunnerErrorCode.DISCOVERY_DIR_NOT_FOUND);
    expect(result.error?.message).toBe(`Workload directory not found: ${missing}`);
  });

  it('reports a file given as the directory', async () => {
    await touch('matmul.json');
    const file = join(dir, 'matmul.json');

    const result = await discoverWorkloads({ directory: file, extension: '.json', sort: true });

    expect(result.workloads).toEqual([]);
    expect(result.error?.code).toBe(RunnerErrorCode.DISCOVERY_NOT_A_DIRECTORY);
  });
});
