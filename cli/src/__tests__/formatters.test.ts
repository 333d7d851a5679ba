import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import {
  DispatchError,
  DispatchResultBuilder,
  RunnerEventType,
  type BatchResult,
  type RunnerEvent,
} from '../../../engine/src/index.js';
import { createFormatter, isFormatterType } from '../formatters/createFormatter.js';
import { HumanFormatter } from '../formatters/HumanFormatter.js';
import { JsonFormatter } from '../formatters/JsonFormatter.js';
import { NullFormatter } from '../formatters/NullFormatter.js';

const invocation = {
  command: 'python3',
  args: ['launch.py', '--task', 'matmul', '--hardware_type', 'GPU'],
};

const taskStarted: RunnerEvent = {
  type: RunnerEventType.TASK_STARTED,
  timestamp: Date.UTC(2024, 0, 1),
  runId: 'run-1',
  payload: { taskId: 'matmul', index: 0, total: 1, invocation },
};

function failedEvent(): RunnerEvent {
  const error = DispatchError.nonZeroExit('matmul', 1);
  const result = new DispatchResultBuilder('matmul', invocation)
    .exited(1, null)
    .failure(error)
    .duration(250)
    .build();
  return {
    type: RunnerEventType.TASK_FAILED,
    timestamp: Date.UTC(2024, 0, 1),
    runId: 'run-1',
    payload: { taskId: 'matmul', index: 0, result, error },
  };
}

function batchResult(overrides: Partial<BatchResult> = {}): BatchResult {
  return {
    runId: 'run-1',
    status: 'completed',
    directory: '/w',
    dryRun: false,
    results: [],
    durationMs: 1500,
    summary: { total: 2, succeeded: 1, failed: 1, skipped: 0 },
    ...overrides,
  };
}

describe('formatters', () => {
  let logSpy: MockInstance;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function lines(): unknown[] {
    return logSpy.mock.calls.map((call) => call.join(' '));
  }

  describe('createFormatter', () => {
    it('creates each formatter type', () => {
      expect(createFormatter('human')).toBeInstanceOf(HumanFormatter);
      expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
      expect(createFormatter('null')).toBeInstanceOf(NullFormatter);
    });

    it('recognises formatter names', () => {
      expect(isFormatterType('json')).toBe(true);
      expect(isFormatterType('xml')).toBe(false);
      expect(isFormatterType(undefined)).toBe(false);
    });
  });

  describe('HumanFormatter', () => {
    it('prints the status line for a started task', () => {
      new HumanFormatter({ noColor: true }).onEvent(taskStarted);

      expect(lines()).toEqual(['running task: matmul']);
    });

    it('keeps failures quiet unless verbose', () => {
      new HumanFormatter({ noColor: true }).onEvent(failedEvent());
      expect(lines()).toEqual([]);

      new HumanFormatter({ noColor: true, verbose: true }).onEvent(failedEvent());
      expect(lines()).toEqual([
        '  ✖ failed in 250ms',
        '    Error: Worker for task matmul exited with code 1 [WR-X-002]',
      ]);
    });

    it('prints a summary only when verbose', () => {
      new HumanFormatter({ noColor: true }).showResult(batchResult());
      expect(lines()).toEqual([]);

      new HumanFormatter({ noColor: true, verbose: true }).showResult(batchResult());
      expect(lines()).toEqual([
        '',
        '═'.repeat(60),
        'Batch finished: 2 tasks',
        '═'.repeat(60),
        '  Succeeded: 1',
        '  Failed:    1',
        '  Skipped:   0',
        '  Duration:  1.5s',
      ]);
    });

    it('announces a halted batch in the summary', () => {
      new HumanFormatter({ noColor: true, verbose: true }).showResult(
        batchResult({ status: 'halted' })
      );

      expect(lines()[2]).toBe('⚠ Batch stopped after a failed task');
    });

    it('prints nothing when silent', () => {
      new HumanFormatter({ noColor: true, silent: true }).onEvent(taskStarted);

      expect(lines()).toEqual([]);
    });
  });

  describe('JsonFormatter', () => {
    it('flattens the event payload into one line', () => {
      new JsonFormatter().onEvent(taskStarted);

      expect(logSpy).toHaveBeenCalledTimes(1);
      const parsed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
      expect(parsed).toEqual({
        type: 'task.started',
        timestamp: '2024-01-01T00:00:00.000Z',
        runId: 'run-1',
        taskId: 'matmul',
        index: 0,
        total: 1,
        invocation,
      });
    });

    it('serialises dispatch errors with their code', () => {
      new JsonFormatter().onEvent(failedEvent());

      const parsed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({
        type: 'task.failed',
        taskId: 'matmul',
        error: {
          name: 'DispatchError',
          code: 'WR-X-002',
          message: 'Worker for task matmul exited with code 1',
        },
      });
    });

    it('writes the batch result', () => {
      new JsonFormatter().showResult(batchResult());

      const parsed: unknown = JSON.parse(String(logSpy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({
        type: 'batch.result',
        runId: 'run-1',
        status: 'completed',
        summary: { total: 2, succeeded: 1, failed: 1, skipped: 0 },
      });
    });
  });

  describe('NullFormatter', () => {
    it('prints nothing', () => {
      const formatter = new NullFormatter();
      formatter.onEvent(taskStarted);
      formatter.showResult(batchResult());
      formatter.showWorkloads({ directory: '/w', workloads: [], ignored: [] });

      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
