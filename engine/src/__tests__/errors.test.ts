import { describe, expect, it } from 'vitest';
import { ConfigError } from '../errors/ConfigError.js';
import { DiscoveryError } from '../errors/DiscoveryError.js';
import { DispatchError } from '../errors/DispatchError.js';
import {
  ErrorSeverity,
  ExitCodes,
  RunnerErrorCode,
  getErrorCategory,
  getExitCodeForError,
} from '../errors/ErrorCodes.js';
import { formatError } from '../errors/ErrorFormatter.js';
import { RunnerError, toRunnerError } from '../errors/RunnerError.js';

function fsError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('error codes', () => {
  it('maps codes to categories', () => {
    expect(getErrorCategory(RunnerErrorCode.CONFIG_INVALID)).toBe('ConfigError');
    expect(getErrorCategory(RunnerErrorCode.DISCOVERY_READ_FAILED)).toBe('DiscoveryError');
    expect(getErrorCategory(RunnerErrorCode.DISPATCH_TIMEOUT)).toBe('DispatchError');
    expect(getErrorCategory(RunnerErrorCode.RUNTIME_INTERNAL_ERROR)).toBe('RunnerError');
  });

  it('never fails the process for discovery problems', () => {
    expect(getExitCodeForError(RunnerErrorCode.DISCOVERY_DIR_NOT_FOUND)).toBe(ExitCodes.SUCCESS);
    expect(getExitCodeForError(RunnerErrorCode.CONFIG_INVALID)).toBe(ExitCodes.USAGE_ERROR);
    expect(getExitCodeForError(RunnerErrorCode.RUNTIME_INTERNAL_ERROR)).toBe(
      ExitCodes.INTERNAL_ERROR
    );
  });
});

describe('ConfigError', () => {
  it('summarises every issue in its message', () => {
    const error = new ConfigError([
      { path: 'extension', message: 'bad' },
      { path: 'timeoutMs', message: 'must be positive' },
    ]);

    expect(error.message).toBe('Invalid configuration: extension: bad; timeoutMs: must be positive');
    expect(error.code).toBe(RunnerErrorCode.CONFIG_INVALID);
    expect(error.path).toBe('extension');
    expect(error.exitCode).toBe(ExitCodes.USAGE_ERROR);
    expect(error.name).toBe('ConfigError');
  });

  it('falls back to the suggested action as hint', () => {
    expect(ConfigError.single('format', 'bad').hint).toBe(
      'Check the command-line flags and WORKRUN_* environment variables'
    );
    expect(ConfigError.single('format', 'bad', 'Use json').hint).toBe('Use json');
  });
});

describe('DiscoveryError', () => {
  it('classifies filesystem errors', () => {
    expect(DiscoveryError.fromFsError('/w', fsError('ENOENT', 'x')).code).toBe(
      RunnerErrorCode.DISCOVERY_DIR_NOT_FOUND
    );
    expect(DiscoveryError.fromFsError('/w', fsError('ENOTDIR', 'x')).code).toBe(
      RunnerErrorCode.DISCOVERY_NOT_A_DIRECTORY
    );
    expect(DiscoveryError.fromFsError('/w', fsError('EACCES', 'x')).code).toBe(
      RunnerErrorCode.DISCOVERY_PERMISSION_DENIED
    );
    expect(DiscoveryError.fromFsError('/w', fsError('EPERM', 'x')).code).toBe(
      RunnerErrorCode.DISCOVERY_PERMISSION_DENIED
    );
  });

  it('keeps the reason for unclassified failures', () => {
    const error = DiscoveryError.fromFsError('/w', fsError('EIO', 'i/o error'));

    expect(error.code).toBe(RunnerErrorCode.DISCOVERY_READ_FAILED);
    expect(error.message).toBe('Failed to read workload directory /w: i/o error');
    expect(error.context).toEqual({ directory: '/w', errno: 'EIO' });
  });

  it('is a warning', () => {
    const error = DiscoveryError.notFound('/w');

    expect(error.severity).toBe(ErrorSeverity.WARNING);
    expect(error.exitCode).toBe(ExitCodes.SUCCESS);
    expect(error.directory).toBe('/w');
  });
});

describe('DispatchError', () => {
  it('carries the task id and exit code', () => {
    const error = DispatchError.nonZeroExit('matmul', 3);

    expect(error.taskId).toBe('matmul');
    expect(error.context).toEqual({ taskId: 'matmul', exitCode: 3 });
    expect(error.exitCode).toBe(ExitCodes.BATCH_HALTED);
  });

  it('keeps the spawn failure as cause', () => {
    const cause = new Error('spawn python3 ENOENT');
    const error = DispatchError.spawnFailed('matmul', 'python3', cause);

    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ taskId: 'matmul', command: 'python3' });
  });
});

describe('toRunnerError', () => {
  it('returns runner errors unchanged', () => {
    const error = DispatchError.signalled('a', 'SIGKILL');

    expect(toRunnerError(error)).toBe(error);
  });

  it('wraps anything else as an internal error', () => {
    const error = toRunnerError('boom');

    expect(error).toBeInstanceOf(RunnerError);
    expect(error.message).toBe('boom');
    expect(error.code).toBe(RunnerErrorCode.RUNTIME_INTERNAL_ERROR);
    expect(error.exitCode).toBe(ExitCodes.INTERNAL_ERROR);
  });
});

describe('RunnerError.toJSON', () => {
  it('serialises the diagnostic', () => {
    const json = ConfigError.single('format', 'unknown format "xml"', 'Use one of: human, json, null').toJSON();

    expect(json).toMatchObject({
      name: 'ConfigError',
      code: 'WR-C-001',
      message: 'Invalid configuration: format: unknown format "xml"',
      severity: 'error',
      exitCode: 1,
      path: 'format',
      hint: 'Use one of: human, json, null',
    });
  });

  it('stamps the time the error was raised', () => {
    const before = Date.now();
    const error = DispatchError.timedOut('a', 1000);

    expect(error.timestamp.getTime()).toBeGreaterThanOrEqual(before);
    expect(error.toJSON().timestamp).toBe(error.timestamp.toISOString());
  });
});

describe('formatError', () => {
  it('renders a runner error with code and hint', () => {
    const output = formatError(ConfigError.single('format', 'bad', 'Use json'), false);

    expect(output).toBe(
      ['✖ ConfigError [WR-C-001]', '  Invalid configuration: format: bad', '  Hint: Use json'].join('\n')
    );
  });

  it('renders a warning with its icon', () => {
    const output = formatError(DiscoveryError.notFound('/w'), false);

    expect(output.split('\n')[0]).toBe('⚠ DiscoveryError [WR-D-001]');
  });

  it('adds context when verbose', () => {
    const output = formatError(DispatchError.nonZeroExit('a', 2), false, true);

    expect(output.split('\n')).toContain('  exitCode: 2');
    expect(output.split('\n')).toContain('  taskId: a');
  });

  it('renders a plain error on one line', () => {
    expect(formatError(new Error('plain'), false)).toBe('✖ Error: plain');
  });
});
