/**
 * Runner Error Codes
 *
 * Structured diagnostic codes, separate from process exit codes.
 *
 * Format: WR-[Category]-[Number]
 *
 * Categories:
 * - C: Configuration errors (invalid flags, environment or options)
 * - D: Discovery errors (workload directory missing or unreadable)
 * - X: Dispatch errors (worker failed to start or exited unsuccessfully)
 * - R: Runtime errors (internal failures)
 *
 * ADDING NEW ERRORS:
 * 1. Add the code below
 * 2. Add a description in getErrorDescription()
 * 3. Add the exit code mapping in getExitCodeForError()
 * 4. Add a suggested action in getSuggestedAction()
 *
 * @module errors
 */

export enum RunnerErrorCode {
  // Configuration (C)
  /** Configuration failed validation */
  CONFIG_INVALID = 'WR-C-001',

  // Discovery (D)
  /** Workload directory does not exist */
  DISCOVERY_DIR_NOT_FOUND = 'WR-D-001',

  /** Workload path is not a directory */
  DISCOVERY_NOT_A_DIRECTORY = 'WR-D-002',

  /** Workload directory cannot be read */
  DISCOVERY_PERMISSION_DENIED = 'WR-D-003',

  /** Any other failure while listing the directory */
  DISCOVERY_READ_FAILED = 'WR-D-004',

  // Dispatch (X)
  /** Worker process could not be started */
  DISPATCH_SPAWN_FAILED = 'WR-X-001',

  /** Worker exited with a non-zero code */
  DISPATCH_NONZERO_EXIT = 'WR-X-002',

  /** Worker was terminated by a signal */
  DISPATCH_SIGNALLED = 'WR-X-003',

  /** Worker exceeded the configured timeout */
  DISPATCH_TIMEOUT = 'WR-X-004',

  // Runtime (R)
  /** Unexpected internal failure */
  RUNTIME_INTERNAL_ERROR = 'WR-R-001',
}

export enum ErrorSeverity {
  /** Stops the operation that raised it */
  ERROR = 'error',

  /** Reported, the run continues */
  WARNING = 'warning',

  INFO = 'info',
}

/**
 * Process exit codes for the `workrun` command
 */
export enum ExitCodes {
  SUCCESS = 0,
  /** Invalid command line, environment or configuration */
  USAGE_ERROR = 1,
  /** Batch stopped early by the stop-on-failure option */
  BATCH_HALTED = 2,
  /** Unexpected internal error */
  INTERNAL_ERROR = 4,
}

export function getErrorCategory(code: RunnerErrorCode): string {
  const category = code.split('-')[1];
  switch (category) {
    case 'C':
      return 'ConfigError';
    case 'D':
      return 'DiscoveryError';
    case 'X':
      return 'DispatchError';
    default:
      return 'RunnerError';
  }
}

export function getErrorDescription(code: RunnerErrorCode): string {
  const descriptions: Record<RunnerErrorCode, string> = {
    [RunnerErrorCode.CONFIG_INVALID]: 'The runner configuration is invalid',
    [RunnerErrorCode.DISCOVERY_DIR_NOT_FOUND]: 'The workload directory does not exist',
    [RunnerErrorCode.DISCOVERY_NOT_A_DIRECTORY]: 'The workload path exists but is not a directory',
    [RunnerErrorCode.DISCOVERY_PERMISSION_DENIED]: 'The workload directory cannot be read',
    [RunnerErrorCode.DISCOVERY_READ_FAILED]: 'Listing the workload directory failed',
    [RunnerErrorCode.DISPATCH_SPAWN_FAILED]: 'The worker process could not be started',
    [RunnerErrorCode.DISPATCH_NONZERO_EXIT]: 'The worker process exited with a non-zero code',
    [RunnerErrorCode.DISPATCH_SIGNALLED]: 'The worker process was terminated by a signal',
    [RunnerErrorCode.DISPATCH_TIMEOUT]: 'The worker process exceeded the configured timeout',
    [RunnerErrorCode.RUNTIME_INTERNAL_ERROR]: 'An unexpected internal error occurred',
  };

  return descriptions[code];
}

/**
 * Map an error code to the process exit code it implies when it ends a run
 */
export function getExitCodeForError(code: RunnerErrorCode): ExitCodes {
  switch (code) {
    case RunnerErrorCode.CONFIG_INVALID:
      return ExitCodes.USAGE_ERROR;
    case RunnerErrorCode.DISCOVERY_DIR_NOT_FOUND:
    case RunnerErrorCode.DISCOVERY_NOT_A_DIRECTORY:
    case RunnerErrorCode.DISCOVERY_PERMISSION_DENIED:
    case RunnerErrorCode.DISCOVERY_READ_FAILED:
      // discovery problems never fail the run
      return ExitCodes.SUCCESS;
    case RunnerErrorCode.DISPATCH_SPAWN_FAILED:
    case RunnerErrorCode.DISPATCH_NONZERO_EXIT:
    case RunnerErrorCode.DISPATCH_SIGNALLED:
    case RunnerErrorCode.DISPATCH_TIMEOUT:
      return ExitCodes.BATCH_HALTED;
    case RunnerErrorCode.RUNTIME_INTERNAL_ERROR:
      return ExitCodes.INTERNAL_ERROR;
  }
}

export function getSuggestedAction(code: RunnerErrorCode): string {
  switch (code) {
    case RunnerErrorCode.CONFIG_INVALID:
      return 'Check the command-line flags and WORKRUN_* environment variables';
    case RunnerErrorCode.DISCOVERY_DIR_NOT_FOUND:
      return 'Create the directory or point --dir at an existing one';
    case RunnerErrorCode.DISCOVERY_NOT_A_DIRECTORY:
      return 'Point --dir at a directory, not a file';
    case RunnerErrorCode.DISCOVERY_PERMISSION_DENIED:
      return 'Check the read and execute permissions of the directory';
    case RunnerErrorCode.DISCOVERY_READ_FAILED:
      return 'Check that the directory is accessible';
    case RunnerErrorCode.DISPATCH_SPAWN_FAILED:
      return 'Check that the worker command exists and is on PATH (see --worker)';
    case RunnerErrorCode.DISPATCH_NONZERO_EXIT:
      return 'See the worker output above for the cause';
    case RunnerErrorCode.DISPATCH_SIGNALLED:
      return 'The worker was killed; check for memory pressure or external signals';
    case RunnerErrorCode.DISPATCH_TIMEOUT:
      return 'Raise --timeout or investigate why the task runs long';
    case RunnerErrorCode.RUNTIME_INTERNAL_ERROR:
      return 'Re-run with --verbose and report the stack trace';
  }
}
