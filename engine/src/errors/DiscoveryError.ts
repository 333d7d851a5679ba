/**
 * Discovery Error
 *
 * Describes why the workload directory could not be listed. Discovery errors
 * are warnings: the batch runs with zero tasks.
 *
 * @module errors
 */

import { RunnerError } from './RunnerError.js';
import { RunnerErrorCode, ErrorSeverity } from './ErrorCodes.js';

export class DiscoveryError extends RunnerError {
  public readonly directory: string;

  constructor(params: {
    code: RunnerErrorCode;
    message: string;
    directory: string;
    errno?: string;
    cause?: unknown;
  }) {
    super(
      {
        code: params.code,
        message: params.message,
        severity: ErrorSeverity.WARNING,
        path: params.directory,
        context: {
          directory: params.directory,
          errno: params.errno,
        },
      },
      { cause: params.cause }
    );
    this.directory = params.directory;
  }

  static notFound(directory: string, cause?: unknown): DiscoveryError {
    return new DiscoveryError({
      code: RunnerErrorCode.DISCOVERY_DIR_NOT_FOUND,
      message: `Workload directory not found: ${directory}`,
      directory,
      errno: 'ENOENT',
      cause,
    });
  }

  static notADirectory(directory: string, cause?: unknown): DiscoveryError {
    return new DiscoveryError({
      code: RunnerErrorCode.DISCOVERY_NOT_A_DIRECTORY,
      message: `Workload path is not a directory: ${directory}`,
      directory,
      errno: 'ENOTDIR',
      cause,
    });
  }

  static permissionDenied(directory: string, errno: string, cause?: unknown): DiscoveryError {
    return new DiscoveryError({
      code: RunnerErrorCode.DISCOVERY_PERMISSION_DENIED,
      message: `Permission denied reading workload directory: ${directory}`,
      directory,
      errno,
      cause,
    });
  }

  static readFailed(directory: string, reason: string, errno?: string, cause?: unknown): DiscoveryError {
    return new DiscoveryError({
      code: RunnerErrorCode.DISCOVERY_READ_FAILED,
      message: `Failed to read workload directory ${directory}: ${reason}`,
      directory,
      errno,
      cause,
    });
  }

  /**
   * Classify a filesystem error raised while listing `directory`
   */
  static fromFsError(directory: string, error: unknown): DiscoveryError {
    const errno = getErrnoCode(error);
    switch (errno) {
      case 'ENOENT':
        return DiscoveryError.notFound(directory, error);
      case 'ENOTDIR':
        return DiscoveryError.notADirectory(directory, error);
      case 'EACCES':
      case 'EPERM':
        return DiscoveryError.permissionDenied(directory, errno, error);
      default: {
        const reason = error instanceof Error ? error.message : String(error);
        return DiscoveryError.readFailed(directory, reason, errno, error);
      }
    }
  }
}

function getErrnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
