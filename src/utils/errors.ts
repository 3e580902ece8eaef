import { PipBridgeError, ErrorCodes, CommandResult } from '../types/index.js';
import { EXIT_CODES } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the different failure kinds of a pipbridge session
 */

export class NoTargetFoundError extends PipBridgeError {
  constructor(candidates: string[]) {
    const message = candidates.length === 0
      ? 'Could not find a target. Connect a board or use --port, --mount or --dir.'
      : `Found ${candidates.length} possible targets (${candidates.join(', ')}). Choose one with --port, --mount or --dir.`;
    super(message, ErrorCodes.NO_TARGET_FOUND, { candidates });
    this.name = 'NoTargetFoundError';
  }
}

export class MalformedMetadataError extends PipBridgeError {
  constructor(metaDirName: string, reason: string) {
    super(`Malformed metadata in '${metaDirName}': ${reason}`, ErrorCodes.MALFORMED_METADATA, { metaDirName, reason });
    this.name = 'MalformedMetadataError';
  }
}

export class UpstreamUnreachableError extends PipBridgeError {
  constructor(indexUrl: string, reason: string) {
    super(`Index ${indexUrl} is unreachable: ${reason}`, ErrorCodes.UPSTREAM_UNREACHABLE, { indexUrl, reason });
    this.name = 'UpstreamUnreachableError';
  }
}

export class InstallerFailureError extends PipBridgeError {
  public readonly exitCode: number;
  public readonly stderrTail: string;

  constructor(exitCode: number, workspaceDir: string, stderrTail: string = '') {
    super(
      `pip exited with status ${exitCode}. The working environment was left at ${workspaceDir} for inspection.`,
      ErrorCodes.INSTALLER_FAILURE,
      { exitCode, workspaceDir, stderrTail }
    );
    this.name = 'InstallerFailureError';
    this.exitCode = exitCode;
    this.stderrTail = stderrTail;
  }
}

export type TargetOperation = 'list' | 'read' | 'write' | 'delete' | 'mkdir' | 'rmdir' | 'sync' | 'connect' | 'info';

export class TargetIOError extends PipBridgeError {
  public readonly operation: TargetOperation;
  public readonly path: string;

  constructor(operation: TargetOperation, path: string, cause: unknown) {
    super(`Target ${operation} failed for '${path}': ${describeError(cause)}`, ErrorCodes.TARGET_IO_ERROR, { operation, path });
    this.name = 'TargetIOError';
    this.operation = operation;
    this.path = path;
  }
}

export class CompilationFailureError extends PipBridgeError {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Could not compile '${path}': ${reason}`, ErrorCodes.COMPILATION_FAILURE, { path, reason });
    this.name = 'CompilationFailureError';
    this.path = path;
  }
}

export class WorkspaceError extends PipBridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.WORKSPACE_ERROR, details);
    this.name = 'WorkspaceError';
  }
}

export class FileSystemError extends PipBridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends PipBridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends PipBridgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Thrown by a command that finished its work but could not apply all of it.
 */
export class PartialSuccessError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PartialSuccessError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isNodeErrorWithCode(error: unknown, code: string): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === code
  );
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PipBridgeError) {
    // Details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(EXIT_CODES.SUCCESS);
      }

      const result = handleError(error);
      console.error(`ERROR: ${result.error}`);
      process.exit(error instanceof PartialSuccessError ? EXIT_CODES.PARTIAL : EXIT_CODES.FAILURE);
    }
  };
}
