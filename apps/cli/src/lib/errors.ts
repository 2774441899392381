import { CompileError, type CompileErrorCode } from '@pandora/compiler';

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'MISSING_REQUIRED'
  | 'UNKNOWN_COMMAND'
  | 'INVALID_CONFIG'
  | 'FILE_READ_ERROR'
  | 'FILE_WRITE_ERROR'
  | 'ARCHIVE_INVALID'
  | 'CANCELLED'
  | 'COMMAND_FAILED';

export class CliError extends Error {
  readonly code: CliErrorCode;
  readonly details?: unknown;
  readonly exitCode: number;

  constructor(code: CliErrorCode, message: string, details?: unknown, exitCode = 1) {
    super(message);
    Object.setPrototypeOf(this, CliError.prototype);
    this.name = 'CliError';
    this.code = code;
    this.details = details;
    this.exitCode = exitCode;
  }
}

const COMPILE_ERROR_CODES: Record<CompileErrorCode, CliErrorCode> = {
  INPUT_UNREADABLE: 'FILE_READ_ERROR',
  OUTPUT_UNWRITABLE: 'FILE_WRITE_ERROR',
  STAGING_FAILED: 'FILE_WRITE_ERROR',
  ASSET_WRITE_FAILED: 'FILE_WRITE_ERROR',
  ARCHIVE_WRITE_FAILED: 'FILE_WRITE_ERROR',
  INVALID_CONFIG: 'INVALID_CONFIG',
  CANCELLED: 'CANCELLED',
};

/** Exit code for an interrupted run (128 + SIGINT). */
const CANCELLED_EXIT_CODE = 130;

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;

  if (error instanceof CompileError) {
    const code = COMPILE_ERROR_CODES[error.code];
    return new CliError(code, error.message, error.details, code === 'CANCELLED' ? CANCELLED_EXIT_CODE : 1);
  }

  if (error instanceof Error) {
    return new CliError('COMMAND_FAILED', error.message, {
      name: error.name,
    });
  }

  return new CliError('COMMAND_FAILED', 'Unknown error', {
    error,
  });
}
