export type CompileErrorCode =
  | 'INPUT_UNREADABLE'
  | 'OUTPUT_UNWRITABLE'
  | 'STAGING_FAILED'
  | 'ASSET_WRITE_FAILED'
  | 'ARCHIVE_WRITE_FAILED'
  | 'INVALID_CONFIG'
  | 'CANCELLED';

/**
 * Fatal compilation error. No archive is produced when one is thrown.
 *
 * Consumers should prefer checking `error.code` over `instanceof` for resilience
 * across package boundaries.
 */
export class CompileError extends Error {
  readonly code: CompileErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: CompileErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CompileError';
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, CompileError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
