export type ArchiveLoadErrorCode =
  | 'ARCHIVE_UNREADABLE'
  | 'MANIFEST_MISSING'
  | 'MANIFEST_PARSE_ERROR'
  | 'MANIFEST_INVALID'
  | 'UNSUPPORTED_VERSION'
  | 'BLOCK_INVALID'
  | 'SEQUENCE_GAP'
  | 'ASSET_REF_MISSING'
  | 'ASSET_NAMESPACE_MISMATCH'
  | 'ASSET_NOT_FOUND';

/**
 * Structural problem that makes an archive unviewable. `sequenceIndex` names the
 * first offending block when the problem is block-level.
 */
export class ArchiveLoadError extends Error {
  readonly code: ArchiveLoadErrorCode;
  readonly sequenceIndex?: number;
  readonly field?: string;

  constructor(code: ArchiveLoadErrorCode, message: string, location: { sequenceIndex?: number; field?: string } = {}) {
    super(message);
    this.name = 'ArchiveLoadError';
    this.code = code;
    this.sequenceIndex = location.sequenceIndex;
    this.field = location.field;
    Object.setPrototypeOf(this, ArchiveLoadError.prototype);
  }
}
