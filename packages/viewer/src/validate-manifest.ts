import {
  MANIFEST_FORMAT,
  MANIFEST_FORMAT_VERSION,
  RENDER_FAILED_ASSET_REF,
  isBlockKind,
  isLayoutMode,
  namespaceForKind,
  type DocumentManifest,
  type ManifestBlock,
} from '@pandora/contracts';
import { ArchiveLoadError } from './errors.js';
import { isInteger, isRecord, isSafeArchivePath, isStringRecord } from './validation-primitives.js';

export type ManifestValidation = { ok: true; manifest: DocumentManifest } | { ok: false; error: ArchiveLoadError };

function invalid(error: ArchiveLoadError): ManifestValidation {
  return { ok: false, error };
}

function blockError(index: number, field: string, message: string): ArchiveLoadError {
  return new ArchiveLoadError('BLOCK_INVALID', `Block ${index}: ${message}`, { sequenceIndex: index, field });
}

/**
 * Checks one manifest entry. Returns the typed block or the error for it.
 */
function validateBlock(
  entry: unknown,
  index: number,
  archiveEntries: ReadonlySet<string>,
): ManifestBlock | ArchiveLoadError {
  if (!isRecord(entry)) return blockError(index, 'block', 'entry is not an object');

  const sequenceIndex = entry.sequence_index;
  if (!isInteger(sequenceIndex)) return blockError(index, 'sequence_index', 'sequence_index must be an integer');
  if (sequenceIndex !== index) {
    return new ArchiveLoadError(
      'SEQUENCE_GAP',
      `Block at position ${index} has sequence_index ${sequenceIndex}; indices must run 0..n-1 in order.`,
      { sequenceIndex: index, field: 'sequence_index' },
    );
  }

  const { kind, options } = entry;
  if (!isBlockKind(kind)) return blockError(index, 'kind', `unknown kind ${JSON.stringify(kind)}`);
  if (!isStringRecord(options)) return blockError(index, 'options', 'options must map strings to strings');

  const pageBreakBefore = entry.page_break_before;
  if (typeof pageBreakBefore !== 'boolean') {
    return blockError(index, 'page_break_before', 'page_break_before must be a boolean');
  }

  const assetRef = entry.asset_ref;
  if (assetRef === null || assetRef === undefined) {
    return new ArchiveLoadError('ASSET_REF_MISSING', `Block ${index} (${kind}) has no asset_ref.`, {
      sequenceIndex: index,
      field: 'asset_ref',
    });
  }
  if (typeof assetRef !== 'string') return blockError(index, 'asset_ref', 'asset_ref must be a string');

  if (assetRef !== RENDER_FAILED_ASSET_REF) {
    const namespace = namespaceForKind(kind);
    if (!assetRef.startsWith(`${namespace}/`) || !isSafeArchivePath(assetRef)) {
      return new ArchiveLoadError(
        'ASSET_NAMESPACE_MISMATCH',
        `Block ${index} (${kind}) references ${assetRef} outside ${namespace}/.`,
        { sequenceIndex: index, field: 'asset_ref' },
      );
    }
    if (!archiveEntries.has(assetRef)) {
      return new ArchiveLoadError('ASSET_NOT_FOUND', `Block ${index} references missing asset ${assetRef}.`, {
        sequenceIndex: index,
        field: 'asset_ref',
      });
    }
  }

  return {
    sequence_index: sequenceIndex,
    kind,
    options: { ...options },
    asset_ref: assetRef,
    page_break_before: pageBreakBefore,
  };
}

/**
 * Validates a parsed `meta.json` against the archive's entry list.
 *
 * Blocks are checked in order and the first problem is reported; a
 * render-failed sentinel is accepted as a resolved asset.
 */
export function validateManifest(raw: unknown, archiveEntries: ReadonlySet<string>): ManifestValidation {
  if (!isRecord(raw)) {
    return invalid(new ArchiveLoadError('MANIFEST_INVALID', 'Manifest is not a JSON object.'));
  }
  if (raw.format !== MANIFEST_FORMAT) {
    return invalid(new ArchiveLoadError('MANIFEST_INVALID', 'Manifest is not a pandora manifest.', { field: 'format' }));
  }
  const formatVersion = raw.format_version;
  if (!isInteger(formatVersion) || formatVersion < 1) {
    return invalid(
      new ArchiveLoadError('MANIFEST_INVALID', 'format_version must be a positive integer.', { field: 'format_version' }),
    );
  }
  if (formatVersion > MANIFEST_FORMAT_VERSION) {
    return invalid(
      new ArchiveLoadError(
        'UNSUPPORTED_VERSION',
        `Archive format_version ${formatVersion} is newer than the supported ${MANIFEST_FORMAT_VERSION}.`,
        { field: 'format_version' },
      ),
    );
  }
  const layoutMode = raw.layout_mode;
  if (!isLayoutMode(layoutMode)) {
    return invalid(new ArchiveLoadError('MANIFEST_INVALID', 'layout_mode is missing or unknown.', { field: 'layout_mode' }));
  }
  if (!Array.isArray(raw.blocks)) {
    return invalid(new ArchiveLoadError('MANIFEST_INVALID', 'blocks must be an array.', { field: 'blocks' }));
  }
  const entries: unknown[] = raw.blocks;

  const blocks: ManifestBlock[] = [];
  for (const [index, entry] of entries.entries()) {
    const checked = validateBlock(entry, index, archiveEntries);
    if (checked instanceof ArchiveLoadError) return invalid(checked);
    blocks.push(checked);
  }

  return {
    ok: true,
    manifest: {
      format: MANIFEST_FORMAT,
      format_version: formatVersion,
      layout_mode: layoutMode,
      blocks,
    },
  };
}
