import { strFromU8 } from 'fflate';
import { MANIFEST_FILE } from '@pandora/contracts';
import { listArchiveEntries, readArchiveEntries } from './archive-reader.js';
import { ArchiveLoadError } from './errors.js';
import { PaginatedDocument } from './paginated-document.js';
import { validateManifest } from './validate-manifest.js';

export type LoadResult = { ok: true; document: PaginatedDocument } | { ok: false; error: ArchiveLoadError };

function failed(error: ArchiveLoadError): LoadResult {
  return { ok: false, error };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Opens a `.pandora` archive for viewing.
 *
 * The whole manifest is validated before anything is returned: an archive is
 * either fully viewable or rejected with the first structural problem. Blocks
 * whose render failed are not problems; they display as placeholders.
 */
export function loadArchive(bytes: Uint8Array): LoadResult {
  let entries: Set<string>;
  try {
    entries = listArchiveEntries(bytes);
  } catch (error) {
    return failed(new ArchiveLoadError('ARCHIVE_UNREADABLE', `Archive could not be read: ${errorMessage(error)}`));
  }

  if (!entries.has(MANIFEST_FILE)) {
    return failed(new ArchiveLoadError('MANIFEST_MISSING', `Archive has no ${MANIFEST_FILE}.`));
  }

  let raw: unknown;
  try {
    const manifestBytes = readArchiveEntries(bytes, new Set([MANIFEST_FILE]))[MANIFEST_FILE];
    raw = JSON.parse(strFromU8(manifestBytes));
  } catch (error) {
    return failed(new ArchiveLoadError('MANIFEST_PARSE_ERROR', `${MANIFEST_FILE} is not valid JSON: ${errorMessage(error)}`));
  }

  const validation = validateManifest(raw, entries);
  if (!validation.ok) return failed(validation.error);

  return { ok: true, document: new PaginatedDocument(validation.manifest, bytes) };
}
