/**
 * Consumption side of the `.pandora` format: validates an archive and exposes
 * it as a paginated, lazily resolved document.
 */

export { loadArchive, type LoadResult } from './load-archive.js';
export { ArchiveLoadError, type ArchiveLoadErrorCode } from './errors.js';
export { validateManifest, type ManifestValidation } from './validate-manifest.js';
export { PaginatedDocument, type ResolvedBlock, type ResolvedPage, type ViewerPage } from './paginated-document.js';
export { listArchiveEntries } from './archive-reader.js';
export { mediaTypeFor } from './media-types.js';
