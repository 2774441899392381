export {
  ARCHIVE_ENTRY_MTIME,
  assembleArchive,
  collectArchiveEntries,
  type AssembleOptions,
  type AssembledArchive,
} from './assemble-archive.js';
