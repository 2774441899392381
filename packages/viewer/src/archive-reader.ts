import { unzipSync, type Unzipped } from 'fflate';

/**
 * Lists entry names without decompressing anything.
 *
 * @throws when the bytes are not a zip archive
 */
export function listArchiveEntries(bytes: Uint8Array): Set<string> {
  const names = new Set<string>();
  unzipSync(bytes, {
    filter: (file) => {
      names.add(file.name);
      return false;
    },
  });
  return names;
}

/** Decompresses only the named entries. */
export function readArchiveEntries(bytes: Uint8Array, names: ReadonlySet<string>): Unzipped {
  if (names.size === 0) return {};
  return unzipSync(bytes, { filter: (file) => names.has(file.name) });
}
