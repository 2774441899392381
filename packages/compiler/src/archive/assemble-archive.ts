import { readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { strToU8, zipSync, type Zippable } from 'fflate';
import { silentLogger, type Logger } from '@pandora/common';
import {
  MANIFEST_FILE,
  RENDER_FAILED_ASSET_REF,
  serializeManifest,
  type DocumentManifest,
} from '@pandora/contracts';
import { CompileError, errorMessage } from '../errors.js';

/** Fixed entry timestamp so identical inputs produce identical archives. */
export const ARCHIVE_ENTRY_MTIME = new Date(2000, 0, 1);

/** Formats that are already compressed and gain nothing from deflate. */
const STORED_EXTENSIONS = new Set(['mp4', 'webm', 'mov', 'mkv', 'png', 'jpg', 'jpeg', 'gif', 'webp']);

const DEFLATE_LEVEL = 6;

function compressionLevel(path: string): 0 | 6 {
  const ext = path.slice(path.lastIndexOf('.') + 1).toLowerCase();
  return STORED_EXTENSIONS.has(ext) ? 0 : DEFLATE_LEVEL;
}

export interface AssembleOptions {
  /** Directory holding the staged assets, laid out by `asset_ref`. */
  stagingDir: string;
  outputPath: string;
  logger?: Logger;
}

export interface AssembledArchive {
  outputPath: string;
  byteLength: number;
  /** Archive entry names in write order, manifest first. */
  entries: string[];
}

/**
 * Builds the zip entry table: the manifest first, then one entry per asset in
 * sequence order. Blocks carrying the render-failed sentinel have no entry.
 */
export async function collectArchiveEntries(manifest: DocumentManifest, stagingDir: string): Promise<Zippable> {
  const entries: Zippable = {
    [MANIFEST_FILE]: [strToU8(serializeManifest(manifest)), { level: DEFLATE_LEVEL, mtime: ARCHIVE_ENTRY_MTIME }],
  };

  for (const block of manifest.blocks) {
    const assetRef = block.asset_ref;
    if (assetRef === null || assetRef === RENDER_FAILED_ASSET_REF) continue;

    let bytes: Uint8Array;
    try {
      bytes = await readFile(join(stagingDir, assetRef));
    } catch (error) {
      throw new CompileError('ARCHIVE_WRITE_FAILED', `Staged asset ${assetRef} could not be read.`, {
        sequenceIndex: block.sequence_index,
        message: errorMessage(error),
      });
    }
    entries[assetRef] = [bytes, { level: compressionLevel(assetRef), mtime: ARCHIVE_ENTRY_MTIME }];
  }

  return entries;
}

/**
 * Packages the manifest and staged assets into a single `.pandora` file.
 *
 * The archive is written next to the destination and renamed into place, so a
 * failed write never leaves a partial archive at `outputPath`.
 *
 * @throws {CompileError} ARCHIVE_WRITE_FAILED
 */
export async function assembleArchive(manifest: DocumentManifest, options: AssembleOptions): Promise<AssembledArchive> {
  const logger = options.logger ?? silentLogger;
  const entries = await collectArchiveEntries(manifest, options.stagingDir);
  const archive = zipSync(entries);
  const partialPath = `${options.outputPath}.partial`;

  try {
    await writeFile(partialPath, archive);
    await rename(partialPath, options.outputPath);
  } catch (error) {
    await rm(partialPath, { force: true });
    throw new CompileError('ARCHIVE_WRITE_FAILED', `Unable to write archive to ${options.outputPath}.`, {
      message: errorMessage(error),
    });
  }

  const names = Object.keys(entries);
  logger.debug(`Wrote ${names.length} entries (${archive.byteLength} bytes) to ${options.outputPath}`);
  return { outputPath: options.outputPath, byteLength: archive.byteLength, entries: names };
}
