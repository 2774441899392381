import { readFile } from 'node:fs/promises';
import { RENDER_FAILED_ASSET_REF } from '@pandora/contracts';
import { loadArchive } from '@pandora/viewer';
import { parseArgs } from '../lib/args.js';
import { CliError } from '../lib/errors.js';
import type { CommandContext, CommandExecution } from '../lib/types.js';

export const INSPECT_USAGE = 'pandora inspect <archive>';

export async function runInspect(tokens: string[], _context: CommandContext): Promise<CommandExecution> {
  const args = parseArgs(tokens, { values: [] });
  const [archivePath, ...extra] = args.positionals;
  if (archivePath === undefined) {
    throw new CliError('MISSING_REQUIRED', `inspect: missing <archive>. Usage: ${INSPECT_USAGE}`);
  }
  if (extra.length > 0) {
    throw new CliError('INVALID_ARGUMENT', `inspect: unexpected argument "${extra[0]}".`);
  }

  let bytes: Uint8Array;
  try {
    bytes = await readFile(archivePath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError('FILE_READ_ERROR', `Unable to read archive: ${archivePath}`, { message });
  }

  const loaded = loadArchive(bytes);
  if (!loaded.ok) {
    const { error } = loaded;
    throw new CliError('ARCHIVE_INVALID', `${archivePath}: ${error.message}`, {
      code: error.code,
      ...(error.sequenceIndex === undefined ? {} : { sequenceIndex: error.sequenceIndex }),
    });
  }

  const { document } = loaded;
  const pages = document.pages.map((page) => ({
    index: page.index,
    blocks: page.blocks.map((block) => ({
      sequenceIndex: block.sequence_index,
      kind: block.kind,
      assetRef: block.asset_ref,
      failed: block.asset_ref === RENDER_FAILED_ASSET_REF,
    })),
  }));

  const lines = [
    `${archivePath}: ${document.blockCount} blocks, ${document.pageCount} pages, layout ${document.layoutMode}`,
  ];
  for (const page of pages) {
    lines.push(`Page ${page.index + 1}`);
    for (const block of page.blocks) {
      const target = block.failed ? 'render failed' : block.assetRef;
      lines.push(`  #${block.sequenceIndex} ${block.kind.padEnd(16)} ${target}`);
    }
  }

  return {
    command: 'inspect',
    data: {
      layoutMode: document.layoutMode,
      blockCount: document.blockCount,
      pageCount: document.pageCount,
      pages,
    },
    pretty: lines.join('\n'),
  };
}
