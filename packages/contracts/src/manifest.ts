import { MANIFEST_FORMAT, MANIFEST_FORMAT_VERSION } from './constants.js';
import type { Block, BlockOptions, DocumentManifest, LayoutMode, ManifestBlock } from './types.js';

function sortOptions(options: BlockOptions): BlockOptions {
  return Object.fromEntries(Object.entries(options).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function toManifestBlock(block: Block): ManifestBlock {
  return {
    sequence_index: block.sequenceIndex,
    kind: block.kind,
    options: sortOptions(block.options),
    asset_ref: block.assetRef,
    page_break_before: block.pageBreakBefore,
  };
}

export function buildManifest(layoutMode: LayoutMode, blocks: readonly Block[]): DocumentManifest {
  return {
    format: MANIFEST_FORMAT,
    format_version: MANIFEST_FORMAT_VERSION,
    layout_mode: layoutMode,
    blocks: blocks.map(toManifestBlock),
  };
}

/**
 * Serializes a manifest with a stable key order so identical documents produce
 * byte-identical `meta.json` files.
 */
export function serializeManifest(manifest: DocumentManifest): string {
  const ordered: DocumentManifest = {
    format: manifest.format,
    format_version: manifest.format_version,
    layout_mode: manifest.layout_mode,
    blocks: manifest.blocks.map((block) => ({
      sequence_index: block.sequence_index,
      kind: block.kind,
      options: sortOptions(block.options),
      asset_ref: block.asset_ref,
      page_break_before: block.page_break_before,
    })),
  };
  return `${JSON.stringify(ordered, null, 2)}\n`;
}
