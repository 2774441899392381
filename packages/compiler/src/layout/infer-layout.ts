import { groupIntoPages, type Block, type LayoutMode, type PagePlan } from '@pandora/contracts';
import { isContentFragment, type Fragment, type SegmentedDocument } from '../segmenter/index.js';

/** `\documentclass[…, twocolumn, …]{…}` inside author text. */
const DOCUMENTCLASS_TWOCOLUMN = /\\documentclass\s*\[[^\]]*\btwocolumn\b[^\]]*\]/;

export interface LayoutResult {
  layoutMode: LayoutMode;
  /** Content blocks in sequence order, page breaks resolved, no assets yet. */
  blocks: Block[];
  pages: PagePlan<Block>[];
}

/**
 * Decides the document-wide column layout. Any two-column directive anywhere in
 * the document selects `two-column`.
 */
export function detectLayoutMode(fragments: readonly Fragment[]): LayoutMode {
  const twoColumn = fragments.some(
    (fragment) =>
      fragment.kind === 'layout-directive' ||
      (fragment.kind === 'text' && DOCUMENTCLASS_TWOCOLUMN.test(fragment.payload)),
  );
  return twoColumn ? 'two-column' : 'single-column';
}

/**
 * Resolves layout markers into block annotations.
 *
 * Page-break markers are dropped and flag the next content block instead;
 * consecutive breaks collapse and a trailing break has no effect.
 */
export function inferLayout(document: SegmentedDocument): LayoutResult {
  const blocks: Block[] = [];
  let breakPending = false;

  for (const fragment of document.fragments) {
    if (fragment.kind === 'page-break') {
      breakPending = true;
      continue;
    }
    if (!isContentFragment(fragment)) continue;

    blocks.push({
      sequenceIndex: fragment.sequenceIndex,
      kind: fragment.kind,
      rawPayload: fragment.payload,
      options: { ...fragment.options },
      pageBreakBefore: breakPending,
      assetRef: null,
      line: fragment.line,
    });
    breakPending = false;
  }

  return {
    layoutMode: detectLayoutMode(document.fragments),
    blocks,
    pages: groupIntoPages(blocks, (block) => block.pageBreakBefore),
  };
}
