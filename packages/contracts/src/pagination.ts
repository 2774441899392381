import type { PagePlan } from './types.js';

/**
 * Groups blocks into pages. A page starts at the first block and at every block
 * whose page-break flag is set; the flag on the first block does not open an
 * extra page.
 *
 * @example
 * ```typescript
 * groupIntoPages([{ pageBreakBefore: true }, { pageBreakBefore: false }, { pageBreakBefore: true }], (b) => b.pageBreakBefore);
 * // → 2 pages: [b0, b1], [b2]
 * ```
 */
export function groupIntoPages<T>(blocks: readonly T[], startsPage: (block: T) => boolean): PagePlan<T>[] {
  const pages: PagePlan<T>[] = [];
  let current: PagePlan<T> | null = null;

  for (const block of blocks) {
    if (current === null || startsPage(block)) {
      current = { index: pages.length, blocks: [] };
      pages.push(current);
    }
    current.blocks.push(block);
  }

  return pages;
}
