import { describe, expect, it } from 'vitest';
import { groupIntoPages } from './pagination.js';

type Item = { id: number; brk: boolean };
const starts = (item: Item) => item.brk;

describe('groupIntoPages', () => {
  it('returns no pages for no blocks', () => {
    expect(groupIntoPages<Item>([], starts)).toEqual([]);
  });

  it('puts everything on one page without breaks', () => {
    const pages = groupIntoPages(
      [
        { id: 0, brk: false },
        { id: 1, brk: false },
      ],
      starts,
    );
    expect(pages).toHaveLength(1);
    expect(pages[0].blocks.map((b) => b.id)).toEqual([0, 1]);
  });

  it('opens a page at each flagged block', () => {
    const pages = groupIntoPages(
      [
        { id: 0, brk: false },
        { id: 1, brk: true },
        { id: 2, brk: false },
        { id: 3, brk: true },
      ],
      starts,
    );
    expect(pages.map((p) => [p.index, p.blocks.map((b) => b.id)])).toEqual([
      [0, [0]],
      [1, [1, 2]],
      [2, [3]],
    ]);
  });

  it('does not open an empty page for a flag on the first block', () => {
    const pages = groupIntoPages(
      [
        { id: 0, brk: true },
        { id: 1, brk: false },
      ],
      starts,
    );
    expect(pages).toHaveLength(1);
    expect(pages[0].blocks).toHaveLength(2);
  });
});
