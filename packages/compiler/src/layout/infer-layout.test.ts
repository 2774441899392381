import { describe, expect, it } from 'vitest';
import { segmentDocument } from '../segmenter/index.js';
import { detectLayoutMode, inferLayout } from './infer-layout.js';

function layoutOf(source: string) {
  return inferLayout(segmentDocument(source));
}

describe('inferLayout', () => {
  it('moves a page break onto the block that follows it', () => {
    const layout = layoutOf('\\section{A}\nHi \\( x \\)\n\\image[width=50%]{a.png}\n%% pagebreak\nBye');

    expect(layout.layoutMode).toBe('single-column');
    expect(layout.blocks.map(({ sequenceIndex, kind, pageBreakBefore }) => ({ sequenceIndex, kind, pageBreakBefore }))).toEqual([
      { sequenceIndex: 0, kind: 'text', pageBreakBefore: false },
      { sequenceIndex: 1, kind: 'image', pageBreakBefore: false },
      { sequenceIndex: 2, kind: 'text', pageBreakBefore: true },
    ]);
    expect(layout.blocks[1].options).toEqual({ width: '50%' });
    expect(layout.pages.map((page) => page.blocks.map((block) => block.sequenceIndex))).toEqual([[0, 1], [2]]);
  });

  it('leaves every asset unresolved', () => {
    const layout = layoutOf('A \\image{a.png} \\manim{self.wait()}');
    expect(layout.blocks.map((block) => block.assetRef)).toEqual([null, null, null]);
  });

  it('collapses consecutive page breaks into one', () => {
    const layout = layoutOf('A\\newpage\\newpage\n%% pagebreak\nB');
    expect(layout.blocks.map((block) => block.pageBreakBefore)).toEqual([false, true]);
    expect(layout.pages).toHaveLength(2);
  });

  it('ignores a trailing page break', () => {
    const layout = layoutOf('A\n\\newpage\n');
    expect(layout.blocks).toHaveLength(1);
    expect(layout.blocks[0].pageBreakBefore).toBe(false);
    expect(layout.pages).toHaveLength(1);
  });

  it('flags a leading break without opening an empty page', () => {
    const layout = layoutOf('\\newpage A');
    expect(layout.blocks[0].pageBreakBefore).toBe(true);
    expect(layout.pages).toEqual([{ index: 0, blocks: layout.blocks }]);
  });

  it('switches to two columns without splitting the surrounding prose', () => {
    const layout = layoutOf('Para one\n\\twocolumn\nPara two');
    expect(layout.layoutMode).toBe('two-column');
    expect(layout.blocks.map((block) => block.rawPayload)).toEqual(['Para one\n\nPara two']);
  });

  it('produces no blocks and no pages for an empty document', () => {
    expect(layoutOf('')).toEqual({ layoutMode: 'single-column', blocks: [], pages: [] });
  });

  it('copies options so blocks do not share them with fragments', () => {
    const segmented = segmentDocument('\\image[width=2cm]{a.png}');
    const layout = inferLayout(segmented);
    layout.blocks[0].options.width = '3cm';
    const [fragment] = segmented.fragments;
    expect(fragment.kind === 'image' ? fragment.options : undefined).toEqual({ width: '2cm' });
  });
});

describe('detectLayoutMode', () => {
  it.each([
    ['%% twocolumn\nBody', 'two-column'],
    ['Body\n\\twocolumn', 'two-column'],
    ['\\documentclass[a4paper, twocolumn]{article}\nBody', 'two-column'],
    ['\\documentclass[a4paper]{article}\nBody', 'single-column'],
    ['The word twocolumn in prose', 'single-column'],
    ['% \\twocolumn', 'single-column'],
    ['', 'single-column'],
  ])('%j -> %s', (source, expected) => {
    expect(detectLayoutMode(segmentDocument(source).fragments)).toBe(expected);
  });
});
