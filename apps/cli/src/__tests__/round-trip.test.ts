import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { compileDocument, inferLayout, segmentDocument } from '@pandora/compiler';
import { loadArchive } from '@pandora/viewer';
import { TEST_MATH_STYLE, createStubRenderers } from './fixtures.js';

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), 'pandora-round-trip-'));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

const DOCUMENTS: Array<[string, string]> = [
  ['a single text block', 'Just some $x$.'],
  ['breaks between blocks', 'One\n\\newpage\nTwo \\manim{self.wait()}\n%% pagebreak\nThree'],
  ['a two-column document with a failed block', '%% twocolumn\nIntro\n\\manim{FAIL}\n\\breakpage\nOutro\n\\newpage'],
  ['a leading break', '\\newpage\nFirst\n\\newpage\n\\newpage\nSecond'],
];

describe('compile then load', () => {
  it.each(DOCUMENTS)('reproduces the inferred layout for %s', async (_label, source) => {
    const expected = inferLayout(segmentDocument(source));
    const result = await compileDocument({
      source,
      sourceDir: workDir,
      outputPath: join(workDir, 'doc.pandora'),
      renderers: createStubRenderers(),
      mathStyle: TEST_MATH_STYLE,
    });

    const loaded = loadArchive(await readFile(result.outputPath));
    if (!loaded.ok) throw new Error(`archive rejected: ${loaded.error.message}`);
    const { document } = loaded;

    expect(document.layoutMode).toBe(expected.layoutMode);
    expect(document.pageCount).toBe(result.pageCount);
    expect(document.pages.map((page) => page.blocks.map((block) => block.sequence_index))).toEqual(
      expected.pages.map((page) => page.blocks.map((block) => block.sequenceIndex)),
    );
  });
});
