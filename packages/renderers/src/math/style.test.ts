import { describe, expect, it } from 'vitest';
import { CONTENT_PLACEHOLDER, buildLatexDocument, createMathStyle, loadMathStyle } from './style.js';

describe('buildLatexDocument', () => {
  const style = createMathStyle('<%CONTENT%>');

  it('drops author preamble lines and trims the body', () => {
    const snippet = '\\documentclass{article}\n\\usepackage{amsmath}\n\\begin{document}\n$x$\n\\end{document}';
    expect(buildLatexDocument(snippet, style)).toBe('<$x$>');
  });

  it('inserts the snippet literally', () => {
    expect(buildLatexDocument("a $& b $' c", style)).toBe("<a $& b $' c>");
  });

  it('keeps environments the preamble defines', () => {
    expect(buildLatexDocument('\\begin{theorem}A\\end{theorem}', style)).toBe('<\\begin{theorem}A\\end{theorem}>');
  });
});

describe('createMathStyle', () => {
  it('requires the content placeholder', () => {
    expect(() => createMathStyle('\\begin{document}\\end{document}')).toThrow(
      `Math style template is missing the ${CONTENT_PLACEHOLDER} placeholder.`,
    );
  });

  it('returns a frozen style', () => {
    expect(Object.isFrozen(createMathStyle('%CONTENT%'))).toBe(true);
  });
});

describe('loadMathStyle', () => {
  it('loads the bundled preamble', async () => {
    const style = await loadMathStyle();
    expect(style.template).toContain('\\documentclass[preview,12pt]{standalone}');
    expect(style.template).toContain(CONTENT_PLACEHOLDER);
  });
});
