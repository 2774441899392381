import { describe, expect, it } from 'vitest';
import { parseOptions, segmentDocument } from './segment-document.js';
import { isContentFragment, type Fragment } from './types.js';

function kinds(fragments: readonly Fragment[]): string[] {
  return fragments.map((fragment) => fragment.kind);
}

describe('segmentDocument', () => {
  it('splits text, media and page breaks in document order', () => {
    const source = '\\section{A}\nHi \\( x \\)\n\\image[width=50%]{a.png}\n%% pagebreak\nBye';
    const { fragments, warnings } = segmentDocument(source);

    expect(warnings).toEqual([]);
    expect(fragments).toEqual([
      { kind: 'text', sequenceIndex: 0, payload: '\\section{A}\nHi \\( x \\)\n', options: {}, line: 1 },
      { kind: 'image', sequenceIndex: 1, payload: 'a.png', options: { width: '50%' }, line: 3 },
      { kind: 'page-break', spelling: 'directive', line: 4 },
      { kind: 'text', sequenceIndex: 2, payload: 'Bye', options: {}, line: 5 },
    ]);
  });

  it('keeps a document without recognized commands as one text block', () => {
    const source = '\\section{Intro}\nSome $x^2$ math and \\textbf{bold}.\n';
    const { fragments } = segmentDocument(source);
    expect(fragments).toEqual([{ kind: 'text', sequenceIndex: 0, payload: source, options: {}, line: 1 }]);
  });

  it('returns no fragments for empty or whitespace-only input', () => {
    expect(segmentDocument('').fragments).toEqual([]);
    expect(segmentDocument('  \n\t\n').fragments).toEqual([]);
  });

  it('drops whitespace-only text between blocks', () => {
    const { fragments } = segmentDocument('\\image{a.png}\n\n\\image{b.png}\n');
    expect(fragments.map((fragment) => (isContentFragment(fragment) ? fragment.payload : fragment.kind))).toEqual([
      'a.png',
      'b.png',
    ]);
  });

  it('numbers content fragments contiguously and skips markers', () => {
    const { fragments } = segmentDocument('A\\newpage B\\breakpage\n C');
    expect(kinds(fragments)).toEqual(['text', 'page-break', 'text', 'page-break', 'text']);
    expect(fragments.filter(isContentFragment).map((fragment) => fragment.sequenceIndex)).toEqual([0, 1, 2]);
    expect(fragments[1]).toEqual({ kind: 'page-break', spelling: 'newpage', line: 1 });
    expect(fragments[3]).toEqual({ kind: 'page-break', spelling: 'breakpage', line: 1 });
  });

  it('does not treat longer command names as page breaks', () => {
    const { fragments } = segmentDocument('\\newpagestyle{x}');
    expect(fragments).toEqual([{ kind: 'text', sequenceIndex: 0, payload: '\\newpagestyle{x}', options: {}, line: 1 }]);
  });

  it('recognizes two-column directives in both spellings', () => {
    expect(segmentDocument('\\twocolumn\nHello').fragments).toEqual([
      { kind: 'layout-directive', mode: 'two-column', spelling: 'command', line: 1 },
      { kind: 'text', sequenceIndex: 0, payload: '\nHello', options: {}, line: 1 },
    ]);
    expect(segmentDocument('Hello\n%% twocolumn\n').fragments[0]).toEqual({
      kind: 'layout-directive',
      mode: 'two-column',
      spelling: 'directive',
      line: 2,
    });
  });

  it('keeps text around a two-column directive in one block', () => {
    expect(segmentDocument('A\n\\twocolumn\nB').fragments).toEqual([
      { kind: 'layout-directive', mode: 'two-column', spelling: 'command', line: 2 },
      { kind: 'text', sequenceIndex: 0, payload: 'A\n\nB', options: {}, line: 1 },
    ]);
    expect(segmentDocument('A\n%% twocolumn\nB').fragments).toEqual([
      { kind: 'layout-directive', mode: 'two-column', spelling: 'directive', line: 2 },
      { kind: 'text', sequenceIndex: 0, payload: 'A\nB', options: {}, line: 1 },
    ]);
  });

  it('accepts indented, mixed-case directives with trailing spaces and CRLF', () => {
    const { fragments } = segmentDocument('  %% PageBreak  \r\nX');
    expect(fragments).toEqual([
      { kind: 'page-break', spelling: 'directive', line: 1 },
      { kind: 'text', sequenceIndex: 0, payload: 'X', options: {}, line: 2 },
    ]);
  });

  it('ignores directives that do not start their line', () => {
    const source = 'text %% pagebreak\nmore';
    expect(segmentDocument(source).fragments).toEqual([
      { kind: 'text', sequenceIndex: 0, payload: source, options: {}, line: 1 },
    ]);
  });

  it('leaves commands inside comments inert', () => {
    const source = '% \\image{a.png} \\newpage\nafter';
    expect(segmentDocument(source).fragments).toEqual([
      { kind: 'text', sequenceIndex: 0, payload: source, options: {}, line: 1 },
    ]);
  });

  it('does not start a command after an escaped backslash or percent', () => {
    const escaped = '\\\\image{a.png}';
    expect(segmentDocument(escaped).fragments).toEqual([
      { kind: 'text', sequenceIndex: 0, payload: escaped, options: {}, line: 1 },
    ]);

    const { fragments } = segmentDocument('50\\% done \\image{x.png}');
    expect(fragments).toEqual([
      { kind: 'text', sequenceIndex: 0, payload: '50\\% done ', options: {}, line: 1 },
      { kind: 'image', sequenceIndex: 1, payload: 'x.png', options: {}, line: 1 },
    ]);
  });

  it('keeps a trailing lone backslash as text', () => {
    expect(segmentDocument('abc\\').fragments).toEqual([
      { kind: 'text', sequenceIndex: 0, payload: 'abc\\', options: {}, line: 1 },
    ]);
  });

  describe('animation environment', () => {
    it('captures the body between begin and end with options', () => {
      const source = 'Intro\n\\begin{manim}[quality=h]\n  self.play(Create(Circle()))\n\\end{manim}\nOutro';
      const { fragments } = segmentDocument(source);
      expect(fragments).toEqual([
        { kind: 'text', sequenceIndex: 0, payload: 'Intro\n', options: {}, line: 1 },
        {
          kind: 'animation-scene',
          sequenceIndex: 1,
          payload: '\n  self.play(Create(Circle()))\n',
          options: { quality: 'h' },
          line: 2,
        },
        { kind: 'text', sequenceIndex: 2, payload: '\nOutro', options: {}, line: 4 },
      ]);
    });

    it('keeps an unterminated environment as text and warns', () => {
      const source = '\\begin{manim}\nself.play()';
      const { fragments, warnings } = segmentDocument(source);
      expect(fragments).toEqual([{ kind: 'text', sequenceIndex: 0, payload: source, options: {}, line: 1 }]);
      expect(warnings).toEqual([
        { code: 'UNTERMINATED_ENVIRONMENT', message: '\\begin{manim} has no matching end', line: 1 },
      ]);
    });

    it('keeps commands inside an unterminated environment as text', () => {
      const source = 'Intro\n\\begin{manim}\n\\image{a.png}\n\\newpage';
      const { fragments, warnings } = segmentDocument(source);
      expect(fragments).toEqual([{ kind: 'text', sequenceIndex: 0, payload: source, options: {}, line: 1 }]);
      expect(warnings).toEqual([
        { code: 'UNTERMINATED_ENVIRONMENT', message: '\\begin{manim} has no matching end', line: 2 },
      ]);
    });

    it('leaves other environments inside the text payload', () => {
      const source = '\\begin{definition}\nA \\emph{set}.\n\\end{definition}';
      expect(segmentDocument(source).fragments).toEqual([
        { kind: 'text', sequenceIndex: 0, payload: source, options: {}, line: 1 },
      ]);
    });
  });

  describe('argument commands', () => {
    it('parses inline animations, videos and their options', () => {
      const { fragments } = segmentDocument('\\manim{self.wait(1)}\\video[autoplay, loop=false]{clip.mp4}');
      expect(fragments).toEqual([
        { kind: 'animation-inline', sequenceIndex: 0, payload: 'self.wait(1)', options: {}, line: 1 },
        {
          kind: 'video',
          sequenceIndex: 1,
          payload: 'clip.mp4',
          options: { autoplay: 'true', loop: 'false' },
          line: 1,
        },
      ]);
    });

    it('balances nested braces and skips escaped ones', () => {
      const { fragments } = segmentDocument('\\manim{Text("{a}\\}")}');
      expect(fragments).toEqual([
        { kind: 'animation-inline', sequenceIndex: 0, payload: 'Text("{a}\\}")', options: {}, line: 1 },
      ]);
    });

    it('trims surrounding whitespace from the argument', () => {
      const { fragments } = segmentDocument('\\image{  figs/a.png \n}');
      expect(fragments).toEqual([{ kind: 'image', sequenceIndex: 0, payload: 'figs/a.png', options: {}, line: 1 }]);
    });

    it.each([
      ['\\image a.png', '\\image is missing its argument'],
      ['\\image{   }', '\\image has an empty argument'],
      ['\\image{a.png', '\\image: unbalanced argument braces'],
      ['\\image[=x]{a.png}', 'Malformed options on \\image'],
      ['\\video[width=1\n]{a.mp4}', 'Malformed options on \\video'],
    ])('falls back to text for %j', (source, message) => {
      const { fragments, warnings } = segmentDocument(source);
      expect(fragments).toEqual([{ kind: 'text', sequenceIndex: 0, payload: source, options: {}, line: 1 }]);
      expect(warnings).toEqual([{ code: 'MALFORMED_COMMAND', message, line: 1 }]);
    });

    it('reports the line of the malformed command', () => {
      const { warnings } = segmentDocument('one\ntwo\n\\manim');
      expect(warnings).toEqual([{ code: 'MALFORMED_COMMAND', message: '\\manim is missing its argument', line: 3 }]);
    });
  });

  it('records the line where each block starts', () => {
    const { fragments } = segmentDocument('\n\nline three \\image{a.png}\n\\video{b.mp4}');
    expect(fragments.filter(isContentFragment).map((fragment) => [fragment.kind, fragment.line])).toEqual([
      ['text', 1],
      ['image', 3],
      ['video', 4],
    ]);
  });
});

describe('parseOptions', () => {
  it('maps key=value pairs and bare flags', () => {
    expect(parseOptions('a=1, b , c = two words')).toEqual({ a: '1', b: 'true', c: 'two words' });
  });

  it('skips empty entries', () => {
    expect(parseOptions('')).toEqual({});
    expect(parseOptions('a=1,,b=2')).toEqual({ a: '1', b: '2' });
  });

  it('keeps everything after the first equals sign', () => {
    expect(parseOptions('size=a=b')).toEqual({ size: 'a=b' });
  });

  it('keeps keys that collide with object prototype names', () => {
    const options = parseOptions('__proto__=x, constructor');
    expect(Object.keys(options ?? {})).toEqual(['__proto__', 'constructor']);
    expect(Object.getOwnPropertyDescriptor(options, '__proto__')?.value).toBe('x');
  });

  it('rejects entries without a key', () => {
    expect(parseOptions('=x')).toBeNull();
    expect(parseOptions('a=1, =2')).toBeNull();
  });
});
