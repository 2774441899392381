import type { BlockOptions } from '@pandora/contracts';
import type {
  ContentFragment,
  Fragment,
  LayoutDirectiveMarker,
  PageBreakMarker,
  SegmentWarning,
  SegmentWarningCode,
  SegmentedDocument,
} from './types.js';

// ============================================================================
// Constants
// ============================================================================

const ANIMATION_ENVIRONMENT = 'manim';
const ANIMATION_END_MARKER = `\\end{${ANIMATION_ENVIRONMENT}}`;

/** Commands taking `[options]{argument}`, keyed by command name. */
const INLINE_ARGUMENT_COMMANDS = {
  image: 'image',
  video: 'video',
  manim: 'animation-inline',
} as const satisfies Record<string, ContentFragment['kind']>;

type InlineArgumentCommand = keyof typeof INLINE_ARGUMENT_COMMANDS;

function isInlineArgumentCommand(name: string): name is InlineArgumentCommand {
  return Object.hasOwn(INLINE_ARGUMENT_COMMANDS, name);
}

const PAGE_BREAK_COMMANDS = new Set(['newpage', 'breakpage']);

/** `%% pagebreak` / `%% twocolumn`, alone on their line. */
const COMMENT_DIRECTIVE = /^%%[ \t]*(pagebreak|twocolumn)[ \t\r]*$/i;

// ============================================================================
// Argument parsing
// ============================================================================

type ArgumentResult = { ok: true; value: string; end: number } | { ok: false; reason: string };

/**
 * Reads `[ … ]` starting at `start` (which must be `[`). The bracket must close
 * on the same line and may not nest.
 */
function readOptionalArgument(source: string, start: number): ArgumentResult {
  for (let i = start + 1; i < source.length; i += 1) {
    const ch = source[i];
    if (ch === ']') return { ok: true, value: source.slice(start + 1, i), end: i + 1 };
    if (ch === '[' || ch === '\n') break;
  }
  return { ok: false, reason: 'unbalanced optional argument' };
}

/**
 * Reads a brace-balanced `{ … }` starting at `start` (which must be `{`).
 * Escaped braces (`\{`, `\}`) do not count towards the balance.
 */
function readMandatoryArgument(source: string, start: number): ArgumentResult {
  let depth = 0;
  for (let i = start; i < source.length; i += 1) {
    const ch = source[i];
    if (ch === '\\') {
      i += 1;
      continue;
    }
    if (ch === '{') depth += 1;
    if (ch === '}') {
      depth -= 1;
      if (depth === 0) return { ok: true, value: source.slice(start + 1, i), end: i + 1 };
    }
  }
  return { ok: false, reason: 'unbalanced argument braces' };
}

/**
 * Parses `key=value, flag` into an options map. A bare key maps to `"true"`.
 * Returns `null` when an entry has no key.
 */
export function parseOptions(raw: string): BlockOptions | null {
  const entries: Array<[string, string]> = [];
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) continue;
    const eq = trimmed.indexOf('=');
    const key = (eq === -1 ? trimmed : trimmed.slice(0, eq)).trim();
    if (!key) return null;
    entries.push([key, eq === -1 ? 'true' : trimmed.slice(eq + 1).trim()]);
  }
  // fromEntries defines own properties, so keys like `__proto__` survive.
  return Object.fromEntries(entries);
}

function isLetter(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z]/.test(ch);
}

// ============================================================================
// Scanner
// ============================================================================

/**
 * Single forward pass over the source. Recognized constructs become fragments;
 * everything else accumulates into the pending text run.
 */
class DocumentScanner {
  private readonly source: string;
  private readonly lineStarts: number[];
  private readonly fragments: Fragment[] = [];
  private readonly warnings: SegmentWarning[] = [];
  private pos = 0;
  private nextSequenceIndex = 0;
  private pendingText = '';
  private pendingTextStart = 0;

  constructor(source: string) {
    this.source = source;
    this.lineStarts = [0];
    for (let i = 0; i < source.length; i += 1) {
      if (source[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  run(): SegmentedDocument {
    const { source } = this;
    while (this.pos < source.length) {
      const ch = source[this.pos];
      if (ch === '\\') {
        this.scanBackslash();
      } else if (ch === '%') {
        this.scanComment();
      } else {
        this.appendText(ch);
        this.pos += 1;
      }
    }
    this.flushText();
    return { fragments: this.fragments, warnings: this.warnings };
  }

  private scanBackslash(): void {
    const start = this.pos;
    const next = this.source[start + 1];

    // `\\`, `\%`, `\{`, `\(` … never start a command.
    if (!isLetter(next)) {
      this.appendText(this.source.slice(start, start + 2));
      this.pos = start + 2;
      return;
    }

    let end = start + 1;
    while (isLetter(this.source[end])) end += 1;
    const name = this.source.slice(start + 1, end);

    if (!this.tryCommand(name, start, end)) {
      this.appendText(this.source.slice(start, end), start);
      this.pos = end;
    }
  }

  private scanComment(): void {
    const start = this.pos;
    const newline = this.source.indexOf('\n', start);
    const lineEnd = newline === -1 ? this.source.length : newline;
    const comment = this.source.slice(start, lineEnd);

    const directive = this.isAtLineStart(start) ? COMMENT_DIRECTIVE.exec(comment) : null;
    if (!directive) {
      // Ordinary comment: copied through, commands inside it stay inert.
      this.appendText(comment, start);
      this.pos = lineEnd;
      return;
    }

    const line = this.lineAt(start);
    if (directive[1].toLowerCase() === 'pagebreak') {
      this.pushMarker({ kind: 'page-break', spelling: 'directive', line });
    } else {
      this.pushLayoutDirective({ kind: 'layout-directive', mode: 'two-column', spelling: 'directive', line });
    }
    this.pos = newline === -1 ? lineEnd : lineEnd + 1;
  }

  /**
   * Handles a recognized command. Returns false when the command is unknown or
   * malformed, in which case the caller copies its name through as text.
   */
  private tryCommand(name: string, start: number, nameEnd: number): boolean {
    if (PAGE_BREAK_COMMANDS.has(name)) {
      this.pushMarker({
        kind: 'page-break',
        spelling: name === 'newpage' ? 'newpage' : 'breakpage',
        line: this.lineAt(start),
      });
      this.pos = nameEnd;
      return true;
    }

    if (name === 'twocolumn') {
      this.pushLayoutDirective({
        kind: 'layout-directive',
        mode: 'two-column',
        spelling: 'command',
        line: this.lineAt(start),
      });
      this.pos = nameEnd;
      return true;
    }

    if (name === 'begin') {
      return this.tryAnimationEnvironment(start, nameEnd);
    }

    if (isInlineArgumentCommand(name)) {
      return this.tryInlineArgumentCommand(name, start, nameEnd);
    }

    return false;
  }

  private tryAnimationEnvironment(start: number, nameEnd: number): boolean {
    const opener = `{${ANIMATION_ENVIRONMENT}}`;
    if (!this.source.startsWith(opener, nameEnd)) return false;

    let bodyStart = nameEnd + opener.length;
    let options: BlockOptions = {};
    if (this.source[bodyStart] === '[') {
      const parsed = this.readOptions(bodyStart);
      if (!parsed) {
        this.warn('MALFORMED_COMMAND', `Malformed options on \\begin{${ANIMATION_ENVIRONMENT}}`, start);
        return false;
      }
      options = parsed.options;
      bodyStart = parsed.end;
    }

    const endIndex = this.source.indexOf(ANIMATION_END_MARKER, bodyStart);
    if (endIndex === -1) {
      // The rest of the document is the unterminated body; none of it is scanned.
      this.warn('UNTERMINATED_ENVIRONMENT', `\\begin{${ANIMATION_ENVIRONMENT}} has no matching end`, start);
      this.appendText(this.source.slice(start), start);
      this.pos = this.source.length;
      return true;
    }

    this.pushContent('animation-scene', this.source.slice(bodyStart, endIndex), options, start);
    this.pos = endIndex + ANIMATION_END_MARKER.length;
    return true;
  }

  private tryInlineArgumentCommand(name: InlineArgumentCommand, start: number, nameEnd: number): boolean {
    let cursor = nameEnd;
    let options: BlockOptions = {};

    if (this.source[cursor] === '[') {
      const parsed = this.readOptions(cursor);
      if (!parsed) {
        this.warn('MALFORMED_COMMAND', `Malformed options on \\${name}`, start);
        return false;
      }
      options = parsed.options;
      cursor = parsed.end;
    }

    if (this.source[cursor] !== '{') {
      this.warn('MALFORMED_COMMAND', `\\${name} is missing its argument`, start);
      return false;
    }

    const argument = readMandatoryArgument(this.source, cursor);
    if (!argument.ok) {
      this.warn('MALFORMED_COMMAND', `\\${name}: ${argument.reason}`, start);
      return false;
    }

    const payload = argument.value.trim();
    if (!payload) {
      this.warn('MALFORMED_COMMAND', `\\${name} has an empty argument`, start);
      return false;
    }

    this.pushContent(INLINE_ARGUMENT_COMMANDS[name], payload, options, start);
    this.pos = argument.end;
    return true;
  }

  private readOptions(start: number): { options: BlockOptions; end: number } | null {
    const raw = readOptionalArgument(this.source, start);
    if (!raw.ok) return null;
    const options = parseOptions(raw.value);
    return options ? { options, end: raw.end } : null;
  }

  // --------------------------------------------------------------------------
  // Output
  // --------------------------------------------------------------------------

  private appendText(text: string, offset = this.pos): void {
    if (!this.pendingText) this.pendingTextStart = offset;
    this.pendingText += text;
  }

  private flushText(): void {
    const text = this.pendingText;
    this.pendingText = '';
    if (!text.trim()) return;
    this.fragments.push({
      kind: 'text',
      sequenceIndex: this.nextSequenceIndex++,
      payload: text,
      options: {},
      line: this.lineAt(this.pendingTextStart),
    });
  }

  private pushContent(kind: Exclude<ContentFragment['kind'], 'text'>, payload: string, options: BlockOptions, start: number): void {
    this.flushText();
    this.fragments.push({
      kind,
      sequenceIndex: this.nextSequenceIndex++,
      payload,
      options,
      line: this.lineAt(start),
    });
  }

  private pushMarker(marker: PageBreakMarker): void {
    this.flushText();
    this.fragments.push(marker);
  }

  /**
   * Layout directives only switch the document mode. The directive itself is
   * dropped and the surrounding text stays one run, so the marker lands ahead
   * of the text it was written in.
   */
  private pushLayoutDirective(marker: LayoutDirectiveMarker): void {
    this.fragments.push(marker);
  }

  private warn(code: SegmentWarningCode, message: string, offset: number): void {
    this.warnings.push({ code, message, line: this.lineAt(offset) });
  }

  // --------------------------------------------------------------------------
  // Positions
  // --------------------------------------------------------------------------

  private isAtLineStart(offset: number): boolean {
    for (let i = offset - 1; i >= 0; i -= 1) {
      const ch = this.source[i];
      if (ch === '\n') return true;
      if (ch !== ' ' && ch !== '\t') return false;
    }
    return true;
  }

  private lineAt(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return low + 1;
  }
}

/**
 * Splits raw markup into an ordered fragment stream.
 *
 * Content fragments get contiguous sequence indices in document order; page
 * breaks and layout directives are markers without an index. Malformed
 * commands never fail the document: they are kept as text and reported in
 * `warnings`.
 */
export function segmentDocument(source: string): SegmentedDocument {
  return new DocumentScanner(source).run();
}
