import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { MathStyle } from '@pandora/contracts';

export const CONTENT_PLACEHOLDER = '%CONTENT%';

export const DEFAULT_PREAMBLE_PATH = fileURLToPath(new URL('../../assets/preamble.tex', import.meta.url));

/**
 * Author preamble lines dropped from snippets; the style template owns the
 * document class, packages and document environment.
 */
const AUTHOR_PREAMBLE = /\\documentclass.*|\\usepackage.*|\\begin\{document\}|\\end\{document\}/g;

export function createMathStyle(template: string): MathStyle {
  if (!template.includes(CONTENT_PLACEHOLDER)) {
    throw new Error(`Math style template is missing the ${CONTENT_PLACEHOLDER} placeholder.`);
  }
  return Object.freeze({ template });
}

/**
 * Reads a style template from disk (the bundled preamble by default).
 */
export async function loadMathStyle(path: string = DEFAULT_PREAMBLE_PATH): Promise<MathStyle> {
  return createMathStyle(await readFile(path, 'utf8'));
}

/** Produces the standalone LaTeX document for one text block. */
export function buildLatexDocument(snippet: string, style: MathStyle): string {
  const body = snippet.replace(AUTHOR_PREAMBLE, '').trim();
  return style.template.replace(CONTENT_PLACEHOLDER, () => body);
}
