import { access, mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { silentLogger, type Logger } from '@pandora/common';
import { buildManifest, type DocumentManifest, type MathStyle, type RendererSet } from '@pandora/contracts';
import { assembleArchive } from './archive/index.js';
import { resolveCompilerConfig, type CompilerConfig } from './config.js';
import { dispatchRenders, type RenderWarning } from './dispatch/index.js';
import { CompileError, errorMessage } from './errors.js';
import { inferLayout } from './layout/index.js';
import { segmentDocument, type SegmentWarning } from './segmenter/index.js';

export type CompileWarning = ({ stage: 'segment' } & SegmentWarning) | ({ stage: 'render' } & RenderWarning);

export interface CompileOptions {
  /** Raw markup. */
  source: string;
  /** Directory image/video references are resolved against. Defaults to the working directory. */
  sourceDir?: string;
  outputPath: string;
  renderers: RendererSet;
  mathStyle: MathStyle;
  /** Validated configuration; defaults apply when omitted. */
  config?: CompilerConfig;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface CompileResult {
  outputPath: string;
  manifest: DocumentManifest;
  pageCount: number;
  byteLength: number;
  warnings: CompileWarning[];
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CompileError('CANCELLED', 'Compilation was cancelled.');
  }
}

async function assertOutputWritable(outputPath: string): Promise<void> {
  const directory = dirname(resolve(outputPath));
  try {
    if (!(await stat(directory)).isDirectory()) {
      throw new Error(`${directory} is not a directory`);
    }
    await access(directory, fsConstants.W_OK);
  } catch (error) {
    throw new CompileError('OUTPUT_UNWRITABLE', `Cannot write archive to ${outputPath}.`, {
      message: errorMessage(error),
    });
  }
}

/**
 * Compiles markup into a `.pandora` archive.
 *
 * Segmentation and layout run first and fix sequence indices and page breaks;
 * renders are then dispatched concurrently and the archive is assembled once
 * every render has settled. Per-block problems come back as warnings. Fatal
 * problems throw and leave no archive behind.
 *
 * @throws {CompileError}
 */
export async function compileDocument(options: CompileOptions): Promise<CompileResult> {
  const logger = options.logger ?? silentLogger;
  const config = options.config ?? resolveCompilerConfig();
  const { signal } = options;

  throwIfCancelled(signal);
  await assertOutputWritable(options.outputPath);

  const segmented = segmentDocument(options.source);
  const layout = inferLayout(segmented);
  logger.info(
    `Segmented ${layout.blocks.length} blocks on ${layout.pages.length} page(s), layout ${layout.layoutMode}`,
  );
  for (const warning of segmented.warnings) {
    logger.warn(`Line ${warning.line}: ${warning.message}; kept as text`);
  }

  let stagingDir: string;
  try {
    stagingDir = await mkdtemp(join(tmpdir(), 'pandora-'));
  } catch (error) {
    throw new CompileError('STAGING_FAILED', 'Unable to create a staging directory.', { message: errorMessage(error) });
  }

  try {
    const dispatched = await dispatchRenders(layout.blocks, {
      renderers: options.renderers,
      mathStyle: options.mathStyle,
      stagingDir,
      sourceDir: options.sourceDir ?? process.cwd(),
      concurrency: config.concurrency,
      renderTimeoutMs: config.renderTimeoutMs,
      signal,
      logger: logger.child('RenderDispatcher'),
    });

    throwIfCancelled(signal);
    const manifest = buildManifest(layout.layoutMode, dispatched.blocks);
    const archive = await assembleArchive(manifest, {
      stagingDir,
      outputPath: options.outputPath,
      logger: logger.child('ArchiveAssembler'),
    });

    return {
      outputPath: archive.outputPath,
      manifest,
      pageCount: layout.pages.length,
      byteLength: archive.byteLength,
      warnings: [
        ...segmented.warnings.map((warning): CompileWarning => ({ stage: 'segment', ...warning })),
        ...dispatched.warnings.map((warning): CompileWarning => ({ stage: 'render', ...warning })),
      ],
    };
  } finally {
    await rm(stagingDir, { recursive: true, force: true });
  }
}

export type CompileFileOptions = Omit<CompileOptions, 'source' | 'sourceDir' | 'outputPath'>;

/**
 * Reads `inputPath` and compiles it to `outputPath`. Media references resolve
 * relative to the input file.
 *
 * @throws {CompileError} INPUT_UNREADABLE, plus everything {@link compileDocument} throws
 */
export async function compileFile(
  inputPath: string,
  outputPath: string,
  options: CompileFileOptions,
): Promise<CompileResult> {
  let source: string;
  try {
    source = await readFile(inputPath, 'utf8');
  } catch (error) {
    throw new CompileError('INPUT_UNREADABLE', `Unable to read ${inputPath}.`, { message: errorMessage(error) });
  }

  return compileDocument({
    ...options,
    source,
    sourceDir: dirname(resolve(inputPath)),
    outputPath,
  });
}
