import { copyFile, mkdir, stat } from 'node:fs/promises';
import { dirname, isAbsolute, join, resolve } from 'node:path';
import { runWithConcurrency, silentLogger, type Logger } from '@pandora/common';
import {
  RENDER_FAILED_ASSET_REF,
  renderFailure,
  type Block,
  type BlockKind,
  type MathStyle,
  type RenderFailureCode,
  type RenderOutcome,
  type RendererSet,
} from '@pandora/contracts';
import { CompileError, errorMessage } from '../errors.js';
import { planAssetPaths } from './plan-assets.js';

export interface DispatchOptions {
  renderers: RendererSet;
  mathStyle: MathStyle;
  /** Directory the archive is staged in; asset paths are relative to it. */
  stagingDir: string;
  /** Directory image/video references are resolved against. */
  sourceDir: string;
  concurrency: number;
  renderTimeoutMs: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/** Per-block render failure, reported to the author without failing the compile. */
export interface RenderWarning {
  sequenceIndex: number;
  kind: BlockKind;
  line: number;
  code: RenderFailureCode;
  message: string;
  detail?: string;
}

export interface DispatchResult {
  /** Input blocks with `assetRef` resolved, in sequence order. */
  blocks: Block[];
  warnings: RenderWarning[];
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function copySource(block: Block, sourceDir: string, outputPath: string): Promise<RenderOutcome> {
  const sourcePath = isAbsolute(block.rawPayload) ? block.rawPayload : resolve(sourceDir, block.rawPayload);
  if (!(await isFile(sourcePath))) {
    return renderFailure('SOURCE_NOT_FOUND', `Referenced ${block.kind} not found: ${block.rawPayload}`);
  }
  try {
    await copyFile(sourcePath, outputPath);
  } catch (error) {
    throw new CompileError('ASSET_WRITE_FAILED', `Unable to copy ${block.rawPayload} into the archive.`, {
      sequenceIndex: block.sequenceIndex,
      message: errorMessage(error),
    });
  }
  return { ok: true };
}

function renderBlock(
  block: Block,
  outputPath: string,
  options: DispatchOptions,
  signal: AbortSignal,
): Promise<RenderOutcome> {
  const base = {
    sequenceIndex: block.sequenceIndex,
    options: block.options,
    outputPath,
    timeoutMs: options.renderTimeoutMs,
    signal,
  };

  switch (block.kind) {
    case 'text':
      return options.renderers.math.render({ ...base, snippet: block.rawPayload, style: options.mathStyle });
    case 'animation-scene':
    case 'animation-inline':
      return options.renderers.animation.render({ ...base, script: block.rawPayload });
    case 'image':
    case 'video':
      return copySource(block, options.sourceDir, outputPath);
  }
}

/**
 * Resolves every block to an archive asset.
 *
 * Asset paths are planned up front, then each block is rendered (or copied) by a
 * bounded pool of workers. A failing block gets the render-failed sentinel and
 * a warning; staging I/O errors and cancellation are fatal. A fatal error
 * aborts the renders still in flight and is rethrown once they have settled.
 *
 * @throws {CompileError} CANCELLED when the signal aborts, ASSET_WRITE_FAILED on staging I/O errors
 */
export async function dispatchRenders(blocks: readonly Block[], options: DispatchOptions): Promise<DispatchResult> {
  const logger = options.logger ?? silentLogger;
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(options.signal?.reason);
  if (options.signal?.aborted) forwardAbort();
  else options.signal?.addEventListener('abort', forwardAbort, { once: true });
  const { signal } = controller;

  const fatal = (error: CompileError): CompileError => {
    controller.abort(error);
    return error;
  };

  const assetPaths = planAssetPaths(blocks, {
    math: options.renderers.math.outputExtension,
    animation: options.renderers.animation.outputExtension,
  });

  // One slot per block, written only by the worker handling that block.
  const outcomes: RenderOutcome[] = blocks.map(() => renderFailure('CANCELLED', 'Render was not started.'));

  try {
    await runWithConcurrency(blocks, options.concurrency, async (block, index) => {
      if (signal.aborted) return;

      const outputPath = join(options.stagingDir, assetPaths[index]);
      try {
        await mkdir(dirname(outputPath), { recursive: true });
      } catch (error) {
        throw fatal(
          new CompileError('ASSET_WRITE_FAILED', `Unable to create ${dirname(outputPath)}.`, {
            message: errorMessage(error),
          }),
        );
      }

      logger.debug(`Rendering block ${block.sequenceIndex} (${block.kind}) -> ${assetPaths[index]}`);

      let outcome: RenderOutcome;
      try {
        outcome = await renderBlock(block, outputPath, options, signal);
      } catch (error) {
        if (error instanceof CompileError) throw fatal(error);
        outcome = renderFailure('RENDERER_CRASHED', errorMessage(error));
      }

      if (outcome.ok && !(await isFile(outputPath))) {
        outcome = renderFailure('OUTPUT_MISSING', `Renderer reported success but did not write ${assetPaths[index]}.`);
      }
      outcomes[index] = outcome;
    });
  } finally {
    options.signal?.removeEventListener('abort', forwardAbort);
  }

  if (options.signal?.aborted) {
    throw new CompileError('CANCELLED', 'Compilation was cancelled.');
  }

  const warnings: RenderWarning[] = [];
  const resolved = blocks.map((block, index): Block => {
    const outcome = outcomes[index];
    if (outcome.ok) {
      return { ...block, assetRef: assetPaths[index] };
    }

    const { failure } = outcome;
    logger.warn(`Block ${block.sequenceIndex} (${block.kind}, line ${block.line}) failed: ${failure.message}`);
    warnings.push({
      sequenceIndex: block.sequenceIndex,
      kind: block.kind,
      line: block.line,
      code: failure.code,
      message: failure.message,
      ...(failure.detail === undefined ? {} : { detail: failure.detail }),
    });
    return { ...block, assetRef: RENDER_FAILED_ASSET_REF };
  });

  return { blocks: resolved, warnings };
}
