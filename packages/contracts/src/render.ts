/**
 * Request/response contract between the render dispatcher and the external
 * renderers. A renderer writes exactly `outputPath` or reports a typed failure;
 * the dispatcher never looks for output anywhere else.
 */

import type { BlockOptions } from './types.js';

export type RenderFailureCode =
  | 'TOOL_FAILED'
  | 'TOOL_NOT_FOUND'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'INVALID_SNIPPET'
  | 'OUTPUT_MISSING'
  | 'SOURCE_NOT_FOUND'
  | 'RENDERER_CRASHED';

export interface RenderFailure {
  code: RenderFailureCode;
  message: string;
  /** Tail of the tool's diagnostic output, when there is one. */
  detail?: string;
}

export type RenderOutcome = { ok: true } | { ok: false; failure: RenderFailure };

/** Immutable style configuration applied to every math render. */
export interface MathStyle {
  /** LaTeX document template; `%CONTENT%` marks where the snippet goes. */
  readonly template: string;
}

interface RenderRequestBase {
  sequenceIndex: number;
  options: BlockOptions;
  /** Absolute path the renderer must write. Its directory already exists. */
  outputPath: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface MathRenderRequest extends RenderRequestBase {
  snippet: string;
  style: MathStyle;
}

export interface AnimationRenderRequest extends RenderRequestBase {
  /** Body of the scene's `construct` method; the renderer supplies the wrapper. */
  script: string;
}

export interface MathRenderer {
  readonly name: string;
  readonly outputExtension: string;
  render(request: MathRenderRequest): Promise<RenderOutcome>;
}

export interface AnimationRenderer {
  readonly name: string;
  readonly outputExtension: string;
  render(request: AnimationRenderRequest): Promise<RenderOutcome>;
}

export interface RendererSet {
  math: MathRenderer;
  animation: AnimationRenderer;
}

export function renderFailure(code: RenderFailureCode, message: string, detail?: string): RenderOutcome {
  return { ok: false, failure: detail === undefined ? { code, message } : { code, message, detail } };
}
