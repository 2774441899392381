/**
 * External renderers for the Pandora compiler: TeX (`latex` + `dvisvgm`) for
 * text blocks and manim for animation blocks.
 */

import type { RendererSet } from '@pandora/contracts';
import { createManimRenderer, type ManimQuality } from './animation/manim-renderer.js';
import { createLatexRenderer } from './math/latex-renderer.js';
import type { ToolRunner } from './run-tool.js';

export {
  buildSceneScript,
  createManimRenderer,
  dedent,
  manimOutputPath,
  type ManimQuality,
  type ManimRendererOptions,
  type SceneSettings,
} from './animation/manim-renderer.js';
export { createLatexRenderer, dvisvgmArgs, type LatexRendererOptions } from './math/latex-renderer.js';
export {
  CONTENT_PLACEHOLDER,
  DEFAULT_PREAMBLE_PATH,
  buildLatexDocument,
  createMathStyle,
  loadMathStyle,
} from './math/style.js';
export { runTool, toolFailure, type ToolInvocation, type ToolResult, type ToolRunner } from './run-tool.js';

export interface DefaultRendererOptions {
  math: { latexCommand: string; dvisvgmCommand: string };
  animation: { manimCommand: string; quality: ManimQuality };
  runTool?: ToolRunner;
}

export function createDefaultRenderers(options: DefaultRendererOptions): RendererSet {
  return {
    math: createLatexRenderer({ ...options.math, runTool: options.runTool }),
    animation: createManimRenderer({ ...options.animation, runTool: options.runTool }),
  };
}
