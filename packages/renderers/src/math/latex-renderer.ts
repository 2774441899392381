import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { renderFailure, type MathRenderer, type MathRenderRequest, type RenderOutcome } from '@pandora/contracts';
import { runTool as defaultRunTool, type ToolRunner } from '../run-tool.js';
import { withWorkDir } from '../work-dir.js';
import { buildLatexDocument } from './style.js';

const SOURCE_NAME = 'block.tex';
const DVI_NAME = 'block.dvi';
const SCALE_PATTERN = /^\d+(\.\d+)?$/;

export interface LatexRendererOptions {
  latexCommand: string;
  dvisvgmCommand: string;
  runTool?: ToolRunner;
}

/** `dvisvgm` arguments for one block; the `scale` option becomes `--scale`. */
export function dvisvgmArgs(request: Pick<MathRenderRequest, 'options' | 'outputPath'>): string[] | null {
  const args = [DVI_NAME, '--no-fonts', '--exact'];
  const { scale } = request.options;
  if (scale !== undefined) {
    if (!SCALE_PATTERN.test(scale)) return null;
    args.push(`--scale=${scale}`);
  }
  args.push('-o', request.outputPath);
  return args;
}

/**
 * Math renderer backed by a TeX installation: `latex` produces DVI, `dvisvgm`
 * converts it to a single SVG at the requested output path.
 */
export function createLatexRenderer(options: LatexRendererOptions): MathRenderer {
  const runTool = options.runTool ?? defaultRunTool;

  const render = async (request: MathRenderRequest): Promise<RenderOutcome> => {
    const svgArgs = dvisvgmArgs(request);
    if (!svgArgs) {
      return renderFailure('INVALID_SNIPPET', `Invalid scale option "${request.options.scale}".`);
    }

    return withWorkDir(`pandora-latex-${request.sequenceIndex}-`, async (workDir) => {
      await writeFile(join(workDir, SOURCE_NAME), buildLatexDocument(request.snippet, request.style), 'utf8');

      const common = { cwd: workDir, timeoutMs: request.timeoutMs, signal: request.signal };
      const compiled = await runTool({
        ...common,
        command: options.latexCommand,
        args: ['-interaction=nonstopmode', '-halt-on-error', SOURCE_NAME],
      });
      if (!compiled.ok) return compiled;

      const converted = await runTool({ ...common, command: options.dvisvgmCommand, args: svgArgs });
      if (!converted.ok) return converted;

      return { ok: true };
    });
  };

  return { name: 'latex', outputExtension: 'svg', render };
}
