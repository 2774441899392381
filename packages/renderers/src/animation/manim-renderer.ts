import { copyFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  renderFailure,
  type AnimationRenderRequest,
  type AnimationRenderer,
  type RenderOutcome,
} from '@pandora/contracts';
import { runTool as defaultRunTool, type ToolRunner } from '../run-tool.js';
import { withWorkDir } from '../work-dir.js';

export type ManimQuality = 'l' | 'm' | 'h' | 'p' | 'k';

/** Directory manim names after the quality preset. */
const QUALITY_FOLDERS: Record<ManimQuality, string> = {
  l: '480p15',
  m: '720p30',
  h: '1080p60',
  p: '1440p60',
  k: '2160p60',
};

const DEFAULT_BACKGROUND = 'WHITE';
const BACKGROUND_PATTERN = /^(#[0-9A-Fa-f]{3,8}|[A-Z][A-Z0-9_]*)$/;
const SCENE_DECLARATION = /^\s*class\s+\w+\s*\([^)]*Scene[^)]*\)\s*:/m;
const BODY_INDENT = ' '.repeat(8);

export interface ManimRendererOptions {
  manimCommand: string;
  quality: ManimQuality;
  runTool?: ToolRunner;
}

export interface SceneSettings {
  className: string;
  background: string;
}

function isManimQuality(value: string): value is ManimQuality {
  return Object.hasOwn(QUALITY_FOLDERS, value);
}

/** Removes the common leading indentation and surrounding blank lines. */
export function dedent(script: string): string[] {
  const lines = script.replace(/\t/g, '    ').split(/\r?\n/);
  while (lines.length > 0 && !lines[0].trim()) lines.shift();
  while (lines.length > 0 && !lines[lines.length - 1].trim()) lines.pop();

  const indents = lines.filter((line) => line.trim()).map((line) => line.length - line.trimStart().length);
  const common = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((line) => (line.trim() ? line.slice(common) : ''));
}

/**
 * Wraps an author snippet in the fixed scene boilerplate. The snippet becomes
 * the body of `construct`.
 */
export function buildSceneScript(script: string, settings: SceneSettings): string {
  const body = dedent(script).map((line) => (line ? `${BODY_INDENT}${line}` : ''));
  return [
    'from manim import *',
    '',
    '',
    `class ${settings.className}(Scene):`,
    '    def construct(self):',
    `        self.camera.background_color = ${JSON.stringify(settings.background)}`,
    ...body,
    '',
  ].join('\n');
}

/** Location manim writes `-o <name>` to for a scene file named `<name>.py`. */
export function manimOutputPath(mediaDir: string, sceneName: string, quality: ManimQuality): string {
  return join(mediaDir, 'videos', sceneName, QUALITY_FOLDERS[quality], `${sceneName}.mp4`);
}

async function exists(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Animation renderer backed by the manim CLI. Each block renders in its own
 * work directory with a unique scene class, and the known output location is
 * copied to the requested path.
 */
export function createManimRenderer(options: ManimRendererOptions): AnimationRenderer {
  const runTool = options.runTool ?? defaultRunTool;

  const render = async (request: AnimationRenderRequest): Promise<RenderOutcome> => {
    const quality = request.options.quality ?? options.quality;
    if (!isManimQuality(quality)) {
      return renderFailure('INVALID_SNIPPET', `Unknown quality "${quality}"; expected one of l, m, h, p, k.`);
    }
    const background = request.options.background ?? DEFAULT_BACKGROUND;
    if (!BACKGROUND_PATTERN.test(background)) {
      return renderFailure('INVALID_SNIPPET', `Invalid background "${background}".`);
    }
    if (!request.script.trim()) {
      return renderFailure('INVALID_SNIPPET', 'Animation snippet is empty.');
    }
    if (SCENE_DECLARATION.test(request.script)) {
      return renderFailure('INVALID_SNIPPET', 'Animation snippets must not declare their own Scene class.');
    }

    const sceneName = `scene_${request.sequenceIndex}`;
    const className = `PandoraScene_${request.sequenceIndex}`;

    return withWorkDir(`pandora-manim-${request.sequenceIndex}-`, async (workDir) => {
      const mediaDir = join(workDir, 'media');
      await writeFile(join(workDir, `${sceneName}.py`), buildSceneScript(request.script, { className, background }), 'utf8');

      const result = await runTool({
        command: options.manimCommand,
        args: ['render', `${sceneName}.py`, className, `-q${quality}`, '--disable_caching', '--media_dir', mediaDir, '-o', sceneName],
        cwd: workDir,
        timeoutMs: request.timeoutMs,
        signal: request.signal,
      });
      if (!result.ok) return result;

      const produced = manimOutputPath(mediaDir, sceneName, quality);
      if (!(await exists(produced))) {
        return renderFailure('OUTPUT_MISSING', `manim finished without writing ${sceneName}.mp4.`, result.stderr || undefined);
      }
      await copyFile(produced, request.outputPath);
      return { ok: true };
    });
  };

  return { name: 'manim', outputExtension: 'mp4', render };
}
