import { writeFile } from 'node:fs/promises';
import {
  renderFailure,
  type MathRenderRequest,
  type MathStyle,
  type RenderOutcome,
  type RendererSet,
} from '@pandora/contracts';
import { run, type RunOptions } from '../run.js';

export type RunResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export const TEST_MATH_STYLE: MathStyle = { template: '%CONTENT%' };

/**
 * Renderers that write their payload straight to the output path. A payload
 * containing `FAIL` fails the block.
 */
export function createStubRenderers(onMath?: (request: MathRenderRequest) => void): RendererSet {
  const write = async (payload: string, outputPath: string): Promise<RenderOutcome> => {
    if (payload.includes('FAIL')) return renderFailure('TOOL_FAILED', 'stub failure');
    await writeFile(outputPath, payload, 'utf8');
    return { ok: true };
  };

  return {
    math: {
      name: 'stub-math',
      outputExtension: 'svg',
      render: async (request) => {
        onMath?.(request);
        return write(request.snippet, request.outputPath);
      },
    },
    animation: {
      name: 'stub-animation',
      outputExtension: 'mp4',
      render: async (request) => write(request.script, request.outputPath),
    },
  };
}

/** Runs the CLI in process with a clock that advances 5 ms per reading. */
export async function runCli(args: string[], options: RunOptions = {}): Promise<RunResult> {
  let stdout = '';
  let stderr = '';
  let clock = 0;

  const code = await run(
    args,
    {
      stdout(message: string) {
        stdout += message;
      },
      stderr(message: string) {
        stderr += message;
      },
      now() {
        clock += 5;
        return clock;
      },
    },
    { env: {}, renderers: createStubRenderers(), mathStyle: TEST_MATH_STYLE, ...options },
  );

  return { code, stdout, stderr };
}
