import { execFile as execFileCb } from 'node:child_process';
import { promisify } from 'node:util';
import type { RenderFailure } from '@pandora/contracts';

const execFile = promisify(execFileCb);

/** Diagnostic output kept on failures. */
const DETAIL_TAIL_CHARS = 2_000;

export interface ToolInvocation {
  command: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

export type ToolResult = { ok: true; stdout: string; stderr: string } | { ok: false; failure: RenderFailure };

/** Runs one external tool. Injected into renderers so tests can replace it. */
export type ToolRunner = (invocation: ToolInvocation) => Promise<ToolResult>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value != null;
}

function tail(text: unknown): string | undefined {
  if (typeof text !== 'string' || !text.trim()) return undefined;
  return text.length > DETAIL_TAIL_CHARS ? text.slice(-DETAIL_TAIL_CHARS) : text;
}

/**
 * Maps an `execFile` rejection to a render failure.
 */
export function toolFailure(command: string, error: unknown, timeoutMs: number): RenderFailure {
  if (!isRecord(error)) {
    return { code: 'TOOL_FAILED', message: `${command} failed: ${String(error)}` };
  }

  const detail = tail(error.stderr) ?? tail(error.stdout);
  const withDetail = (failure: RenderFailure): RenderFailure => (detail ? { ...failure, detail } : failure);

  if (error.name === 'AbortError' || error.code === 'ABORT_ERR') {
    return { code: 'CANCELLED', message: `${command} was cancelled.` };
  }
  if (error.code === 'ENOENT') {
    return { code: 'TOOL_NOT_FOUND', message: `${command} is not installed or not on PATH.` };
  }
  if (error.killed === true && error.signal === 'SIGTERM') {
    return withDetail({ code: 'TIMEOUT', message: `${command} did not finish within ${timeoutMs} ms.` });
  }
  const exit = typeof error.code === 'number' ? `exit code ${error.code}` : String(error.message ?? 'unknown error');
  return withDetail({ code: 'TOOL_FAILED', message: `${command} failed (${exit}).` });
}

/**
 * Default {@link ToolRunner}: `execFile` with a timeout and abort signal. The
 * child process is killed when either fires.
 */
export const runTool: ToolRunner = async ({ command, args, cwd, timeoutMs, signal }) => {
  try {
    const { stdout, stderr } = await execFile(command, args, {
      cwd,
      timeout: timeoutMs,
      signal,
      maxBuffer: 16 * 1024 * 1024,
      encoding: 'utf8',
    });
    return { ok: true, stdout, stderr };
  } catch (error) {
    return { ok: false, failure: toolFailure(command, error, timeoutMs) };
  }
};
