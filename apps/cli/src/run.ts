import { BUILD_USAGE, runBuild } from './commands/build.js';
import { INSPECT_USAGE, runInspect } from './commands/inspect.js';
import { CliError, toCliError } from './lib/errors.js';
import type { CliIO, CommandContext, CommandExecution, OutputMode } from './lib/types.js';

export type { CliIO, CommandContext, CommandExecution, OutputMode } from './lib/types.js';
export { CliError, toCliError, type CliErrorCode } from './lib/errors.js';

export const HELP = `
pandora: compile LaTeX-flavoured markup into .pandora document archives

Commands:
  build <input>      Compile a source file into an archive
  inspect <archive>  Validate an archive and list its pages

Usage:
  ${BUILD_USAGE}
  ${INSPECT_USAGE}

Options:
  -o, --out <file>      Archive to write (default: <input>.pandora)
  --concurrency <n>     Renders to run at once (default 4)
  --timeout <ms>        Per-render time limit (default 120000)
  --config <file>       JSON configuration file
  --json                Machine-readable output
  --verbose             Log pipeline progress to stderr
  --help                Show this message

Environment:
  PANDORA_CONCURRENCY, PANDORA_RENDER_TIMEOUT_MS, PANDORA_LATEX_BIN,
  PANDORA_DVISVGM_BIN, PANDORA_MANIM_BIN, PANDORA_MANIM_QUALITY
`.trimStart();

const GLOBAL_SWITCHES = new Set(['--json', '--verbose', '--help', '-h']);

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
  renderers?: CommandContext['renderers'];
  mathStyle?: CommandContext['mathStyle'];
}

type CommandHandler = (tokens: string[], context: CommandContext) => Promise<CommandExecution>;

const COMMANDS: Record<string, CommandHandler> = {
  build: runBuild,
  inspect: runInspect,
};

function writeSuccess(io: CliIO, output: OutputMode, execution: CommandExecution, startedAt: number): void {
  if (output === 'json') {
    const envelope = {
      ok: true,
      command: execution.command,
      data: execution.data,
      meta: { elapsedMs: io.now() - startedAt },
    };
    io.stdout(`${JSON.stringify(envelope, null, 2)}\n`);
    return;
  }
  io.stdout(`${execution.pretty}\n`);
}

function writeError(io: CliIO, output: OutputMode, error: CliError): void {
  if (output === 'json') {
    const envelope = {
      ok: false,
      error: {
        code: error.code,
        message: error.message,
        ...(error.details === undefined ? {} : { details: error.details }),
      },
    };
    io.stderr(`${JSON.stringify(envelope, null, 2)}\n`);
    return;
  }
  io.stderr(`Error [${error.code}]: ${error.message}\n`);
}

/**
 * Runs one CLI invocation and returns its exit code. Never throws; every error
 * is reported on `io.stderr`.
 */
export async function run(argv: readonly string[], io: CliIO, options: RunOptions = {}): Promise<number> {
  const startedAt = io.now();
  const output: OutputMode = argv.includes('--json') ? 'json' : 'pretty';
  const verbose = argv.includes('--verbose');
  const help = argv.includes('--help') || argv.includes('-h');
  const [command, ...tokens] = argv.filter((token) => !GLOBAL_SWITCHES.has(token));

  if (help || command === undefined) {
    io.stdout(HELP);
    return 0;
  }

  const context: CommandContext = {
    io,
    env: options.env ?? process.env,
    output,
    verbose,
    signal: options.signal,
    renderers: options.renderers,
    mathStyle: options.mathStyle,
  };

  try {
    const handler = Object.hasOwn(COMMANDS, command) ? COMMANDS[command] : undefined;
    if (handler === undefined) {
      throw new CliError('UNKNOWN_COMMAND', `Unknown command "${command}". Run "pandora --help" for usage.`);
    }
    writeSuccess(io, output, await handler(tokens, context), startedAt);
    return 0;
  } catch (error) {
    const cliError = toCliError(error);
    writeError(io, output, cliError);
    return cliError.exitCode;
  }
}
