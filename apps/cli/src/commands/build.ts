import { basename, dirname, extname, join } from 'node:path';
import { Logger, type LogSink } from '@pandora/common';
import { ARCHIVE_EXTENSION } from '@pandora/contracts';
import { compileFile, type CompileWarning, type ConfigLayer } from '@pandora/compiler';
import { createDefaultRenderers, loadMathStyle } from '@pandora/renderers';
import { integerFlag, parseArgs, stringFlag } from '../lib/args.js';
import { loadCompilerConfig } from '../lib/config.js';
import { CliError } from '../lib/errors.js';
import type { CommandContext, CommandExecution } from '../lib/types.js';

export const BUILD_USAGE = 'pandora build <input> [-o <output>] [--concurrency <n>] [--timeout <ms>] [--config <file>]';

/** `notes.tex` -> `notes.pandora` beside the input. */
export function defaultOutputPath(inputPath: string): string {
  const stem = basename(inputPath, extname(inputPath));
  return join(dirname(inputPath), `${stem}${ARCHIVE_EXTENSION}`);
}

function formatWarning(warning: CompileWarning): string {
  if (warning.stage === 'segment') {
    return `  line ${warning.line}: ${warning.message}`;
  }
  return `  block ${warning.sequenceIndex} (${warning.kind}, line ${warning.line}): ${warning.code} ${warning.message}`;
}

function stderrSink(context: CommandContext): LogSink {
  const write = (message: string): void => context.io.stderr(`${message}\n`);
  return { debug: write, info: write, warn: write, error: write };
}

export async function runBuild(tokens: string[], context: CommandContext): Promise<CommandExecution> {
  const args = parseArgs(tokens, {
    values: ['--out', '--concurrency', '--timeout', '--config'],
  });

  const [input, ...extra] = args.positionals;
  if (input === undefined) {
    throw new CliError('MISSING_REQUIRED', `build: missing <input>. Usage: ${BUILD_USAGE}`);
  }
  if (extra.length > 0) {
    throw new CliError('INVALID_ARGUMENT', `build: unexpected argument "${extra[0]}".`);
  }

  const flagLayer: ConfigLayer = {};
  const concurrency = integerFlag(args, '--concurrency');
  if (concurrency !== undefined) flagLayer.concurrency = concurrency;
  const timeout = integerFlag(args, '--timeout');
  if (timeout !== undefined) flagLayer.renderTimeoutMs = timeout;

  const config = await loadCompilerConfig(context.env, stringFlag(args, '--config'), flagLayer);
  const outputPath = stringFlag(args, '--out') ?? defaultOutputPath(input);

  const logger = new Logger('pandora', {
    enabled: context.verbose,
    verbose: context.verbose,
    sink: stderrSink(context),
  });

  const result = await compileFile(input, outputPath, {
    renderers: context.renderers ?? createDefaultRenderers(config),
    mathStyle: context.mathStyle ?? (await loadMathStyle()),
    config,
    signal: context.signal,
    logger,
  });

  const blocks = result.manifest.blocks;
  const failed = result.warnings.filter((warning) => warning.stage === 'render').length;

  const lines = [
    `Built ${result.outputPath} (${blocks.length} blocks, ${result.pageCount} pages, layout ${result.manifest.layout_mode}, ${result.byteLength} bytes)`,
  ];
  if (result.warnings.length > 0) {
    lines.push(`${result.warnings.length} warning(s)${failed > 0 ? `, ${failed} block(s) failed to render` : ''}:`);
    lines.push(...result.warnings.map(formatWarning));
  }

  return {
    command: 'build',
    data: {
      outputPath: result.outputPath,
      layoutMode: result.manifest.layout_mode,
      blockCount: blocks.length,
      pageCount: result.pageCount,
      byteLength: result.byteLength,
      failedBlocks: failed,
      warnings: result.warnings,
    },
    pretty: lines.join('\n'),
  };
}
