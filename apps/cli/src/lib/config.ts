import { readFile } from 'node:fs/promises';
import { configFromEnv, resolveCompilerConfig, type CompilerConfig, type ConfigLayer } from '@pandora/compiler';
import { CliError } from './errors.js';

async function readConfigFile(path: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError('FILE_READ_ERROR', `Unable to read config file: ${path}`, { message });
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError('INVALID_CONFIG', `Config file is not valid JSON: ${path}`, { message });
  }
}

/**
 * Resolves compiler configuration from, lowest precedence first: defaults, the
 * `--config` file, `PANDORA_*` environment variables, command-line flags.
 *
 * @throws {CliError} FILE_READ_ERROR / INVALID_CONFIG; compile config errors are mapped by the caller
 */
export async function loadCompilerConfig(
  env: NodeJS.ProcessEnv,
  configPath: string | undefined,
  flags: ConfigLayer,
): Promise<CompilerConfig> {
  const fileLayer = configPath === undefined ? undefined : await readConfigFile(configPath);
  return resolveCompilerConfig(fileLayer, configFromEnv(env), flags);
}
