import { CliError } from './errors.js';

const FLAG_ALIASES: Record<string, string> = {
  '-o': '--out',
};

export interface ParsedArgs {
  positionals: string[];
  flags: Map<string, string | true>;
}

export interface KnownFlags {
  /** Flags that take a value (`--out file` or `--out=file`). */
  values: readonly string[];
  /** Flags that are on when present. */
  switches?: readonly string[];
}

/**
 * Splits command tokens into positionals and flags. Unknown flags are rejected.
 *
 * @throws {CliError} INVALID_ARGUMENT / MISSING_REQUIRED
 */
export function parseArgs(tokens: readonly string[], known: KnownFlags): ParsedArgs {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();
  const switches = known.switches ?? [];

  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];
    if (!token.startsWith('-') || token === '-') {
      positionals.push(token);
      continue;
    }

    const eq = token.indexOf('=');
    const rawName = eq === -1 ? token : token.slice(0, eq);
    const name = FLAG_ALIASES[rawName] ?? rawName;

    if (switches.includes(name)) {
      if (eq !== -1) throw new CliError('INVALID_ARGUMENT', `${name} does not take a value.`);
      flags.set(name, true);
      continue;
    }

    if (!known.values.includes(name)) {
      throw new CliError('INVALID_ARGUMENT', `Unknown option: ${rawName}`);
    }

    const value = eq === -1 ? tokens[i + 1] : token.slice(eq + 1);
    if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
      throw new CliError('MISSING_REQUIRED', `${name} requires a value.`);
    }
    if (eq === -1) i += 1;
    flags.set(name, value);
  }

  return { positionals, flags };
}

export function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === 'string' ? value : undefined;
}

/**
 * @throws {CliError} INVALID_ARGUMENT when the value is not a positive integer
 */
export function integerFlag(args: ParsedArgs, name: string): number | undefined {
  const value = stringFlag(args, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new CliError('INVALID_ARGUMENT', `${name} must be a positive integer, got "${value}".`);
  }
  return Number(value);
}
