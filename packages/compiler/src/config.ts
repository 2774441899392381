import { z } from 'zod';
import { CompileError } from './errors.js';

export const ANIMATION_QUALITIES = ['l', 'm', 'h', 'p', 'k'] as const;

export const compilerConfigSchema = z
  .object({
    /** Maximum number of renders running at once. */
    concurrency: z.number().int().min(1).max(32).default(4),
    /** Per-invocation limit for an external renderer. */
    renderTimeoutMs: z.number().int().positive().default(120_000),
    math: z
      .object({
        latexCommand: z.string().min(1).default('latex'),
        dvisvgmCommand: z.string().min(1).default('dvisvgm'),
      })
      .strict()
      .default({}),
    animation: z
      .object({
        manimCommand: z.string().min(1).default('manim'),
        quality: z.enum(ANIMATION_QUALITIES).default('l'),
      })
      .strict()
      .default({}),
  })
  .strict();

export type CompilerConfig = z.infer<typeof compilerConfigSchema>;
export type CompilerConfigInput = z.input<typeof compilerConfigSchema>;

/** Unvalidated configuration layer (file, environment, flags). Validated on merge. */
export type ConfigLayer = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value != null && !Array.isArray(value);
}

function numeric(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

/** Drops undefined values and empty sections. */
function compact(record: Record<string, unknown>): ConfigLayer {
  const out: ConfigLayer = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined) continue;
    if (isRecord(value) && Object.keys(value).length === 0) continue;
    out[key] = value;
  }
  return out;
}

/**
 * Reads the `PANDORA_*` environment variables into a configuration layer.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  return compact({
    concurrency: numeric(env.PANDORA_CONCURRENCY),
    renderTimeoutMs: numeric(env.PANDORA_RENDER_TIMEOUT_MS),
    math: compact({
      latexCommand: env.PANDORA_LATEX_BIN,
      dvisvgmCommand: env.PANDORA_DVISVGM_BIN,
    }),
    animation: compact({
      manimCommand: env.PANDORA_MANIM_BIN,
      quality: env.PANDORA_MANIM_QUALITY,
    }),
  });
}

/**
 * Merges configuration layers (later layers win, nested sections merge key by
 * key) and validates the result.
 *
 * @throws {CompileError} INVALID_CONFIG listing every offending path
 */
export function resolveCompilerConfig(...layers: unknown[]): CompilerConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    if (layer === undefined) continue;
    if (!isRecord(layer)) {
      throw new CompileError('INVALID_CONFIG', 'Configuration must be a JSON object.');
    }
    for (const [key, value] of Object.entries(layer)) {
      const previous = merged[key];
      merged[key] = isRecord(previous) && isRecord(value) ? { ...previous, ...value } : value;
    }
  }

  const parsed = compilerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new CompileError('INVALID_CONFIG', `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  return parsed.data;
}
