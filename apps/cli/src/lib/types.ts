import type { MathStyle, RendererSet } from '@pandora/contracts';

export type OutputMode = 'json' | 'pretty';

export interface CliIO {
  stdout(message: string): void;
  stderr(message: string): void;
  now(): number;
}

export interface CommandContext {
  io: CliIO;
  env: NodeJS.ProcessEnv;
  output: OutputMode;
  verbose: boolean;
  signal?: AbortSignal;
  /** Replaces the TeX/manim renderers (tests, embedding). */
  renderers?: RendererSet;
  mathStyle?: MathStyle;
}

export interface CommandExecution {
  command: string;
  data: unknown;
  pretty: string;
}
