/**
 * Compiles Pandora markup into `.pandora` archives.
 *
 * Pipeline: {@link segmentDocument} → {@link inferLayout} → {@link dispatchRenders}
 * → {@link assembleArchive}. {@link compileDocument} runs all four.
 */

export {
  compileDocument,
  compileFile,
  type CompileFileOptions,
  type CompileOptions,
  type CompileResult,
  type CompileWarning,
} from './compile.js';

export {
  ANIMATION_QUALITIES,
  compilerConfigSchema,
  configFromEnv,
  resolveCompilerConfig,
  type CompilerConfig,
  type CompilerConfigInput,
  type ConfigLayer,
} from './config.js';

export { CompileError, type CompileErrorCode } from './errors.js';

export * from './segmenter/index.js';
export * from './layout/index.js';
export * from './dispatch/index.js';
export * from './archive/index.js';
