export {
  PDFBox,
  type PDFBoxOptions,
  type ExtractTextOptions,
  type SplitOptions,
  type DebuggerOptions,
  type ToImageOptions,
  type CropBox,
} from './core/pdfbox.js';
export { ArtifactCache, type ArtifactCacheOptions, type ResolvedArtifact } from './core/artifact-cache.js';
export type { CapturedProcess, LaunchedProcess, ProcessExit } from './core/command-runner.js';
export {
  PDFBoxError,
  ConfigError,
  NetworkError,
  VersionParseError,
  ResolutionError,
  IntegrityError,
  ExecutionError,
} from './core/errors.js';
export { createLogger, silentLogger, type Logger } from './utils/logger.js';
