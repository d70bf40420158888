import { resolve } from 'node:path';
import { ArtifactCache, isRegularFile, type ResolvedArtifact } from './artifact-cache.js';
import { resolveConfig } from './config.js';
import { ConfigError } from './errors.js';
import { findJava } from './java-runtime.js';
import {
  CommandRunner,
  flag,
  positional,
  type CapturedProcess,
  type CommandSpec,
  type LaunchedProcess,
} from './command-runner.js';
import { createLogger, type Logger } from '../utils/logger.js';

// ── Options ──

export interface PDFBoxOptions {
  /** Environment snapshot used for PDFBOX, JAVA_HOME, PATH and the cache location. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Use this jar instead of resolving one. */
  jarPath?: string;
  /** Use this Java executable instead of searching for one. */
  javaPath?: string;
  /** JVM options placed before `-jar`; defaults to PDFBOX_JAVA_OPTS. */
  javaOptions?: string[];
  cacheDir?: string;
  archiveUrl?: string;
  /** Working directory of spawned processes. */
  cwd?: string;
  logger?: Logger;
}

export interface ExtractTextOptions {
  outputPath?: string;
  password?: string;
  encoding?: string;
  html?: boolean;
  sort?: boolean;
  ignoreBeads?: boolean;
  startPage?: number;
  endPage?: number;
  alwaysNext?: boolean;
}

export interface SplitOptions {
  password?: string;
  /** Pages per output document. */
  split?: number;
  startPage?: number;
  endPage?: number;
  outputPrefix?: string;
}

export interface DebuggerOptions {
  password?: string;
  viewStructure?: boolean;
}

export type CropBox = readonly [number, number, number, number];

export interface ToImageOptions {
  password?: string;
  /** jpg, png, gif, bmp ... */
  imageType?: string;
  outputPrefix?: string;
  startPage?: number;
  endPage?: number;
  page?: number;
  dpi?: number;
  /** bilevel, gray, rgb or rgba */
  color?: string;
  cropbox?: CropBox;
  time?: boolean;
}

// ── Facade ──

/**
 * Front end to the PDFBox command-line application. Every method builds one
 * `java -jar pdfbox-app.jar <Subcommand> ...` invocation.
 *
 * Exit codes are not inspected: a document PDFBox cannot read still
 * "succeeds" here. Await `exited` on the returned handle to see the status.
 */
export class PDFBox {
  private constructor(
    readonly jarPath: string,
    readonly javaPath: string,
    readonly artifact: ResolvedArtifact,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  static async create(options: PDFBoxOptions = {}): Promise<PDFBox> {
    const env = options.env ?? process.env;
    const config = resolveConfig(env);
    const logger = options.logger ?? createLogger({ debug: config.debug });

    let artifact: ResolvedArtifact;
    if (options.jarPath) {
      const path = resolve(options.jarPath);
      if (!(await isRegularFile(path))) {
        throw new ConfigError(`PDFBox jar not found: ${options.jarPath}`);
      }
      artifact = { path, version: null, source: 'override' };
    } else {
      const cache = new ArtifactCache({
        env,
        cacheDir: options.cacheDir,
        archiveUrl: options.archiveUrl,
        logger,
      });
      artifact = await cache.resolve();
    }

    const javaPath = options.javaPath ?? (await findJava(env));
    const javaOptions = options.javaOptions ?? config.javaOptions;

    const runner = new CommandRunner({
      executable: javaPath,
      baseArgs: [...javaOptions, '-jar', artifact.path],
      env,
      cwd: options.cwd,
      logger,
    });

    return new PDFBox(artifact.path, javaPath, artifact, runner, logger);
  }

  /**
   * Without `outputPath` the text is written to stdout (`-console`) and
   * returned. With `outputPath` PDFBox writes the file and the running
   * process is returned.
   */
  extractText(inputPath: string, options?: ExtractTextOptions & { outputPath?: undefined }): Promise<string>;
  extractText(inputPath: string, options: ExtractTextOptions & { outputPath: string }): Promise<CapturedProcess>;
  async extractText(inputPath: string, options: ExtractTextOptions = {}): Promise<string | CapturedProcess> {
    const toConsole = !options.outputPath;
    const spec: CommandSpec = {
      subcommand: 'ExtractText',
      args: [
        flag('password', options.password),
        flag('encoding', options.encoding),
        flag('html', options.html),
        flag('sort', options.sort),
        flag('ignoreBeads', options.ignoreBeads),
        flag('startPage', options.startPage),
        flag('endPage', options.endPage),
        flag('alwaysNext', options.alwaysNext),
        flag('console', toConsole),
        positional(inputPath),
        positional(options.outputPath ?? ''),
      ],
    };

    const proc = await this.runner.run(spec);
    if (toConsole) {
      return proc.stdout;
    }
    return proc;
  }

  /** Output files are named `<prefix>-<n>.pdf`, prefix defaulting to the input name. */
  splitFile(inputPath: string, options: SplitOptions = {}): Promise<LaunchedProcess> {
    return this.runner.launch({
      subcommand: 'PDFSplit',
      args: [
        flag('password', options.password),
        flag('startPage', options.startPage),
        flag('endPage', options.endPage),
        flag('split', options.split),
        flag('outputPrefix', options.outputPrefix),
        positional(inputPath),
      ],
    });
  }

  /** Returns null without running anything when fewer than two sources are given. */
  async merge(sourceFiles: string[], targetFile = 'merged.pdf'): Promise<LaunchedProcess | null> {
    if (sourceFiles.length < 2) {
      this.logger.warn('Not enough source files to merge. Need at least 2 source files.');
      return null;
    }

    return this.runner.launch({
      subcommand: 'PDFMerger',
      args: [...sourceFiles.map(positional), positional(targetFile)],
    });
  }

  /** Opens the PDFBox debugger window on the document. */
  pdfDebugger(inputPath: string, options: DebuggerOptions = {}): Promise<LaunchedProcess> {
    return this.runner.launch({
      subcommand: 'PDFDebugger',
      args: [
        positional(inputPath),
        flag('password', options.password),
        flag('viewstructure', options.viewStructure),
      ],
    });
  }

  /**
   * One image per page, the page number appended to the prefix:
   * `test.pdf` with two pages gives `test1.jpg` and `test2.jpg`.
   */
  toImage(inputPath: string, options: ToImageOptions = {}): Promise<LaunchedProcess> {
    return this.runner.launch({
      subcommand: 'PDFToImage',
      args: [
        positional(inputPath),
        flag('password', options.password),
        flag('imageType', options.imageType),
        flag('outputPrefix', options.outputPrefix),
        flag('startPage', options.startPage),
        flag('endPage', options.endPage),
        flag('page', options.page),
        flag('dpi', options.dpi),
        flag('color', options.color),
        flag('cropbox', options.cropbox),
        flag('time', options.time),
      ],
    });
  }
}
