import { InvalidArgumentError } from 'commander';
import ora from 'ora';
import { PDFBox } from '../core/pdfbox.js';
import { loadEnvironment } from '../core/env-file.js';
import { resolveConfig } from '../core/config.js';
import type { ProcessExit } from '../core/command-runner.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { describeExit, icons } from '../utils/output.js';

export interface GlobalOptions {
  verbose?: boolean;
  noEnv?: boolean;
  /** Injected by tests; defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

export interface CommandContext {
  env: NodeJS.ProcessEnv;
  logger: Logger;
}

export async function createContext(options: GlobalOptions): Promise<CommandContext> {
  const env = await loadEnvironment({ noEnv: options.noEnv, env: options.env });
  const debug = !!options.verbose || resolveConfig(env).debug;
  return { env, logger: createLogger({ debug }) };
}

export async function openPDFBox(options: GlobalOptions): Promise<PDFBox> {
  const { env, logger } = await createContext(options);
  const spinner = ora({ text: 'Locating PDFBox...', stream: process.stderr }).start();

  try {
    const pdfbox = await PDFBox.create({ env, logger });
    const { version, source } = pdfbox.artifact;
    spinner.succeed(`PDFBox ${version ?? '(override)'} from ${source}`);
    return pdfbox;
  } catch (err) {
    spinner.fail('Could not set up PDFBox');
    throw err;
  }
}

/** Prints the outcome of a finished PDFBox run and maps it to a process exit code. */
export function reportExit(exit: ProcessExit, subcommand: string, successMessage: string): number {
  if (exit.code === 0) {
    console.log(`${icons.success} ${successMessage}`);
    return 0;
  }
  console.error(`${icons.error} PDFBox ${subcommand} ${describeExit(exit)}`);
  return 1;
}

export function parseInteger(raw: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`"${raw}" is not an integer.`);
  }
  return parsed;
}
