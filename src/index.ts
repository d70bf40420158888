#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { extract, type ExtractCommandOptions } from './commands/extract.js';
import { split, type SplitCommandOptions } from './commands/split.js';
import { merge } from './commands/merge.js';
import { debugDocument, type DebugCommandOptions } from './commands/debug.js';
import { toImage, type ToImageCommandOptions } from './commands/to-image.js';
import { fetchArtifact } from './commands/fetch.js';
import { registerCacheCommand } from './commands/cache.js';
import { parseInteger, type GlobalOptions } from './commands/shared.js';
import { VERSION } from './version.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('pdfbox-bridge')
    .description('Run Apache PDFBox command-line tools, downloading PDFBox on first use')
    .version(VERSION)
    .option('--verbose', 'Log every PDFBox command line')
    .option('--no-env', 'Skip loading .env file');

  const globals = (): GlobalOptions => {
    const opts = program.opts<{ verbose?: boolean; env?: boolean }>();
    return { verbose: opts.verbose, noEnv: opts.env === false };
  };

  const run = async (action: (globals: GlobalOptions) => Promise<number>): Promise<void> => {
    try {
      process.exitCode = await action(globals());
    } catch (err) {
      console.error(chalk.red(err instanceof Error ? err.message : String(err)));
      process.exitCode = 1;
    }
  };

  program
    .command('extract <input> [output]')
    .description('Extract text from a PDF (printed when no output file is given)')
    .option('--password <password>', 'Document password')
    .option('--encoding <encoding>', 'Output text encoding')
    .option('--html', 'Write HTML instead of plain text')
    .option('--sort', 'Sort text by position')
    .option('--ignore-beads', 'Ignore article beads')
    .option('--start-page <n>', 'First page (1-based)', parseInteger)
    .option('--end-page <n>', 'Last page (1-based)', parseInteger)
    .option('--always-next', 'Process the next page even if the current one fails')
    .action((input: string, output: string | undefined, options: ExtractCommandOptions) =>
      run((g) => extract(input, output, { ...options, ...g })),
    );

  program
    .command('split <input>')
    .description('Split a PDF into several documents')
    .option('--password <password>', 'Document password')
    .option('--split <n>', 'Pages per output document', parseInteger)
    .option('--start-page <n>', 'First page (1-based)', parseInteger)
    .option('--end-page <n>', 'Last page (1-based)', parseInteger)
    .option('--output-prefix <prefix>', 'Output file name prefix')
    .action((input: string, options: SplitCommandOptions) =>
      run((g) => split(input, { ...options, ...g })),
    );

  program
    .command('merge <target> <sources...>')
    .description('Merge two or more PDFs into <target>')
    .action((target: string, sources: string[]) => run((g) => merge(target, sources, g)));

  program
    .command('debug <input>')
    .description('Open a PDF in the PDFBox debugger')
    .option('--password <password>', 'Document password')
    .option('--view-structure', 'Show the document structure tree')
    .action((input: string, options: DebugCommandOptions) =>
      run((g) => debugDocument(input, { ...options, ...g })),
    );

  program
    .command('to-image <input>')
    .description('Render each page of a PDF to an image')
    .option('--password <password>', 'Document password')
    .option('--image-type <type>', 'Image format (jpg, png, ...)')
    .option('--output-prefix <prefix>', 'Output file name prefix')
    .option('--start-page <n>', 'First page (1-based)', parseInteger)
    .option('--end-page <n>', 'Last page (1-based)', parseInteger)
    .option('--page <n>', 'Render only this page', parseInteger)
    .option('--dpi <n>', 'Resolution', parseInteger)
    .option('--color <mode>', 'bilevel, gray, rgb or rgba')
    .option('--cropbox <coords...>', 'Crop box as four numbers: x1 y1 x2 y2')
    .option('--time', 'Print timing information')
    .action((input: string, options: ToImageCommandOptions) =>
      run((g) => toImage(input, { ...options, ...g })),
    );

  program
    .command('fetch')
    .description('Make sure a verified PDFBox jar is available locally')
    .action(() => run((g) => fetchArtifact(g)));

  registerCacheCommand(program, run);

  return program;
}

// Only parse when run as CLI entry point
const selfUrl = import.meta.url;
let isDirectRun = false;
try {
  if (process.argv[1]) {
    isDirectRun = selfUrl === pathToFileURL(realpathSync(process.argv[1])).href;
  }
} catch {
  // Non-standard invocation (missing/virtual argv path), default to not parsing
}
if (isDirectRun) {
  await buildProgram().parseAsync();
}
