import { Command } from 'commander';
import chalk from 'chalk';
import { ArtifactCache } from '../core/artifact-cache.js';
import { createContext, type GlobalOptions } from './shared.js';
import { table, value } from '../utils/output.js';

export async function cachePath(options: GlobalOptions): Promise<number> {
  const { env } = await createContext(options);
  console.log(new ArtifactCache({ env }).cacheDir);
  return 0;
}

export async function cacheList(options: GlobalOptions & { json?: boolean }): Promise<number> {
  const { env } = await createContext(options);
  const cache = new ArtifactCache({ env });
  const artifacts = await cache.list();

  if (options.json) {
    console.log(JSON.stringify(artifacts, null, 2));
    return 0;
  }

  if (artifacts.length === 0) {
    console.log(chalk.dim(`No PDFBox jars cached in ${cache.cacheDir}`));
    return 0;
  }

  console.log(
    table([
      [chalk.dim('Version'), chalk.dim('Path')],
      ...artifacts.map((a) => [value(a.version), a.path]),
    ]),
  );
  return 0;
}

export function registerCacheCommand(
  program: Command,
  run: (action: (globals: GlobalOptions) => Promise<number>) => Promise<void>,
): void {
  const cache = program.command('cache').description('Inspect the local PDFBox jar cache');

  cache
    .command('path')
    .description('Print the cache directory')
    .action(() => run((globals) => cachePath(globals)));

  cache
    .command('list')
    .description('List cached PDFBox jars, newest first')
    .option('--json', 'Output as JSON')
    .action((opts: { json?: boolean }) => run((globals) => cacheList({ ...globals, json: opts.json })));
}
