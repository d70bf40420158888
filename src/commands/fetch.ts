import ora from 'ora';
import { ArtifactCache, type ResolvedArtifact } from '../core/artifact-cache.js';
import { createContext, type GlobalOptions } from './shared.js';
import { header, label, table, value } from '../utils/output.js';

export async function fetchArtifact(options: GlobalOptions): Promise<number> {
  const { env, logger } = await createContext(options);
  const cache = new ArtifactCache({ env, logger });

  const spinner = ora({ text: 'Resolving PDFBox...', stream: process.stderr }).start();
  let resolved: ResolvedArtifact;
  try {
    resolved = await cache.resolve();
  } catch (err) {
    spinner.fail('Could not resolve PDFBox');
    throw err;
  }
  spinner.succeed('PDFBox is ready');

  console.log(header('PDFBox'));
  console.log(
    table([
      [label('Version:'), value(resolved.version ?? '(override)')],
      [label('Source:'), resolved.source],
      [label('Path:'), resolved.path],
    ]),
  );
  return 0;
}
