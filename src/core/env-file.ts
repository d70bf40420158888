import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseDotenv } from 'dotenv';

export interface LoadEnvironmentOptions {
  noEnv?: boolean;
  envFilePath?: string;
  /** Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Environment snapshot for one CLI run: the process environment with a
 * `.env` file from the working directory layered on top. `process.env`
 * itself is never modified.
 */
export async function loadEnvironment(options: LoadEnvironmentOptions = {}): Promise<NodeJS.ProcessEnv> {
  const env = options.env ?? process.env;
  if (options.noEnv) return { ...env };

  const envPath = options.envFilePath ?? join(process.cwd(), '.env');
  let fileVars: Record<string, string> = {};
  try {
    const content = await readFile(envPath, 'utf-8');
    fileVars = parseDotenv(Buffer.from(content));
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) {
      throw err;
    }
  }

  return { ...env, ...fileVars };
}
