import { existsSync } from 'node:fs';
import { join } from 'node:path';
import which from 'which';
import { ConfigError } from './errors.js';

/**
 * Locate the `java` executable: `$JAVA_HOME/bin/java` when it exists,
 * otherwise the first `java` on the executable search path.
 */
export async function findJava(env?: NodeJS.ProcessEnv): Promise<string> {
  const e = env ?? process.env;

  if (e.JAVA_HOME) {
    const binary = process.platform === 'win32' ? 'java.exe' : 'java';
    const candidate = join(e.JAVA_HOME, 'bin', binary);
    if (existsSync(candidate)) return candidate;
  }

  // which() reads process.env.PATH when given an empty path
  const searchPath = e.PATH ?? e.Path;
  const found = searchPath ? await which('java', { path: searchPath, nothrow: true }) : null;
  if (!found) {
    throw new ConfigError('java not found: install a Java runtime or set JAVA_HOME');
  }
  return found;
}
