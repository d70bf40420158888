import { resolveCacheDir } from './cache-paths.js';

export const DEFAULT_ARCHIVE_URL = 'https://archive.apache.org/dist/pdfbox/';

export interface PDFBoxConfig {
  /** Jar path from `PDFBOX`; bypasses the cache entirely when set. */
  jarOverride: string | null;
  cacheDir: string;
  archiveUrl: string;
  javaHome: string | null;
  javaOptions: string[];
  debug: boolean;
}

function isTruthy(raw: string | undefined): boolean {
  if (!raw) return false;
  return !['0', 'false', 'no', 'off'].includes(raw.trim().toLowerCase());
}

export function resolveConfig(env?: NodeJS.ProcessEnv): PDFBoxConfig {
  const e = env ?? process.env;

  return {
    jarOverride: e.PDFBOX ? e.PDFBOX : null,
    cacheDir: resolveCacheDir(e),
    archiveUrl: e.PDFBOX_ARCHIVE_URL || DEFAULT_ARCHIVE_URL,
    javaHome: e.JAVA_HOME ? e.JAVA_HOME : null,
    javaOptions: (e.PDFBOX_JAVA_OPTS ?? '').split(/\s+/).filter((opt) => opt.length > 0),
    debug: isTruthy(e.PDFBOX_DEBUG),
  };
}
