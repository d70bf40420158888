import { readdir, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ConfigError, ResolutionError } from './errors.js';
import { fetchVersionCatalog } from './version-catalog.js';
import {
  ARTIFACT_EXTENSION,
  ARTIFACT_PREFIX,
  resolveLatestArtifact,
} from './artifact-resolver.js';
import { resolveConfig } from './config.js';
import { downloadVerifiedArtifact } from '../utils/download.js';
import { compareVersions, isValidVersion } from '../utils/semver.js';
import { silentLogger, type Logger } from '../utils/logger.js';

// ── Types ──

export interface CachedArtifact {
  version: string;
  path: string;
}

export type ArtifactSource = 'override' | 'cache' | 'download';

export interface ResolvedArtifact {
  path: string;
  /** null when the path came from the PDFBOX override. */
  version: string | null;
  source: ArtifactSource;
}

export interface ArtifactCacheOptions {
  env?: NodeJS.ProcessEnv;
  cacheDir?: string;
  archiveUrl?: string;
  logger?: Logger;
}

const CACHED_NAME_RE = new RegExp(
  `^${escapeRegExp(ARTIFACT_PREFIX)}(.+)${escapeRegExp(ARTIFACT_EXTENSION)}$`,
);

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** True for an existing regular file; directories and dangling paths are not artifacts. */
export async function isRegularFile(path: string): Promise<boolean> {
  const s = await stat(path).catch(() => null);
  return s?.isFile() ?? false;
}

export function parseCachedName(fileName: string): string | null {
  const match = CACHED_NAME_RE.exec(fileName);
  if (!match || !isValidVersion(match[1])) return null;
  return match[1];
}

// ── Cache ──

export class ArtifactCache {
  readonly cacheDir: string;
  readonly archiveUrl: string;
  private readonly jarOverride: string | null;
  private readonly logger: Logger;

  constructor(options: ArtifactCacheOptions = {}) {
    const config = resolveConfig(options.env);
    this.cacheDir = options.cacheDir ?? config.cacheDir;
    this.archiveUrl = options.archiveUrl ?? config.archiveUrl;
    this.jarOverride = config.jarOverride;
    this.logger = options.logger ?? silentLogger;
  }

  /** Cached artifacts, newest first. A missing cache directory is an empty cache. */
  async list(): Promise<CachedArtifact[]> {
    let names: string[];
    try {
      names = await readdir(this.cacheDir);
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return [];
      throw err;
    }

    const artifacts: CachedArtifact[] = [];
    for (const name of names) {
      const version = parseCachedName(name);
      if (version === null) continue;
      const path = join(this.cacheDir, name);
      if (!(await isRegularFile(path))) continue;
      artifacts.push({ version, path });
    }

    return artifacts.sort((a, b) => compareVersions(b.version, a.version));
  }

  async resolve(): Promise<ResolvedArtifact> {
    if (this.jarOverride !== null) {
      const path = resolve(this.jarOverride);
      if (!(await isRegularFile(path))) {
        throw new ConfigError(`PDFBOX points to "${this.jarOverride}", which is not an existing file`);
      }
      return { path, version: null, source: 'override' };
    }

    const [newest] = await this.list();
    if (newest) {
      this.logger.debug(`Using cached PDFBox ${newest.version}: ${newest.path}`);
      return { path: newest.path, version: newest.version, source: 'cache' };
    }

    return this.download();
  }

  private async download(): Promise<ResolvedArtifact> {
    this.logger.info(`No cached PDFBox found, checking ${this.archiveUrl}`);
    const versions = await fetchVersionCatalog(this.archiveUrl);
    if (versions.size === 0) {
      throw new ResolutionError(`No PDFBox versions listed at ${this.archiveUrl}`);
    }

    const release = resolveLatestArtifact(versions, this.archiveUrl);
    this.logger.info(`Downloading ${release.artifactUrl}`);

    const path = await downloadVerifiedArtifact({
      url: release.artifactUrl,
      checksumUrl: release.checksumUrl,
      cacheDir: this.cacheDir,
      cacheName: release.fileName,
    });

    this.logger.info(`Verified and cached PDFBox ${release.version} at ${path}`);
    return { path, version: release.version, source: 'download' };
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
