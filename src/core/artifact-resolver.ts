import { ResolutionError } from './errors.js';
import { maxVersion } from '../utils/semver.js';

export const ARTIFACT_PREFIX = 'pdfbox-app-';
export const ARTIFACT_EXTENSION = '.jar';
export const CHECKSUM_SUFFIX = '.sha512';

export interface ResolvedRelease {
  version: string;
  fileName: string;
  artifactUrl: string;
  checksumUrl: string;
}

export function artifactFileName(version: string): string {
  return `${ARTIFACT_PREFIX}${version}${ARTIFACT_EXTENSION}`;
}

export function resolveLatestArtifact(
  versions: Iterable<string>,
  baseUrl: string,
): ResolvedRelease {
  const version = maxVersion(versions);
  if (version === null) {
    throw new ResolutionError(`No PDFBox versions found at ${baseUrl}`);
  }

  const fileName = artifactFileName(version);
  const base = baseUrl.replace(/\/+$/, '');
  const artifactUrl = `${base}/${version}/${fileName}`;

  return {
    version,
    fileName,
    artifactUrl,
    checksumUrl: `${artifactUrl}${CHECKSUM_SUFFIX}`,
  };
}
