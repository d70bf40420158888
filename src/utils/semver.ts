import { VersionParseError } from '../core/errors.js';

export type PreReleaseLabel = 'dev' | 'alpha' | 'beta' | 'rc';

export interface ParsedVersion {
  release: number[];
  preRelease: { label: PreReleaseLabel; number: number } | null;
}

/**
 * Dot-separated numeric groups with an optional qualifier, e.g. `2.0.27`,
 * `3.0.0-alpha2`, `3.0.0-RC1`, `1.0.dev3`.
 */
export const VERSION_PATTERN = /^v?(\d+(?:\.\d+)*)(?:[-_.]?([A-Za-z]+)[-_.]?(\d*))?$/;

const LABEL_ALIASES: Record<string, PreReleaseLabel> = {
  dev: 'dev',
  a: 'alpha',
  alpha: 'alpha',
  b: 'beta',
  beta: 'beta',
  c: 'rc',
  cr: 'rc',
  rc: 'rc',
  pre: 'rc',
  preview: 'rc',
};

const LABEL_RANK: Record<PreReleaseLabel, number> = {
  dev: 0,
  alpha: 1,
  beta: 2,
  rc: 3,
};

export function parseVersion(v: string): ParsedVersion {
  const match = VERSION_PATTERN.exec(v.trim());
  if (!match) {
    throw new VersionParseError(v);
  }

  const release = match[1].split('.').map((part) => parseInt(part, 10));
  const rawLabel = match[2];
  if (rawLabel === undefined) {
    return { release, preRelease: null };
  }

  const label = LABEL_ALIASES[rawLabel.toLowerCase()];
  if (!label) {
    throw new VersionParseError(v);
  }
  return {
    release,
    preRelease: { label, number: match[3] ? parseInt(match[3], 10) : 0 },
  };
}

export function isValidVersion(v: string): boolean {
  try {
    parseVersion(v);
    return true;
  } catch {
    return false;
  }
}

export function compareVersions(a: string, b: string): number {
  const pa = parseVersion(a);
  const pb = parseVersion(b);

  // 1.0 and 1.0.0 are the same release
  const length = Math.max(pa.release.length, pb.release.length);
  for (let i = 0; i < length; i++) {
    const diff = (pa.release[i] ?? 0) - (pb.release[i] ?? 0);
    if (diff !== 0) return diff;
  }

  if (!pa.preRelease && !pb.preRelease) return 0;
  if (!pa.preRelease) return 1;
  if (!pb.preRelease) return -1;

  const rankDiff = LABEL_RANK[pa.preRelease.label] - LABEL_RANK[pb.preRelease.label];
  if (rankDiff !== 0) return rankDiff;
  return pa.preRelease.number - pb.preRelease.number;
}

export function maxVersion(versions: Iterable<string>): string | null {
  let best: string | null = null;
  for (const v of versions) {
    if (best === null) {
      parseVersion(v);
      best = v;
    } else if (compareVersions(v, best) > 0) {
      best = v;
    }
  }
  return best;
}
