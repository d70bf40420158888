import { fetchText } from '../utils/download.js';
import { isValidVersion } from '../utils/semver.js';

const ANCHOR_RE = /<a\b[^>]*?\bhref\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s>]+))[^>]*>/gi;

/**
 * Collects the `href` targets of every anchor in an HTML listing that name
 * a version directory (`2.0.27/`, `3.0.0-RC1/`). Duplicates collapse.
 */
export function parseVersionLinks(html: string): Set<string> {
  const versions = new Set<string>();
  let match: RegExpExecArray | null;

  ANCHOR_RE.lastIndex = 0;
  while ((match = ANCHOR_RE.exec(html)) !== null) {
    const href = (match[1] ?? match[2] ?? match[3] ?? '').trim();
    const candidate = href.replace(/^\/+|\/+$/g, '');
    if (candidate && isValidVersion(candidate)) {
      versions.add(candidate);
    }
  }

  return versions;
}

export async function fetchVersionCatalog(baseUrl: string): Promise<Set<string>> {
  const html = await fetchText(baseUrl);
  return parseVersionLinks(html);
}
