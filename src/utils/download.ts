import { createHash, randomBytes } from 'node:crypto';
import { mkdir, rename, unlink, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigError, IntegrityError, NetworkError } from '../core/errors.js';
import { VERSION } from '../version.js';

export const USER_AGENT = `pdfbox-bridge/${VERSION}`;

export interface VerifiedDownloadOptions {
  url: string;
  checksumUrl: string;
  cacheDir: string;
  cacheName: string;
  userAgent?: string;
}

export function validateUrlScheme(url: string): void {
  if (!url.startsWith('https://') && !url.startsWith('http://')) {
    throw new ConfigError(
      `Invalid URL scheme: only https:// and http:// are allowed, got "${url}"`,
    );
  }
}

async function get(url: string, userAgent: string): Promise<Response> {
  validateUrlScheme(url);

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { 'User-Agent': userAgent },
    });
  } catch (err) {
    throw new NetworkError(
      `Failed to fetch ${url}: ${err instanceof Error ? err.message : String(err)}`,
      url,
      err,
    );
  }

  if (!response.ok) {
    throw new NetworkError(
      `GET ${url} returned HTTP ${response.status}: ${response.statusText}`,
      url,
    );
  }
  return response;
}

export async function fetchText(url: string, userAgent = USER_AGENT): Promise<string> {
  const response = await get(url, userAgent);
  try {
    return await response.text();
  } catch (err) {
    throw new NetworkError(`Failed to read body of ${url}`, url, err);
  }
}

export async function fetchBytes(url: string, userAgent = USER_AGENT): Promise<Buffer> {
  const response = await get(url, userAgent);
  try {
    return Buffer.from(await response.arrayBuffer());
  } catch (err) {
    throw new NetworkError(`Failed to read body of ${url}`, url, err);
  }
}

export function sha512Hex(data: Uint8Array): string {
  return createHash('sha512').update(data).digest('hex');
}

const SHA512_HEX = /(?<![0-9A-Fa-f])[0-9A-Fa-f]{128}(?![0-9A-Fa-f])/;

/**
 * Extracts the hex digest from a checksum file. Accepts a bare digest,
 * `sha512sum` output (`<digest>  <file>`), OpenSSL and BSD tag output
 * (`SHA512(<file>)= <digest>`, `SHA512 (<file>) = <digest>`) and
 * `gpg --print-md` output (`<file>: HEX HEX ...`, possibly wrapped over
 * several lines).
 */
export function parseChecksum(text: string): string {
  const trimmed = text.trim();
  const direct = SHA512_HEX.exec(trimmed);
  if (direct) return direct[0].toLowerCase();

  const colon = trimmed.indexOf(':');
  if (colon !== -1) {
    const grouped = SHA512_HEX.exec(trimmed.slice(colon + 1).replace(/\s+/g, ''));
    if (grouped) return grouped[0].toLowerCase();
  }

  const [digest = ''] = trimmed.split(/\s+/);
  return digest.toLowerCase();
}

export function verifySha512(data: Uint8Array, checksumText: string): boolean {
  return sha512Hex(data) === parseChecksum(checksumText);
}

/**
 * Downloads an artifact and its checksum, verifies the SHA-512 digest and
 * only then moves the bytes into place under `cacheDir/cacheName`.
 */
export async function downloadVerifiedArtifact(options: VerifiedDownloadOptions): Promise<string> {
  const { url, checksumUrl, cacheDir, cacheName } = options;
  const userAgent = options.userAgent ?? USER_AGENT;

  const data = await fetchBytes(url, userAgent);
  const checksumText = await fetchText(checksumUrl, userAgent);

  const expected = parseChecksum(checksumText);
  const actual = sha512Hex(data);
  if (actual !== expected) {
    throw new IntegrityError(url, expected, actual);
  }

  await mkdir(cacheDir, { recursive: true });
  const finalPath = join(cacheDir, cacheName);
  const tempPath = join(cacheDir, `.${cacheName}.${randomBytes(6).toString('hex')}.tmp`);

  try {
    await writeFile(tempPath, data);
    await rename(tempPath, finalPath);
  } catch (err) {
    await unlink(tempPath).catch(() => {});
    throw err;
  }

  return finalPath;
}
