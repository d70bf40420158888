import { join } from 'node:path';
import os from 'node:os';

export const APP_NAME = 'pdfbox-bridge';

export function resolveHomeDir(env?: NodeJS.ProcessEnv): string {
  const e = env ?? process.env;
  const raw = e.HOME ?? e.USERPROFILE;
  if (raw) {
    if (raw.startsWith('~')) {
      return join(os.homedir(), raw.slice(1));
    }
    return raw;
  }
  return os.homedir();
}

/**
 * Platform-conventional per-user cache directory:
 * - Linux and other Unix: `$XDG_CACHE_HOME/<app>` or `~/.cache/<app>`
 * - macOS: `~/Library/Caches/<app>`
 * - Windows: `%LOCALAPPDATA%\<app>\Cache`
 *
 * `PDFBOX_CACHE_DIR` wins on every platform.
 */
export function resolveCacheDir(
  env?: NodeJS.ProcessEnv,
  platform: NodeJS.Platform = process.platform,
): string {
  const e = env ?? process.env;
  if (e.PDFBOX_CACHE_DIR) return e.PDFBOX_CACHE_DIR;

  const homeDir = resolveHomeDir(env);

  if (platform === 'win32') {
    const localAppData = e.LOCALAPPDATA ?? join(homeDir, 'AppData', 'Local');
    return join(localAppData, APP_NAME, 'Cache');
  }

  if (platform === 'darwin') {
    return join(homeDir, 'Library', 'Caches', APP_NAME);
  }

  const xdg = e.XDG_CACHE_HOME;
  if (xdg && xdg.trim().length > 0) {
    return join(xdg, APP_NAME);
  }
  return join(homeDir, '.cache', APP_NAME);
}
