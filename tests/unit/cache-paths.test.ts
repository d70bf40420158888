import { join } from 'node:path';
import os from 'node:os';
import { describe, it, expect } from 'vitest';
import { resolveCacheDir, resolveHomeDir } from '../../src/core/cache-paths.js';

describe('resolveHomeDir', () => {
  it('uses HOME when set', () => {
    expect(resolveHomeDir({ HOME: '/home/tester' })).toBe('/home/tester');
  });

  it('expands a leading tilde', () => {
    expect(resolveHomeDir({ HOME: '~/sandbox' })).toBe(join(os.homedir(), '/sandbox'));
  });

  it('falls back to os.homedir()', () => {
    expect(resolveHomeDir({})).toBe(os.homedir());
  });
});

describe('resolveCacheDir', () => {
  it('honours PDFBOX_CACHE_DIR on every platform', () => {
    const env = { PDFBOX_CACHE_DIR: '/srv/pdfbox-cache', HOME: '/home/tester' };
    expect(resolveCacheDir(env, 'linux')).toBe('/srv/pdfbox-cache');
    expect(resolveCacheDir(env, 'darwin')).toBe('/srv/pdfbox-cache');
    expect(resolveCacheDir(env, 'win32')).toBe('/srv/pdfbox-cache');
  });

  it('uses XDG_CACHE_HOME on Linux', () => {
    expect(resolveCacheDir({ XDG_CACHE_HOME: '/tmp/xdg', HOME: '/home/tester' }, 'linux')).toBe(
      join('/tmp/xdg', 'pdfbox-bridge'),
    );
  });

  it('defaults to ~/.cache on Linux', () => {
    expect(resolveCacheDir({ HOME: '/home/tester' }, 'linux')).toBe(
      join('/home/tester', '.cache', 'pdfbox-bridge'),
    );
  });

  it('ignores a blank XDG_CACHE_HOME', () => {
    expect(resolveCacheDir({ XDG_CACHE_HOME: '  ', HOME: '/home/tester' }, 'freebsd')).toBe(
      join('/home/tester', '.cache', 'pdfbox-bridge'),
    );
  });

  it('uses ~/Library/Caches on macOS', () => {
    expect(resolveCacheDir({ HOME: '/Users/tester' }, 'darwin')).toBe(
      join('/Users/tester', 'Library', 'Caches', 'pdfbox-bridge'),
    );
  });

  it('uses LOCALAPPDATA on Windows', () => {
    expect(resolveCacheDir({ LOCALAPPDATA: 'C:/Users/tester/AppData/Local' }, 'win32')).toBe(
      join('C:/Users/tester/AppData/Local', 'pdfbox-bridge', 'Cache'),
    );
  });
});
