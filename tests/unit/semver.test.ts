import { describe, it, expect } from 'vitest';
import {
  parseVersion,
  compareVersions,
  isValidVersion,
  maxVersion,
} from '../../src/utils/semver.js';
import { VersionParseError } from '../../src/core/errors.js';

describe('parseVersion', () => {
  it('parses a plain release', () => {
    expect(parseVersion('2.0.27')).toEqual({ release: [2, 0, 27], preRelease: null });
  });

  it('parses a version with v prefix', () => {
    expect(parseVersion('v1.0.0')).toEqual({ release: [1, 0, 0], preRelease: null });
  });

  it('accepts any number of numeric groups', () => {
    expect(parseVersion('3').release).toEqual([3]);
    expect(parseVersion('1.8.16.2').release).toEqual([1, 8, 16, 2]);
  });

  it('normalizes pre-release qualifiers', () => {
    expect(parseVersion('3.0.0-alpha2').preRelease).toEqual({ label: 'alpha', number: 2 });
    expect(parseVersion('3.0.0-RC1').preRelease).toEqual({ label: 'rc', number: 1 });
    expect(parseVersion('3.0.0b4').preRelease).toEqual({ label: 'beta', number: 4 });
    expect(parseVersion('1.0.dev3').preRelease).toEqual({ label: 'dev', number: 3 });
  });

  it('treats a qualifier without number as number 0', () => {
    expect(parseVersion('3.0.0-beta').preRelease).toEqual({ label: 'beta', number: 0 });
  });

  it('throws VersionParseError on garbage', () => {
    expect(() => parseVersion('invalid')).toThrow(VersionParseError);
    expect(() => parseVersion('1.2.3junk')).toThrow('Invalid version: "1.2.3junk"');
    expect(() => parseVersion('')).toThrow(VersionParseError);
  });
});

describe('compareVersions', () => {
  it('returns 0 for equal versions', () => {
    expect(compareVersions('1.2.3', '1.2.3')).toBe(0);
  });

  it('pads missing components with zeros', () => {
    expect(compareVersions('1.0', '1.0.0')).toBe(0);
  });

  it('compares numerically, not as strings', () => {
    expect(compareVersions('2.10.0', '2.9.0')).toBeGreaterThan(0);
    expect(compareVersions('1.8.9', '1.8.16')).toBeLessThan(0);
  });

  it('orders pre-releases before the release', () => {
    expect(compareVersions('3.0.0-RC1', '3.0.0')).toBeLessThan(0);
    expect(compareVersions('3.0.0', '3.0.0-alpha1')).toBeGreaterThan(0);
  });

  it('orders qualifiers dev < alpha < beta < rc', () => {
    expect(compareVersions('3.0.0.dev1', '3.0.0-alpha1')).toBeLessThan(0);
    expect(compareVersions('3.0.0-alpha3', '3.0.0-beta1')).toBeLessThan(0);
    expect(compareVersions('3.0.0-beta1', '3.0.0-RC1')).toBeLessThan(0);
  });

  it('compares qualifier numbers', () => {
    expect(compareVersions('3.0.0-alpha10', '3.0.0-alpha2')).toBeGreaterThan(0);
  });

  it('puts a pre-release of a newer release above an older release', () => {
    expect(compareVersions('3.0.0-alpha1', '2.0.27')).toBeGreaterThan(0);
  });
});

describe('isValidVersion', () => {
  it('accepts versions and rejects everything else', () => {
    expect(isValidVersion('2.0.27')).toBe(true);
    expect(isValidVersion('KEYS')).toBe(false);
    expect(isValidVersion('..')).toBe(false);
  });
});

describe('maxVersion', () => {
  it('returns null for an empty input', () => {
    expect(maxVersion([])).toBeNull();
  });

  it('selects the greatest version', () => {
    expect(maxVersion(['2.9.0', '2.10.0', '1.8.16'])).toBe('2.10.0');
  });

  it('prefers a release over its release candidates', () => {
    expect(maxVersion(new Set(['3.0.0-RC1', '3.0.0', '3.0.0-beta1']))).toBe('3.0.0');
  });

  it('throws when any entry is malformed', () => {
    expect(() => maxVersion(['2.0.27', 'latest'])).toThrow(VersionParseError);
  });

  it('validates a single entry', () => {
    expect(() => maxVersion(['nope'])).toThrow(VersionParseError);
  });
});
