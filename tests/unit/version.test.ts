/**
 * Tests for version.ts
 *
 * Covers:
 * - Splitting epoch, upstream version and revision
 * - dpkg ordering rules (epochs, tildes, letters, leading zeros)
 */

import { describe, it, expect } from 'vitest';
import { compareVersions, parseDebianVersion } from '../../src/cache/version.js';

describe('parseDebianVersion', () => {
  it('splits epoch, upstream and revision', () => {
    expect(parseDebianVersion('2:1.2-3-4')).toEqual({ epoch: 2, upstream: '1.2-3', revision: '4' });
  });

  it('defaults epoch and revision', () => {
    expect(parseDebianVersion('1.0')).toEqual({ epoch: 0, upstream: '1.0', revision: '' });
  });
});

describe('compareVersions', () => {
  it('treats identical versions as equal', () => {
    expect(compareVersions('1.0', '1.0')).toBe(0);
  });

  it('orders numeric parts numerically', () => {
    expect(compareVersions('1.0', '1.2')).toBeLessThan(0);
    expect(compareVersions('1.10', '1.9')).toBeGreaterThan(0);
  });

  it('ignores leading zeros', () => {
    expect(compareVersions('1.01', '1.1')).toBe(0);
  });

  it('lets the epoch win over everything else', () => {
    expect(compareVersions('1:0.9', '2.0')).toBeGreaterThan(0);
  });

  it('sorts a tilde before the end of the string', () => {
    expect(compareVersions('1.0~rc1', '1.0')).toBeLessThan(0);
    expect(compareVersions('1.0~~', '1.0~')).toBeLessThan(0);
  });

  it('sorts letters before other characters', () => {
    expect(compareVersions('1.0a', '1.0+')).toBeLessThan(0);
    expect(compareVersions('1.0', '1.0a')).toBeLessThan(0);
  });

  it('compares revisions after upstream versions', () => {
    expect(compareVersions('1.0-2', '1.0-1')).toBeGreaterThan(0);
    expect(compareVersions('1.0-10', '1.0-9')).toBeGreaterThan(0);
    expect(compareVersions('1.1-1', '1.0-9')).toBeGreaterThan(0);
  });
});
