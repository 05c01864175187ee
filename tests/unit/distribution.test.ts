/**
 * Tests for distribution.ts
 *
 * Covers:
 * - Source list match cross-checked against Release attributes
 * - Fallback to archive, codename, empty string
 * - Memoization through the DistributionCache
 */

import { describe, it, expect, vi } from 'vitest';
import {
  DistributionResolver,
  MemoryDistributionCache,
  baseDistribution,
} from '../../src/report/distribution.js';
import type { RepositoryFile } from '../../src/cache/types.js';
import { createMockFile, createSourceList } from './fixtures.js';

describe('baseDistribution', () => {
  it('keeps the part before the first slash', () => {
    expect(baseDistribution('stable/updates')).toBe('stable');
    expect(baseDistribution('bookworm')).toBe('bookworm');
  });
});

describe('DistributionResolver', () => {
  it('uses the configured suite when it agrees with the archive', () => {
    const file = createMockFile({ archive: 'stable', codename: 'bookworm' });
    const resolver = new DistributionResolver(createSourceList('stable', [file]));

    expect(resolver.resolve(file)).toBe('stable');
  });

  it('uses the configured suite when it agrees with the codename', () => {
    const file = createMockFile({ archive: 'stable', codename: 'bookworm' });
    const resolver = new DistributionResolver(createSourceList('bookworm', [file]));

    expect(resolver.resolve(file)).toBe('bookworm');
  });

  it('strips a slash suffix from the configured suite', () => {
    const file = createMockFile({ archive: 'stable-security', codename: 'bookworm-security' });
    const resolver = new DistributionResolver(createSourceList('stable-security/updates', [file]));

    expect(resolver.resolve(file)).toBe('stable-security');
  });

  it('falls back to the archive when the configured suite disagrees', () => {
    const file = createMockFile({ archive: 'stable', codename: 'bookworm' });
    const resolver = new DistributionResolver(createSourceList('testing', [file]));

    expect(resolver.resolve(file)).toBe('stable');
  });

  it('falls back to the codename, then to an empty string', () => {
    const resolver = new DistributionResolver({ entries: [] });

    expect(resolver.resolve(createMockFile({ id: 1, archive: undefined, codename: 'trixie' }))).toBe(
      'trixie'
    );
    expect(resolver.resolve(createMockFile({ id: 2, archive: undefined }))).toBe('');
  });

  it('scans the source list only once per file', () => {
    const file = createMockFile({ archive: 'stable' });
    const describes = vi.fn((candidate: RepositoryFile) => candidate.id === file.id);
    const cache = new MemoryDistributionCache();
    const resolver = new DistributionResolver(createSourceList('stable', [file], describes), cache);

    expect(resolver.resolve(file)).toBe('stable');
    expect(resolver.resolve(file)).toBe('stable');
    expect(describes).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it('serves a cached empty name without scanning', () => {
    const file = createMockFile({ archive: 'stable' });
    const describes = vi.fn(() => true);
    const cache = new MemoryDistributionCache();
    cache.insert(file.id, '');
    const resolver = new DistributionResolver(createSourceList('stable', [file], describes), cache);

    expect(resolver.resolve(file)).toBe('');
    expect(describes).not.toHaveBeenCalled();
  });
});
