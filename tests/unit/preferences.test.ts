/**
 * Tests for preferences.ts
 *
 * Covers:
 * - Parsing release, origin and version pins
 * - Malformed records and package regexes
 * - Matching pins against files, packages and versions
 * - Loading preferences and preferences.d
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import {
  parsePreferences,
  parsePackagePattern,
  isGenericPin,
  pinMatchesFile,
  pinMatchesPackage,
  pinMatchesVersion,
  loadPreferences,
  type PinRecord,
  type PackagePattern,
} from '../../src/policy/preferences.js';
import { MalformedPreferencesError } from '../../src/cache/errors.js';
import {
  createMockFile,
  createMockPackage,
  createMockVersion,
  createTempDir,
  cleanupTempDir,
} from './fixtures.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const PREFERENCES = `Package: *
Pin: release a=stable-backports
Pin-Priority: 100

Package: firefox-esr
Pin: version 115.*
Pin-Priority: 1001
`;

function patterns(...values: string[]): PackagePattern[] {
  return values.map((value) => parsePackagePattern(value, 'preferences:1'));
}

function createMockPin(overrides: Partial<PinRecord> = {}): PinRecord {
  return {
    packages: patterns('*'),
    pin: { kind: 'release', terms: [{ key: 'a', value: 'stable' }] },
    priority: 990,
    source: 'preferences:1',
    ...overrides,
  };
}

// =============================================================================
// Parsing Tests
// =============================================================================

describe('parsePreferences', () => {
  it('parses release and version pins', () => {
    const records = parsePreferences(PREFERENCES, 'preferences');

    expect(records).toEqual([
      {
        packages: [{ kind: 'name', value: '*' }],
        pin: { kind: 'release', terms: [{ key: 'a', value: 'stable-backports' }] },
        priority: 100,
        source: 'preferences:1',
      },
      {
        packages: [{ kind: 'name', value: 'firefox-esr' }],
        pin: { kind: 'version', pattern: '115.*' },
        priority: 1001,
        source: 'preferences:5',
      },
    ]);
  });

  it('parses several release terms and bare archive names', () => {
    const [record] = parsePreferences(
      'Package: *\nPin: release n=bookworm, o=Debian\nPin-Priority: 500\n',
      'p'
    );
    const [bare] = parsePreferences('Package: *\nPin: release unstable\nPin-Priority: 50\n', 'p');

    expect(record.pin).toEqual({
      kind: 'release',
      terms: [
        { key: 'n', value: 'bookworm' },
        { key: 'o', value: 'Debian' },
      ],
    });
    expect(bare.pin).toEqual({ kind: 'release', terms: [{ key: 'a', value: 'unstable' }] });
  });

  it('parses origin pins and negative priorities', () => {
    const [record] = parsePreferences(
      'Package: foo bar\nPin: origin "deb.example.com"\nPin-Priority: -1\n',
      'p'
    );

    expect(record.packages.map((pattern) => pattern.value)).toEqual(['foo', 'bar']);
    expect(record.pin).toEqual({ kind: 'origin', host: 'deb.example.com' });
    expect(record.priority).toBe(-1);
  });

  it('rejects a record without a priority', () => {
    expect(() => parsePreferences('Package: *\nPin: release a=stable\n', 'p')).toThrow(
      'Invalid preferences record p:1 (missing or invalid Pin-Priority)'
    );
  });

  it('compiles /regex/ package fields once', () => {
    const [record] = parsePreferences('Package: /^lib/ foo\nPin: version 1.*\nPin-Priority: 600\n', 'p');

    expect(record.packages.map((pattern) => pattern.kind)).toEqual(['regex', 'name']);
    expect(record.packages[0]).toEqual({ kind: 'regex', value: '/^lib/', regex: /^lib/ });
  });

  it('rejects a package regex that does not compile', () => {
    expect(() => parsePreferences('Package: /[foo/\nPin: version 1.*\nPin-Priority: 600\n', 'p')).toThrow(
      MalformedPreferencesError
    );
    expect(() => parsePreferences('Package: /[foo/\nPin: version 1.*\nPin-Priority: 600\n', 'p')).toThrow(
      'Invalid preferences record p:1 (invalid package regex "/[foo/": '
    );
  });

  it('rejects unknown pin types and release terms', () => {
    expect(() => parsePreferences('Package: *\nPin: label x\nPin-Priority: 1\n', 'p')).toThrow(
      MalformedPreferencesError
    );
    expect(() =>
      parsePreferences('Package: *\nPin: release z=1\nPin-Priority: 1\n', 'p')
    ).toThrow(MalformedPreferencesError);
  });
});

// =============================================================================
// Matching Tests
// =============================================================================

describe('isGenericPin', () => {
  it('treats "*" release pins as generic but not version pins', () => {
    expect(isGenericPin(createMockPin())).toBe(true);
    expect(isGenericPin(createMockPin({ pin: { kind: 'version', pattern: '1.*' } }))).toBe(false);
    expect(isGenericPin(createMockPin({ packages: patterns('foo') }))).toBe(false);
  });
});

describe('pinMatchesFile', () => {
  it('matches an archive term against the archive or the codename', () => {
    const pin = createMockPin({ pin: { kind: 'release', terms: [{ key: 'a', value: 'bookworm' }] } });

    expect(pinMatchesFile(pin.pin, createMockFile({ archive: 'stable', codename: 'bookworm' }))).toBe(
      true
    );
    expect(pinMatchesFile(pin.pin, createMockFile({ archive: 'stable', codename: 'trixie' }))).toBe(
      false
    );
  });

  it('requires every term to match and supports globs', () => {
    const pin = {
      kind: 'release' as const,
      terms: [
        { key: 'o' as const, value: 'Exam*' },
        { key: 'c' as const, value: 'main' },
      ],
    };

    expect(pinMatchesFile(pin, createMockFile({ origin: 'Example', component: 'main' }))).toBe(true);
    expect(pinMatchesFile(pin, createMockFile({ origin: 'Example', component: 'contrib' }))).toBe(
      false
    );
  });

  it('matches origin pins against the site', () => {
    expect(
      pinMatchesFile({ kind: 'origin', host: 'deb.example.com' }, createMockFile({ site: 'deb.example.com' }))
    ).toBe(true);
  });

  it('never matches the status file', () => {
    expect(pinMatchesFile(createMockPin().pin, createMockFile({ notSource: true }))).toBe(false);
  });
});

describe('pinMatchesPackage', () => {
  it('matches names, globs, name:arch and /regex/', () => {
    const pkg = createMockPackage({ name: 'libfoo1', architecture: 'i386' });

    expect(pinMatchesPackage(createMockPin({ packages: patterns('libfoo1') }), pkg)).toBe(true);
    expect(pinMatchesPackage(createMockPin({ packages: patterns('libfoo*') }), pkg)).toBe(true);
    expect(pinMatchesPackage(createMockPin({ packages: patterns('libfoo1:i386') }), pkg)).toBe(true);
    expect(pinMatchesPackage(createMockPin({ packages: patterns('/^lib/') }), pkg)).toBe(true);
    expect(pinMatchesPackage(createMockPin({ packages: patterns('libfoo1:amd64') }), pkg)).toBe(false);
  });
});

describe('pinMatchesVersion', () => {
  it('matches version pins by glob', () => {
    const file = createMockFile();

    expect(pinMatchesVersion({ kind: 'version', pattern: '115.*' }, createMockVersion(1, '115.2', [file]), file)).toBe(true);
    expect(pinMatchesVersion({ kind: 'version', pattern: '115.*' }, createMockVersion(2, '128.0', [file]), file)).toBe(false);
  });
});

// =============================================================================
// loadPreferences Tests
// =============================================================================

describe('loadPreferences', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    cleanupTempDir(tempDir);
  });

  it('reads the main file, then parts APT would read, in name order', async () => {
    const parts = join(tempDir, 'preferences.d');
    mkdirSync(parts);
    writeFileSync(join(tempDir, 'preferences'), PREFERENCES);
    writeFileSync(join(parts, '20-other'), 'Package: bar\nPin: release a=testing\nPin-Priority: 600\n');
    writeFileSync(join(parts, '10-local.pref'), 'Package: foo\nPin: release a=testing\nPin-Priority: 700\n');
    writeFileSync(join(parts, 'backup.pref~'), 'Package: baz\nPin: release a=testing\nPin-Priority: 800\n');
    writeFileSync(join(parts, 'notes.txt'), 'not a preferences file\n');

    const records = await loadPreferences({
      preferences: join(tempDir, 'preferences'),
      preferencesParts: parts,
    });

    expect(records.map((r) => r.priority)).toEqual([100, 1001, 700, 600]);
  });

  it('returns no records when nothing exists', async () => {
    const records = await loadPreferences({
      preferences: join(tempDir, 'missing'),
      preferencesParts: join(tempDir, 'missing.d'),
    });

    expect(records).toEqual([]);
  });
});
