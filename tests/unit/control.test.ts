/**
 * Tests for control.ts and release.ts
 *
 * Covers:
 * - Paragraph splitting, continuation lines and comments
 * - Field helpers
 * - Clearsign stripping and Release parsing
 */

import { describe, it, expect } from 'vitest';
import {
  parseControl,
  field,
  booleanField,
  listField,
  stripClearsign,
} from '../../src/cache/control.js';
import { parseRelease } from '../../src/cache/release.js';

// =============================================================================
// Test Fixtures
// =============================================================================

const SIGNED_RELEASE = [
  '-----BEGIN PGP SIGNED MESSAGE-----',
  'Hash: SHA512',
  '',
  'Origin: Example',
  'Label: Example Backports',
  'Suite: stable-backports',
  'Codename: bookworm-backports',
  '- Version: 12.5',
  'NotAutomatic: yes',
  'ButAutomaticUpgrades: yes',
  '-----BEGIN PGP SIGNATURE-----',
  '',
  'iQIzBAEBCgAdFiEE',
  '-----END PGP SIGNATURE-----',
  '',
].join('\n');

// =============================================================================
// parseControl Tests
// =============================================================================

describe('parseControl', () => {
  it('splits paragraphs on blank lines and records their first line', () => {
    const paragraphs = parseControl('Package: foo\nVersion: 1.0\n\nPackage: bar\nVersion: 2.0\n');

    expect(paragraphs).toHaveLength(2);
    expect(paragraphs[0].line).toBe(1);
    expect(paragraphs[1].line).toBe(4);
    expect(paragraphs[0].fields.get('package')).toBe('foo');
    expect(paragraphs[1].fields.get('version')).toBe('2.0');
  });

  it('joins continuation lines and maps a lone dot to an empty line', () => {
    const [paragraph] = parseControl('Package: foo\nDescription: short\n long line\n .\n more\n');

    expect(field(paragraph, 'Description')).toBe('short\nlong line\n\nmore');
  });

  it('skips comment lines', () => {
    const paragraphs = parseControl('# generated\nPackage: foo\n');

    expect(paragraphs).toHaveLength(1);
    expect(paragraphs[0].line).toBe(2);
    expect(field(paragraphs[0], 'Package')).toBe('foo');
  });

  it('accepts CRLF line endings', () => {
    const paragraphs = parseControl('Package: foo\r\n\r\nPackage: bar\r\n');

    expect(paragraphs.map((p) => field(p, 'package'))).toEqual(['foo', 'bar']);
  });

  it('returns no paragraphs for empty content', () => {
    expect(parseControl('')).toEqual([]);
    expect(parseControl('\n\n')).toEqual([]);
  });
});

// =============================================================================
// Field Helper Tests
// =============================================================================

describe('field helpers', () => {
  const [paragraph] = parseControl(
    'Package: foo\nNotAutomatic: Yes\nEnabled: no\nSuites: bookworm   bookworm-updates\n'
  );

  it('looks up fields case-insensitively', () => {
    expect(field(paragraph, 'PACKAGE')).toBe('foo');
    expect(field(paragraph, 'Missing')).toBeUndefined();
  });

  it('reads boolean fields', () => {
    expect(booleanField(paragraph, 'NotAutomatic')).toBe(true);
    expect(booleanField(paragraph, 'Enabled')).toBe(false);
    expect(booleanField(paragraph, 'ButAutomaticUpgrades')).toBe(false);
  });

  it('splits list fields on whitespace', () => {
    expect(listField(paragraph, 'Suites')).toEqual(['bookworm', 'bookworm-updates']);
    expect(listField(paragraph, 'Components')).toEqual([]);
  });
});

// =============================================================================
// Clearsign and Release Tests
// =============================================================================

describe('stripClearsign', () => {
  it('removes armour and signature and undoes dash escaping', () => {
    const body = stripClearsign(SIGNED_RELEASE);

    expect(body.split('\n')).toEqual([
      'Origin: Example',
      'Label: Example Backports',
      'Suite: stable-backports',
      'Codename: bookworm-backports',
      'Version: 12.5',
      'NotAutomatic: yes',
      'ButAutomaticUpgrades: yes',
    ]);
  });

  it('returns unsigned content unchanged', () => {
    expect(stripClearsign('Suite: stable\n')).toBe('Suite: stable\n');
  });
});

describe('parseRelease', () => {
  it('reads release attributes from a signed InRelease file', () => {
    expect(parseRelease(SIGNED_RELEASE)).toEqual({
      archive: 'stable-backports',
      codename: 'bookworm-backports',
      origin: 'Example',
      label: 'Example Backports',
      version: '12.5',
      notAutomatic: true,
      butAutomaticUpgrades: true,
    });
  });

  it('yields a release without attributes for an empty file', () => {
    expect(parseRelease('')).toEqual({ notAutomatic: false, butAutomaticUpgrades: false });
  });
});
