/**
 * APT preferences (pinning) parsing
 *
 * Package: *
 * Pin: release a=stable-backports
 * Pin-Priority: 100
 *
 * Package: firefox-esr
 * Pin: version 115.*
 * Pin-Priority: 1001
 */

import { readFile, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { parseControl, field } from '../cache/control.js';
import { MalformedPreferencesError } from '../cache/errors.js';
import type { Package, RepositoryFile, Version } from '../cache/types.js';
import { isGlob, matchGlob } from '../utils/pattern.js';

// =============================================================================
// Types
// =============================================================================

/** Release attributes a "Pin: release" term can name */
export type ReleaseTermKey = 'a' | 'n' | 'o' | 'l' | 'c' | 'v' | 'b';

export interface ReleaseTerm {
  key: ReleaseTermKey;
  value: string;
}

export type PinTarget =
  | { kind: 'release'; terms: ReleaseTerm[] }
  | { kind: 'origin'; host: string }
  | { kind: 'version'; pattern: string };

/** A name or glob from the Package field, or a compiled /regex/ */
export type PackagePattern =
  | { kind: 'name'; value: string }
  | { kind: 'regex'; value: string; regex: RegExp };

export interface PinRecord {
  /** A single "*" name for a generic pin */
  packages: PackagePattern[];
  pin: PinTarget;
  priority: number;
  /** "file:line" the record was read from */
  source: string;
}

const RELEASE_TERM_KEYS: readonly ReleaseTermKey[] = ['a', 'n', 'o', 'l', 'c', 'v', 'b'];

// =============================================================================
// Parsing
// =============================================================================

function parsePin(value: string, source: string): PinTarget {
  const spaceIndex = value.indexOf(' ');
  const kind = spaceIndex < 0 ? value : value.substring(0, spaceIndex);
  const data = spaceIndex < 0 ? '' : value.substring(spaceIndex + 1).trim();

  switch (kind) {
    case 'release': {
      const terms: ReleaseTerm[] = [];
      for (const part of data.split(',').map((p) => p.trim()).filter((p) => p.length > 0)) {
        const eqIndex = part.indexOf('=');
        if (eqIndex < 0) {
          // Bare "Pin: release unstable" names an archive
          terms.push({ key: 'a', value: part });
          continue;
        }
        const key = RELEASE_TERM_KEYS.find((k) => k === part.substring(0, eqIndex).trim());
        if (!key) {
          throw new MalformedPreferencesError(source, `unknown release term "${part}"`);
        }
        terms.push({ key, value: part.substring(eqIndex + 1).trim() });
      }
      return { kind: 'release', terms };
    }
    case 'origin':
      return { kind: 'origin', host: data.replace(/^"(.*)"$/, '$1') };
    case 'version':
      if (!data) {
        throw new MalformedPreferencesError(source, 'version pin without a version');
      }
      return { kind: 'version', pattern: data };
    default:
      throw new MalformedPreferencesError(source, `unknown pin type "${kind}"`);
  }
}

/**
 * Parse one word of a Package field
 */
export function parsePackagePattern(value: string, source: string): PackagePattern {
  if (value.length > 2 && value.startsWith('/') && value.endsWith('/')) {
    try {
      return { kind: 'regex', value, regex: new RegExp(value.slice(1, -1)) };
    } catch (err) {
      throw new MalformedPreferencesError(
        source,
        `invalid package regex "${value}": ${err instanceof Error ? err.message : String(err)}`
      );
    }
  }
  return { kind: 'name', value };
}

/**
 * Parse the content of one preferences file
 */
export function parsePreferences(content: string, fileName: string): PinRecord[] {
  const records: PinRecord[] = [];

  for (const paragraph of parseControl(content)) {
    const source = `${fileName}:${paragraph.line}`;
    const packages = field(paragraph, 'Package');
    const pin = field(paragraph, 'Pin');
    const priority = field(paragraph, 'Pin-Priority');

    if (!packages) {
      throw new MalformedPreferencesError(source, 'missing Package');
    }
    if (!pin) {
      throw new MalformedPreferencesError(source, 'missing Pin');
    }
    if (!priority || !/^[+-]?\d+$/.test(priority.trim())) {
      throw new MalformedPreferencesError(source, 'missing or invalid Pin-Priority');
    }

    records.push({
      packages: packages
        .split(/\s+/)
        .filter((p) => p.length > 0)
        .map((p) => parsePackagePattern(p, source)),
      pin: parsePin(pin.trim(), source),
      priority: parseInt(priority.trim(), 10),
      source,
    });
  }

  return records;
}

// =============================================================================
// Matching
// =============================================================================

/**
 * Generic pins apply to files as a whole rather than to named packages
 */
export function isGenericPin(record: PinRecord): boolean {
  const [only] = record.packages;
  return (
    record.packages.length === 1 &&
    only.kind === 'name' &&
    only.value === '*' &&
    record.pin.kind !== 'version'
  );
}

function matchValue(pattern: string, value: string | undefined): boolean {
  const actual = value ?? '';
  return isGlob(pattern) ? matchGlob(pattern, actual) : pattern === actual;
}

function releaseValue(file: RepositoryFile, key: ReleaseTermKey): string | undefined {
  switch (key) {
    case 'a':
      return file.archive;
    case 'n':
      return file.codename;
    case 'o':
      return file.origin;
    case 'l':
      return file.label;
    case 'c':
      return file.component;
    case 'v':
      return file.version;
    case 'b':
      return file.architecture;
  }
}

/**
 * Whether a release or origin pin selects the repository file
 */
export function pinMatchesFile(pin: PinTarget, file: RepositoryFile): boolean {
  if (file.notSource) {
    return false;
  }
  switch (pin.kind) {
    case 'release':
      return pin.terms.every((term) => {
        // A bare archive name also matches the codename
        if (term.key === 'a') {
          return matchValue(term.value, file.archive) || matchValue(term.value, file.codename);
        }
        return matchValue(term.value, releaseValue(file, term.key));
      });
    case 'origin':
      return matchValue(pin.host, file.site);
    case 'version':
      return false;
  }
}

/**
 * Whether a package pin names the package
 */
export function pinMatchesPackage(record: PinRecord, pkg: Package): boolean {
  return record.packages.some((pattern) => {
    if (pattern.kind === 'regex') {
      return pattern.regex.test(pkg.name);
    }
    return (
      matchValue(pattern.value, pkg.name) ||
      matchValue(pattern.value, `${pkg.name}:${pkg.architecture}`)
    );
  });
}

/**
 * Whether a package pin selects this (version, file) pair
 */
export function pinMatchesVersion(pin: PinTarget, version: Version, file: RepositoryFile): boolean {
  if (pin.kind === 'version') {
    return matchValue(pin.pattern, version.version);
  }
  return pinMatchesFile(pin, file);
}

// =============================================================================
// Loading
// =============================================================================

export interface PreferencesPaths {
  preferences: string;
  preferencesParts: string;
}

/** preferences.d entries APT reads: no extension, or ".pref" */
const PREFERENCES_PART = /^[A-Za-z0-9_-]+(\.pref)?$/;

/**
 * Load the main preferences file followed by its parts directory
 */
export async function loadPreferences(paths: PreferencesPaths): Promise<PinRecord[]> {
  const records: PinRecord[] = [];

  if (existsSync(paths.preferences)) {
    records.push(...parsePreferences(await readFile(paths.preferences, 'utf-8'), paths.preferences));
  }

  if (existsSync(paths.preferencesParts)) {
    const names = (await readdir(paths.preferencesParts)).sort();
    for (const name of names.filter((n) => PREFERENCES_PART.test(n))) {
      const path = join(paths.preferencesParts, name);
      records.push(...parsePreferences(await readFile(path, 'utf-8'), path));
    }
  }

  return records;
}
