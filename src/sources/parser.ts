/**
 * Source list parsing
 *
 * Reads the one-line ".list" format:
 *   deb [arch=amd64 signed-by=/usr/share/keyrings/x.gpg] http://host/debian bookworm main contrib
 * and the deb822 ".sources" format:
 *   Types: deb
 *   URIs: http://host/debian
 *   Suites: bookworm bookworm-updates
 *   Components: main
 */

import { readFile, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { parseControl, field, listField } from '../cache/control.js';
import { CacheLoadError, MalformedSourceError } from '../cache/errors.js';
import type { RepositoryFile } from '../cache/types.js';
import type { IndexFile, SourceEntry, SourceList, SourceType } from './types.js';
import { uriToFileName, withTrailingSlash } from './uri.js';

// =============================================================================
// Index Files
// =============================================================================

/**
 * Binary Packages index of one (entry, component, architecture)
 */
export class PackagesIndex implements IndexFile {
  readonly fileName: string;
  readonly releaseFileNames: readonly string[];

  constructor(
    uri: string,
    distribution: string,
    readonly architecture: string,
    readonly component?: string
  ) {
    const root = withTrailingSlash(uri);

    if (isFlatDistribution(distribution)) {
      this.fileName = uriToFileName(`${root}${distribution}Packages`);
      this.releaseFileNames = [
        uriToFileName(`${root}${distribution}InRelease`),
        uriToFileName(`${root}${distribution}Release`),
      ];
    } else {
      this.fileName = uriToFileName(
        `${root}dists/${distribution}/${component ?? ''}/binary-${architecture}/Packages`
      );
      this.releaseFileNames = [
        uriToFileName(`${root}dists/${distribution}/InRelease`),
        uriToFileName(`${root}dists/${distribution}/Release`),
      ];
    }
  }

  describes(file: RepositoryFile): boolean {
    return !file.notSource && file.fileName === this.fileName;
  }
}

/**
 * Flat repositories name a directory instead of a suite
 */
export function isFlatDistribution(distribution: string): boolean {
  return distribution.endsWith('/');
}

function createIndexFiles(
  type: SourceType,
  uri: string,
  distribution: string,
  components: string[],
  architectures: string[]
): IndexFile[] {
  if (type !== 'deb') {
    return [];
  }

  const indexFiles: IndexFile[] = [];
  for (const architecture of architectures) {
    if (isFlatDistribution(distribution)) {
      indexFiles.push(new PackagesIndex(uri, distribution, architecture));
      continue;
    }
    for (const component of components) {
      indexFiles.push(new PackagesIndex(uri, distribution, architecture, component));
    }
  }
  return indexFiles;
}

function buildEntry(
  type: SourceType,
  uri: string,
  distribution: string,
  components: string[],
  restrictedArchitectures: string[],
  defaultArchitectures: string[],
  origin: string
): SourceEntry {
  const architectures =
    restrictedArchitectures.length > 0 ? restrictedArchitectures : defaultArchitectures;

  return {
    type,
    uri: withTrailingSlash(uri),
    distribution,
    components,
    architectures: restrictedArchitectures,
    origin,
    indexFiles: createIndexFiles(type, uri, distribution, components, architectures),
  };
}

function parseSourceType(value: string, origin: string): SourceType {
  if (value === 'deb' || value === 'deb-src') {
    return value;
  }
  throw new MalformedSourceError(origin, `unknown type "${value}"`);
}

// =============================================================================
// One-line Format
// =============================================================================

/**
 * Parse the "[key=value ...]" option block of a one-line entry
 */
function parseOptions(raw: string): Map<string, string[]> {
  const options = new Map<string, string[]>();
  for (const token of raw.split(/\s+/).filter((t) => t.length > 0)) {
    const eqIndex = token.indexOf('=');
    if (eqIndex <= 0) continue;
    options.set(token.substring(0, eqIndex), token.substring(eqIndex + 1).split(','));
  }
  return options;
}

/**
 * Parse a one-line style sources.list file
 */
export function parseOneLineSources(
  content: string,
  fileName: string,
  defaultArchitectures: string[]
): SourceEntry[] {
  const entries: SourceEntry[] = [];

  content.split('\n').forEach((rawLine, index) => {
    const origin = `${fileName}:${index + 1}`;
    const line = rawLine.replace(/#.*$/, '').trim();
    if (!line) return;

    const typeMatch = /^(\S+)\s*(.*)$/.exec(line);
    if (!typeMatch) return;
    const type = parseSourceType(typeMatch[1], origin);
    let rest = typeMatch[2];

    let options = new Map<string, string[]>();
    if (rest.startsWith('[')) {
      const closeIndex = rest.indexOf(']');
      if (closeIndex < 0) {
        throw new MalformedSourceError(origin, 'unterminated option block');
      }
      options = parseOptions(rest.substring(1, closeIndex));
      rest = rest.substring(closeIndex + 1).trim();
    }

    const [uri, distribution, ...components] = rest.split(/\s+/).filter((t) => t.length > 0);
    if (!uri) {
      throw new MalformedSourceError(origin, 'missing URI');
    }
    if (!distribution) {
      throw new MalformedSourceError(origin, 'missing distribution');
    }
    if (!isFlatDistribution(distribution) && components.length === 0) {
      throw new MalformedSourceError(origin, 'missing component');
    }

    entries.push(
      buildEntry(
        type,
        uri,
        distribution,
        components,
        options.get('arch') ?? [],
        defaultArchitectures,
        origin
      )
    );
  });

  return entries;
}

// =============================================================================
// deb822 Format
// =============================================================================

/**
 * Parse a deb822 style .sources file
 */
export function parseDeb822Sources(
  content: string,
  fileName: string,
  defaultArchitectures: string[]
): SourceEntry[] {
  const entries: SourceEntry[] = [];

  for (const paragraph of parseControl(content)) {
    const origin = `${fileName}:${paragraph.line}`;

    if (field(paragraph, 'Enabled')?.toLowerCase() === 'no') {
      continue;
    }

    const types = listField(paragraph, 'Types').map((t) => parseSourceType(t, origin));
    const uris = listField(paragraph, 'URIs');
    const suites = listField(paragraph, 'Suites');
    const components = listField(paragraph, 'Components');
    const architectures = listField(paragraph, 'Architectures');

    if (types.length === 0) {
      throw new MalformedSourceError(origin, 'missing Types');
    }
    if (uris.length === 0) {
      throw new MalformedSourceError(origin, 'missing URIs');
    }
    if (suites.length === 0) {
      throw new MalformedSourceError(origin, 'missing Suites');
    }

    for (const type of types) {
      for (const uri of uris) {
        for (const suite of suites) {
          if (!isFlatDistribution(suite) && components.length === 0) {
            throw new MalformedSourceError(origin, `missing Components for suite "${suite}"`);
          }
          entries.push(
            buildEntry(type, uri, suite, components, architectures, defaultArchitectures, origin)
          );
        }
      }
    }
  }

  return entries;
}

// =============================================================================
// Loading
// =============================================================================

export interface SourceListPaths {
  /** Main sources.list file */
  sourceList: string;
  /** Directory holding *.list and *.sources parts */
  sourceParts: string;
}

async function readSourceFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    throw new CacheLoadError(
      `Failed to read source list ${path}: ${err instanceof Error ? err.message : String(err)}`,
      'SOURCE_LIST_UNREADABLE',
      path
    );
  }
}

/**
 * Load the main source list followed by its parts directory (sorted by name)
 */
export async function loadSourceList(
  paths: SourceListPaths,
  defaultArchitectures: string[]
): Promise<SourceList> {
  const entries: SourceEntry[] = [];

  if (existsSync(paths.sourceList)) {
    const content = await readSourceFile(paths.sourceList);
    entries.push(...parseOneLineSources(content, paths.sourceList, defaultArchitectures));
  }

  if (existsSync(paths.sourceParts)) {
    const names = (await readdir(paths.sourceParts)).sort();
    for (const name of names) {
      const path = join(paths.sourceParts, name);
      if (name.endsWith('.list')) {
        entries.push(...parseOneLineSources(await readSourceFile(path), path, defaultArchitectures));
      } else if (name.endsWith('.sources')) {
        entries.push(...parseDeb822Sources(await readSourceFile(path), path, defaultArchitectures));
      }
    }
  }

  return { entries };
}
