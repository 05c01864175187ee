/**
 * File-system package cache loader
 *
 * Builds the in-memory cache from the dpkg status file and the Packages
 * indices under the APT lists directory, for every index the configured
 * source list names. Nothing is written and nothing is fetched: indices
 * that have not been downloaded are skipped.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { gunzipSync } from 'node:zlib';
import { parseControl, field, type ControlParagraph } from './control.js';
import { CacheLoadError } from './errors.js';
import { parseRelease, type ReleaseInfo } from './release.js';
import { CacheBuilder, type InMemoryPackageCache, type PackageStateInit } from './builder.js';
import {
  CURRENT_STATES,
  INSTALL_FLAGS,
  SELECTION_STATES,
  type CurrentState,
  type InstallFlag,
  type SelectionState,
} from './types.js';
import type { SourceList, IndexFile, SourceEntry } from '../sources/types.js';
import { uriSite } from '../sources/uri.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';

/**
 * Fields whose content decides whether two records of the same version
 * string describe the same build
 */
const FINGERPRINT_FIELDS = [
  'Installed-Size',
  'Depends',
  'Pre-Depends',
  'Suggests',
  'Recommends',
  'Conflicts',
  'Breaks',
  'Replaces',
];

export interface CacheLoadOptions {
  /** dpkg status file */
  statusFile: string;
  /** APT lists directory */
  listsDir: string;
  /** Configured sources; decides which indices are read */
  sourceList: SourceList;
  nativeArchitecture: string;
  logger?: Logger;
}

// =============================================================================
// Record Helpers
// =============================================================================

/**
 * Fingerprint of the dependency-relevant fields, whitespace-insensitive
 */
export function versionFingerprint(paragraph: ControlParagraph): string {
  return FINGERPRINT_FIELDS.map((name) => (field(paragraph, name) ?? '').replace(/\s+/g, '')).join(
    '\u0000'
  );
}

/**
 * Parse a dpkg "Status: <want> <flag> <status>" field
 */
export function parseStatusField(value: string | undefined): PackageStateInit {
  const [want, flag, status] = (value ?? '').trim().split(/\s+/);

  const selectionState: SelectionState = SELECTION_STATES.find((s) => s === want) ?? 'unknown';
  // dpkg writes "reinstreq" in the status file
  const normalizedFlag = flag === 'reinstreq' ? 'reinst-required' : flag;
  const installFlag: InstallFlag = INSTALL_FLAGS.find((f) => f === normalizedFlag) ?? 'ok';
  const currentState: CurrentState = CURRENT_STATES.find((s) => s === status) ?? 'not-installed';

  return { selectionState, installFlag, currentState };
}

/**
 * Whether dpkg considers a version of the package present on the system
 */
export function hasInstalledVersion(state: CurrentState): boolean {
  return state !== 'not-installed' && state !== 'config-files';
}

async function readIndex(path: string): Promise<string> {
  try {
    if (existsSync(path)) {
      return await readFile(path, 'utf-8');
    }
    return gunzipSync(await readFile(`${path}.gz`)).toString('utf-8');
  } catch (err) {
    throw new CacheLoadError(
      `Failed to read index ${path}: ${err instanceof Error ? err.message : String(err)}`,
      'INDEX_UNREADABLE',
      path,
      'Run "apt update" to refresh the package lists'
    );
  }
}

// =============================================================================
// Loader
// =============================================================================

async function loadStatus(builder: CacheBuilder, statusFile: string): Promise<void> {
  let content: string;
  try {
    content = await readFile(statusFile, 'utf-8');
  } catch (err) {
    throw new CacheLoadError(
      `Failed to read dpkg status file ${statusFile}: ${err instanceof Error ? err.message : String(err)}`,
      'STATUS_FILE_UNREADABLE',
      statusFile,
      'Check the --root option or the statusFile setting'
    );
  }

  const file = builder.addFile({ fileName: statusFile, notSource: true });

  for (const paragraph of parseControl(content)) {
    const name = field(paragraph, 'Package');
    if (!name) continue;

    const architecture = builder.normalizeArchitecture(field(paragraph, 'Architecture'));
    const state = parseStatusField(field(paragraph, 'Status'));
    builder.setState(name, architecture, state);

    const versionString = field(paragraph, 'Version');
    if (!versionString) continue;

    const version = builder.addVersion(
      name,
      architecture,
      versionString,
      file,
      versionFingerprint(paragraph)
    );
    if (hasInstalledVersion(state.currentState)) {
      builder.markInstalled(name, architecture, version);
    }
  }
}

async function loadRelease(listsDir: string, indexFile: IndexFile): Promise<ReleaseInfo> {
  for (const releaseName of indexFile.releaseFileNames) {
    const path = join(listsDir, releaseName);
    if (existsSync(path)) {
      return parseRelease(await readFile(path, 'utf-8'));
    }
  }
  return { notAutomatic: false, butAutomaticUpgrades: false };
}

async function loadIndex(
  builder: CacheBuilder,
  listsDir: string,
  entry: SourceEntry,
  indexFile: IndexFile
): Promise<void> {
  const content = await readIndex(join(listsDir, indexFile.fileName));
  const release = await loadRelease(listsDir, indexFile);

  const file = builder.addFile({
    fileName: indexFile.fileName,
    archive: release.archive,
    codename: release.codename,
    origin: release.origin,
    label: release.label,
    version: release.version,
    component: indexFile.component,
    site: uriSite(entry.uri),
    architecture: indexFile.architecture,
    notAutomatic: release.notAutomatic,
    butAutomaticUpgrades: release.butAutomaticUpgrades,
  });

  for (const paragraph of parseControl(content)) {
    const name = field(paragraph, 'Package');
    const versionString = field(paragraph, 'Version');
    if (!name || !versionString) continue;

    builder.addVersion(
      name,
      field(paragraph, 'Architecture') ?? indexFile.architecture,
      versionString,
      file,
      versionFingerprint(paragraph)
    );
  }
}

/**
 * Load the package cache from disk
 */
export async function loadCache(options: CacheLoadOptions): Promise<InMemoryPackageCache> {
  const log = (options.logger ?? defaultLogger).child({ component: 'cache' });
  const builder = new CacheBuilder(options.nativeArchitecture);

  await loadStatus(builder, options.statusFile);
  log.debug('Loaded dpkg status', { path: options.statusFile });

  const seen = new Set<string>();
  for (const entry of options.sourceList.entries) {
    for (const indexFile of entry.indexFiles) {
      if (seen.has(indexFile.fileName)) {
        log.warn(`Target Packages (${indexFile.fileName}) is configured multiple times`, {
          origin: entry.origin,
        });
        continue;
      }
      seen.add(indexFile.fileName);

      const path = join(options.listsDir, indexFile.fileName);
      if (!existsSync(path) && !existsSync(`${path}.gz`)) {
        log.debug('Index not downloaded, skipping', { path });
        continue;
      }

      await loadIndex(builder, options.listsDir, entry, indexFile);
      log.debug('Loaded index', { path });
    }
  }

  const cache = builder.build();
  log.debug('Cache ready', {
    packages: cache.packages().length,
    files: cache.files().length,
  });
  return cache;
}
