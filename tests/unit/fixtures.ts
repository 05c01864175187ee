/**
 * Shared fixtures for the unit tests
 */

import { mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { CacheBuilder, type InMemoryPackageCache, type PackageStateInit } from '../../src/cache/builder.js';
import type { Package, RepositoryFile, Version } from '../../src/cache/types.js';
import type { IndexFile, SourceList } from '../../src/sources/types.js';

// =============================================================================
// Temp Directories
// =============================================================================

export function createTempDir(): string {
  const tempBase = join(tmpdir(), 'apt-show-versions-test-');
  const tempDir = `${tempBase}${Date.now()}-${Math.random().toString(36).slice(2)}`;
  mkdirSync(tempDir, { recursive: true });
  return tempDir;
}

export function cleanupTempDir(dir: string): void {
  try {
    rmSync(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

// =============================================================================
// Plain Data
// =============================================================================

export function createMockFile(overrides: Partial<RepositoryFile> = {}): RepositoryFile {
  return {
    id: 1,
    fileName: 'deb.example.com_debian_dists_stable_main_binary-amd64_Packages',
    archive: 'stable',
    site: 'deb.example.com',
    notSource: false,
    notAutomatic: false,
    butAutomaticUpgrades: false,
    ...overrides,
  };
}

export function createStatusFile(id = 99): RepositoryFile {
  return createMockFile({
    id,
    fileName: '/var/lib/dpkg/status',
    archive: undefined,
    site: undefined,
    notSource: true,
  });
}

export function createMockVersion(id: number, version: string, files: RepositoryFile[]): Version {
  return {
    id,
    version,
    architecture: 'amd64',
    files: files.map((file) => ({ file })),
  };
}

export function createMockPackage(overrides: Partial<Package> = {}): Package {
  return {
    id: 1,
    name: 'foo',
    architecture: 'amd64',
    selectionState: 'install',
    installFlag: 'ok',
    currentState: 'installed',
    versions: [],
    ...overrides,
  };
}

/**
 * Source list whose single entry owns exactly the given files
 */
export function createSourceList(
  distribution: string,
  files: readonly RepositoryFile[],
  describes: (file: RepositoryFile) => boolean = (file) => files.some((f) => f.id === file.id)
): SourceList {
  const indexFile: IndexFile = {
    fileName: files[0]?.fileName ?? 'unused',
    releaseFileNames: [],
    architecture: 'amd64',
    describes,
  };
  return {
    entries: [
      {
        type: 'deb',
        uri: 'http://deb.example.com/debian/',
        distribution,
        components: ['main'],
        architectures: [],
        origin: 'sources.list:1',
        indexFiles: [indexFile],
      },
    ],
  };
}

// =============================================================================
// Synthetic Caches
// =============================================================================

export const INSTALLED: PackageStateInit = {
  selectionState: 'install',
  installFlag: 'ok',
  currentState: 'installed',
};

export const HELD: PackageStateInit = {
  selectionState: 'hold',
  installFlag: 'ok',
  currentState: 'installed',
};

/**
 * Record an installed version in the status file
 */
export function addInstalled(
  builder: CacheBuilder,
  status: RepositoryFile,
  name: string,
  version: string,
  architecture = 'amd64',
  state: PackageStateInit = INSTALLED
): Version {
  builder.setState(name, architecture, state);
  const installed = builder.addVersion(name, architecture, version, status);
  builder.markInstalled(name, architecture, installed);
  return installed;
}

export interface TestCache {
  cache: InMemoryPackageCache;
  status: RepositoryFile;
  stable: RepositoryFile;
  backports: RepositoryFile;
}

/**
 * A cache with the status file, a "stable" archive and a NotAutomatic
 * "stable-backports" archive. `setup` fills in the packages.
 */
export function createTestCache(
  setup: (builder: CacheBuilder, files: Omit<TestCache, 'cache'>) => void,
  nativeArchitecture = 'amd64'
): TestCache {
  const builder = new CacheBuilder(nativeArchitecture);
  const status = builder.addFile({ fileName: '/var/lib/dpkg/status', notSource: true });
  const stable = builder.addFile({
    fileName: 'deb.example.com_debian_dists_stable_main_binary-amd64_Packages',
    archive: 'stable',
    codename: 'bookworm',
    component: 'main',
    site: 'deb.example.com',
    architecture: 'amd64',
  });
  const backports = builder.addFile({
    fileName: 'deb.example.com_debian_dists_stable-backports_main_binary-amd64_Packages',
    archive: 'stable-backports',
    codename: 'bookworm-backports',
    component: 'main',
    site: 'deb.example.com',
    architecture: 'amd64',
    notAutomatic: true,
    butAutomaticUpgrades: true,
  });

  setup(builder, { status, stable, backports });
  return { cache: builder.build(), status, stable, backports };
}
