/**
 * Package cache data model
 *
 * Plain, fully materialized view of an APT-style package cache:
 * packages, their versions (newest first) and the repository files
 * each version is provided by.
 */

// =============================================================================
// Package States
// =============================================================================

/**
 * What the administrator asked dpkg to do with the package
 */
export type SelectionState = 'unknown' | 'install' | 'hold' | 'deinstall' | 'purge';

/**
 * dpkg error flag for the package
 */
export type InstallFlag = 'ok' | 'reinst-required' | 'hold-install' | 'hold-reinst-required';

/**
 * dpkg installation status
 */
export type CurrentState =
  | 'not-installed'
  | 'unpacked'
  | 'half-configured'
  | 'half-installed'
  | 'config-files'
  | 'installed'
  | 'triggers-awaited'
  | 'triggers-pending';

export const SELECTION_STATES: readonly SelectionState[] = [
  'unknown',
  'install',
  'hold',
  'deinstall',
  'purge',
];

export const INSTALL_FLAGS: readonly InstallFlag[] = [
  'ok',
  'reinst-required',
  'hold-install',
  'hold-reinst-required',
];

export const CURRENT_STATES: readonly CurrentState[] = [
  'not-installed',
  'unpacked',
  'half-configured',
  'half-installed',
  'config-files',
  'installed',
  'triggers-awaited',
  'triggers-pending',
];

// =============================================================================
// Repository Files
// =============================================================================

/**
 * One index file contributing version information to the cache
 */
export interface RepositoryFile {
  /** Stable identity within one cache */
  id: number;
  /** Lists file name (or the status file path) */
  fileName: string;
  /** Release "Suite" (e.g. "stable") */
  archive?: string;
  /** Release "Codename" (e.g. "bookworm") */
  codename?: string;
  /** Release "Origin" */
  origin?: string;
  /** Release "Label" */
  label?: string;
  /** Release "Version" (e.g. "12.5") */
  version?: string;
  /** Component the index belongs to (e.g. "main") */
  component?: string;
  /** Host the index was fetched from */
  site?: string;
  /** Architecture of the index */
  architecture?: string;
  /** Metadata-only origin, such as the dpkg status file */
  notSource: boolean;
  /** Release carries "NotAutomatic: yes" */
  notAutomatic: boolean;
  /** Release carries "ButAutomaticUpgrades: yes" */
  butAutomaticUpgrades: boolean;
}

// =============================================================================
// Packages and Versions
// =============================================================================

/**
 * A (version, repository file) pairing
 */
export interface VersionFileRecord {
  file: RepositoryFile;
}

/**
 * One version of one package
 */
export interface Version {
  /** Stable identity within one cache; equal strings do not imply equal ids */
  id: number;
  /** Debian version string */
  version: string;
  /** Architecture of the owning package */
  architecture: string;
  /** Files providing this version, in load order */
  files: VersionFileRecord[];
}

/**
 * A package, keyed by name and architecture
 */
export interface Package {
  id: number;
  name: string;
  architecture: string;
  selectionState: SelectionState;
  installFlag: InstallFlag;
  currentState: CurrentState;
  /** Installed version, if any */
  current?: Version;
  /** All known versions, newest first */
  versions: Version[];
}

// =============================================================================
// Collaborator Interfaces
// =============================================================================

/**
 * Read-only access to a loaded package cache
 */
export interface PackageCache {
  /** Architecture packages are reported without a qualifier for */
  readonly nativeArchitecture: string;
  /** All packages in enumeration order */
  packages(): readonly Package[];
  /** All packages with the given name, in enumeration order */
  findByName(name: string): readonly Package[];
  /** Exact lookup by key */
  find(name: string, architecture: string): Package | undefined;
  /** All repository files, in load order */
  files(): readonly RepositoryFile[];
}

/**
 * Pinning/priority resolver
 */
export interface PolicyEngine {
  /** Version that would be installed now, if any */
  getCandidate(pkg: Package): Version | undefined;
  /** Priority of a repository file */
  getPriority(file: RepositoryFile): number;
}
