/**
 * Source list types
 */

import type { RepositoryFile } from '../cache/types.js';

/**
 * Index file a source entry contributes to the cache
 */
export interface IndexFile {
  /** Name of the Packages file under the lists directory */
  readonly fileName: string;
  /** Candidate Release file names, preferred first */
  readonly releaseFileNames: readonly string[];
  /** Component, absent for flat repositories */
  readonly component?: string;
  readonly architecture: string;
  /** Whether this index is the origin of the given repository file */
  describes(file: RepositoryFile): boolean;
}

export type SourceType = 'deb' | 'deb-src';

/**
 * One configured distribution/suite
 */
export interface SourceEntry {
  type: SourceType;
  /** Archive root, always ending in "/" */
  uri: string;
  /** Distribution as written in the configuration (e.g. "stable/updates") */
  distribution: string;
  components: string[];
  /** Architectures the entry is restricted to (empty = configured defaults) */
  architectures: string[];
  /** "file:line" the entry was read from */
  origin: string;
  /** Binary index files; empty for deb-src entries */
  indexFiles: IndexFile[];
}

/**
 * All configured source entries, in configuration order
 */
export interface SourceList {
  readonly entries: readonly SourceEntry[];
}
