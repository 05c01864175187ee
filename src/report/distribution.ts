/**
 * Distribution name resolution
 *
 * Maps a repository file to the suite name the user configured for it,
 * cross-checked against the file's own Release attributes. Results are
 * memoized per file id for the lifetime of the cache object.
 */

import type { RepositoryFile } from '../cache/types.js';
import type { SourceList } from '../sources/types.js';

/**
 * Memo of file id -> resolved distribution name (possibly empty)
 */
export interface DistributionCache {
  lookup(fileId: number): string | undefined;
  insert(fileId: number, name: string): void;
}

export class MemoryDistributionCache implements DistributionCache {
  private readonly names = new Map<number, string>();

  lookup(fileId: number): string | undefined {
    return this.names.get(fileId);
  }

  insert(fileId: number, name: string): void {
    this.names.set(fileId, name);
  }

  get size(): number {
    return this.names.size;
  }
}

/**
 * Suite part of a configured distribution: "stable/updates" -> "stable"
 */
export function baseDistribution(distribution: string): string {
  const slashIndex = distribution.indexOf('/');
  return slashIndex < 0 ? distribution : distribution.substring(0, slashIndex);
}

export class DistributionResolver {
  constructor(
    private readonly sourceList: SourceList,
    private readonly cache: DistributionCache = new MemoryDistributionCache()
  ) {}

  resolve(file: RepositoryFile): string {
    const cached = this.cache.lookup(file.id);
    if (cached !== undefined) {
      return cached;
    }

    const name = this.fromSourceList(file) ?? file.archive ?? file.codename ?? '';
    this.cache.insert(file.id, name);
    return name;
  }

  /**
   * Find the configured entry owning the file whose suite agrees with
   * the file's archive or codename
   */
  private fromSourceList(file: RepositoryFile): string | undefined {
    for (const entry of this.sourceList.entries) {
      for (const indexFile of entry.indexFiles) {
        if (!indexFile.describes(file)) continue;

        const name = baseDistribution(entry.distribution);
        if (name === file.archive || name === file.codename) {
          return name;
        }
      }
    }
    return undefined;
  }
}
