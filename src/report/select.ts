/**
 * Package selection from command-line arguments
 *
 * An argument is tried, in order, as an exact name ("name" or
 * "name:arch"), as a glob, then as a regular expression matched anywhere
 * in the package name.
 */

import type { Package, PackageCache } from '../cache/types.js';
import { globToRegExp, isGlob, isRegex } from '../utils/pattern.js';

export type MatchKind = 'literal' | 'glob' | 'regex' | 'none';

export interface Selection {
  argument: string;
  kind: MatchKind;
  packages: Package[];
  /** Set when a regular expression failed to compile */
  error?: string;
}

/**
 * Every package, ordered by name then architecture
 */
export function selectAll(cache: PackageCache): Package[] {
  return [...cache.packages()].sort((a, b) => {
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    if (a.architecture !== b.architecture) return a.architecture < b.architecture ? -1 : 1;
    return 0;
  });
}

/**
 * Packages that exist beyond a bare name: some version is known or installed
 */
function isReal(pkg: Package): boolean {
  return pkg.versions.length > 0 || pkg.current !== undefined;
}

function selectLiteral(cache: PackageCache, argument: string): Package | undefined {
  const colonIndex = argument.lastIndexOf(':');
  if (colonIndex > 0) {
    const exact = cache.find(argument.substring(0, colonIndex), argument.substring(colonIndex + 1));
    if (exact) return exact;
  }

  const group = cache.findByName(argument);
  return group.find((pkg) => pkg.architecture === cache.nativeArchitecture) ?? group[0];
}

function selectMatching(cache: PackageCache, pattern: RegExp): Package[] {
  return cache.packages().filter((pkg) => isReal(pkg) && pattern.test(pkg.name));
}

/**
 * Resolve one argument against the cache, in cache enumeration order
 */
export function selectPackages(cache: PackageCache, argument: string): Selection {
  const literal = selectLiteral(cache, argument);
  if (literal) {
    return { argument, kind: 'literal', packages: [literal] };
  }

  if (isGlob(argument)) {
    const packages = selectMatching(cache, globToRegExp(argument));
    if (packages.length > 0) {
      return { argument, kind: 'glob', packages };
    }
  }

  if (isRegex(argument)) {
    let pattern: RegExp;
    try {
      pattern = new RegExp(argument);
    } catch (err) {
      return {
        argument,
        kind: 'none',
        packages: [],
        error: `Regex compilation error: ${err instanceof Error ? err.message : String(err)}`,
      };
    }
    const packages = selectMatching(cache, pattern);
    if (packages.length > 0) {
      return { argument, kind: 'regex', packages };
    }
  }

  return { argument, kind: 'none', packages: [] };
}
