/**
 * Package display names
 */

import type { Package, PolicyEngine, Version } from '../cache/types.js';
import type { DistributionResolver } from './distribution.js';

export interface NamingContext {
  nativeArchitecture: string;
  policy: Pick<PolicyEngine, 'getPriority'>;
  distributions: DistributionResolver;
}

/**
 * Package name, qualified with ":arch" unless the package belongs to
 * the native architecture
 */
export function fullName(pkg: Package, nativeArchitecture: string): string {
  if (pkg.architecture === nativeArchitecture || pkg.architecture === 'all') {
    return pkg.name;
  }
  return `${pkg.name}:${pkg.architecture}`;
}

/**
 * "<fullName>/<distribution>" for the highest-priority file providing the
 * version, or just the full name when no file names a distribution.
 * On equal priority the first file seen keeps the name.
 */
export function displayName(pkg: Package, version: Version, ctx: NamingContext): string {
  const name = fullName(pkg, ctx.nativeArchitecture);

  let best: { distribution: string; priority: number } | undefined;

  for (const { file } of version.files) {
    if (file.notSource) continue;

    const priority = ctx.policy.getPriority(file);
    if (best && priority <= best.priority) continue;

    const distribution = ctx.distributions.resolve(file);
    if (distribution) {
      best = { distribution, priority };
    }
  }

  return best ? `${name}/${best.distribution}` : name;
}
