/**
 * Upgrade-state classification
 *
 * Conditions are checked in a fixed order; the first that holds wins:
 *   1. not_installed      no installed version
 *   2. not_available      nothing else known and no repository still ships it
 *   3. automatic_upgrade  policy picked a different version
 *   4. up_to_date         policy picked the installed version and it is still shipped
 *   5. manual_upgrade     a newer version exists but policy did not pick it
 *   6. downgrade          only older versions are on offer
 */

import type { Package, Version } from '../cache/types.js';
import { UnreachableStateError } from './errors.js';

export type UpgradeState =
  | 'not_installed'
  | 'not_available'
  | 'automatic_upgrade'
  | 'up_to_date'
  | 'manual_upgrade'
  | 'downgrade';

export const UPGRADE_STATES: readonly UpgradeState[] = [
  'not_installed',
  'not_available',
  'automatic_upgrade',
  'up_to_date',
  'manual_upgrade',
  'downgrade',
];

/**
 * States that survive the upgrades-only filter
 */
export function isUpgrade(state: UpgradeState): boolean {
  return state === 'automatic_upgrade' || state === 'manual_upgrade';
}

/**
 * Whether any repository (other than dpkg's own records) still provides the version
 */
export function hasProvidingFile(version: Version): boolean {
  return version.files.some((record) => !record.file.notSource);
}

/**
 * Classify one package.
 *
 * @param allVersions - the package's versions, newest first
 * @throws UnreachableStateError when no condition holds
 */
export function classify(
  pkg: Package,
  installed: Version | undefined,
  candidate: Version | undefined,
  allVersions: readonly Version[]
): UpgradeState {
  if (!installed) {
    return 'not_installed';
  }

  const stillShipped = hasProvidingFile(installed);

  if (allVersions.length <= 1 && !stillShipped) {
    return 'not_available';
  }

  if (candidate && candidate.id !== installed.id) {
    return 'automatic_upgrade';
  }

  if (candidate?.id === installed.id && stillShipped) {
    return 'up_to_date';
  }

  const newest = allVersions[0];
  if (newest && newest.id !== installed.id) {
    return 'manual_upgrade';
  }

  const index = allVersions.findIndex((version) => version.id === installed.id);
  if (index >= 0 && index < allVersions.length - 1) {
    return 'downgrade';
  }

  throw new UnreachableStateError(pkg.name, installed.version);
}
