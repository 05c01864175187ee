/**
 * Pin priorities and candidate selection
 */

import type { Package, PolicyEngine, RepositoryFile, Version } from '../cache/types.js';
import {
  isGenericPin,
  pinMatchesFile,
  pinMatchesPackage,
  pinMatchesVersion,
  type PinRecord,
} from './preferences.js';

/** Priority of the dpkg status file */
export const STATUS_PRIORITY = 100;
/** Priority of files from the default (target) release */
export const DEFAULT_RELEASE_PRIORITY = 990;
/** Priority of ordinary archives */
export const DEFAULT_PRIORITY = 500;
/** Priority of NotAutomatic archives */
export const NOT_AUTOMATIC_PRIORITY = 1;
/** Priority of NotAutomatic archives with ButAutomaticUpgrades */
export const AUTOMATIC_UPGRADES_PRIORITY = 100;
/** Priorities at or above this allow downgrades */
export const DOWNGRADE_PRIORITY = 1000;

export interface PolicyOptions {
  /** Release given priority 990 (archive or codename) */
  defaultRelease?: string;
  /** Preferences records in file order */
  pins?: PinRecord[];
}

export class AptPolicy implements PolicyEngine {
  private readonly genericPins: PinRecord[];
  private readonly packagePins: PinRecord[];
  private readonly filePriorities = new Map<number, number>();

  constructor(private readonly options: PolicyOptions = {}) {
    const pins = options.pins ?? [];
    this.genericPins = pins.filter(isGenericPin);
    this.packagePins = pins.filter((pin) => !isGenericPin(pin));
  }

  getPriority(file: RepositoryFile): number {
    const cached = this.filePriorities.get(file.id);
    if (cached !== undefined) {
      return cached;
    }
    const priority = this.computeFilePriority(file);
    this.filePriorities.set(file.id, priority);
    return priority;
  }

  private computeFilePriority(file: RepositoryFile): number {
    if (file.notSource) {
      return STATUS_PRIORITY;
    }

    const pin = this.genericPins.find((record) => pinMatchesFile(record.pin, file));
    if (pin) {
      return pin.priority;
    }

    const release = this.options.defaultRelease;
    if (release && (file.archive === release || file.codename === release)) {
      return DEFAULT_RELEASE_PRIORITY;
    }

    if (file.notAutomatic) {
      return file.butAutomaticUpgrades ? AUTOMATIC_UPGRADES_PRIORITY : NOT_AUTOMATIC_PRIORITY;
    }

    return DEFAULT_PRIORITY;
  }

  /**
   * Priority of one (version, file) pair, taking package pins into account
   */
  getVersionFilePriority(pkg: Package, version: Version, file: RepositoryFile): number {
    const pin = this.packagePins.find(
      (record) => pinMatchesPackage(record, pkg) && pinMatchesVersion(record.pin, version, file)
    );
    return pin ? pin.priority : this.getPriority(file);
  }

  /**
   * Walk versions newest first and keep the one with the strictly highest
   * positive priority. Reaching the installed version stops the walk unless
   * a pin of 1000 or more asks for a downgrade.
   */
  getCandidate(pkg: Package): Version | undefined {
    let max = 0;
    let preferred: Version | undefined;

    for (const version of pkg.versions) {
      const isInstalled = pkg.current?.id === version.id;

      for (const { file } of version.files) {
        // Status records of versions that are not installed are never candidates
        if (file.notSource && !isInstalled) {
          continue;
        }

        const priority = this.getVersionFilePriority(pkg, version, file);
        if (priority > max) {
          preferred = version;
          max = priority;
        }
      }

      if (isInstalled && max < DOWNGRADE_PRIORITY) {
        preferred = preferred ?? version;
        break;
      }
    }

    return preferred;
  }
}
