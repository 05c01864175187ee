/**
 * Pin priority and candidate selection exports
 */

export {
  AptPolicy,
  STATUS_PRIORITY,
  DEFAULT_RELEASE_PRIORITY,
  DEFAULT_PRIORITY,
  NOT_AUTOMATIC_PRIORITY,
  AUTOMATIC_UPGRADES_PRIORITY,
  DOWNGRADE_PRIORITY,
  type PolicyOptions,
} from './policy.js';
export {
  parsePreferences,
  parsePackagePattern,
  loadPreferences,
  isGenericPin,
  pinMatchesFile,
  pinMatchesPackage,
  pinMatchesVersion,
  type PinRecord,
  type PackagePattern,
  type PinTarget,
  type ReleaseTerm,
  type ReleaseTermKey,
  type PreferencesPaths,
} from './preferences.js';
