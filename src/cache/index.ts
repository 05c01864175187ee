/**
 * Package cache exports
 */

export * from './types.js';
export { CacheBuilder, InMemoryPackageCache, type RepositoryFileInit, type PackageStateInit } from './builder.js';
export { loadCache, versionFingerprint, parseStatusField, hasInstalledVersion, type CacheLoadOptions } from './loader.js';
export { parseControl, field, booleanField, listField, stripClearsign, type ControlParagraph } from './control.js';
export { parseRelease, type ReleaseInfo } from './release.js';
export { compareVersions, parseDebianVersion, type DebianVersion } from './version.js';
export {
  CacheLoadError,
  MalformedSourceError,
  MalformedPreferencesError,
  type CacheLoadErrorCode,
} from './errors.js';
