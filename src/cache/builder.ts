/**
 * In-memory package cache and the builder that assembles it
 *
 * The file-system loader feeds records into a {@link CacheBuilder};
 * tests use the same builder to construct synthetic caches.
 */

import type {
  CurrentState,
  InstallFlag,
  Package,
  PackageCache,
  RepositoryFile,
  SelectionState,
  Version,
} from './types.js';
import { compareVersions } from './version.js';

/**
 * Attributes accepted when registering a repository file
 */
export type RepositoryFileInit = Omit<
  RepositoryFile,
  'id' | 'notSource' | 'notAutomatic' | 'butAutomaticUpgrades'
> &
  Partial<Pick<RepositoryFile, 'notSource' | 'notAutomatic' | 'butAutomaticUpgrades'>>;

/**
 * dpkg state of a package as recorded in the status file
 */
export interface PackageStateInit {
  selectionState: SelectionState;
  installFlag: InstallFlag;
  currentState: CurrentState;
}

function packageKey(name: string, architecture: string): string {
  return `${name}:${architecture}`;
}

// =============================================================================
// InMemoryPackageCache
// =============================================================================

/**
 * Immutable, fully loaded package cache
 */
export class InMemoryPackageCache implements PackageCache {
  private readonly byKey: Map<string, Package>;
  private readonly byName: Map<string, Package[]>;

  constructor(
    readonly nativeArchitecture: string,
    private readonly packageList: readonly Package[],
    private readonly fileList: readonly RepositoryFile[]
  ) {
    this.byKey = new Map(packageList.map((pkg) => [packageKey(pkg.name, pkg.architecture), pkg]));
    this.byName = new Map();
    for (const pkg of packageList) {
      const group = this.byName.get(pkg.name);
      if (group) {
        group.push(pkg);
      } else {
        this.byName.set(pkg.name, [pkg]);
      }
    }
  }

  packages(): readonly Package[] {
    return this.packageList;
  }

  findByName(name: string): readonly Package[] {
    return this.byName.get(name) ?? [];
  }

  find(name: string, architecture: string): Package | undefined {
    return this.byKey.get(packageKey(name, architecture));
  }

  files(): readonly RepositoryFile[] {
    return this.fileList;
  }
}

// =============================================================================
// CacheBuilder
// =============================================================================

export class CacheBuilder {
  private readonly packages = new Map<string, Package>();
  private readonly files: RepositoryFile[] = [];
  /** Dependency fingerprint per version id, used to decide merges */
  private readonly fingerprints = new Map<number, string>();
  private nextPackageId = 1;
  private nextVersionId = 1;

  constructor(readonly nativeArchitecture: string) {}

  /**
   * Map "all" to the native architecture, as dpkg and APT do
   */
  normalizeArchitecture(architecture: string | undefined): string {
    if (!architecture || architecture === 'all') {
      return this.nativeArchitecture;
    }
    return architecture;
  }

  addFile(init: RepositoryFileInit): RepositoryFile {
    const file: RepositoryFile = {
      ...init,
      id: this.files.length + 1,
      notSource: init.notSource ?? false,
      notAutomatic: init.notAutomatic ?? false,
      butAutomaticUpgrades: init.butAutomaticUpgrades ?? false,
    };
    this.files.push(file);
    return file;
  }

  /**
   * Get or create the package with the given key
   */
  ensurePackage(name: string, architecture: string): Package {
    const arch = this.normalizeArchitecture(architecture);
    const key = packageKey(name, arch);
    let pkg = this.packages.get(key);
    if (!pkg) {
      pkg = {
        id: this.nextPackageId++,
        name,
        architecture: arch,
        selectionState: 'unknown',
        installFlag: 'ok',
        currentState: 'not-installed',
        versions: [],
      };
      this.packages.set(key, pkg);
    }
    return pkg;
  }

  setState(name: string, architecture: string, state: PackageStateInit): Package {
    const pkg = this.ensurePackage(name, architecture);
    pkg.selectionState = state.selectionState;
    pkg.installFlag = state.installFlag;
    pkg.currentState = state.currentState;
    return pkg;
  }

  /**
   * Record that `file` provides `version` of the package. Records with the
   * same version string and fingerprint share one Version; anything else
   * gets a new identity. The dpkg status record matches on the version
   * string alone.
   */
  addVersion(
    name: string,
    architecture: string,
    version: string,
    file: RepositoryFile,
    fingerprint = ''
  ): Version {
    const pkg = this.ensurePackage(name, architecture);

    const existing = pkg.versions.find(
      (v) =>
        v.version === version &&
        (file.notSource ||
          v.files.some((record) => record.file.notSource) ||
          this.fingerprints.get(v.id) === fingerprint)
    );
    if (existing) {
      if (!existing.files.some((record) => record.file.id === file.id)) {
        existing.files.push({ file });
      }
      return existing;
    }

    const created: Version = {
      id: this.nextVersionId++,
      version,
      architecture: pkg.architecture,
      files: [{ file }],
    };
    this.fingerprints.set(created.id, fingerprint);
    pkg.versions.push(created);
    return created;
  }

  markInstalled(name: string, architecture: string, version: Version): void {
    this.ensurePackage(name, architecture).current = version;
  }

  /**
   * Finish the cache: versions are ordered newest first, ties keep load order
   */
  build(): InMemoryPackageCache {
    const packages = [...this.packages.values()];
    for (const pkg of packages) {
      pkg.versions.sort((a, b) => compareVersions(b.version, a.version));
    }
    return new InMemoryPackageCache(this.nativeArchitecture, packages, [...this.files]);
  }
}
