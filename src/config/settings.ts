/**
 * Settings resolution
 *
 * Resolution priority order (highest to lowest):
 * 1. CLI flags (--root, --target-release)
 * 2. -o key=value overrides
 * 3. Environment variables (APT_SHOW_VERSIONS_*)
 * 4. YAML config file (-c, APT_SHOW_VERSIONS_CONFIG, or <root>/etc/apt-show-versions.yaml)
 * 5. Defaults
 *
 * Relative paths are taken relative to the resolved root directory.
 */

import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import {
  ConfigError,
  configError,
  invalidValue,
  unknownKey,
  type ConfigIssue,
} from './errors.js';

// =============================================================================
// Types
// =============================================================================

export interface Settings {
  /** Root directory the default paths live under */
  root: string;
  statusFile: string;
  listsDir: string;
  sourceList: string;
  sourceParts: string;
  preferences: string;
  preferencesParts: string;
  /** dpkg's list of foreign architectures */
  dpkgArchFile: string;
  /** Native architecture */
  architecture: string;
  foreignArchitectures: string[];
  /** Release that gets priority 990 */
  defaultRelease?: string;
}

export type SettingsKey = keyof Settings;

export type SettingsSource = 'cli' | 'override' | 'env' | 'config_file' | 'default';

/**
 * Raw values before defaults and path resolution are applied
 */
type PartialSettings = Partial<Record<SettingsKey, string | string[]>>;

export interface CliSettings {
  root?: string;
  configFile?: string;
  targetRelease?: string;
  /** "key=value" strings from -o */
  overrides?: string[];
}

export interface SettingsResolveOptions {
  cli?: CliSettings;
  env?: NodeJS.ProcessEnv;
}

export interface SettingsResolution {
  settings: Settings;
  /** Config file that was read, if any */
  configFile?: string;
  /** Sources consulted, in priority order */
  attempted: SettingsSource[];
}

// =============================================================================
// Constants
// =============================================================================

export const ENV_ROOT = 'APT_SHOW_VERSIONS_ROOT';
export const ENV_CONFIG = 'APT_SHOW_VERSIONS_CONFIG';
export const ENV_ARCH = 'APT_SHOW_VERSIONS_ARCH';
export const ENV_DEFAULT_RELEASE = 'APT_SHOW_VERSIONS_DEFAULT_RELEASE';

/** Config file looked up under the root when none is named */
export const DEFAULT_CONFIG_FILE = 'etc/apt-show-versions.yaml';

const DEFAULT_PATHS = {
  statusFile: 'var/lib/dpkg/status',
  listsDir: 'var/lib/apt/lists',
  sourceList: 'etc/apt/sources.list',
  sourceParts: 'etc/apt/sources.list.d',
  preferences: 'etc/apt/preferences',
  preferencesParts: 'etc/apt/preferences.d',
  dpkgArchFile: 'var/lib/dpkg/arch',
} as const;

type PathKey = keyof typeof DEFAULT_PATHS;

const PATH_KEYS: readonly PathKey[] = [
  'statusFile',
  'listsDir',
  'sourceList',
  'sourceParts',
  'preferences',
  'preferencesParts',
  'dpkgArchFile',
];

const SETTINGS_KEYS: readonly SettingsKey[] = [
  'root',
  ...PATH_KEYS,
  'architecture',
  'foreignArchitectures',
  'defaultRelease',
];

/** APT configuration names accepted by -o, matched case-insensitively */
const APT_OPTION_ALIASES: Record<string, SettingsKey> = {
  'dir': 'root',
  'dir::state::status': 'statusFile',
  'dir::state::lists': 'listsDir',
  'dir::etc::sourcelist': 'sourceList',
  'dir::etc::sourceparts': 'sourceParts',
  'dir::etc::preferences': 'preferences',
  'dir::etc::preferencesparts': 'preferencesParts',
  'apt::architecture': 'architecture',
  'apt::architectures': 'foreignArchitectures',
  'apt::default-release': 'defaultRelease',
};

/** Node's process.arch to Debian architecture names */
const NODE_ARCHITECTURES: Record<string, string> = {
  x64: 'amd64',
  arm64: 'arm64',
  arm: 'armhf',
  ia32: 'i386',
  ppc64: 'ppc64el',
  s390x: 's390x',
  riscv64: 'riscv64',
  loong64: 'loong64',
  mips64el: 'mips64el',
};

// =============================================================================
// Helpers
// =============================================================================

function isSettingsKey(key: string): key is SettingsKey {
  return SETTINGS_KEYS.some((known) => known === key);
}

/**
 * Map an override key (setting name or APT option name) to a setting
 */
export function overrideKey(key: string): SettingsKey | undefined {
  if (isSettingsKey(key)) return key;
  return APT_OPTION_ALIASES[key.toLowerCase()];
}

/**
 * Parse "-o key=value" strings
 */
export function parseOverrides(overrides: readonly string[]): PartialSettings {
  const result: PartialSettings = {};
  const issues: ConfigIssue[] = [];

  for (const raw of overrides) {
    const eqIndex = raw.indexOf('=');
    if (eqIndex <= 0) {
      issues.push({
        code: 'INVALID_OVERRIDE',
        message: `Option "${raw}" is not of the form key=value`,
        path: '-o',
      });
      continue;
    }
    const key = overrideKey(raw.substring(0, eqIndex).trim());
    if (!key) {
      issues.push(unknownKey(raw.substring(0, eqIndex).trim(), SETTINGS_KEYS));
      continue;
    }
    result[key] = raw.substring(eqIndex + 1).trim();
  }

  if (issues.length > 0) {
    throw new ConfigError('Invalid -o option', issues);
  }
  return result;
}

/**
 * Validate the parsed YAML config file
 */
export function validateConfigFile(data: unknown, path: string): PartialSettings {
  if (data === null || data === undefined) {
    return {};
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw configError({
      code: 'CONFIG_PARSE_ERROR',
      message: 'Config file must contain a mapping',
      path,
    });
  }

  const result: PartialSettings = {};
  const issues: ConfigIssue[] = [];

  for (const [key, value] of Object.entries(data)) {
    if (!isSettingsKey(key)) {
      issues.push(unknownKey(key, SETTINGS_KEYS));
      continue;
    }
    if (key === 'foreignArchitectures') {
      if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        result[key] = value;
      } else if (typeof value === 'string') {
        result[key] = value;
      } else {
        issues.push(invalidValue(key, 'a list of architecture names'));
      }
      continue;
    }
    if (typeof value !== 'string' || value.length === 0) {
      issues.push(invalidValue(key, 'a non-empty string'));
      continue;
    }
    result[key] = value;
  }

  if (issues.length > 0) {
    throw new ConfigError(`Invalid config file ${path}`, issues);
  }
  return result;
}

function loadConfigFile(path: string): PartialSettings {
  if (!existsSync(path)) {
    throw configError({
      code: 'CONFIG_NOT_FOUND',
      message: `Config file not found: ${path}`,
      path,
    });
  }

  let data: unknown;
  try {
    data = parseYaml(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw configError({
      code: 'CONFIG_PARSE_ERROR',
      message: `Failed to parse config YAML: ${err instanceof Error ? err.message : String(err)}`,
      path,
    });
  }

  return validateConfigFile(data, path);
}

function asString(value: string | string[] | undefined): string | undefined {
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(' ') : value;
}

function asList(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const items = Array.isArray(value) ? value : value.split(/[\s,]+/);
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}

/**
 * Native architecture of the running Node.js process, in Debian terms
 */
export function detectArchitecture(nodeArch: string = process.arch): string {
  return NODE_ARCHITECTURES[nodeArch] ?? nodeArch;
}

function readDpkgArchitectures(path: string): string[] {
  if (!existsSync(path)) return [];
  return readFileSync(path, 'utf-8')
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve settings from CLI flags, overrides, environment, config file and defaults
 */
export function resolveSettings(options: SettingsResolveOptions = {}): SettingsResolution {
  const cli = options.cli ?? {};
  const env = options.env ?? process.env;
  const attempted: SettingsSource[] = ['cli', 'override', 'env'];

  const overrides = parseOverrides(cli.overrides ?? []);

  const fromCli: PartialSettings = {};
  if (cli.root) fromCli.root = cli.root;
  if (cli.targetRelease) fromCli.defaultRelease = cli.targetRelease;

  const fromEnv: PartialSettings = {};
  if (env[ENV_ROOT]) fromEnv.root = env[ENV_ROOT];
  if (env[ENV_ARCH]) fromEnv.architecture = env[ENV_ARCH];
  if (env[ENV_DEFAULT_RELEASE]) fromEnv.defaultRelease = env[ENV_DEFAULT_RELEASE];

  // The root decides where the default config file lives, so it is
  // resolved from the higher-priority sources first
  const earlyRoot = asString(fromCli.root ?? overrides.root ?? fromEnv.root);

  let configFile = cli.configFile ?? env[ENV_CONFIG];
  if (!configFile) {
    const candidate = join(resolve(earlyRoot ?? '/'), DEFAULT_CONFIG_FILE);
    configFile = existsSync(candidate) ? candidate : undefined;
  }

  let fromFile: PartialSettings = {};
  if (configFile) {
    attempted.push('config_file');
    fromFile = loadConfigFile(resolve(configFile));
  }
  attempted.push('default');

  const pick = (key: SettingsKey): string | string[] | undefined =>
    fromCli[key] ?? overrides[key] ?? fromEnv[key] ?? fromFile[key];

  const root = resolve(asString(pick('root')) ?? '/');
  const resolvePath = (key: PathKey): string => {
    const value = asString(pick(key)) ?? DEFAULT_PATHS[key];
    return isAbsolute(value) ? value : join(root, value);
  };

  const architecture = asString(pick('architecture')) ?? detectArchitecture();
  const dpkgArchFile = resolvePath('dpkgArchFile');
  const foreignArchitectures = [
    ...new Set([...asList(pick('foreignArchitectures')), ...readDpkgArchitectures(dpkgArchFile)]),
  ].filter((arch) => arch !== architecture);

  return {
    settings: {
      root,
      statusFile: resolvePath('statusFile'),
      listsDir: resolvePath('listsDir'),
      sourceList: resolvePath('sourceList'),
      sourceParts: resolvePath('sourceParts'),
      preferences: resolvePath('preferences'),
      preferencesParts: resolvePath('preferencesParts'),
      dpkgArchFile,
      architecture,
      foreignArchitectures,
      defaultRelease: asString(pick('defaultRelease')),
    },
    configFile: configFile ? resolve(configFile) : undefined,
    attempted,
  };
}

/**
 * Native followed by foreign architectures
 */
export function allArchitectures(settings: Settings): string[] {
  return [settings.architecture, ...settings.foreignArchitectures];
}
