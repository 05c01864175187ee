/**
 * Report driver
 *
 * Walks the selected packages, applies the hold / uninstalled /
 * upgrades-only filters, classifies each package and produces its
 * output lines: an optional all-versions block followed by a one-line
 * summary.
 */

import type { Package, PackageCache, PolicyEngine, Version } from '../cache/types.js';
import type { SourceList } from '../sources/types.js';
import { ConfigError, conflictingOptions } from '../config/errors.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { classify, isUpgrade, type UpgradeState } from './classify.js';
import { DistributionResolver } from './distribution.js';
import { displayName, fullName, type NamingContext } from './naming.js';
import { selectAll, selectPackages, type Selection } from './select.js';
import { TablePrinter } from './table.js';

// =============================================================================
// Types
// =============================================================================

export interface ReportOptions {
  /** Only report packages that can be upgraded */
  upgradesOnly: boolean;
  /** Print only the display name for name-led summary lines */
  brief: boolean;
  /** Print every version of every reported package first */
  allVersions: boolean;
  /** Skip packages on hold */
  noHold: boolean;
  /** Report uninstalled packages matched by a pattern */
  regexAll: boolean;
}

export interface ReportContext {
  cache: PackageCache;
  policy: PolicyEngine;
  sourceList: SourceList;
  /** Defaults to a fresh resolver over `sourceList` */
  distributions?: DistributionResolver;
  logger?: Logger;
}

/**
 * Outcome for one package that passed the hold/uninstalled filters
 */
export interface PackageReport {
  pkg: Package;
  state: UpgradeState;
  lines: string[];
}

export interface ReportResult {
  lines: string[];
  reports: PackageReport[];
  exitCode: number;
}

/** Exit status when the only named package is not upgradeable under upgrades-only */
export const EXIT_NOT_UPGRADEABLE = 2;

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  upgradesOnly: false,
  brief: false,
  allVersions: false,
  noHold: false,
  regexAll: false,
};

// =============================================================================
// Option Validation
// =============================================================================

/**
 * Reject option combinations that make no sense. Runs before the cache
 * is loaded.
 */
export function validateReportOptions(options: ReportOptions, args: readonly string[]): void {
  const issues = [];

  if (args.length > 0 && options.noHold) {
    issues.push(conflictingOptions('--no-hold', 'Cannot specify -n|--no-hold with a package name'));
  }
  if (args.length === 0 && options.regexAll) {
    issues.push(conflictingOptions('--regex-all', 'Cannot specify -R|--regex-all without a pattern'));
  }

  if (issues.length > 0) {
    throw new ConfigError(issues.map((issue) => issue.message).join('; '), issues);
  }
}

// =============================================================================
// Driver
// =============================================================================

export class ReportDriver {
  private readonly naming: NamingContext;
  private readonly log: Logger;

  constructor(
    private readonly ctx: ReportContext,
    private readonly options: ReportOptions = DEFAULT_REPORT_OPTIONS
  ) {
    this.naming = {
      nativeArchitecture: ctx.cache.nativeArchitecture,
      policy: ctx.policy,
      distributions: ctx.distributions ?? new DistributionResolver(ctx.sourceList),
    };
    this.log = (ctx.logger ?? defaultLogger).child({ component: 'report' });
  }

  /**
   * Report on all packages (no arguments) or on each argument's matches
   */
  run(args: readonly string[] = []): ReportResult {
    validateReportOptions(this.options, args);

    const reports: PackageReport[] = [];

    if (args.length === 0) {
      for (const pkg of selectAll(this.ctx.cache)) {
        this.collect(reports, pkg, false);
      }
      return this.finish(reports, 0);
    }

    let exitCode = 0;
    for (const argument of args) {
      const selection = selectPackages(this.ctx.cache, argument);
      this.logSelection(selection);

      const showUninstalled = this.options.regexAll || selection.kind === 'literal';
      const before = reports.length;
      for (const pkg of selection.packages) {
        this.collect(reports, pkg, showUninstalled);
      }

      if (
        args.length === 1 &&
        selection.kind === 'literal' &&
        this.options.upgradesOnly &&
        !reports.slice(before).some((report) => isUpgrade(report.state))
      ) {
        exitCode = EXIT_NOT_UPGRADEABLE;
      }
    }

    return this.finish(reports, exitCode);
  }

  /**
   * Apply filters and produce the lines for one package.
   * Returns undefined when the package is filtered out before classification.
   */
  reportPackage(pkg: Package, showUninstalled: boolean): PackageReport | undefined {
    if (this.options.noHold && pkg.selectionState === 'hold') {
      return undefined;
    }
    if (!pkg.current && !showUninstalled) {
      return undefined;
    }

    const candidate = this.ctx.policy.getCandidate(pkg);
    const state = classify(pkg, pkg.current, candidate, pkg.versions);

    if (this.options.upgradesOnly && !isUpgrade(state)) {
      return { pkg, state, lines: [] };
    }

    const lines: string[] = [];
    if (this.options.allVersions) {
      lines.push(...this.allVersionsBlock(pkg));
    }
    lines.push(this.summaryLine(pkg, state, candidate));

    return { pkg, state, lines };
  }

  private collect(reports: PackageReport[], pkg: Package, showUninstalled: boolean): void {
    const report = this.reportPackage(pkg, showUninstalled);
    if (report) {
      reports.push(report);
    }
  }

  private finish(reports: PackageReport[], exitCode: number): ReportResult {
    return {
      lines: reports.flatMap((report) => report.lines),
      reports,
      exitCode,
    };
  }

  private logSelection(selection: Selection): void {
    if (selection.error) {
      this.log.error(selection.error, undefined, { argument: selection.argument });
    } else if (selection.kind === 'none') {
      this.log.warn(`Unable to locate package ${selection.argument}`);
    } else {
      this.log.debug('Selected packages', {
        argument: selection.argument,
        kind: selection.kind,
        count: selection.packages.length,
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Output
  // ---------------------------------------------------------------------------

  /**
   * Installed state header plus one aligned row per (version, repository file)
   */
  allVersionsBlock(pkg: Package): string[] {
    const name = fullName(pkg, this.naming.nativeArchitecture);
    const table = new TablePrinter(4);

    if (pkg.current) {
      table.insertText(
        `${name} ${pkg.current.version} ${pkg.selectionState} ${pkg.installFlag} ${pkg.currentState}`
      );
    } else {
      table.insertText('Not installed');
    }

    for (const version of pkg.versions) {
      for (const { file } of version.files) {
        if (file.notSource) continue;
        table.insertRow([name, version.version, file.archive ?? '', file.site ?? '']);
      }
    }

    return table.lines();
  }

  /**
   * One-line, state-dependent summary
   */
  summaryLine(pkg: Package, state: UpgradeState, candidate: Version | undefined): string {
    const name = fullName(pkg, this.naming.nativeArchitecture);
    const installed = pkg.current;

    switch (state) {
      case 'not_installed':
        return `${name} not installed`;
      case 'not_available':
        return `${name} ${installed?.version} installed: No available version in archive`;
      case 'automatic_upgrade': {
        const target = candidate ?? pkg.versions[0];
        return this.nameLed(
          displayName(pkg, target, this.naming),
          ` upgradeable from ${installed?.version} to ${target.version}`
        );
      }
      case 'up_to_date': {
        const target = candidate ?? installed ?? pkg.versions[0];
        return this.nameLed(displayName(pkg, target, this.naming), ` uptodate ${installed?.version}`);
      }
      case 'manual_upgrade': {
        const newest = pkg.versions[0];
        return this.nameLed(
          displayName(pkg, newest, this.naming),
          ` *manually* upgradeable from ${installed?.version} to ${newest.version}`
        );
      }
      case 'downgrade': {
        const target = candidate ?? installed ?? pkg.versions[0];
        return this.nameLed(
          displayName(pkg, target, this.naming),
          ` ${installed?.version} newer than version in archive`
        );
      }
    }
  }

  /**
   * In brief mode only the name survives
   */
  private nameLed(name: string, rest: string): string {
    return this.options.brief ? name : name + rest;
  }
}
