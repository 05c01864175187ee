/**
 * show-versions command - Report installed packages against the archive
 *
 * Resolves settings, loads the source list, preferences and package cache,
 * then runs the report driver over the requested packages.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { verbose } from '../utils/output.js';
import { logger } from '../utils/logger.js';
import { allArchitectures, resolveSettings, ConfigError } from '../config/index.js';
import { loadSourceList } from '../sources/index.js';
import { AptPolicy, loadPreferences } from '../policy/index.js';
import { CacheLoadError, loadCache } from '../cache/index.js';
import { ReportDriver, UnreachableStateError, validateReportOptions, type ReportResult } from '../report/index.js';

/** Exit status for configuration and cache load failures */
export const EXIT_FAILURE = 1;

/** Exit status when the classifier meets an impossible state */
export const EXIT_INTERNAL = 70;

/**
 * Execute the report
 */
export async function showVersionsCommand(
  ctx: CommandContext,
  packages: readonly string[] = []
): Promise<CommandResult<ReportResult>> {
  const { options } = ctx;
  const log = logger.child({ command: 'show-versions' });

  try {
    validateReportOptions(options, packages);

    const resolution = resolveSettings({
      cli: {
        root: options.root,
        configFile: options.configFile,
        targetRelease: options.targetRelease,
        overrides: options.option,
      },
      env: ctx.env,
    });
    const { settings } = resolution;

    verbose(`Settings attempted: ${resolution.attempted.join(' -> ')}`, options.verbose);
    if (resolution.configFile) {
      verbose(`Config file: ${resolution.configFile}`, options.verbose);
    }
    verbose(`Status file: ${settings.statusFile}`, options.verbose);
    verbose(`Lists directory: ${settings.listsDir}`, options.verbose);
    verbose(`Architectures: ${allArchitectures(settings).join(', ')}`, options.verbose);

    const sourceList = await loadSourceList(settings, allArchitectures(settings));
    const pins = await loadPreferences(settings);
    log.debug('Loaded configuration', {
      sources: sourceList.entries.length,
      pins: pins.length,
    });

    const cache = await loadCache({
      statusFile: settings.statusFile,
      listsDir: settings.listsDir,
      sourceList,
      nativeArchitecture: settings.architecture,
      logger: log,
    });
    const policyOptions = { defaultRelease: settings.defaultRelease, pins };
    const policy = ctx.createPolicy
      ? ctx.createPolicy(policyOptions)
      : new AptPolicy(policyOptions);

    const driver = new ReportDriver({ cache, policy, sourceList, logger: log }, options);
    const result = driver.run(packages);

    return {
      success: result.exitCode === 0,
      message: `Reported ${result.reports.length} package(s)`,
      exitCode: result.exitCode,
      data: result,
    };
  } catch (err) {
    if (err instanceof ConfigError) {
      return {
        success: false,
        message: err.message,
        exitCode: EXIT_FAILURE,
        errors: [err.formatErrors()],
      };
    }
    if (err instanceof CacheLoadError) {
      return {
        success: false,
        message: err.message,
        exitCode: EXIT_FAILURE,
        errors: [err.toUserMessage()],
      };
    }
    if (err instanceof UnreachableStateError) {
      log.error('Classifier reached an impossible state', err, {
        package: err.packageName,
        version: err.installedVersion,
      });
      return {
        success: false,
        message: err.message,
        exitCode: EXIT_INTERNAL,
        errors: [err.message],
      };
    }
    throw err;
  }
}
