/**
 * apt-show-versions CLI - List installed packages with their upgrade state
 *
 * With no arguments every installed package is reported. Arguments are
 * package names, globs or regular expressions.
 */

import { Command, Option } from 'commander';
import type { CommandContext, GlobalOptions } from './types.js';
import { showVersionsCommand, EXIT_FAILURE } from './commands/index.js';
import { error, printLines, verbose as verboseLog, warn } from './utils/output.js';
import { logger } from './utils/logger.js';

export const VERSION = '0.1.0';

/**
 * Option values as commander stores them
 */
export interface CliFlags {
  upgradeable?: boolean;
  brief?: boolean;
  allversions?: boolean;
  regexAll?: boolean;
  /** Cleared by -n/--no-hold */
  hold: boolean;
  targetRelease?: string;
  configFile?: string;
  option: string[];
  root?: string;
  initialize?: boolean;
  verbose?: boolean;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Map commander's flag names onto the command options
 */
export function toGlobalOptions(flags: CliFlags): GlobalOptions {
  return {
    upgradesOnly: flags.upgradeable ?? false,
    brief: flags.brief ?? false,
    allVersions: flags.allversions ?? false,
    regexAll: flags.regexAll ?? false,
    noHold: !flags.hold,
    targetRelease: flags.targetRelease,
    configFile: flags.configFile,
    option: flags.option,
    root: flags.root,
    initialize: flags.initialize ?? false,
    verbose: flags.verbose ?? false,
  };
}

/**
 * Build the program; the action sets process.exitCode
 */
export function createProgram(env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command()
    .name('apt-show-versions')
    .description('List available package versions with distribution')
    .version(VERSION, '-V, --version')
    .argument('[packages...]', 'package names, globs or regular expressions')
    .addOption(new Option('-u, --upgradeable', 'show only upgradeable packages'))
    .addOption(new Option('-b, --brief', 'show package names only'))
    .addOption(new Option('-a, --allversions', 'print all versions of each package'))
    .addOption(new Option('-R, --regex-all', 'patterns also apply to uninstalled packages'))
    .addOption(new Option('-n, --no-hold', 'do not show held packages'))
    .addOption(new Option('-t, --target-release <release>', 'default release (priority 990)'))
    .addOption(new Option('-c, --config-file <file>', 'YAML configuration file'))
    .addOption(
      new Option('-o, --option <key=value>', 'configuration override (repeatable)')
        .argParser(collect)
        .default([])
    )
    .addOption(new Option('--root <dir>', 'root directory all default paths are relative to'))
    .addOption(new Option('-i, --initialize', 'accepted for compatibility, has no effect'))
    .addOption(new Option('-v, --verbose', 'verbose diagnostics on stderr'));

  program.action(async (packages: string[]) => {
    const options = toGlobalOptions(program.opts<CliFlags>());
    if (options.verbose) {
      logger.setConfig({ level: 'debug' });
    }
    if (options.initialize) {
      warn('--initialize has no effect');
    }

    const ctx: CommandContext = { options, env };

    try {
      const result = await showVersionsCommand(ctx, packages);
      if (result.data) {
        printLines(result.data.lines);
      }
      for (const message of result.errors ?? []) {
        error(message);
      }
      verboseLog(result.message, options.verbose);
      process.exitCode = result.exitCode;
    } catch (err) {
      error(`apt-show-versions failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = EXIT_FAILURE;
    }
  });

  return program;
}

/**
 * Parse argv and run
 */
export async function main(argv: readonly string[]): Promise<void> {
  await createProgram().parseAsync([...argv]);
}
