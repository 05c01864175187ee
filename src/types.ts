/**
 * Shared types for the apt-show-versions CLI
 */

import type { ReportOptions } from './report/driver.js';
import type { PolicyEngine } from './cache/types.js';
import type { PolicyOptions } from './policy/policy.js';

// ============================================================================
// Global Options and Context
// ============================================================================

/**
 * Options parsed from the command line
 */
export interface GlobalOptions extends ReportOptions {
  /** Release given priority 990 */
  targetRelease?: string;
  /** YAML configuration file */
  configFile?: string;
  /** "key=value" configuration overrides */
  option: string[];
  /** Root directory the default paths live under */
  root?: string;
  /** Accepted for compatibility, has no effect */
  initialize: boolean;
  /** Enable verbose diagnostics */
  verbose: boolean;
}

/**
 * Command context passed to command handlers
 */
export interface CommandContext {
  /** Parsed CLI options */
  options: GlobalOptions;
  /** Environment used for settings resolution */
  env: NodeJS.ProcessEnv;
  /** Policy engine factory; AptPolicy when absent */
  createPolicy?: (options: PolicyOptions) => PolicyEngine;
}

/**
 * Result of a command execution
 */
export interface CommandResult<T = unknown> {
  success: boolean;
  message: string;
  /** Process exit status */
  exitCode: number;
  data?: T;
  errors?: string[];
}
