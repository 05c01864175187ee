/**
 * Configuration error types
 *
 * Configuration problems are reported before the cache is touched and
 * end the run with exit code 1.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ConfigErrorCode =
  | 'CONFLICTING_OPTIONS'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_ERROR'
  | 'UNKNOWN_KEY'
  | 'INVALID_VALUE'
  | 'INVALID_OVERRIDE';

/**
 * A single configuration issue
 */
export interface ConfigIssue {
  /** Error code for programmatic handling */
  code: ConfigErrorCode;
  /** Human-readable error message */
  message: string;
  /** Setting or option the issue is about (e.g. "listsDir", "--no-hold") */
  path: string;
  /** Suggestions for fixing the issue */
  suggestions?: string[];
}

// =============================================================================
// Error Class
// =============================================================================

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: ConfigIssue[]
  ) {
    super(message);
    this.name = 'ConfigError';
  }

  get code(): ConfigErrorCode | undefined {
    return this.issues[0]?.code;
  }

  /**
   * Format the issues for display
   */
  formatErrors(): string {
    const lines: string[] = [];

    for (const issue of this.issues) {
      lines.push(`[${issue.code}] ${issue.path}: ${issue.message}`);
      if (issue.suggestions?.length) {
        for (const suggestion of issue.suggestions) {
          lines.push(`  • ${suggestion}`);
        }
      }
    }

    return lines.join('\n');
  }
}

/**
 * Build an error from a single issue
 */
export function configError(issue: ConfigIssue): ConfigError {
  return new ConfigError(issue.message, [issue]);
}

// =============================================================================
// Issue Builders
// =============================================================================

export function conflictingOptions(path: string, message: string): ConfigIssue {
  return {
    code: 'CONFLICTING_OPTIONS',
    message,
    path,
  };
}

export function unknownKey(key: string, known: readonly string[]): ConfigIssue {
  return {
    code: 'UNKNOWN_KEY',
    message: `Unknown setting "${key}"`,
    path: key,
    suggestions: [`Known settings: ${known.join(', ')}`],
  };
}

export function invalidValue(key: string, expected: string): ConfigIssue {
  return {
    code: 'INVALID_VALUE',
    message: `Setting "${key}" must be ${expected}`,
    path: key,
  };
}
