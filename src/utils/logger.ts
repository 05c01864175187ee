/**
 * Leveled diagnostic logging
 *
 * Diagnostics always go to stderr; stdout is reserved for the report so
 * its lines stay usable in scripts.
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels in order of severity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Additional context data */
  context?: Record<string, unknown>;
  /** Error details (if applicable) */
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Output as JSON (default: false for human-readable) */
  json?: boolean;
  /** Include timestamps (default: false) */
  timestamps?: boolean;
  /** Where formatted entries are written (default: stderr) */
  sink?: (line: string) => void;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Log level numeric values for comparison
 */
const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Environment variable selecting the minimum level */
export const ENV_LOG_LEVEL = 'APT_SHOW_VERSIONS_LOG_LEVEL';

/** Environment variable switching to JSON output */
export const ENV_LOG_JSON = 'APT_SHOW_VERSIONS_LOG_JSON';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVEL_VALUES;
}

function writeStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private config: Required<LoggerConfig>;

  constructor(
    config: LoggerConfig = {},
    private readonly boundContext: Record<string, unknown> = {}
  ) {
    this.config = {
      level: config.level ?? 'warn',
      json: config.json ?? false,
      timestamps: config.timestamps ?? false,
      sink: config.sink ?? writeStderr,
    };
  }

  /**
   * Check if a log level should be output
   */
  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.config.level];
  }

  private createEntry(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const merged = { ...this.boundContext, ...context };
    if (Object.keys(merged).length > 0) {
      entry.context = merged;
    }

    if (error) {
      entry.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    }

    return entry;
  }

  /**
   * Format entry for output
   */
  private formatEntry(entry: LogEntry): string {
    if (this.config.json) {
      return JSON.stringify(entry);
    }

    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${entry.timestamp}]`);
    }

    parts.push(`[${entry.level.toUpperCase()}]`);
    parts.push(entry.message);

    if (entry.context) {
      parts.push(JSON.stringify(entry.context));
    }

    if (entry.error) {
      parts.push(`\n  Error: ${entry.error.name}: ${entry.error.message}`);
    }

    return parts.join(' ');
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!this.shouldLog(level)) return;
    this.config.sink(this.formatEntry(this.createEntry(level, message, context, error)));
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log('error', message, context, error);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger(this.config, { ...this.boundContext, ...context });
  }

  /**
   * Update logger configuration
   */
  setConfig(config: Partial<LoggerConfig>): void {
    Object.assign(this.config, config);
  }
}

// =============================================================================
// Default Logger Instance
// =============================================================================

const envLevel = process.env[ENV_LOG_LEVEL];

/**
 * Default logger instance
 */
export const logger = new Logger({
  level: isLogLevel(envLevel) ? envLevel : undefined,
  json: process.env[ENV_LOG_JSON] === 'true',
});

/**
 * Create a new logger with custom configuration
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return new Logger(config);
}
