/**
 * Errors raised while loading the package cache
 */

export type CacheLoadErrorCode =
  | 'STATUS_FILE_UNREADABLE'
  | 'SOURCE_LIST_UNREADABLE'
  | 'SOURCE_LIST_MALFORMED'
  | 'INDEX_UNREADABLE'
  | 'PREFERENCES_MALFORMED';

/**
 * The cache could not be built; the report cannot run
 */
export class CacheLoadError extends Error {
  constructor(
    message: string,
    public readonly code: CacheLoadErrorCode,
    public readonly path?: string,
    public readonly suggestion?: string
  ) {
    super(message);
    this.name = 'CacheLoadError';
  }

  /**
   * Get a user-friendly formatted error message
   */
  toUserMessage(): string {
    let msg = `Error: ${this.message}`;
    if (this.suggestion) {
      msg += `\n\nSuggestion: ${this.suggestion}`;
    }
    return msg;
  }
}

/**
 * Error thrown when the source list has a line or stanza APT would reject
 */
export class MalformedSourceError extends CacheLoadError {
  constructor(origin: string, reason: string) {
    super(
      `Malformed entry ${origin} (${reason})`,
      'SOURCE_LIST_MALFORMED',
      origin.replace(/:\d+$/, ''),
      'Fix or comment out the entry in the source list'
    );
    this.name = 'MalformedSourceError';
  }
}

/**
 * Error thrown when a stanza in the APT preferences cannot be used
 */
export class MalformedPreferencesError extends CacheLoadError {
  constructor(origin: string, reason: string) {
    super(
      `Invalid preferences record ${origin} (${reason})`,
      'PREFERENCES_MALFORMED',
      origin.replace(/:\d+$/, ''),
      'Every record needs Package, Pin and an integer Pin-Priority'
    );
    this.name = 'MalformedPreferencesError';
  }
}
