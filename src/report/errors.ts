/**
 * Errors raised by the report core. Both indicate a bug rather than a
 * user mistake and are not meant to be caught by the report itself.
 */

/**
 * The classifier found no state for an installed package
 */
export class UnreachableStateError extends Error {
  constructor(
    public readonly packageName: string,
    public readonly installedVersion: string
  ) {
    super(
      `No upgrade state applies to ${packageName} ${installedVersion}; the cache data is inconsistent`
    );
    this.name = 'UnreachableStateError';
  }
}

/**
 * A table row did not have one cell per column
 */
export class TableShapeError extends Error {
  constructor(
    public readonly expected: number,
    public readonly actual: number
  ) {
    super(`Table row has ${actual} cell(s), expected ${expected}`);
    this.name = 'TableShapeError';
  }
}
