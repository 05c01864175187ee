/**
 * Debian version ordering
 * Format: [epoch:]upstream_version[-debian_revision]
 */

export interface DebianVersion {
  epoch: number;
  upstream: string;
  revision: string;
}

/**
 * Split a version string into epoch, upstream version and revision
 */
export function parseDebianVersion(version: string): DebianVersion {
  const trimmed = version.trim();

  let epoch = 0;
  let rest = trimmed;
  const colonIndex = trimmed.indexOf(':');
  if (colonIndex > 0 && /^\d+$/.test(trimmed.substring(0, colonIndex))) {
    epoch = parseInt(trimmed.substring(0, colonIndex), 10);
    rest = trimmed.substring(colonIndex + 1);
  }

  const dashIndex = rest.lastIndexOf('-');
  if (dashIndex < 0) {
    return { epoch, upstream: rest, revision: '' };
  }

  return {
    epoch,
    upstream: rest.substring(0, dashIndex),
    revision: rest.substring(dashIndex + 1),
  };
}

function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch >= '0' && ch <= '9';
}

function isAlpha(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

/**
 * Sort weight of a non-digit character: "~" sorts before the end of the
 * string, letters before everything else.
 */
function order(ch: string | undefined): number {
  if (ch === undefined || isDigit(ch)) return 0;
  if (isAlpha(ch)) return ch.charCodeAt(0);
  if (ch === '~') return -1;
  return ch.charCodeAt(0) + 256;
}

/**
 * Compare two upstream or revision fragments the way dpkg does
 */
function compareFragment(a: string, b: string): number {
  let i = 0;
  let j = 0;

  while (i < a.length || j < b.length) {
    let firstDiff = 0;

    while ((i < a.length && !isDigit(a[i])) || (j < b.length && !isDigit(b[j]))) {
      const ac = order(a[i]);
      const bc = order(b[j]);
      if (ac !== bc) return ac - bc;
      i++;
      j++;
    }

    while (a[i] === '0') i++;
    while (b[j] === '0') j++;

    while (isDigit(a[i]) && isDigit(b[j])) {
      if (firstDiff === 0) {
        firstDiff = a.charCodeAt(i) - b.charCodeAt(j);
      }
      i++;
      j++;
    }

    if (isDigit(a[i])) return 1;
    if (isDigit(b[j])) return -1;
    if (firstDiff !== 0) return firstDiff;
  }

  return 0;
}

/**
 * Compare two Debian version strings.
 * Returns a negative number, zero or a positive number.
 */
export function compareVersions(a: string, b: string): number {
  const verA = parseDebianVersion(a);
  const verB = parseDebianVersion(b);

  if (verA.epoch !== verB.epoch) return verA.epoch - verB.epoch;

  const upstreamCmp = compareFragment(verA.upstream, verB.upstream);
  if (upstreamCmp !== 0) return upstreamCmp;

  return compareFragment(verA.revision, verB.revision);
}

