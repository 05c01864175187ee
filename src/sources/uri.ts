/**
 * Mapping archive URIs to file names under the APT lists directory
 */

/** Characters APT percent-quotes in lists file names */
const QUOTED_CHARACTERS = '\\|{}[]<>"^~_=!@#$%^&*';

function quote(value: string): string {
  let result = '';
  for (const ch of value) {
    const code = ch.charCodeAt(0);
    if (code <= 0x20 || code >= 0x7f || QUOTED_CHARACTERS.includes(ch)) {
      result += '%' + code.toString(16).padStart(2, '0');
    } else {
      result += ch;
    }
  }
  return result;
}

/**
 * Convert a URI into its lists file name: scheme and credentials dropped,
 * special characters quoted, "/" replaced by "_".
 *
 * @example
 * uriToFileName('http://deb.debian.org/debian/dists/bookworm/InRelease')
 * // 'deb.debian.org_debian_dists_bookworm_InRelease'
 */
export function uriToFileName(uri: string): string {
  let rest = uri;

  const scheme = /^[a-zA-Z][a-zA-Z0-9+.-]*:/.exec(rest);
  if (scheme) {
    rest = rest.substring(scheme[0].length);
  }

  if (rest.startsWith('//')) {
    rest = rest.substring(2);
    const slashIndex = rest.indexOf('/');
    const authority = slashIndex < 0 ? rest : rest.substring(0, slashIndex);
    const path = slashIndex < 0 ? '' : rest.substring(slashIndex);
    const atIndex = authority.lastIndexOf('@');
    rest = (atIndex < 0 ? authority : authority.substring(atIndex + 1)) + path;
  }

  return quote(rest).replace(/\//g, '_');
}

/**
 * Host part of a URI, or an empty string for local archives
 */
export function uriSite(uri: string): string {
  const match = /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\/(?:[^@/]*@)?([^/]*)/.exec(uri);
  return match ? match[1] : '';
}

/**
 * Normalize an archive root so it always ends in "/"
 */
export function withTrailingSlash(uri: string): string {
  return uri.endsWith('/') ? uri : `${uri}/`;
}
