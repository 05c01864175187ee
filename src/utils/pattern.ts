/**
 * Name matching helpers shared by package selection and pinning
 */

/** Characters that make an argument an fnmatch-style glob */
const GLOB_CHARACTERS = /[*?[]/;

/** Characters that make an argument a regular expression */
const REGEX_CHARACTERS = /[.?+*|[^$]/;

export function isGlob(pattern: string): boolean {
  return GLOB_CHARACTERS.test(pattern);
}

export function isRegex(pattern: string): boolean {
  return REGEX_CHARACTERS.test(pattern);
}

/**
 * Convert an fnmatch-style glob into an anchored regular expression.
 * Supports "*", "?" and "[...]" classes (with "!" or "^" negation).
 */
export function globToRegExp(glob: string): RegExp {
  let source = '';

  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];

    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const close = glob.indexOf(']', i + 2);
      if (close < 0) {
        source += '\\[';
        continue;
      }
      let body = glob.substring(i + 1, close);
      if (body.startsWith('!')) {
        body = '^' + body.substring(1);
      }
      source += `[${body.replace(/\\/g, '\\\\')}]`;
      i = close;
    } else {
      source += ch.replace(/[.+^${}()|\\/]/g, '\\$&');
    }
  }

  return new RegExp(`^${source}$`);
}

/**
 * Test a value against a glob
 */
export function matchGlob(glob: string, value: string): boolean {
  return globToRegExp(glob).test(value);
}
