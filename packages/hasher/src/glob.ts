/**
 * File-name glob matching (`*`, `?`, `[abc]`, `[a-z]`, `[!abc]`)
 */

const REGEX_SPECIALS = /[\\^$.*+?()[\]{}|/]/g;

/**
 * Compile a file-name glob into an anchored regular expression
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i];

    if (char === '*') {
      source += '.*';
      i++;
    } else if (char === '?') {
      source += '.';
      i++;
    } else if (char === '[') {
      const close = findClassEnd(pattern, i);
      if (close === -1) {
        // Unterminated class matches a literal bracket
        source += '\\[';
        i++;
        continue;
      }
      let body = pattern.slice(i + 1, close);
      let negate = false;
      if (body.startsWith('!')) {
        negate = true;
        body = body.slice(1);
      }
      source += `[${negate ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
      i = close + 1;
    } else {
      source += char.replace(REGEX_SPECIALS, '\\$&');
      i++;
    }
  }

  return new RegExp(`^${source}$`, 's');
}

function findClassEnd(pattern: string, open: number): number {
  let j = open + 1;
  if (pattern[j] === '!') j++;
  // A leading `]` is a member, not the terminator
  if (pattern[j] === ']') j++;
  return pattern.indexOf(']', j);
}

/**
 * Matcher for a `/`-separated glob over paths given as segments relative to
 * the search root. Anchored patterns must cover the whole path; unanchored
 * ones match its trailing segments, so `logs/*.log` finds `a/logs/x.log`.
 */
export function pathGlobMatcher(
  pattern: string,
  anchored: boolean
): (segments: readonly string[]) => boolean {
  const parts = pattern.split('/').filter(part => part !== '');
  const matchers = (parts.length > 0 ? parts : ['*']).map(globToRegExp);

  return segments => {
    if (anchored ? segments.length !== matchers.length : segments.length < matchers.length) {
      return false;
    }
    const offset = segments.length - matchers.length;
    return matchers.every((matcher, index) => matcher.test(segments[offset + index] ?? ''));
  };
}

/**
 * Test a file name against a glob
 */
export function matchesGlob(name: string, pattern: string): boolean {
  return globToRegExp(pattern).test(name);
}
