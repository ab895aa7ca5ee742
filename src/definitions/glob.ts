/**
 * Shell-style glob patterns for node types, case-sensitive.
 *
 *   *        any run of characters
 *   ?        one character
 *   [abc]    one of a set (ranges allowed)
 *   [!abc]   none of a set
 *
 * A '[' without a closing ']' matches itself.
 */

const patternCache = new Map<string, RegExp>();

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function translate(pattern: string): string {
  let out = '';
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i];
    i++;

    if (char === '*') {
      out += '.*';
    } else if (char === '?') {
      out += '.';
    } else if (char === '[') {
      let j = i;
      if (j < pattern.length && pattern[j] === '!') j++;
      if (j < pattern.length && pattern[j] === ']') j++;
      while (j < pattern.length && pattern[j] !== ']') j++;

      if (j >= pattern.length) {
        out += '\\[';
        continue;
      }

      let body = pattern.slice(i, j).replace(/\\/g, '\\\\').replace(/]/g, '\\]');
      i = j + 1;
      if (body.startsWith('!')) {
        body = '^' + body.slice(1);
      } else if (body.startsWith('^')) {
        body = '\\' + body;
      }
      out += `[${body}]`;
    } else {
      out += escapeRegex(char);
    }
  }

  return `^${out}$`;
}

export function globToRegExp(pattern: string): RegExp {
  let regex = patternCache.get(pattern);
  if (!regex) {
    regex = new RegExp(translate(pattern), 's');
    patternCache.set(pattern, regex);
  }
  return regex;
}

/**
 * @example
 * matchesGlob('listItem', 'list*');   // → true
 * matchesGlob('h2', 'h[1-3]');        // → true
 * matchesGlob('Text', 'text');        // → false
 */
export function matchesGlob(value: string, pattern: string): boolean {
  return globToRegExp(pattern).test(value);
}
