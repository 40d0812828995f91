/**
 * Shell-style wildcard matching against whole names.
 *
 *   *        any run of characters, '/' included
 *   ?        exactly one character
 *   [abc]    one of the listed characters, ranges allowed (`[0-9]`)
 *   [!abc]   any character not listed
 *
 * A ']' right after '[' or '[!' is a literal member. An unterminated '['
 * matches itself. There is no escape character and matching is case-sensitive.
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

function escapeLiteral(ch: string): string {
  return ch.replace(REGEX_SPECIAL, '\\$&');
}

function escapeClassMember(ch: string): string {
  return /[\\\]\[^-]/.test(ch) ? `\\${ch}` : ch;
}

/**
 * Translate the body of a bracket expression.
 * Reversed ranges (`z-a`) are dropped, as they can never match.
 */
function translateClass(members: string[], negated: boolean): string {
  const parts: string[] = [];

  let k = 0;
  while (k < members.length) {
    const lo = members[k] ?? '';
    const dash = members[k + 1];
    const hi = members[k + 2];
    if (dash === '-' && hi !== undefined) {
      if ((lo.codePointAt(0) ?? 0) <= (hi.codePointAt(0) ?? 0)) {
        parts.push(`${escapeClassMember(lo)}-${escapeClassMember(hi)}`);
      }
      k += 3;
    } else {
      parts.push(escapeClassMember(lo));
      k += 1;
    }
  }

  if (parts.length === 0) {
    // `[!]`-style leftovers: an empty set never matches, its negation matches anything
    return negated ? '.' : '(?!)';
  }
  return `[${negated ? '^' : ''}${parts.join('')}]`;
}

/**
 * Compile a glob pattern into an anchored regular expression
 */
export function compileGlob(pattern: string): RegExp {
  const chars = Array.from(pattern);
  let source = '';
  let i = 0;

  for (let ch = chars[i]; ch !== undefined; ch = chars[i]) {
    i++;

    if (ch === '*') {
      while (chars[i] === '*') i++;
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      let j = i;
      const negated = chars[j] === '!';
      if (negated) j++;
      if (chars[j] === ']') j++;
      while (j < chars.length && chars[j] !== ']') j++;

      if (j >= chars.length) {
        source += '\\[';
      } else {
        const body = chars.slice(negated ? i + 1 : i, j);
        source += translateClass(body, negated);
        i = j + 1;
      }
    } else {
      source += escapeLiteral(ch);
    }
  }

  return new RegExp(`^(?:${source})$`, 'su');
}

/**
 * True when `pattern` matches all of `name`
 */
export function matchGlob(name: string, pattern: string): boolean {
  return compileGlob(pattern).test(name);
}
