/**
 * Shell-style wildcard matching with fnmatch semantics: `*` and `?` also match
 * path separators, `[seq]` and `[!seq]` match character classes, and the match
 * is case-sensitive and anchored at both ends.
 */

const REGEX_SPECIAL = /[.*+?^${}()|[\]\\/]/g;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIAL, '\\$&');
}

/**
 * Translate a wildcard pattern to an anchored regular expression source
 */
export function translatePattern(pattern: string): string {
  let out = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern.charAt(i);
    i++;

    if (ch === '*') {
      // Collapse runs of stars
      while (pattern.charAt(i) === '*') i++;
      out += '.*';
    } else if (ch === '?') {
      out += '.';
    } else if (ch === '[') {
      let j = i;
      if (pattern.charAt(j) === '!') j++;
      // A leading ']' is part of the set
      if (pattern.charAt(j) === ']') j++;
      while (j < pattern.length && pattern.charAt(j) !== ']') j++;

      if (j >= pattern.length) {
        out += '\\[';
        continue;
      }

      let set = pattern.slice(i, j).replace(/\\/g, '\\\\');
      i = j + 1;
      if (set.startsWith('!')) {
        set = '^' + set.slice(1);
      } else if (set.startsWith('^')) {
        set = '\\' + set;
      }
      out += `[${set.replace(/\]/g, '\\]')}]`;
    } else {
      out += escapeRegex(ch);
    }
  }

  return `^${out}$`;
}

const cache = new Map<string, RegExp>();

export function fnmatch(name: string, pattern: string): boolean {
  let regex = cache.get(pattern);
  if (!regex) {
    regex = new RegExp(translatePattern(pattern), 's');
    cache.set(pattern, regex);
  }
  return regex.test(name);
}
