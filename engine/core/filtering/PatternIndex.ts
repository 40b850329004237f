/**
 * Pattern Index
 * Glob matching of item labels for search-driven visibility
 *
 * Syntax (full-string, case-sensitive):
 * - `*`       any run of characters, including none
 * - `?`       exactly one character
 * - `[abc]`   one character from the set; ranges like `[a-z]` allowed
 * - `[!abc]`  one character not in the set
 * An unterminated `[` matches itself.
 */

import type { ItemSource } from '../data/ListModel.js';
import type { RowId } from '../types/index.js';

const MAX_CACHED_PATTERNS = 256;

const compiled: Map<string, RegExp> = new Map();

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

function escapeSetChar(char: string): string {
  return /[\\\]^-]/.test(char) ? `\\${char}` : char;
}

/**
 * Character class for a `[...]` body. Reversed ranges such as `z-a` are
 * empty and dropped; a set left with no members never matches (or, negated,
 * matches any character).
 */
function compileSet(body: string, negate: boolean): string {
  let members = '';
  let k = 0;

  while (k < body.length) {
    if (body[k + 1] === '-' && k + 2 < body.length) {
      const start = body[k];
      const end = body[k + 2];
      if (start <= end) {
        members += `${escapeSetChar(start)}-${escapeSetChar(end)}`;
      }
      k += 3;
    } else {
      members += escapeSetChar(body[k]);
      k++;
    }
  }

  if (!members) {
    return negate ? '[\\s\\S]' : '(?!)';
  }
  return `[${negate ? '^' : ''}${members}]`;
}

/**
 * Translate a glob pattern into an anchored regular expression.
 */
export function compilePattern(pattern: string): RegExp {
  const cached = compiled.get(pattern);
  if (cached) {
    return cached;
  }

  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const char = pattern[i];
    i++;

    if (char === '*') {
      // Collapse runs of '*'
      while (pattern[i] === '*') i++;
      source += '[\\s\\S]*';
    } else if (char === '?') {
      source += '[\\s\\S]';
    } else if (char === '[') {
      let j = i;
      if (pattern[j] === '!') j++;
      if (pattern[j] === ']') j++;
      while (j < pattern.length && pattern[j] !== ']') j++;

      if (j >= pattern.length) {
        source += '\\[';
        continue;
      }

      let body = pattern.slice(i, j);
      i = j + 1;

      const negate = body.startsWith('!');
      if (negate) {
        body = body.slice(1);
      }
      source += compileSet(body, negate);
    } else {
      source += escapeRegExp(char);
    }
  }

  const regex = new RegExp(`^${source}$`);

  if (compiled.size >= MAX_CACHED_PATTERNS) {
    compiled.clear();
  }
  compiled.set(pattern, regex);

  return regex;
}

/**
 * Test a label against a glob pattern.
 */
export function matchPattern(label: string, pattern: string): boolean {
  return compilePattern(pattern).test(label);
}

/**
 * Rows whose label matches, in row order.
 */
export function filterRowsByPattern(
  source: ItemSource,
  pattern: string,
  column: number = 0
): RowId[] {
  const regex = compilePattern(pattern);
  const rows: RowId[] = [];
  const rowCount = source.getRowCount();

  for (let row = 0; row < rowCount; row++) {
    if (regex.test(source.getLabel(row, column))) {
      rows.push(row);
    }
  }

  return rows;
}

/**
 * Wrap free search text so it matches anywhere in a label.
 */
export function searchPattern(text: string): string {
  return `*${text}*`;
}
