import { describe, expect, test } from 'vitest';
import {
  encodePartialMatch,
  isExactMatch,
  isPartialMatch,
  partialMatchIndex,
  REFERENCE_NOT_FOUND,
  searchReference,
} from '../references/reference-search.js';

const WORDS = [
  '&zero', '&one', '&two', '&three', '&four', '&five',
  '&six', '&seven', '&eight', '&nine', '&ten', '&eleven',
  '&twelve', '&thirteen', '&fourteen', '&fifteen', '&sixteen',
];

function search(names: readonly string[], text: string): number {
  return searchReference(names, text, 0, text.length);
}

/** Longest name that is a strict prefix of `text`, by brute force. */
function longestPrefix(names: readonly string[], text: string): string | undefined {
  let best: string | undefined;
  for (const name of names) {
    if (name.length < text.length && text.startsWith(name) && (!best || name.length > best.length))
      best = name;
  }
  return best;
}

describe('searchReference', () => {
  test('tables of every size from 1 to 15 names', () => {
    for (let size = 1; size <= 15; size++) {
      const names = WORDS.slice(0, size).sort();
      for (let j = 0; j < WORDS.length; j++) {
        const text = WORDS[j];
        const result = search(names, text);
        if (j < size) {
          expect(isExactMatch(result)).toBe(true);
          expect(names[result]).toBe(text);
          continue;
        }
        const prefix = longestPrefix(names, text);
        if (prefix === undefined) {
          expect(result).toBe(REFERENCE_NOT_FOUND);
        } else {
          expect(isPartialMatch(result)).toBe(true);
          expect(names[partialMatchIndex(result)]).toBe(prefix);
        }
      }
    }
  });

  test('&sixteen falls back to &six', () => {
    const names = WORDS.slice(0, 7).sort();
    const result = search(names, '&sixteen');
    expect(names[partialMatchIndex(result)]).toBe('&six');
  });

  test('exact match beats the shorter prefix', () => {
    const names = ['&not', '&notin;'];
    expect(search(names, '&notin;')).toBe(1);
  });

  test('partial match when the longer name does not fit', () => {
    const names = ['&not', '&notin;'];
    expect(search(names, '&notfoo;')).toBe(encodePartialMatch(0));
  });

  test('finds the prefix even when the binary search never visits it', () => {
    const names = ['&no', '&noa', '&nob', '&noc', '&nod', '&noe', '&nof', '&nog'];
    const result = searchReference(names, '&nox', 0, 4, 3);
    expect(result).toBe(-2);
    expect(partialMatchIndex(result)).toBe(0);
  });

  test('prefers the longest of several prefixes', () => {
    const names = ['&a', '&ab', '&abc', '&abd'];
    expect(partialMatchIndex(search(names, '&abcx'))).toBe(2);
    expect(partialMatchIndex(search(names, '&abz'))).toBe(1);
  });

  test('not found', () => {
    expect(search(['&not', '&notin;'], '&zzz;')).toBe(REFERENCE_NOT_FOUND);
    expect(search([], '&amp;')).toBe(REFERENCE_NOT_FOUND);
  });

  test('a longer name is never a match for a shorter text', () => {
    expect(search(['&notin;'], '&not')).toBe(REFERENCE_NOT_FOUND);
  });

  test('searches a slice of a larger text', () => {
    expect(searchReference(['&not', '&not;'], 'xx&not;yy', 2, 7)).toBe(1);
  });
});
