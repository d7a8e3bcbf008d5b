/**
 * Binary search over ordinal-sorted reference names that also reports the
 * longest name which is a strict prefix of the searched text, so that
 * `&notit;` resolves to `&not` followed by `it;`.
 *
 * Results are plain numbers to keep the unescape loop allocation-free:
 *   index >= 0       exact match at index
 *   -1               no match
 *   -(index + 2)     partial match at index
 */

export const REFERENCE_NOT_FOUND = -1;

export function isExactMatch(result: number): boolean {
  return result >= 0;
}

export function isPartialMatch(result: number): boolean {
  return result < REFERENCE_NOT_FOUND;
}

export function partialMatchIndex(result: number): number {
  return -result - 2;
}

export function encodePartialMatch(index: number): number {
  return -(index + 2);
}

const enum Comparison {
  /** Name sorts before the text and is not a prefix of it. */
  Less = 0,
  /** Name sorts after the text. */
  Greater = 1,
  Equal = 2,
  /** Name is a strict prefix of the text (and so sorts before it). */
  Prefix = 3,
}

function compareName(name: string, text: string, start: number, end: number): Comparison {
  const textLength = end - start;
  const common = name.length < textLength ? name.length : textLength;
  for (let i = 0; i < common; i++) {
    const nameChar = name.charCodeAt(i);
    const textChar = text.charCodeAt(start + i);
    if (nameChar !== textChar)
      return nameChar < textChar ? Comparison.Less : Comparison.Greater;
  }
  if (name.length === textLength) return Comparison.Equal;
  return name.length < textLength ? Comparison.Prefix : Comparison.Greater;
}

function sharedPrefixLength(name: string, text: string, start: number, end: number): number {
  const textLength = end - start;
  const common = name.length < textLength ? name.length : textLength;
  let i = 0;
  while (i < common && name.charCodeAt(i) === text.charCodeAt(start + i)) i++;
  return i;
}

/**
 * Searches `text.substring(start, end)` in `sortedNames`.
 * `shortestNameLength` bounds the backward scan for partial matches.
 */
export function searchReference(
  sortedNames: readonly string[],
  text: string,
  start: number,
  end: number,
  shortestNameLength = 1): number {
  let low = 0;
  let high = sortedNames.length - 1;
  let bestPartial = REFERENCE_NOT_FOUND;
  let bestPartialLength = 0;

  while (low <= high) {
    const mid = (low + high) >>> 1;
    const name = sortedNames[mid];
    const comparison = compareName(name, text, start, end);

    if (comparison === Comparison.Equal) return mid;

    if (comparison === Comparison.Greater) {
      high = mid - 1;
      continue;
    }

    if (comparison === Comparison.Prefix && name.length > bestPartialLength) {
      bestPartial = mid;
      bestPartialLength = name.length;
    }
    low = mid + 1;
  }

  // Every prefix of the text sorts before `low`, and the longest one sorts
  // last among them. Shared prefix length only shrinks going backward.
  for (let i = low - 1; i >= 0; i--) {
    const name = sortedNames[i];
    const shared = sharedPrefixLength(name, text, start, end);
    if (shared <= bestPartialLength || shared < shortestNameLength) break;
    if (shared === name.length) {
      bestPartial = i;
      bestPartialLength = shared;
      break;
    }
  }

  return bestPartial === REFERENCE_NOT_FOUND ? REFERENCE_NOT_FOUND : encodePartialMatch(bestPartial);
}
