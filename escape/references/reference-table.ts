import { ReferenceTableError } from '../errors.js';

/**
 * One entry of reference data: every alias name in `names` stands for the
 * same one or two codepoints. Names carry their marker, e.g. `&amp;`.
 */
export interface ReferenceRecord {
  names: readonly string[];
  codepoints: readonly number[];
}

export interface ReferenceTableOptions {
  /** Character every name starts with. Defaults to `&`. */
  marker?: string;
  /** Terminator a name must end with to be used for escaping. Defaults to `;`. */
  terminator?: string;
  /** Codepoints below this get a slot in the dense index. Defaults to 0x2FFF. */
  denseLength?: number;
  /**
   * Orders the candidate names for one codepoint; the first wins.
   * Defaults to shortest first. Ties keep declaration order.
   */
  compareCanonicalNames?: (a: string, b: string) => number;
}

/**
 * Immutable index of named references, searchable by name (for unescaping)
 * and by codepoint (for escaping).
 */
export interface ReferenceTable {
  /** Ordinal-sorted names, marker included. */
  readonly sortedNames: readonly string[];

  /**
   * Aligned with `sortedNames`: a codepoint, or `-(i + 1)` pointing at
   * `doubleCodepoints[i]`.
   */
  readonly codepointForName: Int32Array;

  readonly doubleCodepoints: readonly (readonly [number, number])[];

  readonly marker: string;
  readonly terminator: string;

  /** Length of the shortest name, marker included. */
  readonly shortestNameLength: number;

  /** Index into `sortedNames` of the canonical name for escaping, or -1. */
  nameIndexOf(codepoint: number): number;

  /** Text a name at `index` in `sortedNames` expands to. */
  textAt(index: number): string;

  fillDebugState(state: ReferenceTableDebugState): void;
}

export interface ReferenceTableDebugState {
  nameCount: number;
  doubleCount: number;
  denseCount: number;
  overflowCount: number;
  shortestNameLength: number;
}

/** Dense slot value meaning "no reference". */
const NO_REFERENCE = -1;

// Dense slots are 16-bit.
const MAX_NAMES = 0x7FFF;

const DEFAULT_DENSE_LENGTH = 0x2FFF;

function compareByLength(a: string, b: string): number {
  return a.length - b.length;
}

function compareOrdinal(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function buildReferenceTable(records: readonly ReferenceRecord[], {
  marker = '&',
  terminator = ';',
  denseLength = DEFAULT_DENSE_LENGTH,
  compareCanonicalNames = compareByLength,
}: ReferenceTableOptions = {}): ReferenceTable {
  if (marker.length !== 1)
    throw new ReferenceTableError('ReferenceTable: marker must be a single character');
  if (terminator.length !== 1)
    throw new ReferenceTableError('ReferenceTable: terminator must be a single character');

  // name -> codepoint value as stored in codepointForName
  const valueByName = new Map<string, number>();
  const doubleCodepoints: (readonly [number, number])[] = [];
  // codepoint -> canonical name while building
  const canonicalByCodepoint = new Map<number, string>();

  for (const record of records) {
    const { names, codepoints } = record;
    if (codepoints.length === 0 || codepoints.length > 2)
      throw new ReferenceTableError(
        `ReferenceTable: reference ${names.join(', ')} must map to one or two codepoints, found ${codepoints.length}`);
    for (const codepoint of codepoints) {
      if (!Number.isInteger(codepoint) || codepoint < 0 || codepoint > 0x10FFFF)
        throw new ReferenceTableError(`ReferenceTable: ${codepoint} is not a valid codepoint`);
    }
    if (names.length === 0)
      throw new ReferenceTableError(`ReferenceTable: codepoints ${codepoints.join(', ')} have no names`);

    let value: number;
    if (codepoints.length === 2) {
      doubleCodepoints.push([codepoints[0], codepoints[1]]);
      value = -doubleCodepoints.length;
    } else {
      value = codepoints[0];
    }

    for (const name of names) {
      if (name.length < 2 || name[0] !== marker)
        throw new ReferenceTableError(`ReferenceTable: name '${name}' must start with '${marker}' and not be empty`);
      if (valueByName.has(name))
        throw new ReferenceTableError(`ReferenceTable: name '${name}' is declared more than once`);
      valueByName.set(name, value);

      // Double-codepoint names are for unescaping only.
      if (value < 0 || !name.endsWith(terminator)) continue;
      const current = canonicalByCodepoint.get(value);
      if (current === undefined || compareCanonicalNames(name, current) < 0)
        canonicalByCodepoint.set(value, name);
    }
  }

  if (valueByName.size > MAX_NAMES)
    throw new ReferenceTableError(`ReferenceTable: at most ${MAX_NAMES} names are supported, found ${valueByName.size}`);

  const sortedNames = [...valueByName.keys()].sort(compareOrdinal);
  const codepointForName = new Int32Array(sortedNames.length);
  const indexByName = new Map<string, number>();
  let shortestNameLength = sortedNames.length ? Number.MAX_SAFE_INTEGER : 0;
  for (let i = 0; i < sortedNames.length; i++) {
    const name = sortedNames[i];
    codepointForName[i] = valueByName.get(name) ?? 0;
    indexByName.set(name, i);
    if (name.length < shortestNameLength) shortestNameLength = name.length;
  }

  const dense = new Int16Array(denseLength).fill(NO_REFERENCE);
  const overflow = new Map<number, number>();
  for (const [codepoint, name] of canonicalByCodepoint) {
    const index = indexByName.get(name) ?? NO_REFERENCE;
    if (codepoint < denseLength) dense[codepoint] = index;
    else overflow.set(codepoint, index);
  }

  function nameIndexOf(codepoint: number): number {
    if (codepoint < denseLength) return dense[codepoint];
    return overflow.get(codepoint) ?? NO_REFERENCE;
  }

  function textAt(index: number): string {
    const value = codepointForName[index];
    if (value >= 0) return String.fromCodePoint(value);
    const [first, second] = doubleCodepoints[-value - 1];
    return String.fromCodePoint(first, second);
  }

  function fillDebugState(state: ReferenceTableDebugState): void {
    state.nameCount = sortedNames.length;
    state.doubleCount = doubleCodepoints.length;
    state.denseCount = canonicalByCodepoint.size - overflow.size;
    state.overflowCount = overflow.size;
    state.shortestNameLength = shortestNameLength;
  }

  return {
    sortedNames,
    codepointForName,
    doubleCodepoints,
    marker,
    terminator,
    shortestNameLength,
    nameIndexOf,
    textAt,
    fillDebugState,
  };
}
