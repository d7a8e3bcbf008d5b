/**
 * Per-codepoint escape levels: a codepoint must be escaped when the
 * requested level is greater than or equal to the level stored for it.
 * Codepoints below `indexedLength` get their own slot, everything above
 * shares the single slot at the end of the table.
 */

export interface EscapeLevelRange {
  from: number;
  /** Inclusive. Defaults to `from`. */
  to?: number;
  level: number;
}

export interface EscapeLevelPolicy {
  levelOf(codepoint: number): number;
  mustEscape(codepoint: number, level: number): boolean;
  readonly indexedLength: number;
}

export interface EscapeLevelPolicyOptions {
  indexedLength: number;
  /** Level of indexed codepoints not named by any range. */
  defaultLevel: number;
  /** Level shared by every codepoint at or above `indexedLength`. */
  beyondLevel: number;
  /** Applied in order, later ranges overwrite earlier ones. */
  ranges: readonly EscapeLevelRange[];
}

const MAX_LEVEL = 0xFF;

export function createEscapeLevelPolicy({ indexedLength, defaultLevel, beyondLevel, ranges }:
  EscapeLevelPolicyOptions): EscapeLevelPolicy {
  if (!Number.isInteger(indexedLength) || indexedLength <= 0)
    throw new Error('EscapeLevelPolicy: indexedLength must be a positive integer');
  checkLevel(defaultLevel);
  checkLevel(beyondLevel);

  const levels = new Uint8Array(indexedLength + 1);
  levels.fill(defaultLevel, 0, indexedLength);
  levels[indexedLength] = beyondLevel;

  for (const { from, to = from, level } of ranges) {
    checkLevel(level);
    if (from < 0 || to < from || to >= indexedLength)
      throw new Error(`EscapeLevelPolicy: range ${from}..${to} is outside 0..${indexedLength - 1}`);
    levels.fill(level, from, to + 1);
  }

  function levelOf(codepoint: number): number {
    return codepoint < indexedLength ? levels[codepoint] : levels[indexedLength];
  }

  function mustEscape(codepoint: number, level: number): boolean {
    return level >= levelOf(codepoint);
  }

  return { levelOf, mustEscape, indexedLength };
}

function checkLevel(level: number): void {
  if (!Number.isInteger(level) || level < 0 || level > MAX_LEVEL)
    throw new Error(`EscapeLevelPolicy: level ${level} is not an integer in 0..${MAX_LEVEL}`);
}

/** Ranges covering ASCII letters and digits. */
export function alphanumericRanges(level: number): EscapeLevelRange[] {
  return [
    { from: 0x30, to: 0x39, level },
    { from: 0x41, to: 0x5A, level },
    { from: 0x61, to: 0x7A, level },
  ];
}
